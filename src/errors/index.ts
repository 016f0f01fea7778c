/**
 * Error handling utilities and base classes.
 *
 * @module errors
 */

export {
	type ErrorCategory,
	isRecoverableError,
	isStructuredError,
	StructuredError,
	toError,
} from './structured-error.ts'
