/**
 * Single-fire result channel.
 *
 * A producer sends exactly one value (or one failure); the consumer awaits
 * `received`. Sends after the first are ignored and reported through the
 * boolean return, so "deliver once" is enforced by the channel rather than
 * by callers remembering to check a flag.
 *
 * @module concurrency/one-shot
 */

export class OneShot<T> {
	/** Settles with the first value sent, or rejects with the first failure. */
	readonly received: Promise<T>

	private settled = false
	private resolveFn: (value: T) => void = () => {}
	private rejectFn: (error: Error) => void = () => {}

	constructor() {
		this.received = new Promise<T>((resolve, reject) => {
			this.resolveFn = resolve
			this.rejectFn = reject
		})
		// A failure nobody awaits (listener closed early) must not surface as an unhandled rejection
		this.received.catch(() => undefined)
	}

	/**
	 * Deliver the value.
	 *
	 * @returns false if the channel had already fired
	 */
	send(value: T): boolean {
		if (this.settled) return false
		this.settled = true
		this.resolveFn(value)
		return true
	}

	/**
	 * Deliver a failure instead of a value.
	 *
	 * @returns false if the channel had already fired
	 */
	fail(error: Error): boolean {
		if (this.settled) return false
		this.settled = true
		this.rejectFn(error)
		return true
	}

	get isSettled(): boolean {
		return this.settled
	}
}
