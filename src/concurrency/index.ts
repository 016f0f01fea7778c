/**
 * Concurrency primitives used by the authorization flow.
 *
 * ## One-shot channels
 *
 * The callback listener hands its single outcome to the waiting
 * orchestrator through a {@link OneShot}:
 *
 * ```typescript
 * import { OneShot } from "loopback-pkce/concurrency";
 *
 * const channel = new OneShot<CallbackOutcome>();
 * server.on("request", () => channel.send({ kind: "code", code }));
 * const outcome = await channel.received;
 * ```
 *
 * ## Timeouts
 *
 * ```typescript
 * import { withTimeout, TimeoutError } from "loopback-pkce/concurrency";
 *
 * try {
 *   await withTimeout(listener.outcome, 120_000, { onTimeout: () => listener.close() });
 * } catch (error) {
 *   if (error instanceof TimeoutError) console.error(`gave up after ${error.timeoutMs}ms`);
 * }
 * ```
 *
 * @module concurrency
 */

export { OneShot } from './one-shot.ts'
export { TimeoutError, withTimeout, type WithTimeoutOptions } from './timeout.ts'
