/**
 * # hookloop Kernel
 *
 * Cooperative scheduling on top of a callback-only host loop. Application
 * code is written as ordinary `async` functions; every `await` on a kernel
 * primitive is a suspension point that the host resumes by delivering a
 * payload to `scheduler.dispatch`.
 *
 * ## Core Primitives
 *
 * - **Future** - single-assignment result cell with one waiter
 * - **Scheduler** - callback registry, `dispatch` entry point, tasks
 * - **sleep** / **runProcess** - timer and process hooks as awaitables
 * - **AsyncCache** - one shared in-flight task per key
 * - **Logger** - structured logging (pino)
 * - **loadConfig** - validated configuration (zod)
 *
 * ## Example
 *
 * ```typescript
 * const scheduler = new Scheduler(host);
 *
 * scheduler.createTask(async () => {
 *   await sleep(scheduler, 1000);
 *   const output = await runProcess(scheduler, "uptime", {}, 5000);
 *   return output.stdout;
 * });
 * ```
 *
 * @module @hookloop/kernel
 */

export * from "./future.js";
export * from "./callback-registry.js";
export * from "./scheduler.js";
export * from "./timer.js";
export * from "./process.js";
export * from "./cache.js";
export * from "./logger.js";
export * from "./config.js";
