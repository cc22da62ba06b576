/**
 * # hookloop Shared Types
 *
 * Platform-independent contracts shared across all hookloop packages:
 *
 * - **Host hooks** - the timer, process and readiness hooks a host runtime
 *   exposes, and the callback signature it delivers through
 * - **Errors** - the structured error taxonomy raised to callers
 * - **Callback ids** - opaque ids routing host deliveries back to futures
 *
 * @module @hookloop/shared
 */

export * from "./host.js";
export * from "./errors.js";
export * from "./utils/callback-ids.js";
