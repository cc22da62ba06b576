import type { Scheduler } from "./scheduler.js";

/**
 * Suspend for `delayMs` using the host's one-shot timer hook.
 * Resolves to whatever marker the host delivers.
 */
export async function sleep(scheduler: Scheduler, delayMs: number): Promise<unknown> {
  const future = scheduler.createFuture<unknown>(
    (payload) => ({ type: "value", value: payload }),
    "timer",
  );
  try {
    scheduler.host.hookTimer(delayMs, scheduler.dispatch, future.id);
  } catch (error) {
    scheduler.cancel(future.id);
    throw error;
  }
  return await future;
}
