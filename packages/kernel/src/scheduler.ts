/**
 * Scheduler
 *
 * Bridges the host's callback-id deliveries to suspended computations.
 *
 * Every async primitive (timer, process, readiness) allocates a {@link Future}
 * through {@link Scheduler.createFuture}, hands `scheduler.dispatch` and the
 * future's id to a host hook, and awaits the future. When the host calls
 * `dispatch(id, payload)`, the registration decodes the payload and settles
 * the future, which resumes exactly the computation awaiting it.
 *
 * The host loop is single-threaded, so dispatches never overlap and the
 * registry needs no locking. A resumed computation runs until its next
 * `await` before the host gets control back; keep that work short.
 */

import { SchedulerShutdownError, type HostCallback, type HostHooks } from "@hookloop/shared";
import { CallbackRegistry, type DeliveryOutcome } from "./callback-registry.js";
import { Future } from "./future.js";
import { Logger } from "./logger.js";

const log = Logger.for("Scheduler");

// ============================================================================
// Types
// ============================================================================

/** What a raw host payload means for the future it is routed to. */
export type Delivery<T> =
  | { type: "value"; value: T }
  | { type: "error"; error: Error }
  /** More deliveries follow; keep the registration open. */
  | { type: "partial" };

export type PayloadDecoder<T> = (payload: unknown) => Delivery<T>;

export type TaskState = "running" | "completed" | "failed";

// ============================================================================
// Task
// ============================================================================

/**
 * A computation started from non-async context.
 *
 * Unlike a {@link Future}, a task may be awaited by any number of waiters,
 * which is what lets a cache hand the same in-flight task to every caller.
 * A task whose failure nobody has awaited by the next macrotask is logged.
 */
export class Task<T> implements PromiseLike<T> {
  private _state: TaskState = "running";
  private observed = false;
  private readonly promise: Promise<T>;

  constructor(
    readonly name: string,
    computation: () => Promise<T>,
  ) {
    this.promise = computation();
    void this.promise.then(
      () => {
        this._state = "completed";
      },
      (error: unknown) => {
        this._state = "failed";
        // Waiters attached later in the same turn still count.
        setImmediate(() => {
          if (!this.observed) {
            log.error({ err: error, task: this.name }, "Task failed with no waiter");
          }
        });
      },
    );
  }

  get state(): TaskState {
    return this._state;
  }

  then<TResult1 = T, TResult2 = never>(
    onfulfilled?: ((value: T) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null,
  ): Promise<TResult1 | TResult2> {
    this.observed = true;
    return this.promise.then(onfulfilled, onrejected);
  }
}

// ============================================================================
// Scheduler
// ============================================================================

export class Scheduler {
  readonly host: HostHooks;
  private readonly registry = new CallbackRegistry();
  private closed = false;
  private taskCount = 0;

  constructor(host: HostHooks) {
    this.host = host;
  }

  /** Number of registrations still waiting for a delivery. */
  get pendingCount(): number {
    return this.registry.size;
  }

  get isShutdown(): boolean {
    return this.closed;
  }

  /**
   * Allocate a pending future and register it for one-shot delivery.
   * The caller passes `future.id` to the host hook.
   */
  createFuture<T>(decode: PayloadDecoder<T>, prefix = "future"): Future<T> {
    this.assertOpen();

    const id = this.registry.allocateId(prefix);
    const future = new Future<T>(id);
    this.registry.set(id, {
      persistent: false,
      deliver: (payload): DeliveryOutcome => {
        const delivery = decode(payload);
        switch (delivery.type) {
          case "partial":
            return "partial";
          case "value":
            future.resolve(delivery.value);
            return "settled";
          case "error":
            future.fail(delivery.error);
            return "settled";
        }
      },
      abandon: (callbackId) => {
        future.fail(new SchedulerShutdownError(callbackId));
      },
    });
    return future;
  }

  /**
   * Register a persistent handler, invoked on every delivery to the returned
   * id until {@link unwatch} removes it.
   */
  watch(onDelivery: (payload: unknown) => void, prefix = "watch"): string {
    this.assertOpen();
    return this.registry.register(prefix, {
      persistent: true,
      deliver: (payload) => {
        onDelivery(payload);
        return "partial";
      },
    });
  }

  unwatch(callbackId: string): boolean {
    return this.registry.delete(callbackId);
  }

  /**
   * Drop a one-shot registration without settling its future, for a hook
   * that failed before the host took the callback id.
   */
  cancel(callbackId: string): boolean {
    return this.registry.delete(callbackId);
  }

  /**
   * Host-facing entry point. Unknown ids (already delivered, unwatched or
   * never registered) are ignored.
   */
  readonly dispatch: HostCallback = (callbackId, payload) => {
    const registration = this.registry.get(callbackId);
    if (!registration) {
      log.debug({ callbackId }, "dispatch: no registration, ignoring");
      return;
    }

    let outcome: DeliveryOutcome;
    try {
      outcome = registration.deliver(payload);
    } catch (error) {
      log.fatal({ err: error, callbackId }, "dispatch: delivery failed");
      throw error;
    }

    if (outcome === "settled" && !registration.persistent) {
      this.registry.delete(callbackId);
    }
  };

  /**
   * Start an async computation from non-async context (a host callback,
   * a constructor, a cache miss). It runs synchronously up to its first
   * suspension point.
   */
  createTask<T>(computation: () => Promise<T>, name?: string): Task<T> {
    this.taskCount += 1;
    return new Task(name ?? `task-${this.taskCount}`, computation);
  }

  /**
   * Tear down the registry. Suspended computations are failed with
   * `SchedulerShutdownError`; later dispatches are no-ops.
   */
  shutdown(): void {
    if (this.closed) return;
    this.closed = true;

    const removed = this.registry.clear();
    log.debug({ pending: removed.length }, "shutdown");
    for (const [callbackId, registration] of removed) {
      registration.abandon?.(callbackId);
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new SchedulerShutdownError();
    }
  }
}
