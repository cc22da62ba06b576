import { FutureStateError } from "@hookloop/shared";

export type FutureState = "pending" | "resolved" | "failed";

type Settlement<T> = { state: "resolved"; value: T } | { state: "failed"; error: Error };

interface Waiter<T> {
  resolve: (value: T) => void;
  reject: (error: Error) => void;
}

/**
 * Single-assignment result cell with at most one waiter.
 *
 * A future goes pending → resolved or pending → failed exactly once. It is
 * `PromiseLike`, so `await future` is the suspension point of the computation
 * waiting on it; the waiter resumes with the value or with the error thrown
 * at that `await`.
 *
 * @example
 * ```typescript
 * const future = new Future<string>("timer_01");
 * setTimeout(() => future.resolve("done"), 10);
 * const value = await future; // "done"
 * ```
 */
export class Future<T> implements PromiseLike<T> {
  private settlement: Settlement<T> | null = null;
  private waiter: Waiter<T> | null = null;
  private awaited = false;

  constructor(readonly id: string) {}

  get state(): FutureState {
    return this.settlement?.state ?? "pending";
  }

  get isPending(): boolean {
    return this.settlement === null;
  }

  resolve(value: T): void {
    this.settle({ state: "resolved", value });
  }

  fail(error: Error): void {
    this.settle({ state: "failed", error });
  }

  then<TResult1 = T, TResult2 = never>(
    onfulfilled?: ((value: T) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null,
  ): Promise<TResult1 | TResult2> {
    if (this.awaited) {
      throw FutureStateError.secondWaiter(this.id);
    }
    this.awaited = true;

    const result = new Promise<T>((resolve, reject) => {
      this.waiter = { resolve, reject };
      if (this.settlement) {
        this.wake(this.settlement);
      }
    });
    return result.then(onfulfilled, onrejected);
  }

  private settle(settlement: Settlement<T>): void {
    if (this.settlement) {
      throw FutureStateError.alreadySettled(this.id, this.settlement.state);
    }
    this.settlement = settlement;
    this.wake(settlement);
  }

  private wake(settlement: Settlement<T>): void {
    const waiter = this.waiter;
    if (!waiter) return;
    this.waiter = null;

    if (settlement.state === "resolved") {
      waiter.resolve(settlement.value);
    } else {
      waiter.reject(settlement.error);
    }
  }
}
