/**
 * Kernel Testing Utilities
 *
 * `FakeHost` records every hook request instead of acting on it. Tests
 * inspect the requests and complete them by hand, which makes every
 * suspension point of a computation observable:
 *
 * @example
 * ```typescript
 * import { FakeHost, settle } from "@hookloop/kernel/testing";
 *
 * const host = new FakeHost();
 * const scheduler = new Scheduler(host);
 * const done = sleep(scheduler, 100);
 *
 * expect(host.timers[0].delayMs).toBe(100);
 * host.fireTimer(0);
 * await done;
 * ```
 *
 * @module @hookloop/kernel/testing
 */

import type {
  HostCallback,
  HostHooks,
  ProcessOptions,
  ProcessOutput,
  ReadinessSource,
  Unhook,
} from "@hookloop/shared";

// ============================================================================
// Types
// ============================================================================

export interface TimerRequest {
  delayMs: number;
  callback: HostCallback;
  callbackId: string;
}

export interface ProcessRequest {
  command: string;
  options: ProcessOptions;
  timeoutMs: number;
  callback: HostCallback;
  callbackId: string;
}

export interface ReadableRequest {
  source: ReadinessSource;
  callback: HostCallback;
  callbackId: string;
  active: boolean;
}

// ============================================================================
// Implementation
// ============================================================================

export class FakeHost implements HostHooks {
  readonly timers: TimerRequest[] = [];
  readonly processes: ProcessRequest[] = [];
  readonly readables: ReadableRequest[] = [];

  hookTimer(delayMs: number, callback: HostCallback, callbackId: string): void {
    this.timers.push({ delayMs, callback, callbackId });
  }

  hookProcess(
    command: string,
    options: ProcessOptions,
    timeoutMs: number,
    callback: HostCallback,
    callbackId: string,
  ): void {
    this.processes.push({ command, options, timeoutMs, callback, callbackId });
  }

  hookReadable(source: ReadinessSource, callback: HostCallback, callbackId: string): Unhook {
    const request: ReadableRequest = { source, callback, callbackId, active: true };
    const unsubscribe = source.onReadable(() => {
      if (request.active) callback(callbackId, undefined);
    });
    this.readables.push(request);
    return () => {
      request.active = false;
      unsubscribe();
    };
  }

  /** Deliver the timer marker (remaining calls, 0) for the timer at `index`. */
  fireTimer(index: number, payload: unknown = 0): void {
    const request = this.timers.at(index);
    if (!request) throw new Error(`No timer request at index ${index}`);
    request.callback(request.callbackId, payload);
  }

  /** Deliver a process completion for the process at `index`. */
  completeProcess(index: number, output: Partial<Omit<ProcessOutput, "command">>): void {
    const request = this.processes.at(index);
    if (!request) throw new Error(`No process request at index ${index}`);
    request.callback(request.callbackId, {
      command: request.command,
      returnCode: output.returnCode ?? 0,
      stdout: output.stdout ?? "",
      stderr: output.stderr ?? "",
    });
  }

  get activeReadables(): ReadableRequest[] {
    return this.readables.filter((request) => request.active);
  }
}

/**
 * Let every continuation queued by a delivery run to its next suspension
 * point. Resolves after the microtask queue has drained.
 */
export function settle(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
