/**
 * Host hook contract.
 *
 * The host runtime owns the event loop. It never calls application code
 * directly; every hook takes a callback and an opaque callback id, and the
 * host later invokes `callback(callbackId, payload)` when the event occurs.
 * The scheduler in `@hookloop/kernel` is the only expected caller.
 */

/**
 * Entry point the host invokes to deliver a raw completion.
 * Bound to `Scheduler.dispatch` in practice.
 */
export type HostCallback = (callbackId: string, payload: unknown) => void;

/** Removes a persistent hook registration. */
export type Unhook = () => void;

/**
 * Options forwarded verbatim to the host's process hook.
 * For `url:` commands these follow libcurl option names
 * (`header`, `httpheader`, `postfields`, `customrequest`, ...).
 */
export type ProcessOptions = Record<string, string>;

/** Return code delivered while the process is still producing output. */
export const PROCESS_RUNNING = -1;

/** Return code delivered when the process could not run or was killed. */
export const PROCESS_ERROR = -2;

/**
 * Payload of a process hook delivery.
 *
 * With `returnCode === PROCESS_RUNNING` the delivery is a partial chunk and
 * more deliveries follow for the same callback id.
 */
export interface ProcessOutput {
  command: string;
  returnCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Something the host can watch for readability. Listeners fire once per
 * readiness transition and carry no payload.
 */
export interface ReadinessSource {
  onReadable(listener: () => void): Unhook;
}

export interface HostHooks {
  /** Fire once after `delayMs`, delivering an opaque marker value. */
  hookTimer(delayMs: number, callback: HostCallback, callbackId: string): void;

  /**
   * Run `command` and deliver a {@link ProcessOutput}. The host enforces
   * `timeoutMs` (0 = none) by killing the command and delivering a failure.
   */
  hookProcess(
    command: string,
    options: ProcessOptions,
    timeoutMs: number,
    callback: HostCallback,
    callbackId: string,
  ): void;

  /** Deliver `undefined` each time `source` becomes readable, until unhooked. */
  hookReadable(source: ReadinessSource, callback: HostCallback, callbackId: string): Unhook;
}
