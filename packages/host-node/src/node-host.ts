/**
 * Node Host
 *
 * A `HostHooks` implementation on the Node.js event loop: timers through
 * `setTimeout`, `url:` commands through `fetch`, everything else through
 * the shell, readiness through the source's own listener.
 *
 * Every delivery goes back through the callback the hook was given, so the
 * scheduler sees exactly what it would see under any other host.
 */

import { execFile } from "node:child_process";
import {
  PROCESS_ERROR,
  type HostCallback,
  type HostHooks,
  type ProcessOptions,
  type ProcessOutput,
  type ReadinessSource,
  type Unhook,
} from "@hookloop/shared";
import { Logger } from "@hookloop/kernel";
import { runUrlRequest, URL_COMMAND_PREFIX, type FetchFn } from "./url-request.js";

const log = Logger.for("NodeHost");

export interface NodeHostOptions {
  /** Custom fetch implementation (defaults to global fetch). */
  fetch?: FetchFn;
  /** Shell used for non-`url:` commands. Default `/bin/sh`. */
  shell?: string;
}

interface ExecFailure {
  code?: number | string | null;
  killed?: boolean;
  message: string;
}

function extractReturnCode(error: ExecFailure | null): number {
  if (!error) return 0;
  if (error.killed) return PROCESS_ERROR;
  if (typeof error.code === "number") return error.code;
  // spawn failures (ENOENT, EACCES) carry a string code
  return PROCESS_ERROR;
}

export function runShellCommand(
  shell: string,
  command: string,
  timeoutMs: number,
): Promise<ProcessOutput> {
  return new Promise((resolve) => {
    execFile(
      shell,
      ["-c", command],
      { encoding: "utf-8", timeout: timeoutMs > 0 ? timeoutMs : 0 },
      (error, stdout, stderr) => {
        const returnCode = extractReturnCode(error);
        resolve({
          command,
          returnCode,
          stdout,
          stderr: error?.killed === true ? `${stderr}Command timed out after ${timeoutMs} ms` : stderr,
        });
      },
    );
  });
}

export class NodeHost implements HostHooks {
  private readonly fetchFn: FetchFn;
  private readonly shell: string;

  constructor(options: NodeHostOptions = {}) {
    this.fetchFn = options.fetch ?? globalThis.fetch.bind(globalThis);
    this.shell = options.shell ?? "/bin/sh";
  }

  hookTimer(delayMs: number, callback: HostCallback, callbackId: string): void {
    setTimeout(() => callback(callbackId, 0), delayMs);
  }

  hookProcess(
    command: string,
    options: ProcessOptions,
    timeoutMs: number,
    callback: HostCallback,
    callbackId: string,
  ): void {
    const run = command.startsWith(URL_COMMAND_PREFIX)
      ? runUrlRequest(this.fetchFn, command, options, timeoutMs)
      : runShellCommand(this.shell, command, timeoutMs);

    void run.then(
      (output) => callback(callbackId, output),
      (error: unknown) => {
        log.error({ err: error, command }, "process hook failed");
        callback(callbackId, {
          command,
          returnCode: PROCESS_ERROR,
          stdout: "",
          stderr: error instanceof Error ? error.message : String(error),
        } satisfies ProcessOutput);
      },
    );
  }

  hookReadable(source: ReadinessSource, callback: HostCallback, callbackId: string): Unhook {
    return source.onReadable(() => callback(callbackId, undefined));
  }
}

export function createNodeHost(options?: NodeHostOptions): NodeHost {
  return new NodeHost(options);
}
