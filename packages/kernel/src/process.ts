/**
 * Process primitive
 *
 * Runs a command through the host's process hook and suspends until the
 * final delivery. Hosts may stream output in chunks, delivering
 * `returnCode === PROCESS_RUNNING` until the command ends; chunks are
 * concatenated in delivery order.
 */

import { z } from "zod";
import { PROCESS_RUNNING, type ProcessOptions, type ProcessOutput } from "@hookloop/shared";
import type { Delivery, Scheduler } from "./scheduler.js";

export const ProcessOutputSchema = z.object({
  command: z.string(),
  returnCode: z.number().int(),
  stdout: z.string(),
  stderr: z.string(),
});

/**
 * Decoder state for one process registration.
 * Exported for hosts and tests that need to feed chunks by hand.
 */
export function createProcessDecoder(): (payload: unknown) => Delivery<ProcessOutput> {
  let stdout = "";
  let stderr = "";

  return (payload) => {
    const parsed = ProcessOutputSchema.safeParse(payload);
    if (!parsed.success) {
      return {
        type: "error",
        error: new TypeError(`Malformed process delivery: ${parsed.error.message}`),
      };
    }

    stdout += parsed.data.stdout;
    stderr += parsed.data.stderr;
    if (parsed.data.returnCode === PROCESS_RUNNING) {
      return { type: "partial" };
    }

    return {
      type: "value",
      value: { command: parsed.data.command, returnCode: parsed.data.returnCode, stdout, stderr },
    };
  };
}

export async function runProcess(
  scheduler: Scheduler,
  command: string,
  options: ProcessOptions,
  timeoutMs: number,
): Promise<ProcessOutput> {
  const future = scheduler.createFuture(createProcessDecoder(), "process");
  try {
    scheduler.host.hookProcess(command, options, timeoutMs, scheduler.dispatch, future.id);
  } catch (error) {
    scheduler.cancel(future.id);
    throw error;
  }
  return await future;
}
