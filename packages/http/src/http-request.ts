/**
 * HTTP request engine
 *
 * One logical request = one or more request processes run through the
 * host, with waits in between:
 *
 * ```
 * dispatching → awaiting_process → succeeded
 *                                → rate_limited → backing_off → dispatching
 *                                → retryable_error → backing_off → dispatching
 *                                                  → failed (budget exhausted)
 * ```
 *
 * Rate-limited attempts replay the identical request and leave the retry
 * budget untouched. Every other failure spends one retry.
 */

import { HttpError, type ProcessOptions, type ProcessOutput } from "@hookloop/shared";
import { Logger, runProcess, sleep, type Scheduler } from "@hookloop/kernel";
import { parseHttpResponse, retryAfterSeconds } from "./response.js";
import {
  backoffDelay,
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_POLICY,
  type RetryPolicy,
} from "./retry-policy.js";

const log = Logger.for("HttpRequest");

export interface HttpRequestOptions {
  /** Retries after the first attempt. Default 5. */
  maxRetries?: number;
  retryPolicy?: RetryPolicy;
}

/** How one attempt ended. */
export type AttemptOutcome =
  | { type: "succeeded"; body: string }
  | { type: "rate_limited"; retryAfterMs: number | null }
  | { type: "retryable_error"; error: HttpError };

/**
 * Classify a finished request process.
 */
export function evaluateAttempt(url: string, output: ProcessOutput): AttemptOutcome {
  if (output.returnCode !== 0 || output.stderr) {
    return {
      type: "retryable_error",
      error: new HttpError(url, output.returnCode, 0, output.stderr),
    };
  }

  const response = parseHttpResponse(output.stdout);
  if (!response) {
    return {
      type: "retryable_error",
      error: new HttpError(url, 0, 0, `Invalid HTTP response: ${output.stdout.slice(0, 80)}`),
    };
  }

  if (response.status === 429) {
    const seconds = retryAfterSeconds(response);
    return { type: "rate_limited", retryAfterMs: seconds === null ? null : seconds * 1000 };
  }

  if (response.status >= 400) {
    return {
      type: "retryable_error",
      error: new HttpError(url, 0, response.status, response.body),
    };
  }

  return { type: "succeeded", body: response.body };
}

/**
 * Fetch `url` through the host's process hook and return the response body.
 *
 * @throws HttpError once the retry budget is spent
 */
export async function httpRequest(
  scheduler: Scheduler,
  url: string,
  options: ProcessOptions,
  timeoutMs: number,
  requestOptions: HttpRequestOptions = {},
): Promise<string> {
  const maxRetries = requestOptions.maxRetries ?? DEFAULT_MAX_RETRIES;
  const policy = requestOptions.retryPolicy ?? DEFAULT_RETRY_POLICY;
  const processOptions: ProcessOptions = { ...options, header: "1" };

  let retries = 0;

  for (;;) {
    const output = await runProcess(scheduler, `url:${url}`, processOptions, timeoutMs);
    const outcome = evaluateAttempt(url, output);

    switch (outcome.type) {
      case "succeeded":
        return outcome.body;

      case "rate_limited": {
        const delayMs = outcome.retryAfterMs ?? backoffDelay(policy, retries);
        log.warn({ url, delayMs, retryAfter: outcome.retryAfterMs !== null }, "rate limited");
        await sleep(scheduler, delayMs);
        break;
      }

      case "retryable_error": {
        if (retries >= maxRetries) {
          log.error(
            { url, retries, returnCode: outcome.error.returnCode, httpStatus: outcome.error.httpStatus },
            "request failed, retries exhausted",
          );
          throw outcome.error;
        }
        const delayMs = backoffDelay(policy, retries);
        retries += 1;
        log.warn(
          { url, retry: retries, maxRetries, delayMs, error: outcome.error.message },
          "request failed, retrying",
        );
        await sleep(scheduler, delayMs);
        break;
      }
    }
  }
}
