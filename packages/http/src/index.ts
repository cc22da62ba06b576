/**
 * @hookloop/http - HTTP requests over the host's process hook
 *
 * Retries transport and HTTP-level failures with a bounded backoff, honours
 * `429 Retry-After` without spending the retry budget, and raises a single
 * `HttpError` when the budget runs out.
 */

export { httpRequest, evaluateAttempt } from "./http-request.js";
export type { HttpRequestOptions, AttemptOutcome } from "./http-request.js";
export { parseHttpResponse, retryAfterSeconds } from "./response.js";
export type { HttpResponse } from "./response.js";
export { backoffDelay, DEFAULT_MAX_RETRIES, DEFAULT_RETRY_POLICY } from "./retry-policy.js";
export type { RetryPolicy } from "./retry-policy.js";
