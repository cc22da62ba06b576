/**
 * `url:` command support
 *
 * Performs the request with `fetch` and renders the result the way a
 * libcurl-backed host prints it: with `header: "1"`, a status line, the
 * header lines and a blank line come before the body.
 */

import type { ProcessOptions, ProcessOutput } from "@hookloop/shared";
import { PROCESS_ERROR } from "@hookloop/shared";

export type FetchFn = typeof fetch;

export const URL_COMMAND_PREFIX = "url:";

export interface UrlRequest {
  url: string;
  init: RequestInit;
  includeHeaders: boolean;
}

/**
 * Translate curl-style options:
 * - `httpheader`: newline-separated `Name: value` lines
 * - `postfields`: request body (implies POST)
 * - `post: "1"`: POST without body
 * - `customrequest`: explicit method
 * - `header: "1"`: include the header block in the output
 */
export function buildUrlRequest(command: string, options: ProcessOptions): UrlRequest {
  const url = command.slice(URL_COMMAND_PREFIX.length);
  const headers = new Headers();
  for (const line of (options.httpheader ?? "").split("\n")) {
    const colon = line.indexOf(":");
    if (colon <= 0) continue;
    headers.append(line.slice(0, colon).trim(), line.slice(colon + 1).trim());
  }

  let method = "GET";
  let body: string | undefined;
  if (options.postfields !== undefined) {
    method = "POST";
    body = options.postfields;
  } else if (options.post === "1") {
    method = "POST";
  }
  if (options.customrequest) {
    method = options.customrequest.toUpperCase();
  }

  return {
    url,
    init: { method, headers, body },
    includeHeaders: options.header === "1",
  };
}

export function formatResponse(response: Response, body: string, includeHeaders: boolean): string {
  if (!includeHeaders) return body;

  const lines = [`HTTP/1.1 ${response.status}${response.statusText ? ` ${response.statusText}` : ""}`];
  response.headers.forEach((value, name) => {
    lines.push(`${name}: ${value}`);
  });
  return `${lines.join("\r\n")}\r\n\r\n${body}`;
}

export async function runUrlRequest(
  fetchFn: FetchFn,
  command: string,
  options: ProcessOptions,
  timeoutMs: number,
): Promise<ProcessOutput> {
  const request = buildUrlRequest(command, options);
  const signal = timeoutMs > 0 ? AbortSignal.timeout(timeoutMs) : undefined;

  try {
    const response = await fetchFn(request.url, { ...request.init, signal });
    const body = await response.text();
    return {
      command,
      returnCode: 0,
      stdout: formatResponse(response, body, request.includeHeaders),
      stderr: "",
    };
  } catch (error) {
    const timedOut = error instanceof Error && error.name === "TimeoutError";
    return {
      command,
      returnCode: PROCESS_ERROR,
      stdout: "",
      stderr: timedOut
        ? `Request timed out after ${timeoutMs} ms`
        : error instanceof Error
          ? error.message
          : String(error),
    };
  }
}
