/**
 * Raw HTTP response parsing
 *
 * The request process prints the response the way curl does with headers
 * enabled: `STATUS-LINE CRLF *(HEADER CRLF) CRLF BODY`. When the transfer
 * went through interim responses (`100 Continue`, followed redirects, a
 * proxy's `CONNECT` reply) each of them contributes its own header block
 * before the final one.
 */

export interface HttpResponse {
  status: number;
  reason: string;
  /** Header names lowercased; repeated headers keep the last value. */
  headers: Map<string, string>;
  body: string;
}

const STATUS_LINE = /^HTTP\/[\d.]+ +(\d{3})(?: +(.*))?$/;
const HEADER_SEPARATOR = "\r\n\r\n";

interface HeaderBlock {
  status: number;
  reason: string;
  headers: Map<string, string>;
  rest: string;
}

function readHeaderBlock(raw: string): HeaderBlock | null {
  const end = raw.indexOf(HEADER_SEPARATOR);
  const block = end === -1 ? raw : raw.slice(0, end);
  const rest = end === -1 ? "" : raw.slice(end + HEADER_SEPARATOR.length);

  const [statusLine = "", ...headerLines] = block.split("\r\n");
  const match = STATUS_LINE.exec(statusLine);
  if (!match) return null;

  const headers = new Map<string, string>();
  for (const line of headerLines) {
    const colon = line.indexOf(":");
    if (colon <= 0) continue;
    headers.set(line.slice(0, colon).trim().toLowerCase(), line.slice(colon + 1).trim());
  }

  return { status: Number(match[1]), reason: match[2]?.trim() ?? "", headers, rest };
}

function isInterim(block: HeaderBlock): boolean {
  if (!STATUS_LINE.test(block.rest.split("\r\n", 1)[0] ?? "")) return false;
  if (block.status >= 100 && block.status < 200) return true;
  if (block.status >= 300 && block.status < 400) return true;
  return block.status === 200 && /connection established/i.test(block.reason);
}

/**
 * Parse process output into the final response, or `null` when it does not
 * start with a status line.
 */
export function parseHttpResponse(raw: string): HttpResponse | null {
  let block = readHeaderBlock(raw);
  while (block && isInterim(block)) {
    block = readHeaderBlock(block.rest);
  }
  if (!block) return null;

  return { status: block.status, reason: block.reason, headers: block.headers, body: block.rest };
}

/**
 * `Retry-After` in seconds, or `null` when absent or not a non-negative
 * integer. The HTTP-date form is not used by the services this talks to.
 */
export function retryAfterSeconds(response: HttpResponse): number | null {
  const value = response.headers.get("retry-after");
  if (value === undefined || !/^\d+$/.test(value)) return null;
  return Number(value);
}
