import { describe, it, expect } from "vitest";
import { parseHttpResponse, retryAfterSeconds, type HttpResponse } from "../response.js";

function parse(raw: string): HttpResponse {
  const response = parseHttpResponse(raw);
  if (!response) throw new Error(`unparsable: ${raw}`);
  return response;
}

describe("parseHttpResponse", () => {
  it("splits status, headers and body", () => {
    const response = parse(
      "HTTP/1.1 200 OK\r\nContent-Type: application/json\r\nX-Count: 3\r\n\r\n{\"ok\":true}",
    );

    expect(response.status).toBe(200);
    expect(response.reason).toBe("OK");
    expect(response.headers.get("content-type")).toBe("application/json");
    expect(response.headers.get("x-count")).toBe("3");
    expect(response.body).toBe('{"ok":true}');
  });

  it("accepts a status line without reason", () => {
    const response = parse("HTTP/1.1 200\r\n\r\nBODY");

    expect(response.status).toBe(200);
    expect(response.reason).toBe("");
    expect(response.body).toBe("BODY");
  });

  it("accepts HTTP/2 status lines", () => {
    expect(parse("HTTP/2 404\r\n\r\nmissing").status).toBe(404);
  });

  it("keeps blank lines inside the body", () => {
    expect(parse("HTTP/1.1 200\r\n\r\na\r\n\r\nb").body).toBe("a\r\n\r\nb");
  });

  it("treats a missing header terminator as an empty body", () => {
    const response = parse("HTTP/1.1 204 No Content");

    expect(response.status).toBe(204);
    expect(response.body).toBe("");
  });

  it("skips 100 Continue", () => {
    const response = parse("HTTP/1.1 100 Continue\r\n\r\nHTTP/1.1 201 Created\r\n\r\nmade");

    expect(response.status).toBe(201);
    expect(response.body).toBe("made");
  });

  it("skips followed redirects", () => {
    const response = parse(
      "HTTP/1.1 301 Moved Permanently\r\nLocation: /next\r\n\r\n" +
        "HTTP/1.1 200 OK\r\nContent-Type: text/plain\r\n\r\nhello",
    );

    expect(response.status).toBe(200);
    expect(response.headers.get("location")).toBeUndefined();
    expect(response.body).toBe("hello");
  });

  it("skips a proxy's CONNECT reply", () => {
    const response = parse("HTTP/1.1 200 Connection established\r\n\r\nHTTP/2 404\r\n\r\nmissing");

    expect(response.status).toBe(404);
    expect(response.body).toBe("missing");
  });

  it("keeps a final 3xx that is not followed by another response", () => {
    const response = parse("HTTP/1.1 304 Not Modified\r\nETag: abc\r\n\r\n");

    expect(response.status).toBe(304);
    expect(response.headers.get("etag")).toBe("abc");
  });

  it("returns null for output without a status line", () => {
    expect(parseHttpResponse("curl: (6) Could not resolve host")).toBeNull();
    expect(parseHttpResponse("")).toBeNull();
  });
});

describe("retryAfterSeconds", () => {
  it("reads integer seconds", () => {
    expect(retryAfterSeconds(parse("HTTP/1.1 429\r\nRetry-After: 12\r\n\r\n"))).toBe(12);
  });

  it("ignores other forms", () => {
    expect(
      retryAfterSeconds(parse("HTTP/1.1 429\r\nRetry-After: Wed, 21 Oct 2015 07:28:00 GMT\r\n\r\n")),
    ).toBeNull();
    expect(retryAfterSeconds(parse("HTTP/1.1 429\r\n\r\n"))).toBeNull();
  });
});
