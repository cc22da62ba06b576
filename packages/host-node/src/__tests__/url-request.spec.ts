import { describe, it, expect, vi } from "vitest";
import { PROCESS_ERROR } from "@hookloop/shared";
import { buildUrlRequest, formatResponse, runUrlRequest, type FetchFn } from "../url-request.js";

describe("buildUrlRequest", () => {
  it("strips the command prefix and defaults to GET", () => {
    const request = buildUrlRequest("url:https://api.test/a?b=1", {});

    expect(request.url).toBe("https://api.test/a?b=1");
    expect(request.init.method).toBe("GET");
    expect(request.init.body).toBeUndefined();
    expect(request.includeHeaders).toBe(false);
  });

  it("parses header lines", () => {
    const request = buildUrlRequest("url:https://api.test", {
      httpheader: "Authorization: Bearer test-token\nX-Trace:  abc \n\nbroken",
      header: "1",
    });

    const headers = new Headers(request.init.headers);
    expect(headers.get("authorization")).toBe("Bearer test-token");
    expect(headers.get("x-trace")).toBe("abc");
    expect([...headers.keys()]).toEqual(["authorization", "x-trace"]);
    expect(request.includeHeaders).toBe(true);
  });

  it("posts postfields", () => {
    const request = buildUrlRequest("url:https://api.test", { postfields: "a=1&b=2" });

    expect(request.init.method).toBe("POST");
    expect(request.init.body).toBe("a=1&b=2");
  });

  it("posts without a body", () => {
    expect(buildUrlRequest("url:https://api.test", { post: "1" }).init.method).toBe("POST");
  });

  it("honours customrequest", () => {
    const request = buildUrlRequest("url:https://api.test", { customrequest: "delete", postfields: "" });

    expect(request.init.method).toBe("DELETE");
    expect(request.init.body).toBe("");
  });
});

describe("formatResponse", () => {
  it("returns the bare body without headers", () => {
    expect(formatResponse(new Response(null, { status: 204 }), "body", false)).toBe("body");
  });

  it("prints status line and headers before the body", () => {
    const response = new Response(null, {
      status: 404,
      statusText: "Not Found",
      headers: { "X-A": "1", "Retry-After": "3" },
    });

    expect(formatResponse(response, "missing", true)).toBe(
      "HTTP/1.1 404 Not Found\r\nretry-after: 3\r\nx-a: 1\r\n\r\nmissing",
    );
  });

  it("omits an empty status text", () => {
    expect(formatResponse(new Response(null, { status: 200 }), "", true)).toBe("HTTP/1.1 200\r\n\r\n");
  });
});

describe("runUrlRequest", () => {
  it("renders the fetched response", async () => {
    const fetchFn = vi.fn<FetchFn>(
      async () =>
        new Response("BODY", { status: 200, headers: { "content-type": "application/json" } }),
    );

    const output = await runUrlRequest(fetchFn, "url:https://api.test/x", { header: "1" }, 1000);

    expect(output).toEqual({
      command: "url:https://api.test/x",
      returnCode: 0,
      stdout: "HTTP/1.1 200\r\ncontent-type: application/json\r\n\r\nBODY",
      stderr: "",
    });
    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe("https://api.test/x");
    expect(init?.method).toBe("GET");
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it("sends no signal without a timeout", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => new Response("ok"));

    await runUrlRequest(fetchFn, "url:https://api.test", {}, 0);

    expect(fetchFn.mock.calls[0][1]?.signal).toBeUndefined();
  });

  it("reports fetch failures as a failed process", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => {
      throw new TypeError("fetch failed");
    });

    const output = await runUrlRequest(fetchFn, "url:https://api.test", {}, 0);

    expect(output).toEqual({
      command: "url:https://api.test",
      returnCode: PROCESS_ERROR,
      stdout: "",
      stderr: "fetch failed",
    });
  });

  it("reports timeouts", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => {
      throw Object.assign(new Error("The operation was aborted due to timeout"), {
        name: "TimeoutError",
      });
    });

    const output = await runUrlRequest(fetchFn, "url:https://api.test", {}, 50);

    expect(output.returnCode).toBe(PROCESS_ERROR);
    expect(output.stderr).toBe("Request timed out after 50 ms");
  });
});
