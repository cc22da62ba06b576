import { describe, it, expect } from "vitest";
import {
  ApiError,
  ConfigError,
  ConnectionClosedError,
  FutureStateError,
  HttpError,
  SocketError,
  WouldBlockError,
  isApiError,
  isFatalSocketError,
  isHttpError,
  isWouldBlockError,
} from "../errors.js";
import { generateCallbackId } from "../utils/callback-ids.js";

describe("HttpError", () => {
  it("describes transport failures", () => {
    const error = new HttpError("https://api.test", -2, 0, "");

    expect(error.message).toBe("HTTP request to https://api.test failed (return code -2, status 0)");
    expect(error.isTransportFailure).toBe(true);
    expect(error.name).toBe("HttpError");
    expect(isHttpError(error)).toBe(true);
  });

  it("describes HTTP-level failures", () => {
    const error = new HttpError("https://api.test", 0, 404, "missing");

    expect(error.message).toBe(
      "HTTP request to https://api.test failed (return code 0, status 404): missing",
    );
    expect(error.isTransportFailure).toBe(false);
  });
});

describe("socket errors", () => {
  it("formats close codes", () => {
    expect(new ConnectionClosedError().message).toBe("Connection closed");
    expect(new ConnectionClosedError(1000).message).toBe("Connection closed (1000)");
    expect(new ConnectionClosedError(1001, "bye").message).toBe("Connection closed (1001 bye)");
  });

  it("keeps the cause", () => {
    const cause = new Error("ECONNRESET");
    expect(new SocketError("lost", cause).cause).toBe(cause);
  });

  it("separates would-block from fatal errors", () => {
    expect(isWouldBlockError(new WouldBlockError())).toBe(true);
    expect(isFatalSocketError(new WouldBlockError())).toBe(false);
    expect(isFatalSocketError(new ConnectionClosedError())).toBe(true);
    expect(isFatalSocketError(new SocketError("lost"))).toBe(true);
    expect(isFatalSocketError(new Error("other"))).toBe(false);
  });
});

describe("FutureStateError", () => {
  it("names the future", () => {
    expect(FutureStateError.alreadySettled("timer_1", "failed").message).toBe(
      "Future timer_1: already failed",
    );
    expect(FutureStateError.secondWaiter("timer_1").futureId).toBe("timer_1");
  });
});

describe("ApiError / ConfigError", () => {
  it("formats messages", () => {
    const apiError = new ApiError("users.info", "user_not_found");
    expect(apiError.message).toBe("users.info failed: user_not_found");
    expect(isApiError(apiError)).toBe(true);

    expect(new ConfigError("Invalid configuration", ["a: x", "b: y"]).message).toBe(
      "Invalid configuration: a: x; b: y",
    );
    expect(new ConfigError("Bad").message).toBe("Bad");
  });
});

describe("generateCallbackId", () => {
  it("prefixes 16 hex characters", () => {
    expect(generateCallbackId("timer")).toMatch(/^timer_[0-9a-f]{16}$/);
    expect(generateCallbackId("timer")).not.toBe(generateCallbackId("timer"));
  });
});
