/**
 * Error taxonomy shared by every hookloop package.
 *
 * - Programming errors: {@link FutureStateError}
 * - Lifecycle: {@link SchedulerShutdownError}
 * - HTTP: {@link HttpError} (transport failure or HTTP status >= 400)
 * - Socket: {@link WouldBlockError}, {@link ConnectionClosedError}, {@link SocketError}
 * - Remote API: {@link ApiError}
 * - Configuration: {@link ConfigError}
 */

// ============================================================================
// Scheduler
// ============================================================================

/**
 * Raised when a future is settled twice or awaited by a second waiter.
 * Never recovered from.
 */
export class FutureStateError extends Error {
  readonly name = "FutureStateError";

  constructor(
    readonly futureId: string,
    message: string,
  ) {
    super(`Future ${futureId}: ${message}`);
  }

  static alreadySettled(futureId: string, state: string): FutureStateError {
    return new FutureStateError(futureId, `already ${state}`);
  }

  static secondWaiter(futureId: string): FutureStateError {
    return new FutureStateError(futureId, "already has a waiter");
  }
}

/** Delivered to computations still suspended when their scheduler shuts down. */
export class SchedulerShutdownError extends Error {
  readonly name = "SchedulerShutdownError";

  constructor(readonly callbackId?: string) {
    super(
      callbackId ? `Scheduler shut down while ${callbackId} was pending` : "Scheduler is shut down",
    );
  }
}

// ============================================================================
// HTTP
// ============================================================================

/**
 * Terminal HTTP failure.
 *
 * `returnCode` is the request process's return code (0 when the transport
 * succeeded), `httpStatus` the parsed status (0 when no response was parsed),
 * and `error` the stderr text or, for HTTP-level errors, the response body.
 */
export class HttpError extends Error {
  readonly name = "HttpError";

  constructor(
    readonly url: string,
    readonly returnCode: number,
    readonly httpStatus: number,
    readonly error: string,
  ) {
    super(
      `HTTP request to ${url} failed (return code ${returnCode}, status ${httpStatus})` +
        (error ? `: ${error}` : ""),
    );
  }

  get isTransportFailure(): boolean {
    return this.httpStatus === 0;
  }
}

export function isHttpError(error: unknown): error is HttpError {
  return error instanceof HttpError;
}

// ============================================================================
// Socket
// ============================================================================

/** No frame is buffered right now. Not a failure. */
export class WouldBlockError extends Error {
  readonly name = "WouldBlockError";

  constructor() {
    super("No frame available");
  }
}

export class ConnectionClosedError extends Error {
  readonly name = "ConnectionClosedError";

  constructor(
    readonly code?: number,
    readonly reason?: string,
  ) {
    super(`Connection closed${code !== undefined ? ` (${code}${reason ? ` ${reason}` : ""})` : ""}`);
  }
}

export class SocketError extends Error {
  readonly name = "SocketError";

  constructor(message: string, cause?: Error) {
    super(message, cause ? { cause } : undefined);
  }
}

export function isWouldBlockError(error: unknown): error is WouldBlockError {
  return error instanceof WouldBlockError;
}

/** Closed or failed: the session cannot continue. */
export function isFatalSocketError(error: unknown): error is ConnectionClosedError | SocketError {
  return error instanceof ConnectionClosedError || error instanceof SocketError;
}

// ============================================================================
// Remote API
// ============================================================================

/** The service answered `{ ok: false }`. */
export class ApiError extends Error {
  readonly name = "ApiError";

  constructor(
    readonly method: string,
    readonly code: string,
  ) {
    super(`${method} failed: ${code}`);
  }
}

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}

// ============================================================================
// Configuration
// ============================================================================

export class ConfigError extends Error {
  readonly name = "ConfigError";

  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
  }
}
