export type DispatchErrorCode =
  | "SUPERSEDED"
  | "REMOTE_FAILURE"
  | "REMOTE_TIMEOUT"
  | "DISPATCHER_STOPPED";

/**
 * Base for every error delivered through a request's outcome. Callers switch
 * on `code` rather than on the class when they only need the kind.
 */
export abstract class DispatchError extends Error {
  abstract readonly code: DispatchErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A newer command for the same device replaced this one before it was sent. */
export class SupersededError extends DispatchError {
  readonly code = "SUPERSEDED";

  constructor(readonly deviceId: string) {
    super(`Command for device ${deviceId} was superseded by a newer command`);
  }
}

export class RemoteFailureError extends DispatchError {
  readonly code = "REMOTE_FAILURE";

  constructor(
    message: string,
    readonly status?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

export class RemoteTimeoutError extends DispatchError {
  readonly code = "REMOTE_TIMEOUT";
}

export class DispatcherStoppedError extends DispatchError {
  readonly code = "DISPATCHER_STOPPED";

  constructor() {
    super("Dispatcher stopped before the request was sent");
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export function isDispatchError(err: unknown): err is DispatchError {
  return err instanceof DispatchError;
}

const TIMEOUT_ERROR_NAMES = new Set(["TimeoutError", "AbortError"]);
const UNDICI_TIMEOUT_CODES = new Set([
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

function isTimeout(err: unknown): boolean {
  if (err instanceof Error) {
    if (TIMEOUT_ERROR_NAMES.has(err.name)) return true;
    if (UNDICI_TIMEOUT_CODES.has(errorCode(err) ?? "")) return true;
    // fetch wraps transport errors as TypeError("fetch failed") with the real one as cause
    if (err.cause !== undefined) return isTimeout(err.cause);
  }
  return false;
}

/**
 * Normalise anything a remote call threw into one of the two remote error
 * kinds, keeping the original as `cause`.
 */
export function toRemoteError(err: unknown, operation: string): RemoteFailureError | RemoteTimeoutError {
  if (err instanceof RemoteFailureError || err instanceof RemoteTimeoutError) return err;
  if (isTimeout(err)) {
    return new RemoteTimeoutError(`${operation} timed out`, { cause: err });
  }
  const detail = err instanceof Error ? err.message : String(err);
  return new RemoteFailureError(`${operation} failed: ${detail}`, undefined, { cause: err });
}
