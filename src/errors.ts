/**
 * Error taxonomy for a sync run.
 *
 * Nothing here is retried: every error surfaces to the process boundary,
 * where the entry points print the message and exit non-zero.
 */

/**
 * Base class for every error raised by the syncer.
 */
export class MirrorSyncError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MirrorSyncError";
  }
}

/** The credential is missing write scope or was rejected. */
export class AuthError extends MirrorSyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AuthError";
  }
}

/** Malformed repository id, or a space without an SDK. */
export class InvalidNameError extends MirrorSyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InvalidNameError";
  }
}

/** The remote repository does not exist (e.g. deleted between steps). */
export class NotFoundError extends MirrorSyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NotFoundError";
  }
}

/** The local source directory is missing or unreadable. */
export class LocalIOError extends MirrorSyncError {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "LocalIOError";
  }
}

/** Retryable connectivity failure. Propagated, never retried here. */
export class TransientNetworkError extends MirrorSyncError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TransientNetworkError";
  }
}

/** Missing or invalid action/CLI input. */
export class ConfigError extends MirrorSyncError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * The Hub call that failed, used to pick the error class for ambiguous
 * statuses (a 400 on creation means a rejected name).
 */
export type HubOperation = "whoami" | "create" | "list" | "upload";

const TRANSIENT_SOCKET_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
]);

/**
 * Reads the HTTP status from an error thrown by the Hub client.
 *
 * `HubApiError` carries it as `statusCode`; other fetch wrappers use `status`.
 */
export function getStatusCode(error: unknown): number | undefined {
  if (error && typeof error === "object") {
    const err = error as { statusCode?: unknown; status?: unknown };
    if (typeof err.statusCode === "number") return err.statusCode;
    if (typeof err.status === "number") return err.status;
  }
  return undefined;
}

/**
 * Checks whether an error is a connectivity failure from `fetch`.
 *
 * Node's fetch throws `TypeError("fetch failed")` with the socket error as
 * `cause`.
 */
export function isNetworkFailure(error: unknown): boolean {
  if (!(error instanceof Error)) return false;

  const code = errorCode(error) ?? errorCode(error.cause);
  if (code && (TRANSIENT_SOCKET_CODES.has(code) || code.startsWith("UND_ERR_"))) {
    return true;
  }

  return error instanceof TypeError && error.message === "fetch failed";
}

function errorCode(value: unknown): string | undefined {
  if (value && typeof value === "object") {
    const code = (value as { code?: unknown }).code;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * Translates an error thrown by the Hub client into the sync taxonomy.
 *
 * Errors that already belong to the taxonomy, and errors that match no
 * class, are returned unchanged.
 *
 * @param error - Whatever the Hub call threw
 * @param operation - The call that failed
 * @param repoId - Repository the call targeted, for the message
 */
export function classifyHubError(
  error: unknown,
  operation: HubOperation,
  repoId?: string
): unknown {
  if (error instanceof MirrorSyncError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const target = repoId ? ` (${repoId})` : "";
  const status = getStatusCode(error);

  if (status !== undefined) {
    if (status === 401 || status === 403) {
      return new AuthError(`Hub rejected the token during ${operation}${target}: ${message}`, {
        cause: error,
      });
    }
    if (status === 404) {
      return new NotFoundError(`Repository not found during ${operation}${target}: ${message}`, {
        cause: error,
      });
    }
    if ((status === 400 || status === 422) && operation === "create") {
      return new InvalidNameError(`Hub refused to create${target}: ${message}`, { cause: error });
    }
    if (status === 408 || status === 429 || status >= 500) {
      return new TransientNetworkError(
        `Hub request failed during ${operation}${target} with status ${status}: ${message}`,
        status,
        { cause: error }
      );
    }
    return error;
  }

  if (isNetworkFailure(error)) {
    return new TransientNetworkError(`Could not reach the Hub during ${operation}${target}: ${message}`, undefined, {
      cause: error,
    });
  }

  return error;
}
