export type PlayErrorCode = "conflict" | "not_found" | "storage" | "stream";

export class PlayError extends Error {
  constructor(
    public readonly code: PlayErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PlayError";
  }
}

/**
 * A guard failed because another action already changed the state.
 * Callers re-fetch and decide; nothing retries automatically.
 */
export class PlayConflictError extends PlayError {
  constructor(message: string) {
    super("conflict", message);
    this.name = "PlayConflictError";
  }
}

export class PlayNotFoundError extends PlayError {
  constructor(message: string) {
    super("not_found", message);
    this.name = "PlayNotFoundError";
  }
}

/** The transaction could not commit. The driver error is kept as `cause`. */
export class PlayStorageError extends PlayError {
  constructor(message: string, cause: unknown) {
    super("storage", message, { cause });
    this.name = "PlayStorageError";
  }
}

export class PlayStreamError extends PlayError {
  constructor(message: string, cause?: unknown) {
    super("stream", message, { cause });
    this.name = "PlayStreamError";
  }
}

export const isPlayError = (error: unknown): error is PlayError =>
  error instanceof PlayError;
