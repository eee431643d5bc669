export class ReaperError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "ReaperError";
  }
}

export class ConfigError extends ReaperError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class SourceError extends ReaperError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "SourceError";
  }
}

export class CacheError extends ReaperError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "CacheError";
  }
}

export class RemoteError extends ReaperError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "RemoteError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "REAPER_CONFIG",
  source: "REAPER_SOURCE",
  cache: "REAPER_CACHE",
  unknown: "REAPER_UNKNOWN",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;
  readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}

export function isUserFacingError(error: unknown): error is UserFacingError {
  return error instanceof UserFacingError;
}
