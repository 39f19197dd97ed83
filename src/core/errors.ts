/*
Purpose: core error types raised by the update workflow and the CLI output layer.
Assumptions: UserFacingError instances are safe to display to end users.
Usage: throw new MissingScriptError(); throw new UserFacingError({ code, title, message, hint, cause }).
*/

// =============================================================================
// CORE ERRORS
// =============================================================================

export type UpdaterErrorKind =
  | "missing_script"
  | "missing_overrides"
  | "parse"
  | "io"
  | "network";

export class UpdaterError extends Error {
  constructor(
    public readonly kind: UpdaterErrorKind,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "UpdaterError";
  }
}

export class MissingScriptError extends UpdaterError {
  constructor(public readonly filePath?: string) {
    super("missing_script", "user.js not detected in the profile directory.");
    this.name = "MissingScriptError";
  }
}

export class MissingOverridesError extends UpdaterError {
  constructor(public readonly filePath?: string) {
    super("missing_overrides", "user-overrides.js not detected in the profile directory.");
    this.name = "MissingOverridesError";
  }
}

export class HeaderParseError extends UpdaterError {
  constructor(
    public readonly context: string,
    cause?: unknown,
  ) {
    super("parse", `Error parsing input: ${context}`, cause);
    this.name = "HeaderParseError";
  }
}

export class IoError extends UpdaterError {
  constructor(detail: string, cause?: unknown) {
    super("io", `IO Error: ${detail}`, cause);
    this.name = "IoError";
  }
}

export class NetworkError extends UpdaterError {
  constructor(detail: string, cause?: unknown) {
    super("network", `Network error: ${detail}`, cause);
    this.name = "NetworkError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  missingScript: "MISSING_SCRIPT",
  missingOverrides: "MISSING_OVERRIDES",
  parse: "PARSE_ERROR",
  io: "IO_ERROR",
  network: "NETWORK_ERROR",
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
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly next?: string;

  constructor(input: UserFacingErrorInput) {
    super(input.message, input.cause === undefined ? undefined : { cause: input.cause });
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
  }
}

// =============================================================================
// MAPPING
// =============================================================================

const PROFILE_DIR_HINT = "Run the updater from your Firefox profile directory, or pass --dir.";

export function toUserFacingError(error: unknown): unknown {
  if (!(error instanceof UpdaterError)) {
    return error;
  }

  switch (error.kind) {
    case "missing_script":
      return new UserFacingError({
        code: USER_FACING_ERROR_CODES.missingScript,
        title: "Profile script missing.",
        message: error.message,
        hint: PROFILE_DIR_HINT,
        cause: error,
      });
    case "missing_overrides":
      return new UserFacingError({
        code: USER_FACING_ERROR_CODES.missingOverrides,
        title: "Overrides file missing.",
        message: error.message,
        hint: "Create user-overrides.js next to user.js, even if it is empty.",
        cause: error,
      });
    case "parse":
      return new UserFacingError({
        code: USER_FACING_ERROR_CODES.parse,
        title: "Profile script could not be parsed.",
        message: error.message,
        hint: "The live user.js was left untouched.",
        cause: error,
      });
    case "io":
      return new UserFacingError({
        code: USER_FACING_ERROR_CODES.io,
        title: "Filesystem operation failed.",
        message: error.message,
        hint: "Check permissions on the profile directory.",
        cause: error,
      });
    case "network":
      return new UserFacingError({
        code: USER_FACING_ERROR_CODES.network,
        title: "Upstream download failed.",
        message: error.message,
        hint: "Check your connection or pass --url to use another source.",
        cause: error,
      });
  }
}
