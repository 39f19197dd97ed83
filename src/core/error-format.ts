/*
Purpose: normalize updater failures into user-facing lines and provide ANSI styling helpers.
Assumptions: debug mode may include stack traces; non-TTY output should disable color.
Usage: renderErrorLines(err, { mode: "debug", color: resolveColorEnabled({ stream }) }).
*/

import {
  toUserFacingError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
  type UserFacingErrorInput,
} from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatOptions = {
  mode?: ErrorFormatMode;
};

export type ErrorFormatLineKind = "title" | "message" | "hint" | "next" | "code" | "cause" | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "bold" | "dim" | "red" | "yellow" | "cyan";

export type AnsiFormatter = (value: string, styles?: AnsiStyle[]) => string;

export type AnsiColorOptions = {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
};

// =============================================================================
// ANSI COLOR HELPERS
// =============================================================================

const ANSI_RESET = "\x1b[0m";

const ANSI_STYLES: Record<AnsiStyle, string> = {
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  return (value: string, styles: AnsiStyle[] = []): string => {
    if (!enabled || styles.length === 0) {
      return value;
    }

    const prefix = styles.map((style) => ANSI_STYLES[style]).join("");
    return `${prefix}${value}${ANSI_RESET}`;
  };
}

export function resolveColorEnabled(options: AnsiColorOptions = {}): boolean {
  const stream = options.stream ?? process.stderr;
  const isTty = Boolean(stream.isTTY);

  if (options.useColor === undefined) {
    return isTty;
  }

  return options.useColor && isTty;
}

// =============================================================================
// ERROR FORMATTING
// =============================================================================

const DEFAULT_ERROR_TITLE = "An error occurred during execution.";
const DEFAULT_ERROR_MESSAGE = "An unexpected error occurred.";

const LINE_STYLES: Record<ErrorFormatLineKind, AnsiStyle[]> = {
  title: ["bold", "red"],
  message: [],
  hint: ["yellow"],
  next: ["cyan"],
  code: ["dim"],
  cause: ["dim"],
  stack: ["dim"],
};

export function formatErrorLines(
  error: unknown,
  options: ErrorFormatOptions = {},
): ErrorFormatLine[] {
  const mode = options.mode ?? "short";
  const normalized = normalizeUserFacingError(error);
  const lines: ErrorFormatLine[] = [{ kind: "title", text: normalized.title }];

  if (normalized.message.trim() !== normalized.title.trim()) {
    lines.push({ kind: "message", text: normalized.message });
  }
  if (normalized.hint) {
    lines.push({ kind: "hint", text: `Hint: ${normalized.hint}` });
  }
  if (normalized.next) {
    lines.push({ kind: "next", text: `Next: ${normalized.next}` });
  }

  if (mode === "debug") {
    lines.push({ kind: "code", text: `Code: ${normalized.code}` });

    const cause = resolveCauseMessage(normalized.cause, normalized.message);
    if (cause) {
      lines.push({ kind: "cause", text: `Cause: ${cause}` });
    }

    const stack = resolveStack(error, normalized.cause);
    if (stack) {
      lines.push({ kind: "stack", text: stack });
    }
  }

  return lines;
}

export function renderErrorLines(
  error: unknown,
  options: ErrorFormatOptions & { color?: boolean } = {},
): string {
  const format = createAnsiFormatter(options.color ?? false);
  return formatErrorLines(error, options)
    .map((line) => format(line.text, LINE_STYLES[line.kind]))
    .join("\n");
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    const message = error.message.trim();
    return message.length > 0 ? message : error.name;
  }

  if (typeof error === "string") {
    return error;
  }

  return String(error);
}

// =============================================================================
// INTERNALS
// =============================================================================

function normalizeUserFacingError(error: unknown): UserFacingErrorInput {
  const mapped = toUserFacingError(error);

  if (mapped instanceof UserFacingError) {
    return {
      code: mapped.code,
      title: normalizeRequiredText(mapped.title, DEFAULT_ERROR_TITLE),
      message: normalizeRequiredText(mapped.message, DEFAULT_ERROR_MESSAGE),
      hint: normalizeOptionalText(mapped.hint),
      next: normalizeOptionalText(mapped.next),
      cause: mapped.cause,
    };
  }

  if (mapped instanceof Error) {
    return {
      code: USER_FACING_ERROR_CODES.unknown,
      title: DEFAULT_ERROR_TITLE,
      message: normalizeRequiredText(formatErrorMessage(mapped), DEFAULT_ERROR_MESSAGE),
      cause: mapped.cause,
    };
  }

  return {
    code: USER_FACING_ERROR_CODES.unknown,
    title: DEFAULT_ERROR_TITLE,
    message:
      mapped === null || mapped === undefined
        ? DEFAULT_ERROR_MESSAGE
        : normalizeRequiredText(formatErrorMessage(mapped), DEFAULT_ERROR_MESSAGE),
  };
}

function normalizeRequiredText(value: string | undefined, fallback: string): string {
  return normalizeOptionalText(value) ?? fallback;
}

function normalizeOptionalText(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function resolveCauseMessage(cause: unknown, message: string): string | undefined {
  if (cause === undefined || cause === null) {
    return undefined;
  }

  // Mapped updater errors carry themselves as cause; report the deeper one.
  const inner = cause instanceof Error && cause.cause !== undefined ? cause.cause : cause;
  const resolved = normalizeOptionalText(formatErrorMessage(inner));
  if (!resolved || resolved === message) {
    return undefined;
  }

  return resolved;
}

function resolveStack(error: unknown, cause?: unknown): string | undefined {
  if (cause instanceof Error && cause.stack) {
    return cause.stack;
  }

  if (error instanceof Error && error.stack) {
    return error.stack;
  }

  return undefined;
}
