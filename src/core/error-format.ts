/*
Purpose: turn thrown values into the text the host writes to the diagnostic stream.
Assumptions: debug mode may include stack traces; non-TTY output never carries ANSI codes.
Usage: renderErrorLines(formatErrorLines(err, { mode }), createAnsiFormatter(resolveColorEnabled()));
*/

import {
  USER_FACING_ERROR_CODES,
  UserFacingError,
  type UserFacingErrorCode,
} from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind = "title" | "message" | "hint" | "next" | "code" | "cause" | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "bold" | "dim" | "red" | "yellow";

export type AnsiFormatter = (value: string, styles?: AnsiStyle[]) => string;

// =============================================================================
// ANSI COLOR HELPERS
// =============================================================================

const ANSI_RESET = "\x1b[0m";

const ANSI_STYLES: Record<AnsiStyle, string> = {
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
};

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  return (value, styles = []) => {
    if (!enabled || styles.length === 0) return value;
    return `${styles.map((style) => ANSI_STYLES[style]).join("")}${value}${ANSI_RESET}`;
  };
}

export function resolveColorEnabled(
  stream: { isTTY?: boolean } = process.stderr,
  env: NodeJS.ProcessEnv = process.env,
): boolean {
  if (env.NO_COLOR !== undefined && env.NO_COLOR !== "") return false;
  return Boolean(stream.isTTY);
}

// =============================================================================
// ERROR FORMATTING
// =============================================================================

const DEFAULT_ERROR_TITLE = "Unexpected error";
const DEFAULT_ERROR_MESSAGE = "An unexpected error occurred.";

const LINE_STYLES: Record<ErrorFormatLineKind, AnsiStyle[]> = {
  title: ["bold", "red"],
  message: [],
  hint: ["yellow"],
  next: ["yellow"],
  code: ["dim"],
  cause: ["dim"],
  stack: ["dim"],
};

export function formatErrorLines(
  error: unknown,
  options: { mode?: ErrorFormatMode } = {},
): ErrorFormatLine[] {
  const mode = options.mode ?? "short";
  const lines: ErrorFormatLine[] = [];

  const userError = error instanceof UserFacingError ? error : undefined;
  const title = normalizeText(userError?.title) ?? DEFAULT_ERROR_TITLE;
  const message = normalizeText(formatErrorMessage(error)) ?? DEFAULT_ERROR_MESSAGE;
  const code: UserFacingErrorCode = userError?.code ?? USER_FACING_ERROR_CODES.unknown;

  lines.push({ kind: "title", text: title });
  if (message !== title) {
    lines.push({ kind: "message", text: message });
  }

  const hint = normalizeText(userError?.hint);
  if (hint) lines.push({ kind: "hint", text: `Hint: ${hint}` });

  const next = normalizeText(userError?.next);
  if (next) lines.push({ kind: "next", text: `Next: ${next}` });

  if (mode === "debug") {
    lines.push({ kind: "code", text: `Code: ${code}` });

    const cause = resolveCause(error);
    const causeMessage = cause === undefined ? undefined : normalizeText(formatErrorMessage(cause));
    if (causeMessage && causeMessage !== message) {
      lines.push({ kind: "cause", text: `Cause: ${causeMessage}` });
    }

    const stack = formatErrorTrace(error);
    if (stack) lines.push({ kind: "stack", text: stack });
  }

  return lines;
}

export function renderErrorLines(lines: ErrorFormatLine[], format: AnsiFormatter): string {
  return lines.map((line) => format(line.text, LINE_STYLES[line.kind])).join("\n");
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return normalizeText(error.message) ?? normalizeText(error.name) ?? DEFAULT_ERROR_MESSAGE;
  }

  if (typeof error === "string") {
    return error;
  }

  if (error && typeof error === "object" && "message" in error) {
    const { message } = error;
    if (typeof message === "string" && message.trim()) {
      return message.trim();
    }
  }

  return String(error);
}

/** Full trace text for a fault; falls back to the message when no stack was captured. */
export function formatErrorTrace(error: unknown): string {
  if (error instanceof Error && error.stack) {
    return error.stack;
  }

  return formatErrorMessage(error);
}

// =============================================================================
// INTERNALS
// =============================================================================

function normalizeText(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function resolveCause(error: unknown): unknown {
  if (error instanceof Error && "cause" in error) {
    return error.cause;
  }
  return undefined;
}
