/*
Purpose: turn arbitrary thrown values into structured lines for CLI and log output.
Assumptions: callers decide how lines are rendered; this module only classifies them.
Usage: formatErrorLines(err, { mode: "short" }).map((line) => line.text)
*/

import { isUserFacingError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "red" | "yellow" | "cyan" | "dim" | "bold";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  red: [31, 39],
  yellow: [33, 39],
  cyan: [36, 39],
  dim: [2, 22],
  bold: [1, 22],
};

// =============================================================================
// MESSAGES
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatErrorLines(
  error: unknown,
  options: { mode: ErrorFormatMode },
): ErrorFormatLine[] {
  const lines: ErrorFormatLine[] = [];

  if (isUserFacingError(error)) {
    lines.push({ kind: "title", text: error.title });
    lines.push({ kind: "message", text: error.message });
    if (error.hint) lines.push({ kind: "hint", text: error.hint });
    if (error.next) lines.push({ kind: "next", text: error.next });

    if (options.mode === "debug") {
      lines.push({ kind: "code", text: error.code });
      if (error.cause !== undefined) {
        lines.push({ kind: "cause", text: formatCause(error.cause) });
      }
      appendStack(lines, error.cause instanceof Error ? error.cause : error);
    }
    return lines;
  }

  lines.push({ kind: "title", text: formatErrorMessage(error) });

  if (options.mode === "debug" && error instanceof Error) {
    lines.push({ kind: "name", text: error.name });
    const cause = readCause(error);
    if (cause !== undefined) {
      lines.push({ kind: "cause", text: formatCause(cause) });
    }
    appendStack(lines, error);
  }

  return lines;
}

// =============================================================================
// COLOR
// =============================================================================

export function resolveColorEnabled(options: {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  if (options.useColor !== undefined) return options.useColor;
  if (process.env.NO_COLOR !== undefined) return false;
  return Boolean(options.stream?.isTTY);
}

export function createAnsiFormatter(useColor: boolean): AnsiFormatter {
  if (!useColor) {
    return (text) => text;
  }

  return (text, styles) =>
    styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\u001b[${open}m${acc}\u001b[${close}m`;
    }, text);
}

// =============================================================================
// INTERNALS
// =============================================================================

function readCause(error: Error): unknown {
  return "cause" in error ? error.cause : undefined;
}

function formatCause(cause: unknown): string {
  if (cause instanceof Error) return `${cause.name}: ${cause.message}`;
  if (typeof cause === "string") return cause;

  try {
    return JSON.stringify(cause);
  } catch {
    return String(cause);
  }
}

function appendStack(lines: ErrorFormatLine[], error: Error): void {
  if (error.stack) {
    lines.push({ kind: "stack", text: error.stack });
  }
}
