/*
Purpose: turn errors into labelled lines shared by CLI output and log warnings.
Assumptions: UserFacingError carries the curated fields; anything else is summarized.
Usage: formatErrorLines(err, { mode: "debug" }) then render each line.
*/

import { UserFacingError } from "./errors.js";

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

export type AnsiStyle = "red" | "yellow" | "cyan" | "bold" | "dim";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

const ANSI_CODES: Record<AnsiStyle, string> = {
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
};

const ANSI_RESET = "\x1b[0m";

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

  if (error instanceof UserFacingError) {
    lines.push({ kind: "title", text: error.title });
    lines.push({ kind: "message", text: error.message });
    if (error.hint) lines.push({ kind: "hint", text: error.hint });
    if (error.next) lines.push({ kind: "next", text: error.next });

    if (options.mode === "debug") {
      lines.push({ kind: "code", text: error.code });
      lines.push({ kind: "name", text: error.name });
      if (error.cause !== undefined) {
        lines.push({ kind: "cause", text: formatErrorMessage(error.cause) });
      }
    }
  } else {
    lines.push({ kind: "title", text: formatErrorMessage(error) });
    if (options.mode === "debug" && error instanceof Error) {
      lines.push({ kind: "name", text: error.name });
    }
  }

  if (options.mode === "debug" && error instanceof Error && error.stack) {
    lines.push({ kind: "stack", text: error.stack });
  }

  return lines;
}

// =============================================================================
// COLOR
// =============================================================================

export function resolveColorEnabled(input: {
  stream: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  if (!input.stream.isTTY) return false;
  if (input.useColor !== undefined) return input.useColor;
  return process.env.NO_COLOR === undefined;
}

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  return (text, styles) => {
    if (!enabled || styles.length === 0) return text;
    const prefix = styles.map((style) => ANSI_CODES[style]).join("");
    return `${prefix}${text}${ANSI_RESET}`;
  };
}
