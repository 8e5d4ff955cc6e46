import fs from "node:fs";

import { minimatch } from "minimatch";

import { isDescendantSpan } from "./context.js";

export type JsonlFilter = {
  // Matches the span and every span beneath it.
  spanId?: string;
  typeGlob?: string;
};

// =============================================================================
// JSONL QUERIES
// =============================================================================

export function readJsonlFile(filePath: string, filter: JsonlFilter = {}): string[] {
  if (!fs.existsSync(filePath)) return [];

  const lines = fs.readFileSync(filePath, "utf8").split(/\r?\n/).filter(Boolean);
  return filterJsonlLines(lines, filter);
}

export function filterJsonlLines(lines: string[], filter: JsonlFilter = {}): string[] {
  if (!filter.spanId && !filter.typeGlob) {
    return lines;
  }

  return lines.filter((line) => {
    const parsed = safeParseJson(line);
    if (!parsed) {
      return false;
    }

    if (filter.spanId) {
      const spanId = readString(parsed, "span_id");
      if (!spanId) return false;
      if (spanId !== filter.spanId && !isDescendantSpan(spanId, filter.spanId)) return false;
    }

    if (filter.typeGlob) {
      const type = readString(parsed, "type");
      return type ? minimatch(type, filter.typeGlob) : false;
    }

    return true;
  });
}

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

function safeParseJson(line: string): Record<string, unknown> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  return isRecord(parsed) ? parsed : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function readString(event: Record<string, unknown>, key: string): string | undefined {
  const value = event[key];
  return typeof value === "string" ? value : undefined;
}
