import { readFile } from "node:fs/promises";

import { StatsUserError } from "../core/errors.js";

/**
 * Splits text into lines, keeping each line's `\n` terminator.
 * The last line has no terminator when the text does not end with one.
 */
export function splitLines(content: string): string[] {
  return content.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

export async function readLines(file: string): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(file, "utf8");
  } catch (err) {
    throw new StatsUserError(1308, { extraMessage: file, cause: err });
  }
  return splitLines(content);
}

export function stripNewline(line: string): string {
  return line.endsWith("\n") ? line.slice(0, -1) : line;
}

const INTEGER_RE = /^[+-]?\d+$/;

/** Integer parsing that tolerates surrounding whitespace and nothing else. */
export function parseIntStrict(value: string): number | null {
  const trimmed = value.trim();
  if (!INTEGER_RE.test(trimmed)) return null;
  return Number.parseInt(trimmed, 10);
}
