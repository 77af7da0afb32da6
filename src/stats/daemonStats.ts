import { StatsInternalError, describeError } from "../core/errors.js";
import type { DaemonStats } from "../core/stats.js";
import { readLines, stripNewline } from "../io/lineReader.js";

export type DaemonStatsResult =
  | { ok: true; stats: [DaemonStats] }
  | { ok: false; error: StatsInternalError };

type StatLine =
  | { kind: "entry"; key: string; value: number }
  | { kind: "skip" }
  | { kind: "invalid"; reason: string };

const FLOAT_RE = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const SPECIAL_FLOATS: Record<string, number> = {
  inf: Number.POSITIVE_INFINITY,
  infinity: Number.POSITIVE_INFINITY,
  nan: Number.NaN,
};

/** Parses one `key="value"` line of a daemon `.state` file. */
export function parseStatLine(line: string): StatLine {
  if (line.length <= 1 || line.includes("#")) return { kind: "skip" };

  const [key = "", rawValue] = stripNewline(line).split("=");
  if (rawValue === undefined) {
    return { kind: "invalid", reason: `missing '=' in line: ${JSON.stringify(line)}` };
  }
  const unquoted = rawValue.slice(1, -1);
  const value = parseFloatStrict(unquoted);
  if (value === null) {
    return { kind: "invalid", reason: `could not convert to float: '${unquoted}'` };
  }
  return { kind: "entry", key, value };
}

export function parseDaemonStats(lines: Iterable<string>): DaemonStatsResult {
  const stats: DaemonStats = {};
  for (const line of lines) {
    const token = parseStatLine(line);
    if (token.kind === "invalid") {
      return { ok: false, error: new StatsInternalError(1104, { extraMessage: token.reason }) };
    }
    if (token.kind === "entry") {
      // __proto__ などもそのままキーとして持つ
      Object.defineProperty(stats, token.key, {
        value: token.value,
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }
  }
  return { ok: true, stats: [stats] };
}

/**
 * Reads a daemon stats file. A missing file throws; a present but corrupt one
 * resolves to `{ ok: false }`.
 */
export async function readDaemonStats(file: string): Promise<DaemonStatsResult> {
  const lines = await readLines(file);
  const result = parseDaemonStats(lines);
  if (!result.ok) {
    console.warn(`[HostStats] corrupt daemon stats file ${file}: ${describeError(result.error)}`);
  }
  return result;
}

function parseFloatStrict(value: string): number | null {
  const trimmed = value.trim();
  if (FLOAT_RE.test(trimmed)) return Number(trimmed);
  const unsigned = trimmed.replace(/^[+-]/, "").toLowerCase();
  const special = SPECIAL_FLOATS[unsigned];
  if (special === undefined) return null;
  return trimmed.startsWith("-") ? -special : special;
}
