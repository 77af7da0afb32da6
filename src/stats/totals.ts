import { format } from "date-fns";
import { join } from "node:path";

import type { AlertRecord, TotalsRecord, TotalsResult } from "../core/stats.js";
import { parseIntStrict, readLines } from "../io/lineReader.js";

const TOTALS_FILE_PREFIX = "ossec-totals";

export type TotalsLine =
  | { kind: "alert"; alert: AlertRecord }
  | { kind: "hour"; record: Omit<TotalsRecord, "alerts"> }
  | { kind: "skip" }
  | { kind: "malformed"; line: string };

/**
 * Classifies one line of a daily totals log.
 *
 * Alert lines carry four `-` separated fields (`hour-sigid-level-times`), hour
 * summaries five `--` separated ones (`hour--alerts--events--syscheck--firewall`).
 */
export function parseTotalsLine(line: string): TotalsLine {
  const alertFields = line.split("-");
  if (alertFields.length === 4) {
    const [sigid, level, times] = parseInts(alertFields.slice(1));
    if (sigid === undefined || level === undefined || times === undefined) {
      return { kind: "malformed", line };
    }
    return { kind: "alert", alert: { sigid, level, times } };
  }

  const hourFields = line.split("--");
  if (hourFields.length <= 1) return { kind: "skip" };
  if (hourFields.length !== 5) return { kind: "malformed", line };

  const [hour, totalAlerts, events, syscheck, firewall] = parseInts(hourFields);
  if (
    hour === undefined ||
    totalAlerts === undefined ||
    events === undefined ||
    syscheck === undefined ||
    firewall === undefined
  ) {
    return { kind: "malformed", line };
  }
  return { kind: "hour", record: { hour, totalAlerts, events, syscheck, firewall } };
}

export function parseTotalsLog(lines: Iterable<string>): TotalsResult {
  const records: TotalsRecord[] = [];
  let pending: AlertRecord[] = [];

  for (const line of lines) {
    const token = parseTotalsLine(line);
    switch (token.kind) {
      case "alert":
        pending.push(token.alert);
        break;
      case "hour": {
        const { hour, ...counters } = token.record;
        records.push({ hour, alerts: pending, ...counters });
        pending = [];
        break;
      }
      case "skip":
        break;
      case "malformed":
        return { failed: true, records };
    }
  }

  // 締め行の無いアラートは捨てる（ログの書き出し単位に合わせた挙動）
  return { failed: false, records };
}

export function totalsLogPath(statsDir: string, date: Date): string {
  return join(
    statsDir,
    "totals",
    format(date, "yyyy"),
    format(date, "MMM"),
    `${TOTALS_FILE_PREFIX}-${format(date, "dd")}.log`
  );
}

type TotalsReaderOptions = {
  statsDir: string;
};

export class TotalsReader {
  constructor(private readonly options: TotalsReaderOptions) {}

  async totals(date: Date = new Date()): Promise<TotalsResult> {
    const lines = await readLines(totalsLogPath(this.options.statsDir, date));
    return parseTotalsLog(lines);
  }
}

function parseInts(fields: string[]): Array<number | undefined> {
  return fields.map((field) => parseIntStrict(field) ?? undefined);
}

