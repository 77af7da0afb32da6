import { isAbsolute } from "node:path";

import { daemonStatePath } from "./runtime/config.js";
import type { StatsConfig } from "./runtime/config.js";
import { createDateFormatter } from "./runtime/dates.js";
import { createUnixSocketTransport } from "./socket/framedSocket.js";
import { DaemonStateClient } from "./socket/daemonState.js";
import { AverageReader } from "./stats/averages.js";
import { readDaemonStats } from "./stats/daemonStats.js";
import { TotalsReader } from "./stats/totals.js";

export const USAGE = `usage: host-stats <command> [args]

commands:
  hourly                          hourly alert averages
  weekly                          per-weekday alert averages
  totals [yyyy-mm-dd]             per-hour alert totals (default: today)
  daemon-stats <daemon|file>      counters from a daemon .state file
  daemon-state <agentId> <daemon> live daemon state over the control socket`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export async function runCommand(argv: readonly string[], config: StatsConfig): Promise<unknown> {
  const [command, ...args] = argv;
  switch (command) {
    case "hourly":
      return new AverageReader({ statsDir: config.statsDir }).hourly();
    case "weekly":
      return new AverageReader({ statsDir: config.statsDir }).weekly();
    case "totals":
      return new TotalsReader({ statsDir: config.statsDir }).totals(parseDateArg(args[0]));
    case "daemon-stats": {
      const target = requireArg(args[0], "daemon name or file");
      const file = isAbsolute(target) ? target : daemonStatePath(config.installDir, target);
      const result = await readDaemonStats(file);
      if (!result.ok) throw result.error;
      return result.stats;
    }
    case "daemon-state": {
      const client = new DaemonStateClient({
        transport: createUnixSocketTransport({ timeoutMs: config.socketTimeoutMs }),
        socketsDir: config.socketsDir,
        formatDate: createDateFormatter(config.dateFormat),
      });
      return client.getDaemonState(
        requireArg(args[0], "agent id"),
        requireArg(args[1], "daemon name")
      );
    }
    default:
      throw new UsageError(command ? `unknown command: ${command}` : "missing command");
  }
}

function requireArg(value: string | undefined, label: string): string {
  if (!value) throw new UsageError(`missing ${label}`);
  return value;
}

function parseDateArg(value: string | undefined): Date | undefined {
  if (!value) return undefined;
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) throw new UsageError(`invalid date: ${value}`);
  const [, year, month, day] = match;
  return new Date(Number(year), Number(month) - 1, Number(day));
}
