import path from "node:path";

import { DEFAULT_DATE_FORMAT, createDateFormatter } from "./dates.js";

const DEFAULT_INSTALL_DIR = "/var/ossec";

export type StatsConfig = {
  installDir: string;
  statsDir: string;
  socketsDir: string;
  dateFormat: string;
  socketTimeoutMs: number | null;
};

type Env = Record<string, string | undefined>;

export function loadStatsConfig(env: Env = process.env): StatsConfig {
  const installDir = resolveDir(env.HOST_STATS_INSTALL_DIR, DEFAULT_INSTALL_DIR);
  const statsDir = resolveDir(env.HOST_STATS_DIR, path.join(installDir, "stats"));
  const socketsDir = resolveDir(
    env.HOST_STATS_SOCKETS_DIR,
    path.join(installDir, "queue", "sockets")
  );
  const dateFormat = env.HOST_STATS_DATE_FORMAT?.trim() || DEFAULT_DATE_FORMAT;
  // 不正なパターンは起動時に弾く
  createDateFormatter(dateFormat);

  return {
    installDir,
    statsDir,
    socketsDir,
    dateFormat,
    socketTimeoutMs: parseTimeout(env.HOST_STATS_SOCKET_TIMEOUT_MS),
  };
}

export function daemonStatePath(installDir: string, daemon: string): string {
  return path.join(installDir, "var", "run", `${daemon}.state`);
}

function resolveDir(value: string | undefined, fallback: string): string {
  if (value && value.trim()) return path.resolve(value.trim());
  return fallback;
}

function parseTimeout(value: string | undefined): number | null {
  if (!value || !value.trim()) return null;
  const ms = Number(value);
  // 0 や負値は「タイムアウトなし」と同じ扱い
  if (!Number.isInteger(ms) || ms <= 0) return null;
  return ms;
}
