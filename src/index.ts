export * from "./core/errors.js";
export * from "./core/stats.js";
export { loadStatsConfig, daemonStatePath } from "./runtime/config.js";
export type { StatsConfig } from "./runtime/config.js";
export { createDateFormatter, tryParseSourceTimestamp } from "./runtime/dates.js";
export type { DateFormatter } from "./runtime/dates.js";
export { AverageReader } from "./stats/averages.js";
export { TotalsReader, parseTotalsLine, parseTotalsLog, totalsLogPath } from "./stats/totals.js";
export type { TotalsLine } from "./stats/totals.js";
export { readDaemonStats, parseDaemonStats, parseStatLine } from "./stats/daemonStats.js";
export type { DaemonStatsResult } from "./stats/daemonStats.js";
export { componentStats } from "./stats/agentStats.js";
export type { AgentInventory, AgentStatsResult } from "./stats/agentStats.js";
export {
  FramedSocket,
  SocketClosedError,
  SocketTimeoutError,
  createUnixSocketTransport,
} from "./socket/framedSocket.js";
export type { FramedSocketOptions, SocketHandle, SocketTransport } from "./socket/framedSocket.js";
export {
  DaemonStateClient,
  buildDaemonRequest,
  decodeDaemonReply,
  normalizeAgentId,
} from "./socket/daemonState.js";
export type { DaemonReplyDecoding, DaemonRequest } from "./socket/daemonState.js";
