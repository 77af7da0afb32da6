import { join } from "node:path";
import { z } from "zod";

import { StatsInternalError, StatsUserError, describeError } from "../core/errors.js";
import type { DaemonSocketReply } from "../core/stats.js";
import { tryParseSourceTimestamp } from "../runtime/dates.js";
import type { DateFormatter } from "../runtime/dates.js";
import type { SocketHandle, SocketTransport } from "./framedSocket.js";

const MANAGER_ID = "000";
const REQUEST_SOCKET = "request";
const STATE_COMMAND = "getstate";
const TIMESTAMP_FIELDS = ["last_keepalive", "last_ack"] as const;

// マネージャ自身には存在しないデーモン
const MANAGER_UNSUPPORTED_DAEMONS: ReadonlySet<string> = new Set(["agent"]);

const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

const DaemonReplySchema = z.object({
  data: z.record(z.unknown()),
});

export type DaemonRequest = {
  socketPath: string;
  command: string;
};

export type DaemonReplyDecoding =
  | { ok: true; data: DaemonSocketReply }
  | { ok: false; message: string };

export function normalizeAgentId(agentId: string): string {
  return agentId.padStart(3, "0");
}

export function buildDaemonRequest(
  socketsDir: string,
  agentId: string,
  daemon: string
): DaemonRequest {
  if (!agentId || !daemon) {
    throw new StatsUserError(1307);
  }

  const normalizedId = normalizeAgentId(agentId);
  if (normalizedId === MANAGER_ID) {
    if (MANAGER_UNSUPPORTED_DAEMONS.has(daemon)) {
      throw new StatsUserError(1310, { extraMessage: daemon });
    }
    return { socketPath: join(socketsDir, daemon), command: STATE_COMMAND };
  }

  return {
    socketPath: join(socketsDir, REQUEST_SOCKET),
    command: `${normalizedId} ${daemon} ${STATE_COMMAND}`,
  };
}

/**
 * Decodes a `getstate` reply. Daemons answer either with JSON carrying a `data`
 * object or with a `<status> <message>` error envelope on the same channel.
 */
export function decodeDaemonReply(raw: string, formatDate: DateFormatter): DaemonReplyDecoding {
  const parsed = parseStateReply(raw);
  if (!parsed) {
    return { ok: false, message: errorEnvelopeMessage(raw) };
  }

  const { data, timestamps } = parsed;
  for (const [field, date] of timestamps) {
    data[field] = formatDate(date);
  }
  return { ok: true, data };
}

type ParsedStateReply = {
  data: DaemonSocketReply;
  timestamps: Array<[field: string, date: Date]>;
};

// null のときはエラーエンベロープとして扱う
function parseStateReply(raw: string): ParsedStateReply | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const reply = DaemonReplySchema.safeParse(json);
  if (!reply.success) return null;

  const { data } = reply.data;
  const timestamps: ParsedStateReply["timestamps"] = [];
  for (const field of TIMESTAMP_FIELDS) {
    const value = data[field];
    if (value === undefined) continue;
    if (typeof value !== "string") return null;
    const date = tryParseSourceTimestamp(value);
    if (!date) return null;
    timestamps.push([field, date]);
  }
  return { data, timestamps };
}

function errorEnvelopeMessage(raw: string): string {
  const separator = raw.indexOf(" ");
  return separator === -1 ? raw : raw.slice(separator + 1);
}

type DaemonStateClientDeps = {
  transport: SocketTransport;
  socketsDir: string;
  formatDate: DateFormatter;
};

export class DaemonStateClient {
  constructor(private readonly deps: DaemonStateClientDeps) {}

  async getDaemonState(agentId: string, daemon: string): Promise<DaemonSocketReply> {
    const { socketPath, command } = buildDaemonRequest(this.deps.socketsDir, agentId, daemon);
    const raw = await this.roundTrip(socketPath, command);

    const decoded = decodeDaemonReply(raw, this.deps.formatDate);
    if (!decoded.ok) {
      throw new StatsUserError(1117, { extraMessage: decoded.message });
    }
    return decoded.data;
  }

  private async roundTrip(socketPath: string, command: string): Promise<string> {
    let handle: SocketHandle;
    try {
      handle = await this.deps.transport.open(socketPath);
    } catch (err) {
      throw new StatsInternalError(1121, { extraMessage: socketPath, cause: err });
    }

    try {
      await handle.send(Buffer.from(command));
      try {
        const reply = await handle.receive();
        return utf8Decoder.decode(reply);
      } catch (err) {
        throw new StatsInternalError(1118, {
          extraMessage: `Data could not be received (${describeError(err)})`,
          cause: err,
        });
      }
    } finally {
      handle.close();
    }
  }
}
