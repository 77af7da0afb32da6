export const STATS_ERROR_MESSAGES = {
  1104: "Invalid stats file content",
  1117: "Daemon returned an error",
  1118: "Error receiving data from socket",
  1121: "Error connecting with socket",
  1307: "Invalid parameters",
  1308: "Stats file does not exist",
  1310: "Daemon not available for this target",
  1701: "Agent does not exist",
} as const;

export type StatsErrorCode = keyof typeof STATS_ERROR_MESSAGES;

type StatsErrorOptions = {
  extraMessage?: string;
  cause?: unknown;
};

export class StatsError extends Error {
  readonly code: StatsErrorCode;
  readonly extraMessage?: string;

  constructor(code: StatsErrorCode, options: StatsErrorOptions = {}) {
    const base = STATS_ERROR_MESSAGES[code];
    const message = options.extraMessage ? `${base}: ${options.extraMessage}` : base;
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.extraMessage = options.extraMessage;
  }
}

/** Caller-side problems: bad input, missing resources, daemon-reported failures. */
export class StatsUserError extends StatsError {}

/** Failures on our side of the boundary: corrupt files, broken sockets. */
export class StatsInternalError extends StatsError {}

export class ResourceNotFoundError extends StatsUserError {}

export function isStatsError(error: unknown): error is StatsError {
  return error instanceof StatsError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
