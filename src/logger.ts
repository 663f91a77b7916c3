import pino, { type DestinationStream } from "pino";

// ── Logging ─────────────────────────────────────────────────────────
// One JSON object per line on stderr. stdout belongs to the stdio MCP
// transport and must only ever carry protocol messages.

export type LogLevel = "debug" | "info" | "warn" | "error";

let destination: DestinationStream = pino.destination(2);

export const logger = pino(
  {
    level: "info",
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  },
  { write: (line: string) => destination.write(line) },
);

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

/** Redirect log output (tests) */
export function setLogSink(write: (line: string) => void): void {
  destination = { write };
}
