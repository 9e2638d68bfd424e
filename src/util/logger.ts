import { destination, pino, type Logger } from "pino";

export type { Logger };

// stdout carries the MCP stdio transport, so logs always go to stderr.
export function createLogger(level = "info"): Logger {
  return pino({ name: "devicegate", level }, destination(2));
}

export const silentLogger: Logger = pino({ level: "silent" });
