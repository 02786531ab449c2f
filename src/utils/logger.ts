import pino, { type Logger } from "pino";

export type { Logger };

// stdio mode owns stdout for the MCP protocol, so logs go to stderr there
export function createLogger(level: string, toStderr = false): Logger {
  return toStderr
    ? pino({ level }, pino.destination(2))
    : pino({ level });
}

export const silentLogger: Logger = pino({ level: "silent" });
