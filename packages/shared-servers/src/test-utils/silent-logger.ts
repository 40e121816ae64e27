import pino, { type Logger } from "pino";

/**
 * Logger that drops every line. Pass it to components under test to keep output quiet.
 */
export const createSilentLogger = (): Logger => pino({ level: "silent" });

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === "object" && value !== null && !Array.isArray(value);
};

export interface CapturedLogLine {
  level: number;
  msg: string;
  [key: string]: unknown;
}

/**
 * Logger that records every line it receives so tests can assert on warnings and errors.
 */
export const createCapturingLogger = (): { logger: Logger; lines: CapturedLogLine[] } => {
  const lines: CapturedLogLine[] = [];
  const logger = pino(
    { level: "trace" },
    {
      write(chunk: string) {
        const record: unknown = JSON.parse(chunk);
        if (isRecord(record)) {
          lines.push({
            ...record,
            level: typeof record.level === "number" ? record.level : 0,
            msg: typeof record.msg === "string" ? record.msg : "",
          });
        }
      },
    },
  );
  return { logger, lines };
};
