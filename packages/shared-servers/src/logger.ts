import pino from "pino";

// Pretty print outside production; tests and production write plain JSON
const isProduction = process.env.NODE_ENV === "production";
const isTest = process.env.NODE_ENV === "test" || process.env.VITEST !== undefined;
const transport =
  isProduction || isTest
    ? undefined
    : {
        target: "pino-pretty",
        options: {
          colorize: true,
          ignore: "pid,hostname",
          translateTime: "SYS:standard",
        },
      };

/**
 * Application logger.
 */
export const logger = pino({
  level: process.env.LOG_LEVEL || "info",
  transport,
});

export type { Logger } from "pino";

/**
 * Child logger tagged with the owning module.
 */
export const createModuleLogger = (module: string): pino.Logger => logger.child({ module });
