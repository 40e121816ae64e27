export { logger, createModuleLogger } from "./logger";
export type { Logger } from "./logger";
export { createSilentLogger, createCapturingLogger } from "./test-utils/silent-logger";
export type { CapturedLogLine } from "./test-utils/silent-logger";
