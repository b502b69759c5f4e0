export { accessReadable, ensureDirectory, errorMessage, extractErrorCode, reasonFromCode } from "./file-utils.js";
export type { AccessResult } from "./file-utils.js";
export { createLogger, isLogLevel, silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";
