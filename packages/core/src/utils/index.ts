/**
 * Utils Module
 */

export { logger, initLogger, getLogger, getDefaultLogDir, LogLevel } from "./logger.js";
export type { Logger, LoggerConfig } from "./logger.js";
export { yesNoQuery } from "./prompt.js";
export { sleep } from "./async.js";
export { idGenerator } from "./random.js";
