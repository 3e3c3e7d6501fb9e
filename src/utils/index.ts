//
//
//

export type { Hashable } from "./interfaces";
export { HashSet } from "./set";
export { createAppLogger, isLogLevel, LOG_LEVELS } from "./logger";
export type { LogLevel } from "./logger";
