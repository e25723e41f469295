//
//
//

export { Instant, Duration } from "./time";
export { sleep, fitText } from "./misc";
export { seededRandom } from "./random";
export type { Random } from "./random";
export { createLogger, isLogLevel, LOG_LEVELS } from "./logger";
export type { LogLevel } from "./logger";
