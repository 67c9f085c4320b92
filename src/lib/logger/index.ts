export { createLogger, type Logger, type LoggerConfig } from "./logger";

export type { LogFormat, LogLevel } from "./schema";
