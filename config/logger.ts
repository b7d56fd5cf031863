import pino, { type LoggerOptions } from "pino";

import { env } from "./env";

export const loggerOptions: LoggerOptions = {
  level: env.LOG_LEVEL,
};

export const logger = pino(loggerOptions);

// Child loggers for different modules
export const sourceLogger = logger.child({ module: "sources" });
export const refreshLogger = logger.child({ module: "refresh" });
export const dbLogger = logger.child({ module: "database" });
export const imageLogger = logger.child({ module: "summary-image" });
export const serverLogger = logger.child({ module: "server" });
