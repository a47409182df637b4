import pino, { type Logger } from "pino";
import { LOG_LEVEL } from "../config";

export type { Logger };

const isDevelopment = process.env.NODE_ENV === "development";

export const logger: Logger = pino({
  level: LOG_LEVEL,
  transport: isDevelopment
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss Z",
          ignore: "pid,hostname",
        },
      }
    : undefined,
  base: { service: "vp-price-tracker" },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
  },
});

/** Дочерний логгер с именем модуля. */
export const createLogger = (module: string): Logger => logger.child({ module });
