import pino, { type LoggerOptions } from "pino";
import { env } from "./env";

// Mêmes options pour Fastify et pour le moteur: un seul format de logs
export const loggerOptions: LoggerOptions = {
  level: env.LOG_LEVEL,
  base: { service: "bourse-quotidienne" },
  timestamp: pino.stdTimeFunctions.isoTime,
};

export const logger = pino(loggerOptions);

export const engineLogger = logger.child({ module: "engine" });
export const dividendLogger = logger.child({ module: "dividends" });
export const achievementLogger = logger.child({ module: "achievements" });
export const syncLogger = logger.child({ module: "sync" });
export const storeLogger = logger.child({ module: "store" });
export const marketLogger = logger.child({ module: "market" });
