import pino, { type DestinationStream, type Logger } from "pino";
import type { Config } from "../config/schema.js";

export const createLogger = (
  config: Pick<Config, "logLevel">,
  destination?: DestinationStream
): Logger =>
  pino(
    {
      name: "review-rota",
      level: config.logLevel,
      timestamp: pino.stdTimeFunctions.isoTime
    },
    destination
  );
