import pino from "pino";
import { config } from "./config";

// Human-readable output for local runs, JSON otherwise
const transport = config.logPretty
  ? {
      target: "pino-pretty",
      options: {
        colorize: true
      }
    }
  : undefined;

export const logger = pino({
  name: config.serviceName,
  level: config.logLevel,
  transport,
  base: { service: config.serviceName }
});
