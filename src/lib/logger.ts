import pino from "pino";
import { config } from "./config";

export type Logger = pino.Logger;

export const logger: Logger = pino(
  config.isDev
    ? {
        level: config.logLevel,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        },
      }
    : {
        level: config.logLevel,
      },
);

export default logger;
