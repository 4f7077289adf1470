import pino, { type LoggerOptions } from "pino";
import { loadConfig } from "./config";

const level = loadConfig().logLevel;
const pretty = process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test";

const options: LoggerOptions = {
  level,
  name: "crossword-csp",
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
};

// stdout carries the solved grid; log records go to stderr
export const logger = pretty
  ? pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          destination: 2,
        },
      },
    })
  : pino(options, pino.destination(2));

export default logger;
