import pino from "pino";
import { config } from "./config.js";

// stdout carries the response document, so log lines go to stderr
export const logger = pino(
  {
    level: config.logLevel,
    formatters: {
      level: (label) => {
        return { level: label };
      }
    },
    timestamp: pino.stdTimeFunctions.isoTime
  },
  pino.destination(2)
);
