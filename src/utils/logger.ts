import pino from "pino";

export const logger = pino({
  name: "bq-dlp-redactor",
  level: process.env.LOG_LEVEL || "info",
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});
