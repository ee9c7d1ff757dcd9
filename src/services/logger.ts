import pino from "pino";

const logLevel = process.env.LOG_LEVEL || "info";

// stdout carries the stdio transport, so logs go to stderr.
export const logger = pino(
  {
    name: "mealie-mcp",
    level: logLevel,
    formatters: {
      level: (label) => {
        return { level: label.toUpperCase() };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination(2)
);
