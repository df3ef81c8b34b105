import pino from "pino";

// stdout carries the MCP protocol, so logs always go to stderr.
export const logger = pino(
  {
    name: "sysbak",
    level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "test" ? "silent" : "info"),
  },
  pino.destination(2),
);
