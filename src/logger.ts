import pino from "pino";

const defaultLevel = process.env.NODE_ENV === "test" ? "silent" : "info";

// stdout belongs to the MCP stdio transport; logs go to stderr.
export const logger = pino(
  {
    name: "gh-project-mcp",
    level: process.env.LOG_LEVEL ?? defaultLevel,
  },
  pino.destination(2),
);

export type Logger = typeof logger;
