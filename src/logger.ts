import pino from "pino";
import { SERVER_NAME, parseLogLevel } from "./config.js";

// stdout belongs to the MCP transport, so logs go to stderr.
export const logger = pino(
  {
    level: parseLogLevel(process.env.LOG_LEVEL),
    base: { service: SERVER_NAME },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination(2)
);
