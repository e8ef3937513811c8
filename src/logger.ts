import "dotenv/config";

import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import pino, { type DestinationStream, type LoggerOptions } from "pino";

const LOG_LEVEL = process.env.LOG_LEVEL ?? "info";
const LOG_FILE = process.env.LOG_FILE;

// Build the destination stream
function createDestination(): DestinationStream | undefined {
  if (LOG_FILE === undefined || LOG_FILE === "") {
    return undefined;
  }

  const logDir = dirname(LOG_FILE);
  if (logDir !== "." && !existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  // Stdout for the supervisor, file for post-mortem of stuck syncs
  const streams: pino.StreamEntry[] = [
    { level: LOG_LEVEL as pino.Level, stream: process.stdout },
    {
      level: LOG_LEVEL as pino.Level,
      stream: pino.destination({
        dest: LOG_FILE,
        sync: false,
      }),
    },
  ];

  return pino.multistream(streams) as DestinationStream;
}

const destination = createDestination();

export const loggerOptions: LoggerOptions = {
  level: LOG_LEVEL,
};

export const logger =
  destination !== undefined
    ? pino(loggerOptions, destination)
    : pino(loggerOptions);

// Child loggers for different modules
export const sourceLogger = logger.child({ module: "fitbit-api" });
export const syncLogger = logger.child({ module: "sync" });
export const dbLogger = logger.child({ module: "database" });
export const exportLogger = logger.child({ module: "export" });

if (LOG_FILE !== undefined && LOG_FILE !== "") {
  logger.info(
    { logFile: LOG_FILE, logLevel: LOG_LEVEL },
    "Logging to file enabled"
  );
}
