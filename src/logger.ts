import "dotenv/config";

import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import pino, { type DestinationStream, type LevelWithSilent } from "pino";

function isLevel(value: string): value is pino.Level {
  return Object.hasOwn(pino.levels.values, value);
}

function resolveLevel(value: string | undefined): LevelWithSilent {
  if (value === undefined) {
    return "info";
  }
  return value === "silent" || isLevel(value) ? value : "info";
}

const level = resolveLevel(process.env.LOG_LEVEL);
const logFile = process.env.LOG_FILE ?? "";

// Mirror stdout into LOG_FILE when it is set
function createDestination(): DestinationStream | undefined {
  if (logFile === "") {
    return undefined;
  }

  const logDir = dirname(logFile);
  if (logDir !== "." && !existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  // Stream entries cannot be silent; the logger level still filters first
  const streamLevel: pino.Level = isLevel(level) ? level : "fatal";
  return pino.multistream([
    { level: streamLevel, stream: process.stdout },
    {
      level: streamLevel,
      stream: pino.destination({ dest: logFile, sync: false }),
    },
  ]) as DestinationStream;
}

const destination = createDestination();

const logger =
  destination !== undefined ? pino({ level }, destination) : pino({ level });

export const fetchLogger = logger.child({ module: "bls-api" });
export const dbLogger = logger.child({ module: "database" });
export const pipelineLogger = logger.child({ module: "pipeline" });

if (logFile !== "") {
  logger.info({ logFile, level }, "Logging to file enabled");
}
