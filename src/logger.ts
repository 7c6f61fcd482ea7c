import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import winston from "winston";
import { LOG_FILE } from "./paths.js";

// The terminal belongs to the UI: records go to a file, never to stdout.
function buildTransports(): winston.transport[] {
  if (process.env.NODE_ENV === "test") {
    return [new winston.transports.Console({ silent: true })];
  }
  mkdirSync(dirname(LOG_FILE), { recursive: true });
  return [new winston.transports.File({ filename: LOG_FILE, maxsize: 5 * 1024 * 1024, maxFiles: 2 })];
}

export const logger = winston.createLogger({
  level: process.env.DOCKER_DASH_LOG_LEVEL || "info",
  format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
  transports: buildTransports(),
});
