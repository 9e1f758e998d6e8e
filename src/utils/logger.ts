import { existsSync, mkdirSync } from "node:fs";
import path from "node:path";
import winston from "winston";
import { config } from "../config/env";

const logDirectory = config.logging.directory;
const fileSizeBytes = config.logging.maxSizeMB * 1024 * 1024;

const perLevelFiles: Record<string, string> = {
  error: "error.log",
  warn: "warn.log",
  info: "info.log",
  debug: "debug.log",
};

const baseFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.metadata({ fillExcept: ["message", "level", "timestamp", "label"] }),
);

function createFileTransports(): winston.transports.FileTransportInstance[] {
  if (!config.logging.toFile) {
    return [];
  }

  if (!existsSync(logDirectory)) {
    try {
      mkdirSync(logDirectory, { recursive: true });
    } catch (error) {
      console.error(`[logger] Failed to create log directory at ${logDirectory}`, error);
      return [];
    }
  }

  const perLevelTransports = Object.entries(perLevelFiles).map(
    ([level, filename]) =>
      new winston.transports.File({
        level,
        filename: path.join(logDirectory, filename),
        maxsize: fileSizeBytes,
        maxFiles: config.logging.maxFiles,
        tailable: true,
      }),
  );

  return [
    new winston.transports.File({
      level: config.logging.fileLevel,
      filename: path.join(logDirectory, config.logging.fileName),
      maxsize: fileSizeBytes,
      maxFiles: config.logging.maxFiles,
      tailable: true,
    }),
    ...perLevelTransports,
  ];
}

export const logger = winston.createLogger({
  level: config.logging.level,
  format: winston.format.combine(baseFormat, winston.format.json()),
  transports: [
    ...createFileTransports(),
    new winston.transports.Console({
      level: config.logging.consoleLevel,
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, stack, metadata }) => {
          const meta =
            metadata && typeof metadata === "object" && Object.keys(metadata).length > 0
              ? ` ${JSON.stringify(metadata)}`
              : "";
          return stack
            ? `${String(timestamp)} [${level}]: ${String(message)}\n${String(stack)}${meta}`
            : `${String(timestamp)} [${level}]: ${String(message)}${meta}`;
        }),
      ),
    }),
  ],
});
