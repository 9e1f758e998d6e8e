import dotenv from "dotenv";
import { parseDurationToSeconds } from "../utils/time";

dotenv.config();

export type CacheDriver = "memory" | "redis";

export interface AppConfig {
  port: number;
  nodeEnv: string;
  clientOrigin?: string;
  youtube: YouTubeConfig;
  cache: CacheConfig;
  logging: LoggingConfig;
}

export interface YouTubeConfig {
  apiKey: string;
  requestTimeoutMs: number;
}

export interface CacheConfig {
  driver: CacheDriver;
  redisUrl: string;
  keyPrefix: string;
  ttlSeconds?: number;
}

export interface LoggingConfig {
  level: string;
  consoleLevel: string;
  fileLevel: string;
  toFile: boolean;
  directory: string;
  fileName: string;
  maxSizeMB: number;
  maxFiles: number;
}

function parsePositiveInt(name: string, value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed <= 0) {
    throw new Error(`Environment variable ${name} must be a positive integer`);
  }

  return parsed;
}

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Environment variable ${name} is required`);
  }

  return value;
}

function parseBooleanEnv(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }

  if (value === "true") {
    return true;
  }
  if (value === "false") {
    return false;
  }

  return fallback;
}

function parseCacheDriver(value: string | undefined): CacheDriver {
  if (!value) {
    return "memory";
  }

  const normalized = value.toLowerCase();
  if (normalized === "memory" || normalized === "redis") {
    return normalized;
  }

  throw new Error("Environment variable CACHE_DRIVER must be one of memory|redis");
}

function loadYouTubeConfig(): YouTubeConfig {
  return {
    apiKey: requireEnv("YOUTUBE_API_KEY"),
    requestTimeoutMs: parsePositiveInt(
      "YOUTUBE_REQUEST_TIMEOUT_MS",
      process.env.YOUTUBE_REQUEST_TIMEOUT_MS,
      20_000,
    ),
  };
}

function loadCacheConfig(): CacheConfig {
  const cacheConfig: CacheConfig = {
    driver: parseCacheDriver(process.env.CACHE_DRIVER),
    redisUrl: process.env.REDIS_URL ?? "redis://localhost:6379",
    keyPrefix: process.env.CACHE_KEY_PREFIX ?? "yt",
  };

  const rawTtl = process.env.CACHE_TTL;
  if (rawTtl) {
    const ttlSeconds = parseDurationToSeconds(rawTtl);
    if (ttlSeconds === undefined) {
      throw new Error("Environment variable CACHE_TTL must be a duration such as 90s, 30m or 6h");
    }
    cacheConfig.ttlSeconds = ttlSeconds;
  }

  return cacheConfig;
}

function loadLoggingConfig(nodeEnv: string): LoggingConfig {
  const level = process.env.LOG_LEVEL ?? (nodeEnv === "production" ? "info" : "debug");

  return {
    level,
    consoleLevel: process.env.LOG_CONSOLE_LEVEL ?? level,
    fileLevel: process.env.LOG_FILE_LEVEL ?? "info",
    toFile: parseBooleanEnv(process.env.LOG_TO_FILE, nodeEnv !== "test"),
    directory: process.env.LOG_DIR ?? "logs",
    fileName: process.env.LOG_FILE_NAME ?? "app.log",
    maxSizeMB: parsePositiveInt("LOG_MAX_SIZE_MB", process.env.LOG_MAX_SIZE_MB, 10),
    maxFiles: parsePositiveInt("LOG_MAX_FILES", process.env.LOG_MAX_FILES, 5),
  };
}

export function loadConfig(): AppConfig {
  const nodeEnv = process.env.NODE_ENV ?? "development";

  const appConfig: AppConfig = {
    port: parsePositiveInt("PORT", process.env.PORT, 5001),
    nodeEnv,
    youtube: loadYouTubeConfig(),
    cache: loadCacheConfig(),
    logging: loadLoggingConfig(nodeEnv),
  };

  if (process.env.CLIENT_ORIGIN) {
    appConfig.clientOrigin = process.env.CLIENT_ORIGIN;
  }

  return appConfig;
}

export const config = loadConfig();
