import Redis from "ioredis";
import { config } from "../config/env";
import { logger } from "../utils/logger";
import { MemoryVideoCache } from "./cache/memoryVideoCache";
import { RedisVideoCache } from "./cache/redisVideoCache";
import type { VideoCache } from "./cache/videoCache";
import { YouTubeService } from "./youtubeService";

let redisClient: Redis | undefined;
let youtubeService: YouTubeService | undefined;

function createCache(): VideoCache {
  if (config.cache.driver === "memory") {
    return new MemoryVideoCache();
  }

  redisClient = new Redis(config.cache.redisUrl, { lazyConnect: true });
  redisClient.on("error", (error) => {
    logger.error("Redis cache connection error", { err: error });
  });

  return new RedisVideoCache(redisClient, {
    keyPrefix: config.cache.keyPrefix,
    ttlSeconds: config.cache.ttlSeconds,
  });
}

/** Process-wide service, built from configuration on first use. */
export function getYouTubeService(): YouTubeService {
  if (!youtubeService) {
    const cache = createCache();
    youtubeService = new YouTubeService(config.youtube.apiKey, cache, {
      timeoutMs: config.youtube.requestTimeoutMs,
    });
    logger.info("YouTube service ready", { cache: cache.getServiceName() });
  }

  return youtubeService;
}

export async function closeServices(): Promise<void> {
  if (redisClient) {
    await redisClient.quit();
    redisClient = undefined;
  }
  youtubeService = undefined;
}
