import type { ChannelInfo, VideoResults } from "../../models/youtube";
import { logger } from "../../utils/logger";
import type { CachePartition, PlaylistCacheEntry, VideoCache } from "./videoCache";

export const REDIS_CACHE_NAME = "redis-cache";

/** The subset of an ioredis client this cache talks to. */
export interface RedisCommands {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  set(key: string, value: string, secondsToken: "EX", seconds: number): Promise<unknown>;
}

export interface RedisVideoCacheOptions {
  keyPrefix?: string;
  /** Expire entries after this many seconds. Entries never expire when omitted. */
  ttlSeconds?: number;
}

function hasItemsArray(value: unknown): value is { items: unknown[] } {
  return (
    typeof value === "object" &&
    value !== null &&
    "items" in value &&
    Array.isArray(value.items)
  );
}

function isVideoResults(value: unknown): value is VideoResults {
  return hasItemsArray(value);
}

function isChannelInfo(value: unknown): value is ChannelInfo {
  return hasItemsArray(value);
}

function isPlaylistEntry(value: unknown): value is PlaylistCacheEntry {
  return value === null || isVideoResults(value);
}

/**
 * Stores each entry as JSON under `<prefix>:<partition>:<key>`. An entry that
 * no longer parses into the expected shape reads as a miss.
 */
export class RedisVideoCache implements VideoCache {
  private readonly keyPrefix: string;
  private readonly ttlSeconds: number | undefined;

  constructor(
    private readonly client: RedisCommands,
    options: RedisVideoCacheOptions = {},
  ) {
    this.keyPrefix = options.keyPrefix ?? "yt";
    this.ttlSeconds = options.ttlSeconds;
  }

  getVideo(key: string): Promise<VideoResults | undefined> {
    return this.read("video", key, isVideoResults);
  }

  setVideo(key: string, results: VideoResults): Promise<void> {
    return this.write("video", key, results);
  }

  getChannel(key: string): Promise<ChannelInfo | undefined> {
    return this.read("channel", key, isChannelInfo);
  }

  setChannel(key: string, channel: ChannelInfo): Promise<void> {
    return this.write("channel", key, channel);
  }

  getPlaylist(key: string): Promise<PlaylistCacheEntry | undefined> {
    return this.read("playlist", key, isPlaylistEntry);
  }

  setPlaylist(key: string, playlist: PlaylistCacheEntry): Promise<void> {
    return this.write("playlist", key, playlist);
  }

  getVideoDetail(key: string): Promise<VideoResults | undefined> {
    return this.read("videoDetail", key, isVideoResults);
  }

  setVideoDetail(key: string, details: VideoResults): Promise<void> {
    return this.write("videoDetail", key, details);
  }

  getServiceName(): string {
    return REDIS_CACHE_NAME;
  }

  storageKey(partition: CachePartition, key: string): string {
    return `${this.keyPrefix}:${partition}:${key}`;
  }

  private async read<T>(
    partition: CachePartition,
    key: string,
    guard: (value: unknown) => value is T,
  ): Promise<T | undefined> {
    const storageKey = this.storageKey(partition, key);
    const raw = await this.client.get(storageKey);
    if (raw === null) {
      return undefined;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      logger.warn("Discarding unreadable cache entry", { key: storageKey, err: error });
      return undefined;
    }

    if (!guard(parsed)) {
      logger.warn("Discarding cache entry with unexpected shape", { key: storageKey });
      return undefined;
    }

    return parsed;
  }

  private async write(partition: CachePartition, key: string, value: unknown): Promise<void> {
    const storageKey = this.storageKey(partition, key);
    const payload = JSON.stringify(value);
    if (this.ttlSeconds === undefined) {
      await this.client.set(storageKey, payload);
      return;
    }

    await this.client.set(storageKey, payload, "EX", this.ttlSeconds);
  }
}
