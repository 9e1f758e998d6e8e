import type {
  ChannelInfo,
  ChannelItem,
  SnippetInfo,
  Video,
  VideoResults,
} from "../models/youtube";
import { AppError, ErrorCode } from "../utils/appError";
import { batchIds } from "../utils/batch";
import { logger } from "../utils/logger";
import { MemoryVideoCache } from "./cache/memoryVideoCache";
import type { VideoCache } from "./cache/videoCache";
import { collectPages } from "./pagination";
import { MIN_VIEWS, filterByMinViews, mergeSnippetInfo } from "./videoMerge";
import { YouTubeDataApi, type YouTubeDataApiOptions } from "./youtubeDataApi";

export const DEFAULT_SEARCH_PAGES = 1;
export const MAX_SEARCH_PAGES = 5;
export const PLAYLIST_PAGE_SIZE = 50;

const INTEGER_PATTERN = /^\d+$/;

export function clampPageCount(pageCount?: number): number {
  if (pageCount === undefined || Number.isNaN(pageCount)) {
    return DEFAULT_SEARCH_PAGES;
  }

  return Math.min(MAX_SEARCH_PAGES, Math.max(DEFAULT_SEARCH_PAGES, Math.trunc(pageCount)));
}

export function playlistPagesFor(desiredCount: number): number {
  return Math.ceil(desiredCount / PLAYLIST_PAGE_SIZE);
}

function uploadsPlaylistMissing(channelId: string): AppError {
  return new AppError("Channel has no uploads playlist", {
    statusCode: 404,
    code: ErrorCode.UploadsPlaylistNotFound,
    details: { channelId },
  });
}

/**
 * Search, channel and upload lookups with a cache in front of every one.
 * Results are assembled in full before they are cached, so a failed call
 * leaves the cache as it was.
 */
export class YouTubeService {
  private readonly api: YouTubeDataApi;

  constructor(
    private readonly apiKey: string,
    private readonly cache: VideoCache = new MemoryVideoCache(),
    apiOptions: YouTubeDataApiOptions = {},
  ) {
    this.api = new YouTubeDataApi(apiKey, apiOptions);
  }

  getApiKey(): string {
    return this.apiKey;
  }

  getCacheName(): string {
    return this.cache.getServiceName();
  }

  /**
   * Keyword search enriched with statistics, keeping only videos with more
   * than {@link MIN_VIEWS} views. `pageCount` is clamped to 1..5.
   *
   * The result is cached by the raw query alone: once a query is cached,
   * asking for a different page count returns the earlier result.
   */
  searchAndRetrieveTags(query: string, pageCount?: number): Promise<VideoResults> {
    return this.findTags(query, clampPageCount(pageCount));
  }

  async findTags(query: string, pages: number): Promise<VideoResults> {
    const cached = await this.cache.getVideo(query);
    if (cached) {
      logger.debug("Search cache hit", { query });
      return cached;
    }

    logger.info("Searching videos", { query, pages });
    const search = await collectPages((pageToken) => this.api.searchVideos(query, pageToken), {
      maxPages: pages,
    });

    const videoIds: string[] = [];
    const snippetIndex = new Map<string, SnippetInfo>();
    for (const item of search.items) {
      const videoId = item.id?.videoId;
      if (!videoId) {
        continue;
      }

      videoIds.push(videoId);
      snippetIndex.set(videoId, {
        channelTitle: item.snippet?.channelTitle,
        channelId: item.snippet?.channelId,
        thumbnails: item.snippet?.thumbnails,
      });
    }

    const details = await this.getVideosByIds(videoIds);
    const merged = mergeSnippetInfo(details.items, snippetIndex);

    let items: Video[];
    try {
      items = filterByMinViews(merged, MIN_VIEWS);
    } catch (error) {
      logger.warn("Rejecting search results with malformed statistics", { query, err: error });
      throw error;
    }

    const results: VideoResults = search.nextPageToken
      ? { items, nextPageToken: search.nextPageToken }
      : { items };

    await this.cache.setVideo(query, results);
    logger.info("Cached search results", {
      query,
      found: videoIds.length,
      kept: items.length,
    });

    return results;
  }

  async getChannelInfo(channelId: string): Promise<ChannelInfo> {
    const cached = await this.cache.getChannel(channelId);
    if (cached) {
      logger.debug("Channel cache hit", { channelId });
      return cached;
    }

    const channel = await this.api.fetchChannel(channelId);
    if (channel.items.length === 0) {
      throw new AppError("Channel not found", {
        statusCode: 404,
        code: ErrorCode.ChannelNotFound,
        details: { channelId },
      });
    }

    await this.cache.setChannel(channelId, channel);
    return channel;
  }

  /**
   * Lists the newest uploads of a channel, reading enough playlist pages to
   * cover `desiredCount` videos. A channel without an uploads playlist is
   * remembered as such and rejected on every later call.
   */
  async getChannelPlaylist(item: ChannelItem, desiredCount: number): Promise<VideoResults> {
    if (!Number.isInteger(desiredCount) || desiredCount < 1) {
      throw new AppError("Video count must be a positive integer", {
        statusCode: 400,
        code: ErrorCode.InvalidVideoCount,
        details: { desiredCount },
      });
    }

    const uploadsPlaylistId = item.contentDetails?.relatedPlaylists?.uploads;
    const cacheKey = `${uploadsPlaylistId ?? item.id}-${desiredCount}`;

    const cached = await this.cache.getPlaylist(cacheKey);
    if (cached === null) {
      throw uploadsPlaylistMissing(item.id);
    }
    if (cached) {
      logger.debug("Playlist cache hit", { cacheKey });
      return cached;
    }

    if (!uploadsPlaylistId) {
      logger.warn("Channel missing uploads playlist id", { channelId: item.id });
      await this.cache.setPlaylist(cacheKey, null);
      throw uploadsPlaylistMissing(item.id);
    }

    const pages = playlistPagesFor(desiredCount);
    logger.info("Listing channel uploads", { channelId: item.id, uploadsPlaylistId, pages });
    const listing = await collectPages(
      (pageToken) => this.api.listPlaylistItems(uploadsPlaylistId, pageToken),
      { maxPages: pages },
    );

    const videoIds: string[] = [];
    const thumbnailIndex = new Map<string, SnippetInfo>();
    for (const entry of listing.items) {
      const videoId = entry.contentDetails?.videoId;
      if (!videoId) {
        continue;
      }

      videoIds.push(videoId);
      thumbnailIndex.set(videoId, { thumbnails: entry.snippet?.thumbnails });
    }

    const details = await this.getVideosByIds(videoIds);
    const results: VideoResults = { items: mergeSnippetInfo(details.items, thumbnailIndex) };

    await this.cache.setPlaylist(cacheKey, results);
    return results;
  }

  async getVideosByIds(videoIds: readonly string[]): Promise<VideoResults> {
    if (videoIds.length === 0) {
      return { items: [] };
    }

    const cacheKey = videoIds.join(",");
    const cached = await this.cache.getVideoDetail(cacheKey);
    if (cached) {
      logger.debug("Video detail cache hit", { count: videoIds.length });
      return cached;
    }

    const batches = batchIds(videoIds);
    const items: Video[] = [];
    for (const batch of batches) {
      const page = await collectPages((pageToken) => this.api.listVideos(batch, pageToken));
      items.push(...page.items);
    }

    const results: VideoResults = { items };
    await this.cache.setVideoDetail(cacheKey, results);
    logger.debug("Fetched video details", {
      requested: videoIds.length,
      received: items.length,
      batches: batches.length,
    });

    return results;
  }

  getVideoCount(item: ChannelItem): number {
    const raw = item.statistics?.videoCount;
    if (raw === undefined || !INTEGER_PATTERN.test(raw)) {
      throw new AppError("Channel statistics contain an invalid video count", {
        statusCode: 502,
        code: ErrorCode.InvalidStatistic,
        details: { channelId: item.id, videoCount: raw ?? null },
      });
    }

    return Number.parseInt(raw, 10);
  }
}
