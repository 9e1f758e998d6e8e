import { URL } from "node:url";
import type {
  ChannelInfo,
  ChannelItem,
  ListResponse,
  PlaylistVideoItem,
  SearchResultItem,
  Video,
} from "../models/youtube";
import { AppError, ErrorCode } from "../utils/appError";
import type { Page } from "./pagination";

export type FetchLike = (input: string, init?: { signal?: AbortSignal }) => Promise<Response>;

export interface YouTubeDataApiOptions {
  fetch?: FetchLike;
  timeoutMs?: number;
}

const API_BASE = "https://www.googleapis.com/youtube/v3/";
const SEARCH_PAGE_SIZE = 100;
const MAX_PAGE_SIZE = 50;
const VIDEO_FIELDS = "items(snippet(title,publishedAt,description,tags),id,statistics),nextPageToken";

function isListResponse<T>(value: unknown): value is ListResponse<T> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }

  if ("items" in value && value.items !== undefined && !Array.isArray(value.items)) {
    return false;
  }

  if (
    "nextPageToken" in value &&
    value.nextPageToken !== undefined &&
    typeof value.nextPageToken !== "string"
  ) {
    return false;
  }

  return true;
}

function toPage<T>(body: ListResponse<T>): Page<T> {
  const items = body.items ?? [];
  return body.nextPageToken ? { items, nextPageToken: body.nextPageToken } : { items };
}

/**
 * Thin client over the four Data API listings the service reads. Each method
 * fetches exactly one page; walking pages is left to the caller.
 */
export class YouTubeDataApi {
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number | undefined;

  constructor(
    private readonly apiKey: string,
    options: YouTubeDataApiOptions = {},
  ) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs;
  }

  async searchVideos(query: string, pageToken?: string): Promise<Page<SearchResultItem>> {
    const url = this.buildUrl("search", {
      part: "snippet",
      maxResults: String(SEARCH_PAGE_SIZE),
      q: query,
      type: "video",
      order: "date",
      relevanceLanguage: "en",
      pageToken,
    });

    return toPage(await this.request<SearchResultItem>(url));
  }

  /** `ids` is one comma-joined batch of at most 50 video ids. */
  async listVideos(ids: string, pageToken?: string): Promise<Page<Video>> {
    const url = this.buildUrl("videos", {
      part: "snippet,statistics",
      fields: VIDEO_FIELDS,
      id: ids,
      order: "date",
      pageToken,
    });

    return toPage(await this.request<Video>(url));
  }

  async fetchChannel(channelId: string): Promise<ChannelInfo> {
    const url = this.buildUrl("channels", {
      part: "snippet,contentDetails,statistics",
      id: channelId,
      maxResults: String(MAX_PAGE_SIZE),
    });

    return toPage(await this.request<ChannelItem>(url));
  }

  async listPlaylistItems(
    playlistId: string,
    pageToken?: string,
  ): Promise<Page<PlaylistVideoItem>> {
    const url = this.buildUrl("playlistItems", {
      part: "snippet,contentDetails",
      maxResults: String(MAX_PAGE_SIZE),
      playlistId,
      pageToken,
    });

    return toPage(await this.request<PlaylistVideoItem>(url));
  }

  private buildUrl(path: string, params: Record<string, string | undefined>): URL {
    const url = new URL(path, API_BASE);
    url.searchParams.set("key", this.apiKey);
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined && value !== "") {
        url.searchParams.set(key, value);
      }
    }
    return url;
  }

  private async request<T>(url: URL): Promise<ListResponse<T>> {
    let response: Response;
    try {
      response = await this.fetchImpl(
        url.toString(),
        this.timeoutMs === undefined ? undefined : { signal: AbortSignal.timeout(this.timeoutMs) },
      );
    } catch (error) {
      throw new AppError("Unable to reach the YouTube Data API", {
        statusCode: 502,
        code: ErrorCode.UpstreamUnreachable,
        details: {
          url: url.pathname,
          reason: error instanceof Error ? error.message : String(error),
        },
        cause: error,
      });
    }

    if (!response.ok) {
      const body = await safeReadText(response);
      throw new AppError("YouTube Data API request failed", {
        statusCode: response.status,
        code: ErrorCode.UpstreamStatus,
        details: {
          url: url.pathname,
          statusText: response.statusText,
          body,
        },
      });
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new AppError("Unable to read the YouTube Data API response", {
        statusCode: 502,
        code: ErrorCode.UpstreamUnreachable,
        details: {
          url: url.pathname,
          reason: error instanceof Error ? error.message : String(error),
        },
        cause: error,
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new AppError("YouTube Data API returned malformed JSON", {
        statusCode: 502,
        code: ErrorCode.UpstreamInvalidResponse,
        details: {
          url: url.pathname,
          reason: error instanceof Error ? error.message : String(error),
        },
        cause: error,
      });
    }

    if (!isListResponse<T>(parsed)) {
      throw new AppError("YouTube Data API returned an unexpected payload", {
        statusCode: 502,
        code: ErrorCode.UpstreamInvalidResponse,
        details: { url: url.pathname },
      });
    }

    return parsed;
  }
}

async function safeReadText(response: Response): Promise<string | null> {
  try {
    return await response.text();
  } catch {
    return null;
  }
}
