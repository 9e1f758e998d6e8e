import type { SnippetIndex, Video } from "../models/youtube";
import { AppError, ErrorCode } from "../utils/appError";

/** Search results must have strictly more views than this to be kept. */
export const MIN_VIEWS = 1000;

const INTEGER_PATTERN = /^\d+$/;

/**
 * Copies channel title, channel id and thumbnails from the listing a video
 * was discovered in onto its lookup record. Videos missing from `index` are
 * returned as-is.
 */
export function mergeSnippetInfo(videos: readonly Video[], index: SnippetIndex): Video[] {
  return videos.map((video) => {
    const info = index.get(video.id);
    if (!info) {
      return video;
    }

    const snippet = { ...video.snippet };
    if (info.channelId !== undefined) {
      snippet.channelId = info.channelId;
    }
    if (info.channelTitle !== undefined) {
      snippet.channelTitle = info.channelTitle;
    }
    snippet.thumbnails = info.thumbnails ?? {};

    return { ...video, snippet };
  });
}

export function parseViewCount(video: Video): number {
  const raw = video.statistics?.viewCount;
  if (raw === undefined || !INTEGER_PATTERN.test(raw)) {
    throw new AppError("Video statistics contain an invalid view count", {
      statusCode: 502,
      code: ErrorCode.InvalidStatistic,
      details: { videoId: video.id, viewCount: raw ?? null },
    });
  }

  return Number.parseInt(raw, 10);
}

// One malformed count fails the whole batch rather than dropping that video.
export function filterByMinViews(videos: readonly Video[], minViews: number): Video[] {
  return videos.filter((video) => parseViewCount(video) > minViews);
}
