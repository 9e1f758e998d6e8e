import { Router } from "express";
import type { YouTubeService } from "../services/youtubeService";
import { AppError, ErrorCode } from "../utils/appError";

const DEFAULT_VIDEO_COUNT = 50;
const MAX_VIDEO_COUNT = 500;

function readQueryString(value: unknown): string | undefined {
  const candidate = Array.isArray(value) ? value[0] : value;
  return typeof candidate === "string" ? candidate : undefined;
}

function parseIntegerParam(
  raw: string | undefined,
  code: ErrorCode,
  name: string,
): number | undefined {
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }

  if (!/^\d+$/.test(raw.trim())) {
    throw new AppError(`${name} must be a positive integer`, {
      statusCode: 400,
      code,
      details: { [name]: raw },
    });
  }

  return Number.parseInt(raw, 10);
}

export function createYouTubeRouter(youtubeService: YouTubeService): Router {
  const router = Router();

  // GET /youtube/search?q=&pages=: keyword search enriched with statistics
  router.get("/search", async (req, res, next) => {
    try {
      const query = readQueryString(req.query.q);
      if (!query || query.trim().length === 0) {
        throw new AppError("q must be a non-empty string", {
          statusCode: 400,
          code: ErrorCode.QueryRequired,
        });
      }

      const pages = parseIntegerParam(
        readQueryString(req.query.pages),
        ErrorCode.InvalidPageCount,
        "pages",
      );
      const results = await youtubeService.searchAndRetrieveTags(query, pages);
      res.json({ data: results });
    } catch (error) {
      next(error);
    }
  });

  // GET /youtube/channels/:channelId
  router.get("/channels/:channelId", async (req, res, next) => {
    try {
      const channel = await youtubeService.getChannelInfo(req.params.channelId);
      res.json({ data: channel });
    } catch (error) {
      next(error);
    }
  });

  // GET /youtube/channels/:channelId/videos?count=: newest uploads of the channel
  router.get("/channels/:channelId/videos", async (req, res, next) => {
    try {
      const count =
        parseIntegerParam(
          readQueryString(req.query.count),
          ErrorCode.InvalidVideoCount,
          "count",
        ) ?? DEFAULT_VIDEO_COUNT;
      if (count < 1 || count > MAX_VIDEO_COUNT) {
        throw new AppError(`count must be between 1 and ${MAX_VIDEO_COUNT}`, {
          statusCode: 400,
          code: ErrorCode.InvalidVideoCount,
          details: { count },
        });
      }

      const channel = await youtubeService.getChannelInfo(req.params.channelId);
      const [item] = channel.items;
      if (!item) {
        throw new AppError("Channel not found", {
          statusCode: 404,
          code: ErrorCode.ChannelNotFound,
          details: { channelId: req.params.channelId },
        });
      }

      const videos = await youtubeService.getChannelPlaylist(item, count);
      res.json({ data: videos });
    } catch (error) {
      next(error);
    }
  });

  // GET /youtube/videos?ids=a,b,c
  router.get("/videos", async (req, res, next) => {
    try {
      const ids = (readQueryString(req.query.ids) ?? "")
        .split(",")
        .map((id) => id.trim())
        .filter((id) => id.length > 0);
      if (ids.length === 0) {
        throw new AppError("ids must list at least one video id", {
          statusCode: 400,
          code: ErrorCode.VideoIdsRequired,
        });
      }

      const videos = await youtubeService.getVideosByIds(ids);
      res.json({ data: videos });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
