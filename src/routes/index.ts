import { Router } from "express";
import type { YouTubeService } from "../services/youtubeService";
import { createHealthRouter } from "./health";
import { createYouTubeRouter } from "./youtube";

export interface RouteDependencies {
  youtubeService: YouTubeService;
  environment: string;
}

export function createRoutes({ youtubeService, environment }: RouteDependencies): Router {
  const router = Router();

  router.use(
    "/health",
    createHealthRouter({ environment, cache: youtubeService.getCacheName() }),
  );
  router.use("/youtube", createYouTubeRouter(youtubeService));

  return router;
}
