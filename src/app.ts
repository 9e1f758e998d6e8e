import cors from "cors";
import express from "express";
import type { Application } from "express";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler";
import { createRoutes } from "./routes";
import type { YouTubeService } from "./services/youtubeService";

export interface AppOptions {
  youtubeService: YouTubeService;
  environment: string;
  clientOrigin?: string;
}

export function createApp(options: AppOptions): Application {
  const app = express();
  const { youtubeService, environment, clientOrigin } = options;

  app.use(
    cors({
      origin: clientOrigin ?? true,
    }),
  );

  app.get("/", (_req, res) => {
    res.json({
      name: "YouTube cache client API",
      status: "ok",
      version: "0.1.0",
    });
  });

  app.use("/api", createRoutes({ youtubeService, environment }));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
