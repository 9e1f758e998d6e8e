import { Router } from "express";

export interface HealthInfo {
  environment: string;
  cache: string;
}

export function createHealthRouter(info: HealthInfo): Router {
  const router = Router();

  // GET /health: liveness probe with basic runtime info
  router.get("/", (_req, res) => {
    res.json({
      api: "yt-cache-client",
      status: "healthy",
      environment: info.environment,
      cache: info.cache,
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
