import type { Express } from "express";
import { createServer, type Server } from "http";
import { createTravelRouter, type TravelRouteDeps } from "./routes/travel";
import { generalRateLimiter, getRateLimitMetrics } from "./middleware/rateLimiter";

export async function registerRoutes(app: Express, deps: TravelRouteDeps): Promise<Server> {
  app.get("/api/healthz", (_req, res) => {
    res.json({
      status: "ok",
      llmConfigured: deps.llm !== null,
      streams: getRateLimitMetrics(),
    });
  });

  app.use("/api", generalRateLimiter);
  app.use("/api/travel", createTravelRouter(deps));

  return createServer(app);
}
