import "dotenv/config";
import express, { type Request, type Response, type NextFunction } from "express";
import compression from "compression";
import { registerRoutes } from "./routes";
import { getConfig } from "./config";
import { createStorage } from "./storage";
import { createLocationClient } from "./services/locationService";
import { NoteService } from "./services/noteService";
import { createItineraryLLM, isAIConfigured, logAIConfig } from "./services/aiClientFactory";

export function log(message: string, source = "express") {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  console.log(`${formattedTime} [${source}] ${message}`);
}

function statusOf(err: unknown): number {
  if (typeof err === "object" && err !== null) {
    const candidate = "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
    if (typeof candidate === "number" && candidate >= 400 && candidate < 600) return candidate;
  }
  return 500;
}

async function main(): Promise<void> {
  const config = getConfig();
  const app = express();

  // Compress everything except event streams, which must flush frame by frame
  app.use(compression({
    level: 6,
    threshold: 1024,
    filter: (req, res) => {
      const contentType = res.getHeader("Content-Type");
      if (typeof contentType === "string" && contentType.includes("text/event-stream")) return false;
      return compression.filter(req, res);
    },
  }));

  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: false }));

  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;

    res.on("finish", () => {
      if (path.startsWith("/api")) {
        log(`${req.method} ${path} ${res.statusCode} in ${Date.now() - start}ms`);
      }
    });

    next();
  });

  logAIConfig(config);
  const server = await registerRoutes(app, {
    storage: createStorage(config),
    locations: createLocationClient(config),
    notes: new NoteService(config.NOTE_API_BASE_URL ?? null),
    llm: isAIConfigured(config) ? createItineraryLLM(config) : null,
  });

  app.use("/api", (_req: Request, res: Response) => {
    res.status(404).json({ message: "Not found" });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err);
    const message = err instanceof Error && err.message ? err.message : "Internal Server Error";

    if (status >= 500) {
      console.error("[Server] Unhandled error:", err);
    }
    if (res.headersSent) {
      res.end();
      return;
    }
    res.status(status).json({ message });
  });

  server.listen({ port: config.PORT, host: "0.0.0.0" }, () => {
    log(`serving on port ${config.PORT}`);
  });
}

main().catch((err: unknown) => {
  console.error("[Startup] Failed to start server:", err);
  process.exit(1);
});
