import express from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";
import { createCalendarRouter } from "./routes/calendar.js";
import { createCompetitionsRouter } from "./routes/competitions.js";
import { createJobsRouter } from "./routes/jobs.js";
import { createMatchesRouter } from "./routes/matches.js";
import type { CoreServices } from "./services/context.js";
import type { Scheduler } from "./services/scheduler.js";

export interface AppOptions {
  corsOrigins?: string[];
  scheduler?: Scheduler;
}

export function createApp(services: CoreServices, options: AppOptions = {}) {
  const app = express();

  // Trust proxy (Docker / reverse proxies)
  app.set("trust proxy", 1);

  const allowedOrigins = options.corsOrigins ?? [];
  app.use(
    cors({
      origin: (origin, callback) => {
        // Allow requests with no origin (curl, cron, other services)
        if (!origin) return callback(null, true);
        if (allowedOrigins.includes(origin)) {
          callback(null, true);
        } else {
          callback(new Error("Not allowed by CORS"));
        }
      },
    })
  );

  // General rate limit - 100 requests per 15 minutes
  const generalLimiter = rateLimit({
    windowMs: 15 * 60 * 1000,
    limit: 100,
    standardHeaders: true,
    legacyHeaders: false,
    skip: () => process.env.NODE_ENV === "test",
  });

  // Live fetches and calendar writes hit third parties - 10 per minute
  const upstreamLimiter = rateLimit({
    windowMs: 60 * 1000,
    limit: 10,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: "Too many requests, please try again later" },
    skip: () => process.env.NODE_ENV === "test",
  });

  app.use(generalLimiter);
  app.use(express.json({ limit: "10kb" }));

  app.get("/up", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/api/teams", (_req, res) => {
    res.json(services.registry.list());
  });

  app.use("/api/matches", upstreamLimiter, createMatchesRouter(services));
  app.use("/api/competitions", createCompetitionsRouter(services));
  app.use("/api/calendar", upstreamLimiter, createCalendarRouter(services));
  app.use("/api/jobs", createJobsRouter(options.scheduler));

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  // Global error handler
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    console.error("[API] Unhandled error:", err);
    if (!res.headersSent) {
      res.status(500).json({ error: "Internal server error" });
    }
  });

  return app;
}
