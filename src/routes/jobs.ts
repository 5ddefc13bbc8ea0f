import { Router } from "express";
import type { Scheduler } from "../services/scheduler.js";

export function createJobsRouter(scheduler?: Scheduler): Router {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json({ running: scheduler !== undefined, jobs: scheduler?.jobs() ?? [] });
  });

  return router;
}
