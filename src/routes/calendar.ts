import { Router } from "express";
import { sendError } from "../middleware/errors.js";
import { validateTeamParam } from "../middleware/sanitize.js";
import type { CoreServices } from "../services/context.js";
import { addToCalendar } from "../services/jobs.js";

export function createCalendarRouter(services: CoreServices): Router {
  const router = Router();

  // ?source=live fetches first; the default syncs the stored snapshot
  router.post("/:team/sync", validateTeamParam, async (req, res) => {
    const source = req.query.source === "live" ? "live" : "store";
    try {
      const report = await addToCalendar(services, req.params.team, source);
      res.json(report);
    } catch (error) {
      sendError(res, error, `Calendar sync failed for ${req.params.team}`);
    }
  });

  return router;
}
