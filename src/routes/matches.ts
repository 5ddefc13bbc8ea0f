import { Router } from "express";
import { sendError } from "../middleware/errors.js";
import { validateTeamParam } from "../middleware/sanitize.js";
import type { CoreServices } from "../services/context.js";

export function createMatchesRouter(services: CoreServices): Router {
  const router = Router();

  // Live fetch for one team
  router.get("/:team/upcoming", validateTeamParam, async (req, res) => {
    try {
      const team = services.registry.require(req.params.team);
      const report = await services.fetcher.fetchWithReport(team);
      res.json({
        team: team.id,
        strategy: report.strategy,
        dropped: report.dropped.length,
        matches: report.matches,
      });
    } catch (error) {
      sendError(res, error, `Failed to fetch matches for ${req.params.team}`);
    }
  });

  return router;
}
