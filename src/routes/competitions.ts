import { Router } from "express";
import { sendError } from "../middleware/errors.js";
import type { CoreServices } from "../services/context.js";

export function createCompetitionsRouter(services: CoreServices): Router {
  const router = Router();

  // Stored competitions with their match counts
  router.get("/", async (_req, res) => {
    try {
      const competitions = await services.store.loadAll();
      res.json(
        competitions.map((competition) => ({
          name: competition.name,
          matches: competition.matches.length,
        }))
      );
    } catch (error) {
      sendError(res, error, "Failed to list competitions");
    }
  });

  router.get("/:name", async (req, res) => {
    try {
      const matches = await services.store.load(req.params.name);
      if (!matches) {
        res.status(404).json({ error: "Competition not found" });
        return;
      }
      res.json({ name: req.params.name, matches });
    } catch (error) {
      sendError(res, error, `Failed to load competition ${req.params.name}`);
    }
  });

  return router;
}
