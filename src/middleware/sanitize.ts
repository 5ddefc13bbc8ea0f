import type { Request, Response, NextFunction } from "express";

const MAX_PARAM_LENGTH = 64;

// Route params end up in log lines and registry lookups
export function validateTeamParam(req: Request<{ team: string }>, res: Response, next: NextFunction) {
  const team = req.params.team;
  if (typeof team !== "string" || team.trim().length === 0) {
    res.status(400).json({ error: "Team is required" });
    return;
  }
  if (team.length > MAX_PARAM_LENGTH) {
    res.status(400).json({ error: "Team name too long" });
    return;
  }
  if (/[<>]/.test(team)) {
    res.status(400).json({ error: "Invalid team name" });
    return;
  }
  next();
}
