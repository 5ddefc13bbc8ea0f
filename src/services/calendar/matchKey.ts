import { createHash } from "crypto";
import { matchIdentity, type Match } from "../../types/fixtures.js";

// Deterministic key stored on the event; survives provider-side id changes
export function matchKey(match: Match): string {
  return createHash("sha256").update(matchIdentity(match).join("|")).digest("hex").slice(0, 32);
}
