import { FetchError, errorMessage } from "../../errors.js";
import { sortByKickoff, type DroppedEntry, type FetchReport, type Match, type RawFixture, type Team } from "../../types/fixtures.js";
import { EndpointStrategy } from "./endpointStrategy.js";
import { normalize, type NormalizeOptions } from "./normalizer.js";
import { PageStrategy } from "./pageStrategy.js";
import type { EspnSourceOptions, FixtureStrategy } from "./strategy.js";

export class FixtureFetcher {
  constructor(
    private readonly strategies: FixtureStrategy[],
    private readonly normalizeOptions: NormalizeOptions
  ) {
    if (strategies.length === 0) {
      throw new Error("FixtureFetcher needs at least one strategy");
    }
  }

  async fetch(team: Team): Promise<Match[]> {
    const report = await this.fetchWithReport(team);
    return report.matches;
  }

  // Strategies are tried in order; the first one that resolves is
  // authoritative and its entries are never merged with another source's.
  async fetchWithReport(team: Team): Promise<FetchReport> {
    const failures: unknown[] = [];

    for (const strategy of this.strategies) {
      let raw: RawFixture[];
      try {
        raw = await strategy.fetch(team);
      } catch (error) {
        console.warn(`[Fetcher] ${strategy.name} failed for ${team.id}: ${errorMessage(error)}`);
        failures.push(error);
        continue;
      }

      return this.normalizeAll(team, strategy.name, raw);
    }

    const tried = this.strategies.map((s) => s.name).join(", ");
    throw new FetchError(`All strategies failed for ${team.id} (${tried})`, "unavailable", failures);
  }

  private normalizeAll(team: Team, strategy: string, raw: RawFixture[]): FetchReport {
    const matches: Match[] = [];
    const dropped: DroppedEntry[] = [];

    raw.forEach((entry, idx) => {
      const result = normalize(entry, this.normalizeOptions);
      if (result.ok) {
        matches.push(result.match);
      } else {
        console.warn(`[Fetcher] Dropped ${team.id} entry ${idx}: ${result.error.message}`);
        dropped.push({ reason: result.error.reason, message: result.error.message });
      }
    });

    if (raw.length > 0 && matches.length === 0) {
      throw new FetchError(
        `${strategy} returned ${raw.length} entries for ${team.id} but none could be normalized`,
        "malformed"
      );
    }

    console.log(
      `[Fetcher] ${team.id} via ${strategy}: ${matches.length}/${raw.length} matches` +
        (dropped.length > 0 ? ` (${dropped.length} dropped)` : "")
    );

    return { team: team.id, strategy, fetched: raw.length, matches: sortByKickoff(matches), dropped };
  }
}

// Endpoint first, page scrape second
export function createEspnFetcher(options: EspnSourceOptions): FixtureFetcher {
  return new FixtureFetcher(
    [new EndpointStrategy(options), new PageStrategy(options)],
    { webBase: options.webBase }
  );
}
