import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { FetchError, errorMessage } from "../../errors.js";
import type { RawFixture, Team } from "../../types/fixtures.js";
import { getHtml } from "../http.js";
import { pick, readString } from "./guards.js";
import { competitionHintFor, type EspnSourceOptions, type FixtureStrategy } from "./strategy.js";

const PAYLOAD_MARKER = "window['__espnfitt__']";

export interface DomTeamCell {
  name?: string;
  abbreviation?: string;
  link?: string;
  logo?: string;
}

// One row of a fixtures table as it appears on the page
export interface DomFixtureRow {
  date?: string;
  time?: string;
  datetime?: string; // absolute kickoff from a data-date / <time datetime> attribute
  home: DomTeamCell;
  away: DomTeamCell;
  competition?: string;
  venue?: string;
  link?: string;
}

// Returns the JSON object literal starting at the first "{" after `from`
export function sliceJsonObject(text: string, from: number): string | undefined {
  const open = text.indexOf("{", from);
  if (open === -1) return undefined;

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = open; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return text.slice(open, i + 1);
    }
  }
  return undefined;
}

function readEmbeddedEvents($: CheerioAPI): unknown[] | undefined {
  const scripts = $("script")
    .toArray()
    .map((el) => $(el).html() ?? "");

  for (const script of scripts) {
    const start = script.indexOf(PAYLOAD_MARKER);
    if (start === -1) continue;

    const json = sliceJsonObject(script, start + PAYLOAD_MARKER.length);
    if (!json) {
      console.warn("[Fetcher] Embedded payload marker found but no object follows it");
      return undefined;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(json);
    } catch (error) {
      console.warn(`[Fetcher] Embedded payload is not valid JSON: ${errorMessage(error)}`);
      return undefined;
    }

    const events = pick(payload, "page", "content", "fixtures", "events");
    if (!Array.isArray(events)) {
      console.warn("[Fetcher] Embedded payload has no fixtures list");
      return undefined;
    }
    return events;
  }

  return undefined;
}

function readFixtureTables($: CheerioAPI): DomFixtureRow[] | undefined {
  const tables = $("table")
    .toArray()
    .map((table) => ({
      table,
      headers: $(table)
        .find("thead th")
        .toArray()
        .map((th) => $(th).text().trim().toLowerCase()),
    }))
    .filter(({ headers }) => ["date", "home", "away"].every((name) => headers.includes(name)));

  if (tables.length === 0) return undefined;

  const rows: DomFixtureRow[] = [];
  for (const { table, headers } of tables) {
    const column = (name: string) => headers.indexOf(name);
    const caption =
      readString($(table).find("caption").first().text()) ??
      readString($(table).closest(".ResponsiveTable").find(".Table__Title").first().text());

    $(table)
      .find("tbody tr")
      .each((_, tr) => {
        const row = $(tr);
        const cells = row.find("td");
        const text = (index: number) =>
          index === -1 ? undefined : readString(cells.eq(index).text().replace(/\s+/g, " "));
        const team = (index: number): DomTeamCell => {
          const cell = cells.eq(index);
          const anchor = cell.find("a[href]").first();
          return {
            name: readString(anchor.text()) ?? text(index),
            abbreviation:
              readString(cell.attr("data-abbrev")) ??
              readString(cell.find("[data-abbrev]").first().attr("data-abbrev")),
            link: readString(anchor.attr("href")),
            logo: readString(cell.find("img").first().attr("src")),
          };
        };

        rows.push({
          date: text(column("date")),
          time: text(column("time")),
          datetime:
            readString(row.attr("data-date")) ??
            readString(row.find("time[datetime]").first().attr("datetime")),
          home: team(column("home")),
          away: team(column("away")),
          competition: text(column("competition")) ?? caption,
          venue: text(column("venue")),
          link: readString(row.find("a[href*='/game/']").first().attr("href")),
        });
      });
  }

  return rows;
}

// Prefers the JSON the page embeds for its own scripts; falls back to the
// visible fixtures table(s)
export function extractFixtures(html: string, competitionHint?: string): RawFixture[] {
  const $ = cheerio.load(html);

  const embedded = readEmbeddedEvents($);
  if (embedded) {
    return embedded.map((data): RawFixture => ({ kind: "embedded", data, competitionHint }));
  }

  const rows = readFixtureTables($);
  if (rows) {
    console.log(`[Fetcher] No embedded payload, read ${rows.length} table rows`);
    return rows.map((data): RawFixture => ({ kind: "dom", data, competitionHint }));
  }

  throw new FetchError("Page has neither an embedded fixtures payload nor a fixtures table", "malformed");
}

// ESPN team fixtures page (HTML)
export class PageStrategy implements FixtureStrategy {
  readonly name = "espn-page";

  constructor(private readonly options: EspnSourceOptions) {}

  fixturesUrl(team: Team): string {
    return `${this.options.webBase}/soccer/team/fixtures/_/id/${encodeURIComponent(team.externalSiteId)}/${team.slug}`;
  }

  async fetch(team: Team): Promise<RawFixture[]> {
    const url = this.fixturesUrl(team);
    console.log(`[Fetcher] GET ${url}`);
    const html = await getHtml(url, { timeoutMs: this.options.timeoutMs });
    return extractFixtures(html, competitionHintFor(team, this.options));
  }
}
