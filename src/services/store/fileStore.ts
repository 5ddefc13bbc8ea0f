import { createHash, randomUUID } from "crypto";
import fs from "fs/promises";
import path from "path";
import { StoreError, errorMessage } from "../../errors.js";
import type { Competition, Match } from "../../types/fixtures.js";
import { parseCompetitionDocument, serializeCompetition } from "./document.js";
import type { CompetitionStore } from "./types.js";

// "Brazilian Serie A" -> "brazilian-serie-a"
export function competitionSlug(name: string): string {
  const slug = name
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return slug || "competition";
}

// Names that slug alike ("Série A" and "Serie A") still get their own file
function nameHash(name: string): string {
  return createHash("sha256").update(name).digest("hex").slice(0, 8);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

// One JSON document per competition. Writes go to a temp file in the same
// directory and are renamed over the target, so readers never see a partial file.
export class FileCompetitionStore implements CompetitionStore {
  readonly driver = "file";

  constructor(
    private readonly directory: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  pathFor(competition: string): string {
    return path.join(this.directory, `${competitionSlug(competition)}-${nameHash(competition)}.json`);
  }

  async save(competition: string, matches: Match[]): Promise<void> {
    const target = this.pathFor(competition);
    const tmp = `${target}.${randomUUID()}.tmp`;

    try {
      await fs.mkdir(this.directory, { recursive: true });
      await fs.writeFile(tmp, serializeCompetition(competition, matches, this.now()), "utf8");
      await fs.rename(tmp, target);
    } catch (error) {
      await fs.rm(tmp, { force: true }).catch((rmError: unknown) => {
        console.warn(`[Store] Could not remove ${tmp}: ${errorMessage(rmError)}`);
      });
      throw new StoreError(`Could not write ${target}: ${errorMessage(error)}`, "io_failure", {
        cause: error,
      });
    }

    console.log(`[Store] Saved ${matches.length} matches for "${competition}" to ${target}`);
  }

  async load(competition: string): Promise<Match[] | undefined> {
    const document = await this.readDocument(this.pathFor(competition));
    if (document && document.name !== competition) {
      console.warn(`[Store] ${this.pathFor(competition)} holds "${document.name}", not "${competition}"`);
      return undefined;
    }
    return document?.matches;
  }

  async loadAll(): Promise<Competition[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.directory);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw new StoreError(`Could not list ${this.directory}: ${errorMessage(error)}`, "io_failure", {
        cause: error,
      });
    }

    const competitions: Competition[] = [];
    for (const name of names.filter((n) => n.endsWith(".json")).sort()) {
      const document = await this.readDocument(path.join(this.directory, name));
      if (document) competitions.push(document);
    }
    return competitions.sort((a, b) => a.name.localeCompare(b.name));
  }

  async close(): Promise<void> {}

  private async readDocument(file: string): Promise<Competition | undefined> {
    let raw: string;
    try {
      raw = await fs.readFile(file, "utf8");
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw new StoreError(`Could not read ${file}: ${errorMessage(error)}`, "io_failure", {
        cause: error,
      });
    }
    return parseCompetitionDocument(raw, file);
  }
}
