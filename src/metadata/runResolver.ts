import { promises as fs } from "fs";
import { ConfigurationError } from "../core/errors.js";
import { isBioProjectAccession, isRunAccession, type RunAccession } from "../core/ids.js";
import type { InvocationContext } from "../runs/invocationContext.js";
import type { EnaPortalClient } from "./enaPortal.js";

export interface RunSelection {
  runIds?: readonly string[];
  /** A file with one accession per line; blank lines and `#` comments are ignored. */
  runIdentifiersList?: string | null;
  bioprojects?: readonly string[];
}

export function parseRunList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

export class RunResolver {
  constructor(private readonly ena: EnaPortalClient) {}

  /** Expands every source into run accessions, first-seen order, no duplicates. */
  async resolve(selection: RunSelection, ctx: InvocationContext): Promise<RunAccession[]> {
    const seen = new Set<RunAccession>();
    const add = (id: string, source: string): void => {
      if (!isRunAccession(id)) throw new ConfigurationError(`invalid run accession ${JSON.stringify(id)} (${source})`);
      seen.add(id);
    };

    for (const id of selection.runIds ?? []) add(id.trim(), "run identifiers");

    if (selection.runIdentifiersList) {
      const file = selection.runIdentifiersList;
      let text: string;
      try {
        text = await fs.readFile(file, "utf8");
      } catch (err) {
        if ((err as NodeJS.ErrnoException).code === "ENOENT") {
          throw new ConfigurationError(`run identifiers list not found: ${file}`);
        }
        throw err;
      }
      for (const id of parseRunList(text)) add(id, file);
    }

    for (const raw of selection.bioprojects ?? []) {
      const project = raw.trim();
      if (!isBioProjectAccession(project)) {
        throw new ConfigurationError(`invalid BioProject accession ${JSON.stringify(raw)}`);
      }
      const runs = await this.ena.projectRuns(project, ctx.signal);
      ctx.log("info", "resolve.bioproject", `${project}: ${runs.length} run(s)`, { bioproject: project, runs: runs.length });
      for (const id of runs) add(id, project);
    }

    if (!seen.size) throw new ConfigurationError("no run accessions to process");
    return [...seen];
  }
}
