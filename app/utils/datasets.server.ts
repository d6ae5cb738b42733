import { readFile } from "node:fs/promises";
import path from "node:path";

import type {
  DatasetLoadResult,
  DatasetLoadResults,
  DatasetMap,
  DatasetName,
  Datasets
} from "~/types/datasets";
import { DATASET_NAMES } from "~/types/datasets";
import { parseCsv } from "./csv.server";
import type { CsvTable } from "./csv.server";
import {
  parseAssignees,
  parseCategorization,
  parseContributors,
  parseEngineeringSummary,
  parseEngineeringTeams,
  parseFirstResponse,
  parseMonthly,
  parseOrganizations,
  parseResolution
} from "./dataset-parsers.server";

export const DEFAULT_CACHE_TTL_MS = 10_000;

interface DatasetSource<T> {
  file: string;
  parse: (table: CsvTable) => T;
}

export const DATASET_SOURCES: { [K in DatasetName]: DatasetSource<DatasetMap[K]> } = {
  monthly: { file: "ticket_monthly.csv", parse: parseMonthly },
  resolution: { file: "resolution_by_severity.csv", parse: parseResolution },
  firstResponse: { file: "first_response_by_severity.csv", parse: parseFirstResponse },
  engineeringSummary: { file: "engineering_summary.csv", parse: parseEngineeringSummary },
  engineeringTeams: { file: "engineering_by_team.csv", parse: parseEngineeringTeams },
  organizations: { file: "organizations.csv", parse: parseOrganizations },
  assignees: { file: "assignee_performance.csv", parse: parseAssignees },
  contributors: { file: "contributor_performance.csv", parse: parseContributors },
  categorization: { file: "ticket_categorization.csv", parse: parseCategorization }
};

export interface DatasetLoaderOptions {
  dataDir: string;
  ttlMs?: number;
  now?: () => number;
}

export interface LoadOptions {
  forceRefresh?: boolean;
}

function isMissingFile(error: unknown) {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Reads the known dataset files from one directory. Results are held for
 * `ttlMs` so repeated page loads in a session skip the disk.
 */
export class DatasetLoader {
  private cached: { expiresAt: number; value: DatasetLoadResults } | null = null;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(private readonly options: DatasetLoaderOptions) {
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  invalidate() {
    this.cached = null;
  }

  async load({ forceRefresh = false }: LoadOptions = {}): Promise<DatasetLoadResults> {
    if (forceRefresh) {
      this.invalidate();
    }
    if (this.cached && this.cached.expiresAt > this.now()) {
      return this.cached.value;
    }

    const [
      monthly,
      resolution,
      firstResponse,
      engineeringSummary,
      engineeringTeams,
      organizations,
      assignees,
      contributors,
      categorization
    ] = await Promise.all([
      this.loadDataset("monthly"),
      this.loadDataset("resolution"),
      this.loadDataset("firstResponse"),
      this.loadDataset("engineeringSummary"),
      this.loadDataset("engineeringTeams"),
      this.loadDataset("organizations"),
      this.loadDataset("assignees"),
      this.loadDataset("contributors"),
      this.loadDataset("categorization")
    ]);

    const value: DatasetLoadResults = {
      monthly,
      resolution,
      firstResponse,
      engineeringSummary,
      engineeringTeams,
      organizations,
      assignees,
      contributors,
      categorization
    };

    this.cached = { expiresAt: this.now() + this.ttlMs, value };
    return value;
  }

  private async loadDataset<K extends DatasetName>(name: K): Promise<DatasetLoadResult<DatasetMap[K]>> {
    const source: DatasetSource<DatasetMap[K]> = DATASET_SOURCES[name];
    const filePath = path.join(this.options.dataDir, source.file);

    let raw: string;
    try {
      raw = await readFile(filePath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        return { status: "absent" };
      }
      const reason = error instanceof Error ? error.message : String(error);
      console.warn(`Unable to read dataset ${name} from ${filePath}`, error);
      return { status: "malformed", reason };
    }

    try {
      return { status: "loaded", data: source.parse(parseCsv(raw)) };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.warn(`Dataset ${name} (${source.file}) is malformed: ${reason}`);
      return { status: "malformed", reason };
    }
  }
}

function collect<K extends DatasetName>(target: Datasets, results: DatasetLoadResults, name: K) {
  const result: DatasetLoadResult<DatasetMap[K]> = results[name];
  if (result.status === "loaded") {
    target[name] = result.data;
  }
}

/** Narrows load results to the engine input: only datasets that loaded cleanly. */
export function availableDatasets(results: DatasetLoadResults): Datasets {
  const datasets: Datasets = {};
  for (const name of DATASET_NAMES) {
    collect(datasets, results, name);
  }
  return datasets;
}
