import { redirect } from "@remix-run/node";

import type { DatasetLoadResults, DatasetName } from "~/types/datasets";
import { DATASET_NAMES } from "~/types/datasets";
import type { MetricsCatalog, ReportYears } from "~/types/metrics";
import { DATASET_SOURCES, DatasetLoader, availableDatasets } from "./datasets.server";
import { getReportConfig } from "./env.server";
import { computeCatalog } from "./metrics";

export interface DatasetIssue {
  dataset: DatasetName;
  file: string;
  status: "absent" | "malformed";
  reason: string | null;
}

export interface Report {
  generatedAt: string;
  catalog: MetricsCatalog;
  issues: DatasetIssue[];
}

export interface BuildReportOptions {
  forceRefresh?: boolean;
  years?: ReportYears;
  now?: Date;
}

let sharedLoader: DatasetLoader | null = null;

/** Loader for the configured data directory, created on first use. */
export function getDatasetLoader() {
  if (!sharedLoader) {
    sharedLoader = new DatasetLoader({ dataDir: getReportConfig().dataDir });
  }
  return sharedLoader;
}

export function listIssues(results: DatasetLoadResults): DatasetIssue[] {
  return DATASET_NAMES.flatMap((dataset): DatasetIssue[] => {
    const result = results[dataset];
    const file = DATASET_SOURCES[dataset].file;
    if (result.status === "absent") {
      return [{ dataset, file, status: "absent", reason: null }];
    }
    if (result.status === "malformed") {
      return [{ dataset, file, status: "malformed", reason: result.reason }];
    }
    return [];
  });
}

export async function buildReport(loader: DatasetLoader, options: BuildReportOptions = {}): Promise<Report> {
  const results = await loader.load({ forceRefresh: options.forceRefresh });
  return {
    generatedAt: (options.now ?? new Date()).toISOString(),
    catalog: computeCatalog(availableDatasets(results), { years: options.years }),
    issues: listIssues(results)
  };
}

export function isRefreshRequested(request: Request) {
  return new URL(request.url).searchParams.get("refresh") === "1";
}

/** Drops the cached datasets and sends the browser back to the page without `?refresh=1`. */
export function refreshRedirect(request: Request, loader: DatasetLoader) {
  const url = new URL(request.url);
  url.searchParams.delete("refresh");
  loader.invalidate();
  return redirect(`${url.pathname}${url.search}`);
}

export type ReportLoaderData = { ok: true; report: Report } | { ok: false; error: string };

/**
 * Shared body of the view loaders: one report cycle, failures reported rather
 * than thrown. A refresh request throws a redirect so the parameter does not
 * stick to later reloads.
 */
export async function loadReportData(request: Request, loader = getDatasetLoader()): Promise<ReportLoaderData> {
  if (isRefreshRequested(request)) {
    throw refreshRedirect(request, loader);
  }
  try {
    const report = await buildReport(loader);
    return { ok: true, report };
  } catch (error) {
    console.error(error);
    const message = error instanceof Error ? error.message : "Unknown error";
    return { ok: false, error: message };
  }
}
