import type { LoaderFunctionArgs } from "@remix-run/node";
import { json } from "@remix-run/node";

import type {
  AgentEntry,
  EntityComparison,
  LevelOneScorecard,
  LevelTwoScorecard,
  Metric,
  RankedEntry,
  ReportYears
} from "~/types/metrics";
import { mapMetric } from "~/utils/kpi";
import { loadReportData } from "~/utils/report.server";
import type { DatasetIssue } from "~/utils/report.server";

const FASTEST_RESOLVER_LIMIT = 5;

export type TeamLoaderData =
  | {
      ok: true;
      generatedAt: string;
      issues: DatasetIssue[];
      years: ReportYears;
      levelOne: Metric<LevelOneScorecard>;
      levelTwo: Metric<LevelTwoScorecard>;
      fastestResolvers: Metric<RankedEntry<AgentEntry>[]>;
      agentComparison: Metric<EntityComparison[]>;
    }
  | { ok: false; error: string };

export async function loader({ request }: LoaderFunctionArgs) {
  const data = await loadReportData(request);
  if (!data.ok) {
    return json<TeamLoaderData>(data, { status: 500 });
  }

  const { catalog, generatedAt, issues } = data.report;
  const { metrics, years } = catalog;

  return json<TeamLoaderData>({
    ok: true,
    generatedAt,
    issues,
    years,
    levelOne: metrics.levelOneScorecard,
    levelTwo: metrics.levelTwoScorecard,
    fastestResolvers: mapMetric(metrics.fastestResolvers, (entries) => entries.slice(0, FASTEST_RESOLVER_LIMIT)),
    agentComparison: metrics.agentYearOverYear
  });
}
