import type {
  AssigneeRow,
  ContributorRow,
  Datasets,
  EngineeringSummaryRow,
  OrganizationRow,
  SeverityRow
} from "~/types/datasets";
import type {
  AgentEntry,
  CatalogMetrics,
  CategorizationBreakdown,
  CategoryComparison,
  ContributorEntry,
  EngineeringSummaryEntry,
  EngineeringTeamEntry,
  LevelOneScorecard,
  LevelTwoScorecard,
  Metric,
  MetricsCatalog,
  OrganizationEntry,
  OrganizationTiering,
  RankedEntry,
  ReportYears,
  SummaryRow,
  Trend,
  YearComparison
} from "~/types/metrics";
import {
  available,
  buildBacklog,
  compareEntities,
  compareMeasured,
  compareYears,
  countBy,
  lookupCategory,
  mapMetric,
  mean,
  percentChange,
  rankBy,
  sumByYear,
  tierOrganizations,
  unavailable,
  valueForYear
} from "./kpi";

export const DEFAULT_REPORT_YEARS: ReportYears = { previous: 2024, current: 2025 };
export const SEVERITIES = ["Blocker", "Critical", "Major", "Minor"];
export const ENGINEERING_INVOLVEMENT_METRIC = "Engineering Involvement Rate";
export const LEVEL_ONE = "Level 1";
const TOP_ORGANIZATION_LIMIT = 10;

export interface ComputeOptions {
  years?: ReportYears;
}

function requireDataset<T>(dataset: T[] | undefined, name: string): Metric<T[]> {
  return dataset ? available(dataset) : unavailable(`${name} dataset not available`);
}

function bothYears<T>(previous: Metric<T>, current: Metric<T>, compare: (a: T, b: T) => YearComparison) {
  if (previous.status === "unavailable") return unavailable<YearComparison>(previous.reason);
  if (current.status === "unavailable") return unavailable<YearComparison>(current.reason);
  return available(compare(previous.value, current.value));
}

function flatten<T>(metric: Metric<Metric<T>>): Metric<T> {
  return metric.status === "available" ? metric.value : metric;
}

function averageComparison(rows: Metric<SeverityRow[]>, years: ReportYears) {
  return flatten(
    mapMetric(rows, (data) => {
      const averageFor = (year: number) =>
        mean(
          data.flatMap((row) => {
            const value = row.byYear.get(year);
            return value === undefined ? [] : [value];
          })
        );
      return bothYears(averageFor(years.previous), averageFor(years.current), compareYears);
    })
  );
}

function severityComparisons(rows: Metric<SeverityRow[]>, years: ReportYears): Metric<CategoryComparison[]> {
  return mapMetric(rows, (data) =>
    SEVERITIES.map((severity) => {
      const lookup = (year: number) =>
        lookupCategory(data, (row) => row.severity, severity, (row) => row.byYear, year);
      return {
        category: severity,
        comparison: bothYears(lookup(years.previous), lookup(years.current), compareYears)
      };
    })
  );
}

function engineeringEntry(row: EngineeringSummaryRow, years: ReportYears): EngineeringSummaryEntry {
  const previous = row.byYear.get(years.previous) ?? null;
  const current = row.byYear.get(years.current) ?? null;
  const comparison = previous && current ? compareMeasured(previous, current) : null;
  return {
    metric: row.metric,
    previous,
    current,
    change: comparison ? comparison.change : unavailable("Missing value for one of the years"),
    changeUnit: comparison ? comparison.changeUnit : "percent"
  };
}

function engineeringInvolvement(rows: Metric<EngineeringSummaryRow[]>, years: ReportYears) {
  return flatten(
    mapMetric(rows, (data) => {
      const row = data.find((candidate) => candidate.metric === ENGINEERING_INVOLVEMENT_METRIC);
      if (!row) {
        return unavailable<YearComparison>(`No "${ENGINEERING_INVOLVEMENT_METRIC}" row`);
      }
      return bothYears(valueForYear(row.byYear, years.previous), valueForYear(row.byYear, years.current), compareMeasured);
    })
  );
}

function trendOf(change: Metric<number>): Trend {
  if (change.status === "unavailable") return "unknown";
  if (change.value < 0) return "improved";
  if (change.value > 0) return "worsened";
  return "unchanged";
}

function summaryRow(
  label: string,
  valueUnit: SummaryRow["valueUnit"],
  comparison: Metric<YearComparison>
): SummaryRow[] {
  if (comparison.status === "unavailable") {
    return [];
  }
  const { previous, current, change, changeUnit } = comparison.value;
  return [{ label, previous, current, valueUnit, change, changeUnit, trend: trendOf(change) }];
}

function organizationEntry(row: OrganizationRow, years: ReportYears): Metric<OrganizationEntry> {
  const currentTickets = row.ticketsByYear.get(years.current);
  if (currentTickets === undefined) {
    return unavailable(`No ${years.current} tickets`);
  }
  const previousTickets = row.ticketsByYear.get(years.previous) ?? null;
  return available({
    organization: row.organization,
    previousTickets,
    currentTickets,
    change:
      previousTickets === null
        ? unavailable<number>(`No ${years.previous} tickets`)
        : percentChange(previousTickets, currentTickets),
    avgResolutionDays: row.avgResolutionDaysByYear.get(years.current) ?? null
  });
}

function organizationTiering(rows: OrganizationRow[], years: ReportYears): OrganizationTiering {
  const entries: OrganizationEntry[] = [];
  const untiered: OrganizationTiering["untiered"] = [];
  for (const row of rows) {
    const entry = organizationEntry(row, years);
    if (entry.status === "available") {
      entries.push(entry.value);
    } else {
      untiered.push({ organization: row.organization, reason: entry.reason });
    }
  }
  return { tiers: tierOrganizations(entries), untiered };
}

function toAgentEntry(row: AssigneeRow): AgentEntry {
  return {
    assignee: row.assignee,
    totalAssigned: row.totalAssigned,
    totalResolved: row.totalResolved,
    avgResolutionDays: row.avgResolutionDays,
    resolutionRatePct: row.resolutionRatePct,
    engineeringRatePct: row.engineeringRatePct,
    supportLevel: row.supportLevel
  };
}

function toContributorEntry(row: ContributorRow): ContributorEntry {
  return {
    contributor: row.contributor,
    role: row.role,
    ticketsContributed: row.ticketsContributed,
    totalComments: row.totalComments,
    avgCommentsPerTicket: row.avgCommentsPerTicket,
    commentVelocityPerDay: row.commentVelocityPerDay,
    avgHoldTimeHours: row.avgHoldTimeHours
  };
}

function averageOf<T>(rows: T[], value: (row: T) => number) {
  const result = mean(rows.map(value));
  return result.status === "available" ? result.value : 0;
}

function levelOneScorecard(rows: AssigneeRow[], year: number): Metric<LevelOneScorecard> {
  const agents = rows.filter((row) => row.year === year && row.supportLevel === LEVEL_ONE).map(toAgentEntry);
  if (!agents.length) {
    return unavailable(`No ${LEVEL_ONE} agents for ${year}`);
  }
  return available({
    agentCount: agents.length,
    avgTicketsResolved: averageOf(agents, (agent) => agent.totalResolved),
    avgResolutionDays: averageOf(agents, (agent) => agent.avgResolutionDays),
    avgResolutionRatePct: averageOf(agents, (agent) => agent.resolutionRatePct),
    avgEngineeringRatePct: averageOf(agents, (agent) => agent.engineeringRatePct),
    rankings: rankBy(agents, (agent) => agent.totalResolved)
  });
}

function levelTwoScorecard(rows: ContributorRow[], year: number): Metric<LevelTwoScorecard> {
  const contributors = rows.filter((row) => row.year === year).map(toContributorEntry);
  if (!contributors.length) {
    return unavailable(`No contributors for ${year}`);
  }
  return available({
    contributorCount: contributors.length,
    totalTicketsContributed: contributors.reduce((acc, entry) => acc + entry.ticketsContributed, 0),
    totalComments: contributors.reduce((acc, entry) => acc + entry.totalComments, 0),
    avgCommentsPerTicket: averageOf(contributors, (entry) => entry.avgCommentsPerTicket),
    avgVelocityPerDay: averageOf(contributors, (entry) => entry.commentVelocityPerDay),
    rankings: rankBy(contributors, (entry) => entry.ticketsContributed)
  });
}

function nonEmpty<T>(values: T[], reason: string): Metric<T[]> {
  return values.length ? available(values) : unavailable(reason);
}

function categorizationBreakdown(rows: Datasets["categorization"]): Metric<CategorizationBreakdown> {
  if (!rows) {
    return unavailable("categorization dataset not available");
  }
  if (!rows.length) {
    return unavailable("No categorized tickets");
  }
  const cells: CategorizationBreakdown["matrix"] = [];
  for (const row of rows) {
    const cell = cells.find((candidate) => candidate.category === row.category && candidate.type === row.type);
    if (cell) {
      cell.count += 1;
    } else {
      cells.push({ category: row.category, type: row.type, count: 1 });
    }
  }
  return available({
    totalTickets: rows.length,
    averageConfidence: averageOf(rows, (row) => row.confidence),
    byCategory: countBy(rows, (row) => [row.category]),
    byType: countBy(rows, (row) => [row.type]),
    matrix: rankBy(cells, (cell) => cell.count).map(({ item }) => item),
    topComponents: countBy(rows, (row) => row.components).slice(0, 10)
  });
}

/**
 * Derives every dashboard metric from the datasets that loaded. Each entry is
 * computed on its own and degrades to `unavailable` when its inputs are
 * missing, so a partial data drop never blocks the rest of the report.
 */
export function computeCatalog(datasets: Datasets, options: ComputeOptions = {}): MetricsCatalog {
  const years = options.years ?? DEFAULT_REPORT_YEARS;

  const monthly = requireDataset(datasets.monthly, "monthly");
  const resolution = requireDataset(datasets.resolution, "resolution");
  const firstResponse = requireDataset(datasets.firstResponse, "first response");
  const engineering = requireDataset(datasets.engineeringSummary, "engineering summary");
  const teams = requireDataset(datasets.engineeringTeams, "engineering by team");
  const organizations = requireDataset(datasets.organizations, "organizations");
  const assignees = requireDataset(datasets.assignees, "assignee performance");
  const contributors = requireDataset(datasets.contributors, "contributor performance");

  const totalTickets = flatten(
    mapMetric(monthly, (rows) => {
      const totals = sumByYear(rows, (row) => row.created);
      return bothYears(valueForYear(totals, years.previous), valueForYear(totals, years.current), compareYears);
    })
  );
  const engineeringInvolvementRate = engineeringInvolvement(engineering, years);
  const avgFirstResponseHours = averageComparison(firstResponse, years);
  const avgResolutionDays = averageComparison(resolution, years);
  const resolutionBySeverity = severityComparisons(resolution, years);

  const severityComparison = (category: string) =>
    flatten(
      mapMetric(resolutionBySeverity, (entries) => {
        const entry = entries.find((candidate) => candidate.category === category);
        return entry ? entry.comparison : unavailable<YearComparison>(`No ${category} row`);
      })
    );

  const summaryRows = [
    ...summaryRow("Total Tickets", "count", totalTickets),
    ...summaryRow("Engineering Involvement", "percent", engineeringInvolvementRate),
    ...summaryRow("Blocker Resolution (days)", "days", severityComparison("Blocker")),
    ...summaryRow("Critical Resolution (days)", "days", severityComparison("Critical")),
    ...summaryRow("Avg FRT (hours)", "hours", avgFirstResponseHours),
    ...summaryRow("Avg Resolution (days)", "days", avgResolutionDays)
  ];

  const organizationEntries = mapMetric(organizations, (rows) =>
    rows.flatMap((row) => {
      const entry = organizationEntry(row, years);
      return entry.status === "available" ? [entry.value] : [];
    })
  );

  const currentAgents = mapMetric(assignees, (rows) =>
    rows.filter((row) => row.year === years.current).map(toAgentEntry)
  );

  const metrics: CatalogMetrics = {
    totalTickets,
    engineeringInvolvement: engineeringInvolvementRate,
    avgFirstResponseHours,
    avgResolutionDays,
    resolutionBySeverity,
    firstResponseBySeverity: severityComparisons(firstResponse, years),
    yearOverYearSummary: nonEmpty(summaryRows, "No year-over-year metrics available"),
    engineeringSummary: mapMetric(engineering, (rows) => rows.map((row) => engineeringEntry(row, years))),
    engineeringTeams: mapMetric(teams, (rows): RankedEntry<EngineeringTeamEntry>[] => {
      const entries = rows.flatMap((row): EngineeringTeamEntry[] => {
        const currentTickets = row.ticketsByYear.get(years.current);
        if (currentTickets === undefined) return [];
        const previousTickets = row.ticketsByYear.get(years.previous) ?? null;
        return [
          {
            team: row.team,
            previousTickets,
            currentTickets,
            change:
              previousTickets === null
                ? unavailable(`No ${years.previous} tickets`)
                : percentChange(previousTickets, currentTickets),
            reportedChange: row.reportedChange
          }
        ];
      });
      return rankBy(entries, (entry) => entry.currentTickets);
    }),
    organizationTiers: mapMetric(organizations, (rows) => organizationTiering(rows, years)),
    topOrganizations: mapMetric(organizationEntries, (entries) =>
      rankBy(entries, (entry) => entry.currentTickets).slice(0, TOP_ORGANIZATION_LIMIT)
    ),
    backlog: flatten(mapMetric(monthly, (rows) => nonEmpty(buildBacklog(rows), "No monthly rows"))),
    levelOneScorecard: flatten(mapMetric(assignees, (rows) => levelOneScorecard(rows, years.current))),
    levelTwoScorecard: flatten(mapMetric(contributors, (rows) => levelTwoScorecard(rows, years.current))),
    fastestResolvers: flatten(
      mapMetric(currentAgents, (agents) =>
        nonEmpty(
          rankBy(agents, (agent) => agent.avgResolutionDays, "asc"),
          `No agents for ${years.current}`
        )
      )
    ),
    agentYearOverYear: mapMetric(assignees, (rows) =>
      compareEntities(rows, {
        identity: (row) => row.assignee,
        year: (row) => row.year,
        value: (row) => row.totalResolved,
        previousYear: years.previous,
        currentYear: years.current
      })
    ),
    categorization: categorizationBreakdown(datasets.categorization)
  };

  return { years, metrics };
}
