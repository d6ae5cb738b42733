import Papa from "papaparse";

import type { MetricsCatalog, Metric } from "~/types/metrics";
import { formatChange, formatMeasured, formatMonth } from "./format";
import { mapMetric } from "./kpi";

type Cell = string | number;
export type ExportRow = Record<string, Cell>;

export interface ExportTable {
  columns: string[];
  rows: ExportRow[];
}

export const EXPORT_TABLES = [
  "yoy-summary",
  "resolution",
  "first-response",
  "engineering-summary",
  "engineering-teams",
  "organizations",
  "organization-tiers",
  "backlog",
  "level-one",
  "level-two",
  "agent-comparison",
  "categories"
] as const;

export type ExportTableId = (typeof EXPORT_TABLES)[number];

export function isExportTableId(value: string | undefined): value is ExportTableId {
  return EXPORT_TABLES.some((id) => id === value);
}

function table(columns: string[], rows: Metric<ExportRow[]>): Metric<ExportTable> {
  return mapMetric(rows, (data) => ({ columns, rows: data }));
}

function blank(value: number | null): Cell {
  return value === null ? "" : value;
}

export function buildExportTable(catalog: MetricsCatalog, id: ExportTableId): Metric<ExportTable> {
  const { metrics, years } = catalog;
  const previous = String(years.previous);
  const current = String(years.current);

  switch (id) {
    case "yoy-summary":
      return table(
        ["Metric", previous, current, "Change", "Trend"],
        mapMetric(metrics.yearOverYearSummary, (rows) =>
          rows.map((row) => ({
            Metric: row.label,
            [previous]: row.previous,
            [current]: row.current,
            Change: formatChange(row.change, row.changeUnit),
            Trend: row.trend
          }))
        )
      );
    case "resolution":
    case "first-response": {
      const source = id === "resolution" ? metrics.resolutionBySeverity : metrics.firstResponseBySeverity;
      return table(
        ["Severity", previous, current, "Change"],
        mapMetric(source, (entries) =>
          entries.map(({ category, comparison }) =>
            comparison.status === "available"
              ? {
                  Severity: category,
                  [previous]: comparison.value.previous,
                  [current]: comparison.value.current,
                  Change: formatChange(comparison.value.change)
                }
              : { Severity: category, [previous]: "", [current]: "", Change: formatChange(comparison) }
          )
        )
      );
    }
    case "engineering-summary":
      return table(
        ["Metric", previous, current, "Change"],
        mapMetric(metrics.engineeringSummary, (entries) =>
          entries.map((entry) => ({
            Metric: entry.metric,
            [previous]: formatMeasured(entry.previous),
            [current]: formatMeasured(entry.current),
            Change: formatChange(entry.change, entry.changeUnit)
          }))
        )
      );
    case "engineering-teams":
      return table(
        ["Rank", "Team", previous, current, "Change"],
        mapMetric(metrics.engineeringTeams, (entries) =>
          entries.map(({ rank, item }) => ({
            Rank: rank,
            Team: item.team,
            [previous]: blank(item.previousTickets),
            [current]: item.currentTickets,
            Change: formatChange(item.change)
          }))
        )
      );
    case "organizations":
      return table(
        ["Rank", "Organization", previous, current, "Change", "Avg Resolution Days"],
        mapMetric(metrics.topOrganizations, (entries) =>
          entries.map(({ rank, item }) => ({
            Rank: rank,
            Organization: item.organization,
            [previous]: blank(item.previousTickets),
            [current]: item.currentTickets,
            Change: formatChange(item.change),
            "Avg Resolution Days": blank(item.avgResolutionDays)
          }))
        )
      );
    case "organization-tiers":
      return table(
        ["Tier", "Organization", "Tickets"],
        mapMetric(metrics.organizationTiers, ({ tiers, untiered }) => [
          ...tiers.flatMap((tier) =>
            tier.organizations.map((entry) => ({
              Tier: tier.label,
              Organization: entry.organization,
              Tickets: entry.currentTickets
            }))
          ),
          ...untiered.map((entry) => ({ Tier: "Untiered", Organization: entry.organization, Tickets: "" }))
        ])
      );
    case "backlog":
      return table(
        ["Month", "Created", "Resolved", "Net", "Backlog"],
        mapMetric(metrics.backlog, (series) =>
          series.flatMap(({ year, points }) =>
            points.map((point) => ({
              Month: formatMonth(year, point.monthIndex),
              Created: point.created,
              Resolved: point.resolved,
              Net: point.net,
              Backlog: point.backlog
            }))
          )
        )
      );
    case "level-one":
      return table(
        ["Rank", "Assignee", "Resolved", "Avg Resolution Days", "Resolution Rate %", "Engineering Rate %"],
        mapMetric(metrics.levelOneScorecard, (scorecard) =>
          scorecard.rankings.map(({ rank, item }) => ({
            Rank: rank,
            Assignee: item.assignee,
            Resolved: item.totalResolved,
            "Avg Resolution Days": item.avgResolutionDays,
            "Resolution Rate %": item.resolutionRatePct,
            "Engineering Rate %": item.engineeringRatePct
          }))
        )
      );
    case "level-two":
      return table(
        ["Rank", "Contributor", "Role", "Tickets Contributed", "Total Comments", "Avg Comments/Ticket"],
        mapMetric(metrics.levelTwoScorecard, (scorecard) =>
          scorecard.rankings.map(({ rank, item }) => ({
            Rank: rank,
            Contributor: item.contributor,
            Role: item.role,
            "Tickets Contributed": item.ticketsContributed,
            "Total Comments": item.totalComments,
            "Avg Comments/Ticket": item.avgCommentsPerTicket
          }))
        )
      );
    case "agent-comparison":
      return table(
        ["Assignee", previous, current, "Difference", "Change"],
        mapMetric(metrics.agentYearOverYear, (entries) =>
          entries.map((entry) => ({
            Assignee: entry.entity,
            [previous]: entry.previous,
            [current]: entry.current,
            Difference: entry.difference,
            Change: formatChange(entry.change)
          }))
        )
      );
    case "categories":
      return table(
        ["Category", "Type", "Tickets"],
        mapMetric(metrics.categorization, (breakdown) =>
          breakdown.matrix.map((cell) => ({ Category: cell.category, Type: cell.type, Tickets: cell.count }))
        )
      );
  }
}

export function toCsv(exported: ExportTable) {
  return Papa.unparse(exported.rows, { columns: exported.columns });
}
