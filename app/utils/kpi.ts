import type { MeasuredValue, MonthlyRow, YearValues } from "~/types/datasets";
import type {
  BacklogSeries,
  ChangeUnit,
  EntityComparison,
  Metric,
  OrganizationEntry,
  OrganizationTier,
  RankedEntry,
  TierId,
  YearComparison
} from "~/types/metrics";

export function available<T>(value: T): Metric<T> {
  return { status: "available", value };
}

export function unavailable<T>(reason: string): Metric<T> {
  return { status: "unavailable", reason };
}

export function mapMetric<T, U>(metric: Metric<T>, fn: (value: T) => U): Metric<U> {
  return metric.status === "available" ? available(fn(metric.value)) : metric;
}

export function percentChange(previous: number, current: number): Metric<number> {
  if (!Number.isFinite(previous) || !Number.isFinite(current)) {
    return unavailable("Non-numeric input");
  }
  if (previous === 0) {
    return unavailable("No baseline: previous value is zero");
  }
  return available(((current - previous) / previous) * 100);
}

/** Delta between two values already expressed as percentages. */
export function percentagePointChange(previous: number, current: number): Metric<number> {
  if (!Number.isFinite(previous) || !Number.isFinite(current)) {
    return unavailable("Non-numeric input");
  }
  return available(current - previous);
}

export function compareYears(previous: number, current: number, changeUnit: ChangeUnit = "percent"): YearComparison {
  return {
    previous,
    current,
    change: changeUnit === "points" ? percentagePointChange(previous, current) : percentChange(previous, current),
    changeUnit
  };
}

export function compareMeasured(previous: MeasuredValue, current: MeasuredValue): YearComparison {
  const bothPercent = previous.unit === "percent" && current.unit === "percent";
  return compareYears(previous.value, current.value, bothPercent ? "points" : "percent");
}

export function mean(values: number[]): Metric<number> {
  if (!values.length) {
    return unavailable("No values to average");
  }
  return available(values.reduce((acc, value) => acc + value, 0) / values.length);
}

export function sumByYear<T extends { year: number }>(rows: T[], value: (row: T) => number): Map<number, number> {
  const totals = new Map<number, number>();
  for (const row of rows) {
    totals.set(row.year, (totals.get(row.year) ?? 0) + value(row));
  }
  return totals;
}

export function valueForYear<T>(values: YearValues<T>, year: number): Metric<T> {
  const value = values.get(year);
  return value === undefined ? unavailable(`No ${year} value`) : available(value);
}

export function lookupCategory<T>(
  rows: T[],
  key: (row: T) => string,
  category: string,
  values: (row: T) => YearValues,
  year: number
): Metric<number> {
  const row = rows.find((candidate) => key(candidate) === category);
  if (!row) {
    return unavailable(`No ${category} row`);
  }
  return valueForYear(values(row), year);
}

export interface TierDefinition {
  id: TierId;
  label: string;
  minTickets: number;
  maxTickets: number | null;
}

/** Ordered from the highest band; `minTickets` is inclusive, `maxTickets` exclusive. */
export const ORGANIZATION_TIERS: TierDefinition[] = [
  { id: "enterprise", label: "Enterprise", minTickets: 50, maxTickets: null },
  { id: "growth", label: "Growth", minTickets: 20, maxTickets: 50 },
  { id: "standard", label: "Standard", minTickets: 5, maxTickets: 20 },
  { id: "self-service", label: "Self-service", minTickets: 0, maxTickets: 5 }
];

export function tierFor(tickets: number): TierId {
  const tier = ORGANIZATION_TIERS.find((candidate) => tickets >= candidate.minTickets);
  return tier ? tier.id : "self-service";
}

/** Buckets organizations by current-year tickets; every tier is listed, empty ones included. */
export function tierOrganizations(entries: OrganizationEntry[]): OrganizationTier[] {
  return ORGANIZATION_TIERS.map((tier) => {
    const organizations = entries.filter((entry) => tierFor(entry.currentTickets) === tier.id);
    return {
      ...tier,
      organizations,
      totalTickets: organizations.reduce((acc, entry) => acc + entry.currentTickets, 0)
    };
  });
}

export function buildBacklog(rows: MonthlyRow[]): BacklogSeries[] {
  const byYear = new Map<number, MonthlyRow[]>();
  for (const row of rows) {
    byYear.set(row.year, [...(byYear.get(row.year) ?? []), row]);
  }

  return Array.from(byYear.entries())
    .sort(([a], [b]) => a - b)
    .map(([year, months]) => {
      let running = 0;
      const points = [...months]
        .sort((a, b) => a.monthIndex - b.monthIndex)
        .map((row) => {
          const net = row.created - row.resolved;
          running += net;
          return {
            month: row.month,
            monthIndex: row.monthIndex,
            created: row.created,
            resolved: row.resolved,
            net,
            backlog: running
          };
        });
      return { year, points };
    });
}

export type RankDirection = "desc" | "asc";

/**
 * Orders by `score` and numbers the result from 1. Equal scores keep their
 * input order and still receive consecutive ranks.
 */
export function rankBy<T>(items: T[], score: (item: T) => number, direction: RankDirection = "desc"): RankedEntry<T>[] {
  const sign = direction === "desc" ? -1 : 1;
  return items
    .map((item, index) => ({ item, index, key: score(item) }))
    .sort((a, b) => sign * (a.key - b.key) || a.index - b.index)
    .map(({ item }, position) => ({ rank: position + 1, item }));
}

export interface EntityComparisonOptions<T> {
  identity: (row: T) => string;
  year: (row: T) => number;
  value: (row: T) => number;
  previousYear: number;
  currentYear: number;
}

/** Inner join of two single-year slices; entities missing from either year are dropped. */
export function compareEntities<T>(rows: T[], options: EntityComparisonOptions<T>): EntityComparison[] {
  const previous = new Map<string, number>();
  for (const row of rows) {
    const entity = options.identity(row);
    if (options.year(row) === options.previousYear && !previous.has(entity)) {
      previous.set(entity, options.value(row));
    }
  }

  const seen = new Set<string>();
  const comparisons: EntityComparison[] = [];
  for (const row of rows) {
    const entity = options.identity(row);
    const before = previous.get(entity);
    if (options.year(row) !== options.currentYear || before === undefined || seen.has(entity)) {
      continue;
    }
    seen.add(entity);
    const current = options.value(row);
    comparisons.push({
      entity,
      previous: before,
      current,
      difference: current - before,
      change: percentChange(before, current)
    });
  }
  return comparisons;
}

export function countBy<T>(rows: T[], label: (row: T) => string[]): Array<{ label: string; count: number }> {
  const counts = new Map<string, number>();
  for (const row of rows) {
    for (const key of label(row)) {
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }
  }
  return rankBy(
    Array.from(counts.entries()).map(([key, count]) => ({ label: key, count })),
    (entry) => entry.count
  ).map(({ item }) => item);
}
