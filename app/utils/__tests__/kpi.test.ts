import { describe, expect, it } from "vitest";

import type { MonthlyRow } from "~/types/datasets";
import {
  buildBacklog,
  compareEntities,
  compareMeasured,
  countBy,
  lookupCategory,
  mean,
  percentChange,
  percentagePointChange,
  rankBy,
  sumByYear,
  tierFor,
  tierOrganizations,
  unavailable
} from "../kpi";

function month(year: number, monthIndex: number, created: number, resolved: number): MonthlyRow {
  return {
    month: `${year}-${String(monthIndex).padStart(2, "0")}`,
    monthIndex,
    year,
    created,
    resolved
  };
}

describe("percentChange", () => {
  it("computes relative change against the previous value", () => {
    const pairs: Array<[number, number]> = [
      [80, 100],
      [200, 150],
      [3, 3],
      [-4, 2]
    ];
    for (const [previous, current] of pairs) {
      const result = percentChange(previous, current);
      expect(result.status).toBe("available");
      if (result.status === "available") {
        expect(result.value).toBeCloseTo(((current - previous) / previous) * 100);
      }
    }
  });

  it("is unavailable when the previous value is zero", () => {
    expect(percentChange(0, 12)).toEqual({
      status: "unavailable",
      reason: "No baseline: previous value is zero"
    });
    expect(percentChange(0, 0).status).toBe("unavailable");
  });

  it("never surfaces NaN or infinity", () => {
    expect(percentChange(Number.NaN, 4).status).toBe("unavailable");
    expect(percentChange(4, Number.POSITIVE_INFINITY).status).toBe("unavailable");
  });
});

describe("percentage point change", () => {
  it("subtracts percentages instead of dividing", () => {
    expect(percentagePointChange(40, 45)).toEqual({ status: "available", value: 5 });
  });

  it("picks points only when both measured values are percentages", () => {
    const points = compareMeasured({ value: 40, unit: "percent" }, { value: 30, unit: "percent" });
    expect(points.changeUnit).toBe("points");
    expect(points.change).toEqual({ status: "available", value: -10 });

    const relative = compareMeasured({ value: 40, unit: "number" }, { value: 30, unit: "number" });
    expect(relative.changeUnit).toBe("percent");
    expect(relative.change).toEqual({ status: "available", value: -25 });
  });
});

describe("aggregation helpers", () => {
  it("sums a column per year", () => {
    const totals = sumByYear([month(2024, 1, 10, 0), month(2024, 2, 5, 0), month(2025, 1, 7, 0)], (row) => row.created);
    expect(Array.from(totals.entries())).toEqual([
      [2024, 15],
      [2025, 7]
    ]);
  });

  it("reports an empty mean as unavailable", () => {
    expect(mean([]).status).toBe("unavailable");
    expect(mean([2, 4, 9])).toEqual({ status: "available", value: 5 });
  });

  it("looks up a category value for a year", () => {
    const rows = [{ severity: "Blocker", byYear: new Map([[2025, 4]]) }];
    const lookup = (category: string, year: number) =>
      lookupCategory(rows, (row) => row.severity, category, (row) => row.byYear, year);

    expect(lookup("Blocker", 2025)).toEqual({ status: "available", value: 4 });
    expect(lookup("Blocker", 2024)).toEqual({ status: "unavailable", reason: "No 2024 value" });
    expect(lookup("Trivial", 2025)).toEqual({ status: "unavailable", reason: "No Trivial row" });
  });

  it("counts labels in descending order, ties in first-seen order", () => {
    const rows = [{ tags: ["b"] }, { tags: ["a", "b"] }, { tags: ["c"] }, { tags: ["a"] }];
    expect(countBy(rows, (row) => row.tags)).toEqual([
      { label: "b", count: 2 },
      { label: "a", count: 2 },
      { label: "c", count: 1 }
    ]);
  });
});

describe("tierFor", () => {
  it("assigns boundary values to the higher tier", () => {
    const assignments = [0, 4, 5, 19, 20, 49, 50, 100].map((tickets) => [tickets, tierFor(tickets)]);
    expect(assignments).toEqual([
      [0, "self-service"],
      [4, "self-service"],
      [5, "standard"],
      [19, "standard"],
      [20, "growth"],
      [49, "growth"],
      [50, "enterprise"],
      [100, "enterprise"]
    ]);
  });

  it("lists every tier with its members and total", () => {
    const entry = (organization: string, currentTickets: number) => ({
      organization,
      previousTickets: null,
      currentTickets,
      change: unavailable<number>("No 2024 tickets"),
      avgResolutionDays: null
    });
    const tiers = tierOrganizations([entry("Acme", 60), entry("Globex", 3), entry("Initech", 52)]);
    expect(tiers.map((tier) => [tier.id, tier.organizations.map((org) => org.organization), tier.totalTickets])).toEqual([
      ["enterprise", ["Acme", "Initech"], 112],
      ["growth", [], 0],
      ["standard", [], 0],
      ["self-service", ["Globex"], 3]
    ]);
  });
});

describe("buildBacklog", () => {
  const rows = [month(2025, 3, 10, 4), month(2025, 1, 5, 7), month(2024, 12, 3, 1), month(2025, 2, 8, 8)];

  it("orders months and restarts the running total each year", () => {
    expect(buildBacklog(rows)).toEqual([
      {
        year: 2024,
        points: [{ month: "2024-12", monthIndex: 12, created: 3, resolved: 1, net: 2, backlog: 2 }]
      },
      {
        year: 2025,
        points: [
          { month: "2025-01", monthIndex: 1, created: 5, resolved: 7, net: -2, backlog: -2 },
          { month: "2025-02", monthIndex: 2, created: 8, resolved: 8, net: 0, backlog: -2 },
          { month: "2025-03", monthIndex: 3, created: 10, resolved: 4, net: 6, backlog: 4 }
        ]
      }
    ]);
  });

  it("gives identical results when recomputed", () => {
    expect(buildBacklog(rows)).toEqual(buildBacklog(rows));
    expect(rows.map((row) => row.monthIndex)).toEqual([3, 1, 12, 2]);
  });
});

describe("rankBy", () => {
  const items = [
    { name: "a", score: 5 },
    { name: "b", score: 7 },
    { name: "c", score: 5 },
    { name: "d", score: 7 }
  ];

  it("keeps input order for equal scores", () => {
    expect(rankBy(items, (item) => item.score).map(({ rank, item }) => [rank, item.name])).toEqual([
      [1, "b"],
      [2, "d"],
      [3, "a"],
      [4, "c"]
    ]);
  });

  it("ranks ascending for fastest-style lists", () => {
    expect(rankBy(items, (item) => item.score, "asc").map(({ item }) => item.name)).toEqual(["a", "c", "b", "d"]);
  });
});

describe("compareEntities", () => {
  it("only includes entities present in both years", () => {
    const rows = [
      { name: "A", year: 2024, resolved: 10 },
      { name: "B", year: 2024, resolved: 20 },
      { name: "B", year: 2025, resolved: 25 },
      { name: "C", year: 2025, resolved: 30 }
    ];

    const result = compareEntities(rows, {
      identity: (row) => row.name,
      year: (row) => row.year,
      value: (row) => row.resolved,
      previousYear: 2024,
      currentYear: 2025
    });

    expect(result).toEqual([
      { entity: "B", previous: 20, current: 25, difference: 5, change: { status: "available", value: 25 } }
    ]);
  });
});
