import { describe, expect, it } from "vitest";

import type { Datasets } from "~/types/datasets";
import { buildExportTable, isExportTableId, toCsv } from "../export";
import { computeCatalog } from "../metrics";

const datasets: Datasets = {
  resolution: [
    { severity: "Blocker", byYear: new Map([[2024, 4], [2025, 3]]) },
    { severity: "Minor", byYear: new Map([[2024, 0], [2025, 5]]) }
  ],
  engineeringTeams: [
    { team: "Platform", ticketsByYear: new Map([[2024, 40], [2025, 30]]), reportedChange: null },
    { team: "Payments", ticketsByYear: new Map([[2025, 45]]), reportedChange: null }
  ]
};

describe("export tables", () => {
  const catalog = computeCatalog(datasets);

  it("recognises known table ids only", () => {
    expect(isExportTableId("resolution")).toBe(true);
    expect(isExportTableId("tickets")).toBe(false);
    expect(isExportTableId(undefined)).toBe(false);
  });

  it("writes severity rows with blanks for missing comparisons", () => {
    const exported = buildExportTable(catalog, "resolution");
    if (exported.status !== "available") {
      throw new Error(exported.reason);
    }
    expect(toCsv(exported.value)).toBe(
      [
        "Severity,2024,2025,Change",
        "Blocker,4,3,-25.0%",
        "Critical,,,N/A",
        "Major,,,N/A",
        "Minor,0,5,N/A"
      ].join("\r\n")
    );
  });

  it("keeps rank order for team tables", () => {
    const exported = buildExportTable(catalog, "engineering-teams");
    if (exported.status !== "available") {
      throw new Error(exported.reason);
    }
    expect(exported.value.rows).toEqual([
      { Rank: 1, Team: "Payments", "2024": "", "2025": 45, Change: "N/A" },
      { Rank: 2, Team: "Platform", "2024": 40, "2025": 30, Change: "-25.0%" }
    ]);
  });

  it("passes through the reason of an unavailable metric", () => {
    expect(buildExportTable(catalog, "backlog")).toEqual({
      status: "unavailable",
      reason: "monthly dataset not available"
    });
  });
});
