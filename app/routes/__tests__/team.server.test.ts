import { beforeEach, describe, expect, it, vi } from "vitest";

import { loader } from "~/routes/team.server";
import type { AssigneeRow } from "~/types/datasets";
import { computeCatalog } from "~/utils/metrics";
import type { ReportLoaderData } from "~/utils/report.server";

vi.mock("~/utils/report.server", () => ({
  loadReportData: vi.fn()
}));

const { loadReportData } = await import("~/utils/report.server");
const loadReportDataMock = vi.mocked(loadReportData);

function agent(assignee: string, avgResolutionDays: number): AssigneeRow {
  return {
    assignee,
    year: 2025,
    totalAssigned: 20,
    totalResolved: 18,
    avgResolutionDays,
    resolutionRatePct: 90,
    engineeringRatePct: 10,
    supportLevel: "Level 1"
  };
}

function reportData(): ReportLoaderData {
  const assignees = ["Ana", "Ben", "Cal", "Dee", "Eli", "Fay", "Gus"].map((name, index) => agent(name, 7 - index));
  return {
    ok: true,
    report: {
      generatedAt: "2025-06-01T09:00:00.000Z",
      catalog: computeCatalog({ assignees }),
      issues: [{ dataset: "contributors", file: "contributor_performance.csv", status: "absent", reason: null }]
    }
  };
}

function callLoader(url: string) {
  return loader({ request: new Request(url), params: {}, context: {} });
}

beforeEach(() => {
  vi.resetAllMocks();
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

describe("team loader", () => {
  it("returns the scorecards and limits the fastest resolvers", async () => {
    loadReportDataMock.mockResolvedValueOnce(reportData());

    const response = await callLoader("http://localhost/team");
    const data = await response.json();

    expect(response.status).toBe(200);
    expect(loadReportDataMock).toHaveBeenCalledWith(expect.any(Request));
    if (!data.ok) {
      throw new Error(data.error);
    }
    expect(data.levelOne.status).toBe("available");
    expect(data.levelTwo).toEqual({ status: "unavailable", reason: "contributor performance dataset not available" });
    expect(data.fastestResolvers.status).toBe("available");
    if (data.fastestResolvers.status === "available") {
      expect(data.fastestResolvers.value.map(({ item }) => item.assignee)).toEqual(["Gus", "Fay", "Eli", "Dee", "Cal"]);
    }
    expect(data.issues).toHaveLength(1);
  });

  it("responds with 500 when the report cannot be built", async () => {
    loadReportDataMock.mockResolvedValueOnce({ ok: false, error: "disk unavailable" });

    const response = await callLoader("http://localhost/team");

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ ok: false, error: "disk unavailable" });
  });
});
