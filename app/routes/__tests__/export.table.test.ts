import { beforeEach, describe, expect, it, vi } from "vitest";

import { loader } from "~/routes/export.$table";
import { computeCatalog } from "~/utils/metrics";

vi.mock("~/utils/report.server", () => ({
  buildReport: vi.fn(),
  getDatasetLoader: vi.fn(),
  isRefreshRequested: vi.fn()
}));

const { buildReport } = await import("~/utils/report.server");
const buildReportMock = vi.mocked(buildReport);

function callLoader(table: string) {
  return loader({ request: new Request(`http://localhost/export/${table}`), params: { table }, context: {} });
}

beforeEach(() => {
  vi.resetAllMocks();
  buildReportMock.mockResolvedValue({
    generatedAt: "2025-06-01T09:00:00.000Z",
    catalog: computeCatalog({
      monthly: [
        { month: "2025-01", monthIndex: 1, year: 2025, created: 12, resolved: 10 },
        { month: "2025-02", monthIndex: 2, year: 2025, created: 8, resolved: 9 }
      ]
    }),
    issues: []
  });
});

describe("export loader", () => {
  it("downloads a table as CSV", async () => {
    const response = await callLoader("backlog");

    expect(response.status).toBe(200);
    expect(response.headers.get("Content-Type")).toBe("text/csv; charset=utf-8");
    expect(response.headers.get("Content-Disposition")).toBe('attachment; filename="backlog.csv"');
    expect(await response.text()).toBe(
      ["Month,Created,Resolved,Net,Backlog", "Jan 2025,12,10,2,2", "Feb 2025,8,9,-1,1"].join("\r\n")
    );
  });

  it("returns 404 for an unknown table", async () => {
    const response = await callLoader("tickets");

    expect(response.status).toBe(404);
    expect(await response.text()).toBe("Unknown table: tickets");
    expect(buildReportMock).not.toHaveBeenCalled();
  });

  it("returns 404 with the reason when the table has no data", async () => {
    const response = await callLoader("organizations");

    expect(response.status).toBe(404);
    expect(await response.text()).toBe("Table organizations is not available: organizations dataset not available");
  });
});
