import os from "node:os";
import path from "node:path";

import { describe, expect, it, vi } from "vitest";

import { DatasetLoader } from "../datasets.server";
import { loadReportData } from "../report.server";

function emptyLoader() {
  return new DatasetLoader({ dataDir: path.join(os.tmpdir(), "report-data-that-does-not-exist") });
}

describe("loadReportData", () => {
  it("builds a report with every missing dataset listed", async () => {
    const data = await loadReportData(new Request("http://localhost/"), emptyLoader());

    if (!data.ok) {
      throw new Error(data.error);
    }
    expect(data.report.issues).toHaveLength(9);
    expect(data.report.catalog.metrics.totalTickets.status).toBe("unavailable");
  });

  it("clears the cache and redirects away from the refresh parameter", async () => {
    const loader = emptyLoader();
    const invalidate = vi.spyOn(loader, "invalidate");

    const thrown = await loadReportData(new Request("http://localhost/team?refresh=1&view=all"), loader).catch(
      (error: unknown) => error
    );

    if (!(thrown instanceof Response)) {
      throw new Error("Expected a redirect response");
    }
    expect(thrown.status).toBe(302);
    expect(thrown.headers.get("Location")).toBe("/team?view=all");
    expect(invalidate).toHaveBeenCalledTimes(1);
  });
});
