import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { getReportConfig, resetReportConfig } from "../env.server";

afterEach(() => {
  vi.unstubAllEnvs();
  resetReportConfig();
});

describe("report config", () => {
  it("defaults to the data folder of the working directory", () => {
    vi.stubEnv("REPORT_DATA_DIR", "  ");
    expect(getReportConfig().dataDir).toBe(path.join(process.cwd(), "data"));
  });

  it("keeps an absolute data directory as configured", () => {
    vi.stubEnv("REPORT_DATA_DIR", "/srv/reports");
    expect(getReportConfig()).toEqual({ dataDir: "/srv/reports" });
  });

  it("reads the environment once until reset", () => {
    vi.stubEnv("REPORT_DATA_DIR", "/srv/first");
    getReportConfig();
    vi.stubEnv("REPORT_DATA_DIR", "/srv/second");
    expect(getReportConfig().dataDir).toBe("/srv/first");

    resetReportConfig();
    expect(getReportConfig().dataDir).toBe("/srv/second");
  });
});
