import { describe, expect, it } from "vitest";

import {
  DatasetFormatError,
  parseCsv,
  parseMeasuredValue,
  readLenientMeasured,
  readNumber,
  readPercent,
  readYearNumbers
} from "../csv.server";
import { parseAssignees, parseMonthIndex, parseMonthly, parseOrganizations } from "../dataset-parsers.server";

describe("measured values", () => {
  it("strips the percent suffix without rescaling", () => {
    expect(parseMeasuredValue("42.5%")).toEqual({ value: 42.5, unit: "percent" });
    expect(parseMeasuredValue(" 612 ")).toEqual({ value: 612, unit: "number" });
  });

  it("rejects values that are not numbers", () => {
    expect(() => parseMeasuredValue("high%")).toThrow(DatasetFormatError);
    expect(() => parseMeasuredValue("%")).toThrow('Column value "%" is not a number');
  });
});

describe("parseCsv", () => {
  it("reads headers and rows", () => {
    const table = parseCsv("Severity, 2025_Avg_Days\nBlocker,4.5\n\n");
    expect(table.columns).toEqual(["Severity", "2025_Avg_Days"]);
    expect(table.rows).toEqual([{ Severity: "Blocker", "2025_Avg_Days": "4.5" }]);
  });

  it("fails on rows with missing fields", () => {
    expect(() => parseCsv("Month,Year,Created\n2025-01,2025")).toThrow(DatasetFormatError);
  });
});

describe("cell readers", () => {
  it("reads numbers and percentages", () => {
    const row = { Created: " 12 ", Rate: "87.5%" };
    expect(readNumber(row, "Created")).toBe(12);
    expect(readPercent(row, "Rate")).toBe(87.5);
  });

  it("names the column of a non-numeric cell", () => {
    expect(() => readNumber({ Created: "twelve" }, "Created")).toThrow('Column Created value "twelve" is not a number');
    expect(() => readNumber({ Created: "" }, "Created")).toThrow('Column Created value "" is empty');
  });

  it("reads informational values leniently", () => {
    const row = { Change: "inf", Delta: "-4.5%", Empty: "" };
    expect(readLenientMeasured(row, "Change")).toBeNull();
    expect(readLenientMeasured(row, "Delta")).toEqual({ value: -4.5, unit: "percent" });
    expect(readLenientMeasured(row, "Empty")).toBeNull();
  });

  it("collects year-keyed columns and skips blanks", () => {
    const table = parseCsv("Organization,2024_Tickets,2025_Tickets,2025_Avg_Resolution_Days\nAcme,,14,3.5");
    const values = readYearNumbers(table, table.rows[0], "Tickets");
    expect(Array.from(values.entries())).toEqual([[2025, 14]]);
  });
});

describe("dataset parsers", () => {
  it("derives the month index from several label styles", () => {
    expect(parseMonthIndex("2025-03")).toBe(3);
    expect(parseMonthIndex("11")).toBe(11);
    expect(parseMonthIndex("February")).toBe(2);
    expect(parseMonthIndex("Sep")).toBe(9);
    expect(parseMonthIndex("2025-13")).toBeNull();
    expect(parseMonthIndex("Q1")).toBeNull();
  });

  it("parses monthly rows", () => {
    const rows = parseMonthly(parseCsv("Month,Year,Created,Resolved\n2025-02,2025,40,38"));
    expect(rows).toEqual([{ month: "2025-02", monthIndex: 2, year: 2025, created: 40, resolved: 38 }]);
  });

  it("rejects an unknown month label", () => {
    expect(() => parseMonthly(parseCsv("Month,Year,Created,Resolved\nQ1,2025,40,38"))).toThrow('Unrecognised month "Q1"');
  });

  it("requires the identity column", () => {
    expect(() => parseOrganizations(parseCsv("Name,2025_Tickets\nAcme,4"))).toThrow(
      "Missing required column(s): Organization"
    );
  });

  it("accepts the older engineering escalation column name", () => {
    const csv = [
      "Assignee,Year,Total_Assigned,Total_Resolved,Avg_Resolution_Days,Resolution_Rate_Pct,Engineering_Escalation_Rate_Pct,Support_Level",
      "Avery,2025,10,9,2.5,90%,12.5,Level 1"
    ].join("\n");
    expect(parseAssignees(parseCsv(csv))).toEqual([
      {
        assignee: "Avery",
        year: 2025,
        totalAssigned: 10,
        totalResolved: 9,
        avgResolutionDays: 2.5,
        resolutionRatePct: 90,
        engineeringRatePct: 12.5,
        supportLevel: "Level 1"
      }
    ]);
  });
});
