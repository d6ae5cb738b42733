import { isValid, parse } from "date-fns";

import type {
  AssigneeRow,
  CategorizationRow,
  ContributorRow,
  EngineeringSummaryRow,
  EngineeringTeamRow,
  MonthlyRow,
  OrganizationRow,
  SeverityRow
} from "~/types/datasets";
import {
  DatasetFormatError,
  pickColumn,
  readNumber,
  readLenientMeasured,
  readOptionalNumber,
  readPercent,
  readText,
  readYearMeasured,
  readYearNumbers,
  requireColumns,
  requireYearColumns
} from "./csv.server";
import type { CsvTable } from "./csv.server";

const MONTH_NAME_FORMATS = ["MMMM", "MMM"];
const REFERENCE_DATE = new Date(2000, 0, 1);

export function parseMonthIndex(label: string): number | null {
  const value = label.trim();
  const isoMatch = /^\d{4}-(\d{1,2})(?:-\d{1,2})?$/.exec(value);
  const numeric = isoMatch ? Number(isoMatch[1]) : /^\d{1,2}$/.test(value) ? Number(value) : null;
  if (numeric !== null) {
    return numeric >= 1 && numeric <= 12 ? numeric : null;
  }

  for (const format of MONTH_NAME_FORMATS) {
    const parsed = parse(value, format, REFERENCE_DATE);
    if (isValid(parsed)) {
      return parsed.getMonth() + 1;
    }
  }
  return null;
}

function splitComponents(raw: string) {
  return raw
    .split(/[;,|]/)
    .map((component) => component.trim())
    .filter(Boolean);
}

export function parseMonthly(table: CsvTable): MonthlyRow[] {
  requireColumns(table, ["Month", "Year", "Created", "Resolved"]);
  return table.rows.map((row) => {
    const month = readText(row, "Month");
    const monthIndex = parseMonthIndex(month);
    if (monthIndex === null) {
      throw new DatasetFormatError(`Unrecognised month "${month}"`);
    }
    return {
      month,
      monthIndex,
      year: readNumber(row, "Year"),
      created: readNumber(row, "Created"),
      resolved: readNumber(row, "Resolved")
    };
  });
}

function parseSeverityTable(table: CsvTable, field: string): SeverityRow[] {
  requireColumns(table, ["Severity"]);
  requireYearColumns(table, field);
  return table.rows.map((row) => ({
    severity: readText(row, "Severity"),
    byYear: readYearNumbers(table, row, field)
  }));
}

export function parseResolution(table: CsvTable): SeverityRow[] {
  return parseSeverityTable(table, "Avg_Days");
}

export function parseFirstResponse(table: CsvTable): SeverityRow[] {
  return parseSeverityTable(table, "Avg_Hours");
}

export function parseEngineeringSummary(table: CsvTable): EngineeringSummaryRow[] {
  requireColumns(table, ["Metric"]);
  requireYearColumns(table, "Value");
  return table.rows.map((row) => ({
    metric: readText(row, "Metric"),
    byYear: readYearMeasured(table, row, "Value")
  }));
}

export function parseEngineeringTeams(table: CsvTable): EngineeringTeamRow[] {
  requireColumns(table, ["Engineering_Team"]);
  requireYearColumns(table, "Tickets");
  const hasChange = table.columns.includes("Change");
  return table.rows.map((row) => ({
    team: readText(row, "Engineering_Team"),
    ticketsByYear: readYearNumbers(table, row, "Tickets"),
    reportedChange: hasChange ? readLenientMeasured(row, "Change") : null
  }));
}

export function parseOrganizations(table: CsvTable): OrganizationRow[] {
  requireColumns(table, ["Organization"]);
  requireYearColumns(table, "Tickets");
  return table.rows.map((row) => ({
    organization: readText(row, "Organization"),
    ticketsByYear: readYearNumbers(table, row, "Tickets"),
    avgResolutionDaysByYear: readYearNumbers(table, row, "Avg_Resolution_Days")
  }));
}

export function parseAssignees(table: CsvTable): AssigneeRow[] {
  requireColumns(table, [
    "Assignee",
    "Year",
    "Total_Assigned",
    "Total_Resolved",
    "Avg_Resolution_Days",
    "Resolution_Rate_Pct",
    "Support_Level"
  ]);
  const engineeringColumn = pickColumn(table, ["Engineering_Rate_Pct", "Engineering_Escalation_Rate_Pct"]);

  return table.rows.map((row) => ({
    assignee: readText(row, "Assignee"),
    year: readNumber(row, "Year"),
    totalAssigned: readNumber(row, "Total_Assigned"),
    totalResolved: readNumber(row, "Total_Resolved"),
    avgResolutionDays: readNumber(row, "Avg_Resolution_Days"),
    resolutionRatePct: readPercent(row, "Resolution_Rate_Pct"),
    engineeringRatePct: readPercent(row, engineeringColumn),
    supportLevel: readText(row, "Support_Level")
  }));
}

export function parseContributors(table: CsvTable): ContributorRow[] {
  requireColumns(table, [
    "Contributor",
    "Year",
    "Tickets_Contributed",
    "Total_Comments",
    "Avg_Comments_Per_Ticket"
  ]);
  const velocityColumn = pickColumn(table, ["Comment_Velocity_Per_Day", "Avg_Velocity_Per_Day"]);
  const hasRole = table.columns.includes("Role");
  const hasHoldTime = table.columns.includes("Avg_Hold_Time_Hours");

  return table.rows.map((row) => ({
    contributor: readText(row, "Contributor"),
    year: readNumber(row, "Year"),
    ticketsContributed: readNumber(row, "Tickets_Contributed"),
    totalComments: readNumber(row, "Total_Comments"),
    avgCommentsPerTicket: readNumber(row, "Avg_Comments_Per_Ticket"),
    commentVelocityPerDay: readNumber(row, velocityColumn),
    role: hasRole ? readText(row, "Role") : "",
    avgHoldTimeHours: hasHoldTime ? readOptionalNumber(row, "Avg_Hold_Time_Hours") : null
  }));
}

export function parseCategorization(table: CsvTable): CategorizationRow[] {
  requireColumns(table, ["ticket_key", "category", "type", "confidence"]);
  return table.rows.map((row) => ({
    ticketKey: readText(row, "ticket_key"),
    category: readText(row, "category") || "Uncategorized",
    type: readText(row, "type") || "Unknown",
    confidence: readNumber(row, "confidence"),
    reasoning: readText(row, "reasoning"),
    components: splitComponents(readText(row, "components"))
  }));
}
