import { format } from "date-fns";

import type { MeasuredValue } from "~/types/datasets";
import type { ChangeUnit, Metric, SummaryRow, Trend } from "~/types/metrics";

export const NOT_AVAILABLE = "N/A";

export function formatNumber(value: number | null | undefined, digits = 0) {
  if (value === null || value === undefined || !Number.isFinite(value)) {
    return NOT_AVAILABLE;
  }
  return value.toLocaleString("en-US", { minimumFractionDigits: digits, maximumFractionDigits: digits });
}

export function formatPercent(value: number | null | undefined, digits = 1) {
  const formatted = formatNumber(value, digits);
  return formatted === NOT_AVAILABLE ? formatted : `${formatted}%`;
}

export function formatMeasured(value: MeasuredValue | null) {
  if (!value) return NOT_AVAILABLE;
  return value.unit === "percent" ? formatPercent(value.value) : formatNumber(value.value, Number.isInteger(value.value) ? 0 : 1);
}

/** Signed delta: `+12.5%` for relative change, `-1.2pp` for percentage points. */
export function formatChange(change: Metric<number>, unit: ChangeUnit = "percent") {
  if (change.status === "unavailable" || !Number.isFinite(change.value)) {
    return NOT_AVAILABLE;
  }
  const sign = change.value > 0 ? "+" : change.value < 0 ? "-" : "";
  const magnitude = Math.abs(change.value).toFixed(1);
  return `${sign}${magnitude}${unit === "points" ? "pp" : "%"}`;
}

export function formatSummaryValue(row: SummaryRow, which: "previous" | "current") {
  return row.valueUnit === "percent" ? formatPercent(row[which]) : formatNumber(row[which]);
}

export function trendLabel(trend: Trend) {
  switch (trend) {
    case "improved":
      return "Improving";
    case "worsened":
      return "Needs attention";
    case "unchanged":
      return "Flat";
    default:
      return NOT_AVAILABLE;
  }
}

export function formatMonth(year: number, monthIndex: number) {
  return format(new Date(year, monthIndex - 1, 1), "MMM yyyy");
}

export function formatGeneratedAt(isoDate: string) {
  return format(new Date(isoDate), "MMM d, yyyy HH:mm:ss");
}
