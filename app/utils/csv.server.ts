import Papa from "papaparse";
import { z } from "zod";

import type { MeasuredValue, YearValues } from "~/types/datasets";

export type CsvRow = Record<string, string | undefined>;

export interface CsvTable {
  columns: string[];
  rows: CsvRow[];
}

export class DatasetFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DatasetFormatError";
  }
}

const numericCell = z
  .string()
  .trim()
  .min(1, "is empty")
  .transform((value) => Number(value))
  .refine((value) => Number.isFinite(value), "is not a number");

const measuredCell = z
  .string()
  .trim()
  .min(1, "is empty")
  .transform((raw): MeasuredValue => {
    const isPercent = raw.endsWith("%");
    const digits = isPercent ? raw.slice(0, -1).trim() : raw;
    return { value: digits ? Number(digits) : Number.NaN, unit: isPercent ? "percent" : "number" };
  })
  .refine((measured) => Number.isFinite(measured.value), "is not a number");

export function parseCsv(text: string): CsvTable {
  const parsed = Papa.parse<CsvRow>(text, {
    header: true,
    skipEmptyLines: "greedy",
    transformHeader: (header) => header.trim()
  });

  const [firstError] = parsed.errors;
  if (firstError) {
    const where = firstError.row === undefined ? "" : ` (row ${firstError.row + 1})`;
    throw new DatasetFormatError(`${firstError.message}${where}`);
  }

  return { columns: parsed.meta.fields ?? [], rows: parsed.data };
}

function cellText(row: CsvRow, column: string) {
  return (row[column] ?? "").trim();
}

export function requireColumns(table: CsvTable, columns: string[]) {
  const missing = columns.filter((column) => !table.columns.includes(column));
  if (missing.length) {
    throw new DatasetFormatError(`Missing required column(s): ${missing.join(", ")}`);
  }
}

/** First column of `candidates` present in the table, for renamed upstream columns. */
export function pickColumn(table: CsvTable, candidates: string[]): string {
  const found = candidates.find((column) => table.columns.includes(column));
  if (!found) {
    throw new DatasetFormatError(`Missing required column: ${candidates.join(" or ")}`);
  }
  return found;
}

export function readText(row: CsvRow, column: string): string {
  return cellText(row, column);
}

export function readNumber(row: CsvRow, column: string): number {
  const result = numericCell.safeParse(cellText(row, column));
  if (!result.success) {
    const reason = result.error.issues[0]?.message ?? "is invalid";
    throw new DatasetFormatError(`Column ${column} value "${cellText(row, column)}" ${reason}`);
  }
  return result.data;
}

export function readOptionalNumber(row: CsvRow, column: string): number | null {
  return cellText(row, column) ? readNumber(row, column) : null;
}

export function readMeasured(row: CsvRow, column: string): MeasuredValue {
  return parseMeasuredValue(cellText(row, column), column);
}

/** Informational columns: a blank or unparseable cell (`inf`, `N/A`) reads as null. */
export function readLenientMeasured(row: CsvRow, column: string): MeasuredValue | null {
  const result = measuredCell.safeParse(cellText(row, column));
  return result.success ? result.data : null;
}

/** Percent columns may or may not carry the `%` suffix; both read as percentage units. */
export function readPercent(row: CsvRow, column: string): number {
  return readMeasured(row, column).value;
}

export function parseMeasuredValue(raw: string, column = "value"): MeasuredValue {
  const result = measuredCell.safeParse(raw);
  if (!result.success) {
    const reason = result.error.issues[0]?.message ?? "is invalid";
    throw new DatasetFormatError(`Column ${column} value "${raw.trim()}" ${reason}`);
  }
  return result.data;
}

function yearColumns(table: CsvTable, field: string) {
  const pattern = new RegExp(`^(\\d{4})_${field}$`);
  const columns: Array<{ year: number; column: string }> = [];
  for (const column of table.columns) {
    const match = pattern.exec(column);
    if (match) {
      columns.push({ year: Number(match[1]), column });
    }
  }
  return columns;
}

function readYearColumns<T>(
  table: CsvTable,
  row: CsvRow,
  field: string,
  read: (row: CsvRow, column: string) => T
): YearValues<T> {
  const values = new Map<number, T>();
  for (const { year, column } of yearColumns(table, field)) {
    if (cellText(row, column)) {
      values.set(year, read(row, column));
    }
  }
  return values;
}

/** Collects `{year}_{field}` cells; blank cells leave the year out. */
export function readYearNumbers(table: CsvTable, row: CsvRow, field: string): YearValues {
  return readYearColumns(table, row, field, readNumber);
}

export function readYearMeasured(table: CsvTable, row: CsvRow, field: string): YearValues<MeasuredValue> {
  return readYearColumns(table, row, field, readMeasured);
}

export function requireYearColumns(table: CsvTable, field: string) {
  if (!yearColumns(table, field).length) {
    throw new DatasetFormatError(`Missing year columns matching {year}_${field}`);
  }
}
