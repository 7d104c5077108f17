import { formatDateTime } from "../../utils/dates";

function escapeCell(value: string): string {
  if (value.includes(",") || value.includes("\n") || value.includes("\"")) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** Dates as `YYYY-MM-DD HH:MM:SS`, null as an empty cell. */
export function toCell(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (value instanceof Date) return formatDateTime(value);
  return String(value);
}

export function toCsv<T extends object>(rows: readonly T[], columns: ReadonlyArray<keyof T & string>): string {
  const header = columns.join(",");
  const body = rows.map((row) => columns.map((column) => escapeCell(toCell(row[column]))).join(","));
  return [header, ...body].join("\n") + "\n";
}
