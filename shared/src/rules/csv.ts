import { parse } from "csv-parse/sync";
import { SchemaViolationError } from "./errors";

export type CsvRow = Record<string, string>;

const isCsvRow = (value: unknown): value is CsvRow =>
  !!value &&
  typeof value === "object" &&
  !Array.isArray(value) &&
  Object.values(value).every((cell) => typeof cell === "string");

/** Header-keyed rows of a CSV document, blank lines skipped and cells trimmed. */
export function parseCsvRows(csvText: string, section: string, delimiter = ","): CsvRow[] {
  let records: unknown;
  try {
    records = parse(csvText, {
      columns: true,
      delimiter,
      skip_empty_lines: true,
      trim: true
    });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SchemaViolationError(section, `Malformed CSV in ${section}: ${reason}`);
  }
  if (!Array.isArray(records)) return [];
  return records.filter(isCsvRow);
}

/** Names that cannot key a plain-object map. */
export const isReservedName = (name: string): boolean => name === "__proto__";

export function toInteger(value: string | undefined): number | null {
  if (value === undefined) return null;
  const cleaned = value.trim();
  if (!cleaned) return null;
  const n = Number(cleaned);
  return Number.isInteger(n) ? n : null;
}

export function parseBoolean(value: string | undefined): boolean {
  if (!value) return false;
  return ["yes", "true", "y", "1"].includes(value.trim().toLowerCase());
}
