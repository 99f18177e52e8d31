import type { MetadataRow, MetadataValue } from "@/types/dataset";

/** Trim strings; blank strings and non-finite numbers become missing (null). */
export function normalizeMetadataValue(value: MetadataValue | undefined): MetadataValue {
  if (value === undefined || value === null) return null;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  const trimmed = value.trim();
  return trimmed === "" ? null : trimmed;
}

export function normalizeMetadataRow(row: MetadataRow): MetadataRow {
  const out: MetadataRow = {};
  for (const [field, value] of Object.entries(row)) {
    out[field] = normalizeMetadataValue(value);
  }
  return out;
}

const NUMERIC_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Numeric reading of a normalized value, or null when it is missing or not a number. */
export function toNumeric(value: MetadataValue): number | null {
  if (value === null) return null;
  if (typeof value === "number") return value;
  if (!NUMERIC_PATTERN.test(value)) return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

/** Text reading of a normalized value. Numbers keep their JS string form. */
export function toText(value: MetadataValue): string | null {
  if (value === null) return null;
  return typeof value === "number" ? String(value) : value;
}
