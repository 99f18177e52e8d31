/**
 * FeatureMetadataIndex — immutable per-feature attribute table with a query
 * evaluator.
 *
 * Field types (numeric vs text) are decided once at build time and stored in
 * a registry; queries are compiled against that registry, so a query that
 * compiles is guaranteed to evaluate without type surprises.
 */

import { MetadataFieldConflictError, QueryFieldError, QuerySyntaxError, SnapshotValidationError } from "@/lib/errors";
import { normalizeMetadataValue, toNumeric, toText } from "@/lib/metadata-values";
import { parseQuery } from "@/lib/query-parser";
import type { ComparisonOp, QueryExpression } from "@/lib/query-parser";
import type { MetadataRow, MetadataValue } from "@/types/dataset";

// ─── Types ─────────────────────────────────────────────────

export type FieldType = "numeric" | "text";

export interface FieldInfo {
  name: string;
  type: FieldType;
}

export interface FeatureRow {
  id: string;
  metadata: MetadataRow;
}

type NumericColumn = { type: "numeric"; values: (number | null)[] };
type TextColumn = { type: "text"; values: (string | null)[]; lowered: (string | null)[] };
type Column = NumericColumn | TextColumn;

/** Row-index predicate produced by compiling a query. */
type CompiledQuery = (row: number) => boolean;

export const DEFAULT_QUERY_CACHE_LIMIT = 64;

// ─── Field typing ──────────────────────────────────────────

function inferFieldType(values: MetadataValue[]): FieldType {
  let seen = 0;
  for (const v of values) {
    if (v === null) continue;
    if (toNumeric(v) === null) return "text";
    seen++;
  }
  return seen > 0 ? "numeric" : "text";
}

function buildColumn(values: MetadataValue[]): Column {
  if (inferFieldType(values) === "numeric") {
    return { type: "numeric", values: values.map(toNumeric) };
  }
  const text = values.map(toText);
  return { type: "text", values: text, lowered: text.map((t) => (t === null ? null : t.toLowerCase())) };
}

// ─── Index ─────────────────────────────────────────────────

export class FeatureMetadataIndex {
  /** Feature ids in code-unit order; row i of every column belongs to ids[i]. */
  readonly ids: readonly string[];
  private readonly rowOf: Map<string, number>;
  private readonly columns: Map<string, Column>;
  /** lower-cased field name → canonical field name */
  private readonly fieldLookup: Map<string, string>;
  private readonly cache = new Map<string, CompiledQuery>();

  private constructor(
    ids: string[],
    columns: Map<string, Column>,
    private readonly cacheLimit: number,
  ) {
    this.ids = ids;
    this.rowOf = new Map(ids.map((id, i) => [id, i] as const));
    this.columns = columns;
    this.fieldLookup = new Map([...columns.keys()].map((name) => [name.toLowerCase(), name] as const));
  }

  static build(rows: readonly FeatureRow[], cacheLimit = DEFAULT_QUERY_CACHE_LIMIT): FeatureMetadataIndex {
    const seen = new Set<string>();
    const duplicates = new Set<string>();
    for (const row of rows) {
      if (seen.has(row.id)) duplicates.add(row.id);
      seen.add(row.id);
    }
    if (duplicates.size > 0) {
      throw new SnapshotValidationError([...duplicates].map((id) => `duplicate feature metadata row "${id}"`));
    }

    const sorted = [...rows].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));

    // Union of field names, in first-seen order over the sorted rows.
    const fieldNames: string[] = [];
    const byLower = new Map<string, string[]>();
    for (const row of sorted) {
      for (const field of Object.keys(row.metadata)) {
        if (fieldNames.includes(field)) continue;
        fieldNames.push(field);
        const key = field.toLowerCase();
        const group = byLower.get(key) ?? [];
        group.push(field);
        byLower.set(key, group);
      }
    }
    for (const group of byLower.values()) {
      if (group.length > 1) throw new MetadataFieldConflictError(group);
    }

    const columns = new Map<string, Column>();
    for (const field of fieldNames) {
      columns.set(field, buildColumn(sorted.map((row) => normalizeMetadataValue(row.metadata[field]))));
    }

    return new FeatureMetadataIndex(sorted.map((r) => r.id), columns, cacheLimit);
  }

  /** Query strings currently compiled, least recently used first. */
  cachedQueries(): string[] {
    return [...this.cache.keys()];
  }

  has(featureId: string): boolean {
    return this.rowOf.has(featureId);
  }

  fields(): FieldInfo[] {
    return [...this.columns].map(([name, column]) => ({ name, type: column.type }));
  }

  /** Case-insensitive field lookup. */
  resolveField(name: string): FieldInfo | null {
    const canonical = this.fieldLookup.get(name.toLowerCase());
    if (canonical === undefined) return null;
    const column = this.columns.get(canonical);
    return column ? { name: canonical, type: column.type } : null;
  }

  /** Values of a numeric field keyed by feature id; null for a text field. Throws for unknown fields. */
  numericValues(field: string): Map<string, number | null> | null {
    const info = this.resolveField(field);
    const column = info ? this.columns.get(info.name) : undefined;
    if (!column) throw new QueryFieldError(field);
    if (column.type !== "numeric") return null;
    return new Map(this.ids.map((id, i) => [id, column.values[i]] as const));
  }

  /**
   * Evaluate a query to the set of matching feature ids.
   * Throws QuerySyntaxError or QueryFieldError; never returns a partial result.
   */
  evaluate(queryText: string): ReadonlySet<string> {
    const predicate = this.compile(queryText);
    const matches = new Set<string>();
    for (let i = 0; i < this.ids.length; i++) {
      if (predicate(i)) matches.add(this.ids[i]);
    }
    return matches;
  }

  /** Compile (or fetch from the LRU cache) the predicate for an exact query string. */
  private compile(queryText: string): CompiledQuery {
    const cached = this.cache.get(queryText);
    if (cached) {
      this.cache.delete(queryText);
      this.cache.set(queryText, cached);
      return cached;
    }

    const compiled = this.bind(parseQuery(queryText));
    this.cache.set(queryText, compiled);
    if (this.cache.size > this.cacheLimit) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) this.cache.delete(oldest.value);
    }
    return compiled;
  }

  private bind(expr: QueryExpression): CompiledQuery {
    switch (expr.type) {
      case "or": {
        const operands = expr.operands.map((e) => this.bind(e));
        return (row) => operands.some((p) => p(row));
      }
      case "and": {
        const operands = expr.operands.map((e) => this.bind(e));
        return (row) => operands.every((p) => p(row));
      }
      case "not": {
        const operand = this.bind(expr.operand);
        return (row) => !operand(row);
      }
      case "comparison": {
        const info = this.resolveField(expr.field.name);
        const column = info ? this.columns.get(info.name) : undefined;
        if (!info || !column) throw new QueryFieldError(expr.field.name, expr.field.position);
        return column.type === "numeric"
          ? bindNumeric(column, info.name, expr.op, expr.opPosition, expr.value)
          : bindText(column, info.name, expr.op, expr.opPosition, expr.value.text);
      }
    }
  }
}

// ─── Atom binding ──────────────────────────────────────────

function bindNumeric(
  column: NumericColumn,
  field: string,
  op: ComparisonOp,
  opPosition: number,
  value: { text: string; position: number },
): CompiledQuery {
  if (op === "contains") {
    throw new QuerySyntaxError(`Operator "contains" does not apply to numeric field "${field}"`, op, opPosition);
  }
  const target = toNumeric(value.text.trim());
  if (target === null) {
    throw new QuerySyntaxError(`Expected a number for numeric field "${field}"`, value.text, value.position);
  }
  const values = column.values;
  const test = NUMERIC_TESTS[op];
  return (row) => {
    const v = values[row];
    return v !== null && test(v, target);
  };
}

const NUMERIC_TESTS: Record<Exclude<ComparisonOp, "contains">, (a: number, b: number) => boolean> = {
  "==": (a, b) => a === b,
  "!=": (a, b) => a !== b,
  "<": (a, b) => a < b,
  "<=": (a, b) => a <= b,
  ">": (a, b) => a > b,
  ">=": (a, b) => a >= b,
};

function bindText(column: TextColumn, field: string, op: ComparisonOp, opPosition: number, target: string): CompiledQuery {
  const values = column.values;
  switch (op) {
    case "==":
      return (row) => values[row] !== null && values[row] === target;
    case "!=":
      return (row) => values[row] !== null && values[row] !== target;
    case "contains": {
      const needle = target.toLowerCase();
      const lowered = column.lowered;
      return (row) => {
        const v = lowered[row];
        return v !== null && v.includes(needle);
      };
    }
    default:
      throw new QuerySyntaxError(`Operator "${op}" does not apply to text field "${field}"`, op, opPosition);
  }
}
