/**
 * Dataset construction — validates a DatasetSnapshot and builds the
 * immutable core objects (FeatureTable, FeatureMetadataIndex, samples) once.
 */

import { SnapshotValidationError } from "@/lib/errors";
import { FeatureMetadataIndex } from "@/lib/feature-metadata-index";
import { FeatureTable } from "@/lib/feature-table";
import { DEFAULT_LINK_CONFIG } from "@/lib/link-config";
import type { LinkConfig } from "@/lib/link-config";
import { normalizeMetadataRow } from "@/lib/metadata-values";
import { createLogger } from "@/lib/logger";
import type { CountEntry, DatasetSnapshot, MetadataRow, MetadataValue, Sample } from "@/types/dataset";

const log = createLogger("dataset");

export interface Dataset {
  table: FeatureTable;
  featureIndex: FeatureMetadataIndex;
  /** Keyed by sample id, in table sample order. */
  samples: ReadonlyMap<string, Sample>;
  /** Numeric metadata fields holding externally computed ranks. */
  rankFields: readonly string[];
}

// ─── Snapshot shape ────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isMetadataValue(value: unknown): value is MetadataValue {
  return value === null || typeof value === "string" || typeof value === "number";
}

function stringList(value: unknown, name: string, problems: string[]): string[] {
  if (!Array.isArray(value)) {
    problems.push(`${name} must be an array`);
    return [];
  }
  const out: string[] = [];
  value.forEach((item: unknown, i: number) => {
    if (typeof item === "string") out.push(item);
    else problems.push(`${name}[${i}] is not a string`);
  });
  return out;
}

function countList(value: unknown, problems: string[]): CountEntry[] {
  if (!Array.isArray(value)) {
    problems.push("counts must be an array");
    return [];
  }
  const out: CountEntry[] = [];
  value.forEach((item: unknown, i: number) => {
    if (Array.isArray(item) && item.length === 3) {
      const [featureId, sampleId, count]: unknown[] = item;
      if (typeof featureId === "string" && typeof sampleId === "string" && typeof count === "number") {
        out.push([featureId, sampleId, count]);
        return;
      }
    }
    problems.push(`counts[${i}] is not a [feature_id, sample_id, count] triplet`);
  });
  return out;
}

function metadataTable(value: unknown, name: string, problems: string[]): Record<string, MetadataRow> {
  if (!isRecord(value)) {
    problems.push(`${name} must be an object keyed by id`);
    return {};
  }
  const rows: [string, MetadataRow][] = [];
  for (const [id, row] of Object.entries(value)) {
    if (!isRecord(row)) {
      problems.push(`${name} row "${id}" is not an object`);
      continue;
    }
    const fields: [string, MetadataValue][] = [];
    for (const [field, fieldValue] of Object.entries(row)) {
      if (isMetadataValue(fieldValue)) fields.push([field, fieldValue]);
      else problems.push(`${name} row "${id}" field "${field}" is not a string, number or null`);
    }
    rows.push([id, Object.fromEntries(fields)]);
  }
  return Object.fromEntries(rows);
}

/**
 * Checks the shape of a decoded snapshot (arrays, rows, count triplets,
 * metadata value types) before anything reads it. Every problem found is
 * reported in one SnapshotValidationError.
 */
export function parseSnapshot(raw: unknown): DatasetSnapshot {
  if (!isRecord(raw)) throw new SnapshotValidationError(["snapshot must be a JSON object"]);

  const problems: string[] = [];
  const snapshot: DatasetSnapshot = {
    feature_ids: stringList(raw.feature_ids, "feature_ids", problems),
    sample_ids: stringList(raw.sample_ids, "sample_ids", problems),
    counts: countList(raw.counts, problems),
    feature_metadata: metadataTable(raw.feature_metadata, "feature_metadata", problems),
  };
  // Optional parts may be absent or null.
  if (raw.sample_metadata !== undefined && raw.sample_metadata !== null) {
    snapshot.sample_metadata = metadataTable(raw.sample_metadata, "sample_metadata", problems);
  }
  if (raw.rank_fields !== undefined && raw.rank_fields !== null) {
    snapshot.rank_fields = stringList(raw.rank_fields, "rank_fields", problems);
  }

  if (problems.length > 0) throw new SnapshotValidationError(problems);
  return snapshot;
}

// ─── Build ─────────────────────────────────────────────────

/** Cross-reference problems between the snapshot's parts (table-level problems are reported by FeatureTable). */
function crossReferenceProblems(snapshot: DatasetSnapshot): string[] {
  const problems: string[] = [];
  const features = new Set(snapshot.feature_ids);
  const samples = new Set(snapshot.sample_ids);

  for (const id of Object.keys(snapshot.feature_metadata)) {
    if (!features.has(id)) problems.push(`feature metadata for unknown feature "${id}"`);
  }
  for (const id of features) {
    if (!Object.hasOwn(snapshot.feature_metadata, id)) problems.push(`feature "${id}" has no metadata row`);
  }
  for (const id of Object.keys(snapshot.sample_metadata ?? {})) {
    if (!samples.has(id)) problems.push(`sample metadata for unknown sample "${id}"`);
  }
  return problems;
}

/** Build from a decoded snapshot; its shape is checked by `parseSnapshot` first. */
export function buildDataset(input: unknown, config: LinkConfig = DEFAULT_LINK_CONFIG): Dataset {
  const snapshot = parseSnapshot(input);
  const problems = crossReferenceProblems(snapshot);

  let table: FeatureTable | null = null;
  try {
    table = FeatureTable.fromEntries({
      featureIds: snapshot.feature_ids,
      sampleIds: snapshot.sample_ids,
      counts: snapshot.counts,
    });
  } catch (err) {
    if (!(err instanceof SnapshotValidationError)) throw err;
    problems.unshift(...err.problems);
  }
  if (problems.length > 0 || !table) throw new SnapshotValidationError(problems);

  const featureIndex = FeatureMetadataIndex.build(
    snapshot.feature_ids.map((id) => ({ id, metadata: snapshot.feature_metadata[id] })),
    config.queryCacheLimit,
  );

  const rankFields = snapshot.rank_fields ?? [];
  const rankProblems: string[] = [];
  for (const field of rankFields) {
    const info = featureIndex.resolveField(field);
    if (!info) rankProblems.push(`rank field "${field}" is not a feature metadata field`);
    else if (info.type !== "numeric") rankProblems.push(`rank field "${field}" is not numeric`);
  }
  if (rankProblems.length > 0) throw new SnapshotValidationError(rankProblems);

  const sampleMetadata = snapshot.sample_metadata ?? {};
  const samples = new Map<string, Sample>();
  let withoutMetadata = 0;
  for (const id of table.sampleIds) {
    const row = sampleMetadata[id];
    if (!row) withoutMetadata++;
    samples.set(id, { id, metadata: row ? normalizeMetadataRow(row) : {} });
  }
  if (withoutMetadata > 0) {
    log.warn(`${withoutMetadata} of ${table.sampleCount} samples have no sample metadata`);
  }

  log.info(
    `dataset loaded: ${table.featureCount} features × ${table.sampleCount} samples, ` +
      `${table.nonzeroCount} nonzero counts, ${featureIndex.fields().length} metadata fields`,
  );

  return { table, featureIndex, samples, rankFields };
}

/**
 * Rank field the rank display should use: the configured one (by its canonical
 * name) when it is a numeric feature metadata field, else the first snapshot
 * rank field.
 */
export function defaultRankField(dataset: Dataset, config: LinkConfig = DEFAULT_LINK_CONFIG): string | null {
  const fallback = dataset.rankFields[0] ?? null;
  if (config.rankField === null) return fallback;

  const info = dataset.featureIndex.resolveField(config.rankField);
  if (info?.type === "numeric") return info.name;
  log.warn(
    `configured rank field "${config.rankField}" is ${info ? "not numeric" : "not a feature metadata field"}; ` +
      `using ${fallback === null ? "no rank field" : `"${fallback}"`}`,
  );
  return fallback;
}
