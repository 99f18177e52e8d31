/**
 * Log-ratio engine — pure, stateless.
 *
 *   value(sample) = ln(Σ numerator counts) − ln(Σ denominator counts)
 *
 * A sample whose numerator or denominator sum is zero has no defined
 * log-ratio; it is marked EXCLUDED and reported with a SampleExclusionNotice.
 */

import { GroupEmptyError } from "@/lib/errors";
import type { FeatureTable } from "@/lib/feature-table";

// ─── Types ─────────────────────────────────────────────────

export const EXCLUDED = "excluded" as const;
export type Excluded = typeof EXCLUDED;

export type LogRatioValue = number | Excluded;

export type ExclusionReason = "numerator-zero" | "denominator-zero" | "both-zero";

/** Informational, not an error: the sample is dropped from rendering. */
export interface SampleExclusionNotice {
  sampleId: string;
  reason: ExclusionReason;
}

export interface LogRatioResult {
  /** Keyed by sample id, in the table's sample order. */
  values: ReadonlyMap<string, LogRatioValue>;
  excludedSampleCount: number;
  exclusions: readonly SampleExclusionNotice[];
}

export function isExcluded(value: LogRatioValue | undefined): value is Excluded {
  return value === EXCLUDED;
}

// ─── Computation ───────────────────────────────────────────

/** Per-sample sums over a deduplicated feature group (nonzero samples only). */
export function sumGroup(featureIds: ReadonlySet<string>, table: FeatureTable): Map<string, number> {
  const sums = new Map<string, number>();
  for (const featureId of featureIds) {
    for (const [sampleId, count] of table.entries(featureId)) {
      sums.set(sampleId, (sums.get(sampleId) ?? 0) + count);
    }
  }
  return sums;
}

function exclusionReason(numeratorSum: number, denominatorSum: number): ExclusionReason | null {
  if (numeratorSum === 0 && denominatorSum === 0) return "both-zero";
  if (numeratorSum === 0) return "numerator-zero";
  if (denominatorSum === 0) return "denominator-zero";
  return null;
}

export function computeLogRatios(
  numeratorIds: Iterable<string>,
  denominatorIds: Iterable<string>,
  table: FeatureTable,
): LogRatioResult {
  const numerator = new Set(numeratorIds);
  const denominator = new Set(denominatorIds);
  if (numerator.size === 0) throw new GroupEmptyError("numerator");
  if (denominator.size === 0) throw new GroupEmptyError("denominator");

  const numeratorSums = sumGroup(numerator, table);
  const denominatorSums = sumGroup(denominator, table);

  const values = new Map<string, LogRatioValue>();
  const exclusions: SampleExclusionNotice[] = [];

  for (const sampleId of table.sampleIds) {
    const num = numeratorSums.get(sampleId) ?? 0;
    const den = denominatorSums.get(sampleId) ?? 0;
    const reason = exclusionReason(num, den);
    if (reason) {
      values.set(sampleId, EXCLUDED);
      exclusions.push({ sampleId, reason });
    } else {
      values.set(sampleId, Math.log(num) - Math.log(den));
    }
  }

  return { values, excludedSampleCount: exclusions.length, exclusions };
}

/** Plain-object form of the per-sample values, for packets and worker messages. */
export function logRatiosToRecord(values: ReadonlyMap<string, LogRatioValue>): Record<string, LogRatioValue> {
  return Object.fromEntries(values);
}

export function logRatiosFromRecord(
  record: Record<string, LogRatioValue>,
  sampleOrder: readonly string[],
): Map<string, LogRatioValue> {
  const values = new Map<string, LogRatioValue>();
  for (const sampleId of sampleOrder) {
    const value = record[sampleId];
    if (value !== undefined) values.set(sampleId, value);
  }
  return values;
}
