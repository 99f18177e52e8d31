/**
 * FeatureTable — immutable sparse feature × sample count matrix.
 *
 * Stored feature-major (feature → sample → count) so that summing a group of
 * features touches only that group's nonzero entries.
 */

import { SnapshotValidationError } from "@/lib/errors";
import type { CountEntry } from "@/types/dataset";

export interface FeatureTableInput {
  featureIds: readonly string[];
  sampleIds: readonly string[];
  counts: readonly CountEntry[];
}

export class FeatureTable {
  readonly featureIds: readonly string[];
  readonly sampleIds: readonly string[];
  private readonly featureSet: ReadonlySet<string>;
  private readonly byFeature: Map<string, Map<string, number>>;
  private readonly nonzero: number;

  private constructor(featureIds: string[], sampleIds: string[], byFeature: Map<string, Map<string, number>>, nonzero: number) {
    this.featureIds = featureIds;
    this.sampleIds = sampleIds;
    this.featureSet = new Set(featureIds);
    this.byFeature = byFeature;
    this.nonzero = nonzero;
  }

  /** Build from sparse triplets. Zero counts are dropped; every problem found is reported together. */
  static fromEntries(input: FeatureTableInput): FeatureTable {
    const problems: string[] = [];
    const features = new Set<string>();
    const samples = new Set<string>();

    for (const id of input.featureIds) {
      if (features.has(id)) problems.push(`duplicate feature id "${id}"`);
      features.add(id);
    }
    for (const id of input.sampleIds) {
      if (samples.has(id)) problems.push(`duplicate sample id "${id}"`);
      samples.add(id);
    }
    if (features.size === 0) problems.push("table has no features");
    if (samples.size === 0) problems.push("table has no samples");

    const byFeature = new Map<string, Map<string, number>>();
    const seenPairs = new Set<string>();
    let nonzero = 0;

    for (const [featureId, sampleId, count] of input.counts) {
      if (!features.has(featureId)) {
        problems.push(`count for unknown feature "${featureId}"`);
        continue;
      }
      if (!samples.has(sampleId)) {
        problems.push(`count for unknown sample "${sampleId}"`);
        continue;
      }
      if (typeof count !== "number" || !Number.isFinite(count) || count < 0) {
        problems.push(`invalid count ${String(count)} for ("${featureId}", "${sampleId}")`);
        continue;
      }
      const pairKey = JSON.stringify([featureId, sampleId]);
      if (seenPairs.has(pairKey)) {
        problems.push(`repeated count for ("${featureId}", "${sampleId}")`);
        continue;
      }
      seenPairs.add(pairKey);
      if (count === 0) continue;

      let row = byFeature.get(featureId);
      if (!row) {
        row = new Map();
        byFeature.set(featureId, row);
      }
      row.set(sampleId, count);
      nonzero++;
    }

    if (problems.length > 0) throw new SnapshotValidationError(problems);
    return new FeatureTable([...input.featureIds], [...input.sampleIds], byFeature, nonzero);
  }

  get featureCount(): number {
    return this.featureIds.length;
  }

  get sampleCount(): number {
    return this.sampleIds.length;
  }

  /** Stored nonzero entries. */
  get nonzeroCount(): number {
    return this.nonzero;
  }

  hasFeature(featureId: string): boolean {
    return this.featureSet.has(featureId);
  }

  /** Nonzero (sample, count) entries of one feature; empty for unknown or all-zero features. */
  entries(featureId: string): ReadonlyMap<string, number> {
    return this.byFeature.get(featureId) ?? EMPTY_ROW;
  }

  toEntries(): CountEntry[] {
    const out: CountEntry[] = [];
    for (const [featureId, row] of this.byFeature) {
      for (const [sampleId, count] of row) out.push([featureId, sampleId, count]);
    }
    return out;
  }
}

const EMPTY_ROW: ReadonlyMap<string, number> = new Map();
