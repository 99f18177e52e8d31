/**
 * Rank display projection: features ordered by an external rank value,
 * tagged with their membership in the current numerator/denominator groups.
 */

import { QueryFieldError, RankFieldTypeError } from "@/lib/errors";
import type { FeatureMetadataIndex } from "@/lib/feature-metadata-index";
import type { OutputPacket } from "@/lib/link-controller";

export type SlotMembership = "numerator" | "denominator" | "both" | "none";

export interface RankRow {
  featureId: string;
  rank: number | null;
  /** 0-based position along the rank axis. */
  position: number;
  membership: SlotMembership;
}

export function slotMembership(
  featureId: string,
  numerator: ReadonlySet<string>,
  denominator: ReadonlySet<string>,
): SlotMembership {
  const inNum = numerator.has(featureId);
  const inDen = denominator.has(featureId);
  if (inNum && inDen) return "both";
  if (inNum) return "numerator";
  if (inDen) return "denominator";
  return "none";
}

/**
 * Ascending by rank; features with a missing rank go last. Ties (and the
 * missing-rank tail) are ordered by feature id so the axis is stable.
 */
export function buildRankRows(
  featureIndex: FeatureMetadataIndex,
  rankField: string,
  packet: OutputPacket | null,
): RankRow[] {
  const info = featureIndex.resolveField(rankField);
  if (!info) throw new QueryFieldError(rankField);
  const ranks = featureIndex.numericValues(info.name);
  if (!ranks) throw new RankFieldTypeError(info.name);

  const numerator = new Set(packet?.numeratorFeatureIds ?? []);
  const denominator = new Set(packet?.denominatorFeatureIds ?? []);

  const ordered = [...ranks.entries()].sort(([idA, a], [idB, b]) => {
    if (a === null && b === null) return idA < idB ? -1 : idA > idB ? 1 : 0;
    if (a === null) return 1;
    if (b === null) return -1;
    if (a !== b) return a - b;
    return idA < idB ? -1 : idA > idB ? 1 : 0;
  });

  return ordered.map(([featureId, rank], position) => ({
    featureId,
    rank,
    position,
    membership: slotMembership(featureId, numerator, denominator),
  }));
}
