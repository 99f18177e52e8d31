import { useMemo } from "react";
import { useRatioLink } from "@/contexts/RatioLinkContext";
import { defaultRankField } from "@/lib/dataset";
import { buildRankRows } from "@/lib/rank-display";
import type { RankRow } from "@/lib/rank-display";
import { buildSamplePoints } from "@/lib/sample-points";
import type { SamplePoint } from "@/lib/sample-points";

export interface LinkedViews {
  rankField: string | null;
  rankRows: RankRow[];
  samplePoints: SamplePoint[];
  excludedSampleCount: number;
}

/** Rendering-ready rows for the rank display and the sample plot, derived from the latest packet. */
export function useLinkedViews(): LinkedViews {
  const { dataset, config, snapshot } = useRatioLink();
  const packet = snapshot?.lastPacket ?? null;

  const rankField = useMemo(() => (dataset ? defaultRankField(dataset, config) : null), [dataset, config]);

  return useMemo(() => {
    if (!dataset) return { rankField: null, rankRows: [], samplePoints: [], excludedSampleCount: 0 };
    return {
      rankField,
      rankRows: rankField ? buildRankRows(dataset.featureIndex, rankField, packet) : [],
      samplePoints: buildSamplePoints(packet, dataset.samples, config.categoryField),
      excludedSampleCount: packet?.excludedSampleCount ?? 0,
    };
  }, [dataset, config, rankField, packet]);
}
