import { isExcluded } from "@/lib/log-ratio-engine";
import type { OutputPacket } from "@/lib/link-controller";
import type { MetadataValue, Sample } from "@/types/dataset";

export interface SamplePoint {
  sampleId: string;
  logRatio: number;
  category: MetadataValue;
}

/**
 * Points for the sample log-ratio plot, in dataset sample order. Excluded
 * samples are dropped (the packet's excludedSampleCount already reports them).
 */
export function buildSamplePoints(
  packet: OutputPacket | null,
  samples: ReadonlyMap<string, Sample>,
  categoryField: string | null,
): SamplePoint[] {
  if (!packet?.perSampleLogRatio) return [];

  const ratios = packet.perSampleLogRatio;
  const points: SamplePoint[] = [];
  for (const [sampleId, sample] of samples) {
    const value = ratios[sampleId];
    if (value === undefined || isExcluded(value)) continue;
    const category = categoryField ? sample.metadata[categoryField] ?? null : null;
    points.push({ sampleId, logRatio: value, category });
  }
  return points;
}
