// Wire shapes produced by the analysis backend (snake_case, as serialized).

export type MetadataValue = number | string | null;

export type MetadataRow = Record<string, MetadataValue>;

/** Sparse count triplet: [feature_id, sample_id, count]. */
export type CountEntry = [string, string, number];

export interface DatasetSnapshot {
  feature_ids: string[];
  sample_ids: string[];
  counts: CountEntry[];
  feature_metadata: Record<string, MetadataRow>;
  sample_metadata?: Record<string, MetadataRow>;
  /** Numeric feature metadata columns holding differentials / loadings. */
  rank_fields?: string[];
}

export interface Sample {
  id: string;
  metadata: MetadataRow;
}
