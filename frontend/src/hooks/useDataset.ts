import { queryOptions, useQuery } from "@tanstack/react-query";
import { fetchDatasetSnapshot } from "@/lib/dataset-api";
import { buildDataset } from "@/lib/dataset";
import { DEFAULT_LINK_CONFIG } from "@/lib/link-config";
import type { LinkConfig } from "@/lib/link-config";

export function datasetQueryOptions(datasetId: string, config: LinkConfig = DEFAULT_LINK_CONFIG) {
  return queryOptions({
    queryKey: ["dataset", datasetId, config.queryCacheLimit],
    queryFn: async () => buildDataset(await fetchDatasetSnapshot(datasetId), config),
    // Snapshots never change server-side.
    staleTime: Infinity,
  });
}

/** Fetches a dataset snapshot and builds the immutable core objects once per id. */
export function useDataset(datasetId: string | undefined, config: LinkConfig = DEFAULT_LINK_CONFIG) {
  return useQuery({
    ...datasetQueryOptions(datasetId ?? "", config),
    enabled: !!datasetId,
  });
}
