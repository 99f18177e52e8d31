import { DatasetFetchError } from "@/lib/errors";

const API_BASE = "/api";

async function fetchJson<T>(path: string): Promise<T> {
  const res = await fetch(`${API_BASE}${path}`);
  if (!res.ok) {
    throw new DatasetFetchError(res.status, res.statusText);
  }
  return res.json();
}

/** Decoded JSON body, unchecked; `buildDataset` validates its shape. */
export function fetchDatasetSnapshot(datasetId: string): Promise<unknown> {
  return fetchJson(`/datasets/${encodeURIComponent(datasetId)}/snapshot`);
}
