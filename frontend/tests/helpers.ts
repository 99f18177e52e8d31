import { readFileSync } from "node:fs";
import { FeatureTable } from "@/lib/feature-table";
import type { ComputeRequest, ComputeRunner } from "@/lib/compute-runner";
import type { LogRatioResult } from "@/lib/log-ratio-engine";
import type { CountEntry, DatasetSnapshot } from "@/types/dataset";

/** Fresh copy of a JSON fixture from tests/fixtures. */
export function loadSnapshot(name = "small-dataset.json"): DatasetSnapshot {
  return JSON.parse(readFileSync(new URL(`./fixtures/${name}`, import.meta.url), "utf-8"));
}

/** Table whose feature/sample ids are taken from the entries, in first-seen order. */
export function tableOf(counts: CountEntry[], extraSamples: string[] = []): FeatureTable {
  const featureIds = [...new Set(counts.map(([f]) => f))];
  const sampleIds = [...new Set([...counts.map(([, s]) => s), ...extraSamples])];
  return FeatureTable.fromEntries({ featureIds, sampleIds, counts });
}

/** Return whatever `fn` throws; fail the test if it does not throw. */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected function to throw");
}

interface PendingRun {
  request: ComputeRequest;
  resolve: (result: LogRatioResult) => void;
  reject: (err: unknown) => void;
}

/**
 * Runner whose computations settle only when the test says so, letting tests
 * complete them in any order.
 */
export function deferredRunner(): { runner: ComputeRunner; runs: PendingRun[] } {
  const runs: PendingRun[] = [];
  const runner: ComputeRunner = (request) =>
    new Promise<LogRatioResult>((resolve, reject) => {
      runs.push({ request, resolve, reject });
    });
  return { runner, runs };
}
