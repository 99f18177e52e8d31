import { computeLogRatios } from "@/lib/log-ratio-engine";
import type { LogRatioResult } from "@/lib/log-ratio-engine";
import type { FeatureTable } from "@/lib/feature-table";

export interface ComputeRequest {
  /** Selection generation the computation belongs to. */
  generation: number;
  numeratorIds: readonly string[];
  denominatorIds: readonly string[];
}

/**
 * Where log-ratio computations run. The controller never awaits one runner
 * call before accepting the next event, so results may settle out of order.
 */
export type ComputeRunner = (request: ComputeRequest) => Promise<LogRatioResult>;

/** Runs the engine on the current thread, deferred to a microtask. */
export function createInlineRunner(table: FeatureTable): ComputeRunner {
  return async (request) => {
    await Promise.resolve();
    return computeLogRatios(request.numeratorIds, request.denominatorIds, table);
  };
}
