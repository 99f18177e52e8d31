/**
 * Message protocol between LogRatioWorkerClient and a log-ratio worker.
 *
 *   init    → ready | error(generation: null)
 *   compute → result | error(generation)
 *
 * The worker holds one FeatureTable (sent once with `init`); compute requests
 * carry only feature ids.
 */

import { toErrorDetail, GroupEmptyError } from "@/lib/errors";
import type { ErrorDetail, SlotName } from "@/lib/errors";
import { FeatureTable } from "@/lib/feature-table";
import { computeLogRatios, logRatiosFromRecord, logRatiosToRecord } from "@/lib/log-ratio-engine";
import type { LogRatioResult, LogRatioValue, SampleExclusionNotice } from "@/lib/log-ratio-engine";
import type { CountEntry } from "@/types/dataset";

export type LogRatioInitRequest = {
  type: "init";
  featureIds: string[];
  sampleIds: string[];
  counts: CountEntry[];
};

export type LogRatioComputeRequest = {
  type: "compute";
  generation: number;
  numeratorIds: string[];
  denominatorIds: string[];
};

export type LogRatioRequest = LogRatioInitRequest | LogRatioComputeRequest;

export type LogRatioReadyMessage = { type: "ready"; sampleCount: number };

export type LogRatioResultMessage = {
  type: "result";
  generation: number;
  values: Record<string, LogRatioValue>;
  exclusions: SampleExclusionNotice[];
};

export type LogRatioErrorMessage = {
  type: "error";
  /** null when the failure belongs to `init` */
  generation: number | null;
  kind: ErrorDetail["kind"];
  message: string;
  slot?: SlotName;
};

export type LogRatioMessage = LogRatioReadyMessage | LogRatioResultMessage | LogRatioErrorMessage;

export function initRequestFor(table: FeatureTable): LogRatioInitRequest {
  return {
    type: "init",
    featureIds: [...table.featureIds],
    sampleIds: [...table.sampleIds],
    counts: table.toEntries(),
  };
}

function errorMessage(generation: number | null, err: unknown): LogRatioErrorMessage {
  const detail = toErrorDetail(err);
  const msg: LogRatioErrorMessage = { type: "error", generation, kind: detail.kind, message: detail.message };
  if (err instanceof GroupEmptyError) msg.slot = err.slot;
  return msg;
}

/**
 * Worker-side request handler. The worker entry point only has to forward
 * each incoming message through this function and post back the response.
 */
export function createLogRatioMessageHandler(): (request: LogRatioRequest) => LogRatioMessage {
  let table: FeatureTable | null = null;

  return (request) => {
    if (request.type === "init") {
      try {
        table = FeatureTable.fromEntries(request);
        return { type: "ready", sampleCount: table.sampleCount };
      } catch (err) {
        return errorMessage(null, err);
      }
    }

    if (!table) {
      return {
        type: "error",
        generation: request.generation,
        kind: "WorkerError",
        message: "Log-ratio worker received a compute request before init",
      };
    }
    try {
      const result = computeLogRatios(request.numeratorIds, request.denominatorIds, table);
      return {
        type: "result",
        generation: request.generation,
        values: logRatiosToRecord(result.values),
        exclusions: [...result.exclusions],
      };
    } catch (err) {
      return errorMessage(request.generation, err);
    }
  };
}

export function resultFromMessage(msg: LogRatioResultMessage, sampleOrder: readonly string[]): LogRatioResult {
  return {
    values: logRatiosFromRecord(msg.values, sampleOrder),
    excludedSampleCount: msg.exclusions.length,
    exclusions: msg.exclusions,
  };
}
