/**
 * LinkController — single-writer state machine between the rank display and
 * the sample log-ratio display.
 *
 * States:
 *   Idle  — at least one slot empty (initial)
 *   Ready — both slots filled, last computation applied
 *   Error — last event rejected; the previous Ready result stays on display
 *
 * Events are handled synchronously and one at a time. Log-ratio computations
 * are handed to a ComputeRunner and may settle in any order; a result is
 * applied only if its generation is still the current selection's generation
 * and newer than anything applied before (last-writer-by-generation-wins).
 */

import { GroupEmptyError, UnknownFeatureError, isRatioLinkError, toErrorDetail } from "@/lib/errors";
import type { ErrorDetail, RatioLinkError } from "@/lib/errors";
import type { FeatureMetadataIndex } from "@/lib/feature-metadata-index";
import type { ComputeRunner } from "@/lib/compute-runner";
import { logRatiosToRecord } from "@/lib/log-ratio-engine";
import type { LogRatioResult, LogRatioValue, SampleExclusionNotice } from "@/lib/log-ratio-engine";
import {
  EMPTY_SELECTION,
  applyClear,
  applyClick,
  applyQueryResult,
  isComplete,
  sortedIds,
} from "@/lib/selection-state";
import type { SelectionState, SlotName } from "@/lib/selection-state";
import { createLogger } from "@/lib/logger";

const log = createLogger("link-controller");

// ─── Types ─────────────────────────────────────────────────

export type LinkStateName = "Idle" | "Ready" | "Error";

export type LinkEvent =
  | { type: "ClickFeature"; featureId: string }
  | { type: "SubmitQuery"; text: string; slot: SlotName }
  | { type: "Clear"; slot: SlotName };

/** Immutable record handed to renderers. */
export interface OutputPacket {
  /** Selection generation at emission. */
  generation: number;
  /** Generation the log-ratios and feature ids belong to; null when there is no result. */
  resultGeneration: number | null;
  state: LinkStateName;
  /** null when there is no result to show (Idle, or Error with nothing retained). */
  perSampleLogRatio: Readonly<Record<string, LogRatioValue>> | null;
  excludedSampleCount: number;
  exclusions: readonly SampleExclusionNotice[];
  numeratorFeatureIds: readonly string[];
  denominatorFeatureIds: readonly string[];
  errorDetail?: ErrorDetail;
}

export type ComputationOutcome =
  | { status: "applied"; packet: OutputPacket }
  | { status: "superseded"; generation: number }
  | { status: "group-empty"; error: GroupEmptyError }
  | { status: "failed"; error: ErrorDetail; packet: OutputPacket };

export type DispatchResult =
  | {
      accepted: true;
      state: LinkStateName;
      generation: number;
      /** Packet emitted synchronously by this event (an Idle packet), if any. */
      packet: OutputPacket | null;
      /** Present when the event started a computation. Never rejects. */
      computation: Promise<ComputationOutcome> | null;
    }
  | { accepted: false; state: "Error"; error: RatioLinkError; packet: OutputPacket };

export interface LinkSnapshot {
  state: LinkStateName;
  selection: SelectionState;
  lastPacket: OutputPacket | null;
  /** Generations with a computation still outstanding, oldest first. */
  pendingGenerations: readonly number[];
}

export type PacketListener = (packet: OutputPacket) => void;

export interface LinkControllerOptions {
  featureIndex: FeatureMetadataIndex;
  runner: ComputeRunner;
}

interface RetainedResult {
  generation: number;
  record: Readonly<Record<string, LogRatioValue>>;
  excludedSampleCount: number;
  exclusions: readonly SampleExclusionNotice[];
  numeratorFeatureIds: readonly string[];
  denominatorFeatureIds: readonly string[];
}

// ─── Controller ────────────────────────────────────────────

export class LinkController {
  private readonly featureIndex: FeatureMetadataIndex;
  private readonly runner: ComputeRunner;

  private state: LinkStateName = "Idle";
  private selection: SelectionState = EMPTY_SELECTION;
  private retained: RetainedResult | null = null;
  private lastAppliedGeneration = 0;
  private lastPacket: OutputPacket | null = null;
  private readonly inFlight = new Map<number, Promise<ComputationOutcome>>();

  private readonly packetListeners = new Set<PacketListener>();
  private readonly changeListeners = new Set<() => void>();
  private snapshot: LinkSnapshot;

  constructor(options: LinkControllerOptions) {
    this.featureIndex = options.featureIndex;
    this.runner = options.runner;
    this.snapshot = this.buildSnapshot();
  }

  // ─── Public API ──────────────────────────────────────────

  dispatch(event: LinkEvent): DispatchResult {
    let next: SelectionState;
    try {
      next = this.reduce(event);
    } catch (err) {
      return this.reject(event, err);
    }

    if (next === this.selection) {
      return { accepted: true, state: this.state, generation: next.generation, packet: null, computation: null };
    }
    this.selection = next;
    log.debug(`${event.type} → generation ${next.generation}`);

    if (isComplete(next)) {
      const computation = this.startComputation(next);
      this.notifyChange();
      return { accepted: true, state: this.state, generation: next.generation, packet: null, computation };
    }

    const packet = this.enterIdle();
    return { accepted: true, state: "Idle", generation: next.generation, packet, computation: null };
  }

  clickFeature(featureId: string): DispatchResult {
    return this.dispatch({ type: "ClickFeature", featureId });
  }

  submitQuery(text: string, slot: SlotName): DispatchResult {
    return this.dispatch({ type: "SubmitQuery", text, slot });
  }

  clear(slot: SlotName): DispatchResult {
    return this.dispatch({ type: "Clear", slot });
  }

  getSnapshot(): LinkSnapshot {
    return this.snapshot;
  }

  /** Listen for emitted packets. Returns an unsubscribe function. */
  subscribe(listener: PacketListener): () => void {
    this.packetListeners.add(listener);
    return () => {
      this.packetListeners.delete(listener);
    };
  }

  /** Listen for any snapshot change (packets, selection, pending work). */
  watch(listener: () => void): () => void {
    this.changeListeners.add(listener);
    return () => {
      this.changeListeners.delete(listener);
    };
  }

  /** Resolves once no computation is outstanding. */
  async whenSettled(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight.values());
    }
  }

  // ─── Transitions ─────────────────────────────────────────

  /** Next selection for an event. Throws (without side effects) when the event is invalid. */
  private reduce(event: LinkEvent): SelectionState {
    switch (event.type) {
      case "ClickFeature":
        if (!this.featureIndex.has(event.featureId)) throw new UnknownFeatureError(event.featureId);
        return applyClick(this.selection, event.featureId);
      case "SubmitQuery": {
        const ids = this.featureIndex.evaluate(event.text);
        if (ids.size === 0) {
          throw new GroupEmptyError(event.slot, `Query "${event.text}" matched no features for the ${event.slot}`);
        }
        return applyQueryResult(this.selection, event.slot, event.text, ids);
      }
      case "Clear":
        return applyClear(this.selection, event.slot);
    }
  }

  private reject(event: LinkEvent, err: unknown): DispatchResult {
    if (!isRatioLinkError(err)) throw err;
    log.info(`${event.type} rejected: ${err.message}`);
    this.state = "Error";
    const packet = this.errorPacket(toErrorDetail(err));
    this.emit(packet);
    return { accepted: false, state: "Error", error: err, packet };
  }

  /** Move to Idle; emits an Idle packet when leaving Ready/Error so views drop stale marks. */
  private enterIdle(): OutputPacket | null {
    const previous = this.state;
    this.state = "Idle";
    this.retained = null;
    if (previous === "Idle") {
      this.notifyChange();
      return null;
    }
    const packet = this.packet("Idle", null);
    this.emit(packet);
    return packet;
  }

  private startComputation(selection: SelectionState): Promise<ComputationOutcome> {
    const generation = selection.generation;
    const request = {
      generation,
      numeratorIds: sortedIds(selection.numerator),
      denominatorIds: sortedIds(selection.denominator),
    };

    let outcome: Promise<ComputationOutcome>;
    try {
      outcome = this.runner(request).then(
        (result) => this.applyResult(generation, result),
        (err: unknown) => this.applyFailure(generation, err),
      );
    } catch (err) {
      outcome = Promise.resolve().then(() => this.applyFailure(generation, err));
    }

    const tracked = outcome.finally(() => {
      this.inFlight.delete(generation);
      this.notifyChange();
    });
    this.inFlight.set(generation, tracked);
    return tracked;
  }

  private isSuperseded(generation: number): boolean {
    return generation !== this.selection.generation || generation <= this.lastAppliedGeneration;
  }

  private applyResult(generation: number, result: LogRatioResult): ComputationOutcome {
    if (this.isSuperseded(generation)) {
      log.debug(`discarding result for superseded generation ${generation}`);
      return { status: "superseded", generation };
    }

    this.lastAppliedGeneration = generation;
    this.state = "Ready";
    this.retained = {
      generation,
      record: Object.freeze(logRatiosToRecord(result.values)),
      excludedSampleCount: result.excludedSampleCount,
      exclusions: result.exclusions,
      numeratorFeatureIds: sortedIds(this.selection.numerator),
      denominatorFeatureIds: sortedIds(this.selection.denominator),
    };
    const packet = this.packet("Ready", this.retained);
    this.emit(packet);
    return { status: "applied", packet };
  }

  private applyFailure(generation: number, err: unknown): ComputationOutcome {
    if (this.isSuperseded(generation)) {
      log.debug(`discarding failure for superseded generation ${generation}`);
      return { status: "superseded", generation };
    }

    if (err instanceof GroupEmptyError) {
      // No packet: the previous result would be stale for this selection.
      this.state = "Idle";
      this.retained = null;
      this.notifyChange();
      return { status: "group-empty", error: err };
    }

    log.warn(`computation for generation ${generation} failed`, err);
    this.state = "Error";
    const detail = toErrorDetail(err);
    const packet = this.errorPacket(detail);
    this.emit(packet);
    return { status: "failed", error: detail, packet };
  }

  // ─── Packets ─────────────────────────────────────────────

  /**
   * Feature ids travel with the result they produced, so an Error packet that
   * retains an older result never pairs it with a newer (pending) selection.
   */
  private packet(state: LinkStateName, result: RetainedResult | null, errorDetail?: ErrorDetail): OutputPacket {
    const packet: OutputPacket = {
      generation: this.selection.generation,
      resultGeneration: result ? result.generation : null,
      state,
      perSampleLogRatio: result ? result.record : null,
      excludedSampleCount: result ? result.excludedSampleCount : 0,
      exclusions: result ? result.exclusions : [],
      numeratorFeatureIds: result ? result.numeratorFeatureIds : sortedIds(this.selection.numerator),
      denominatorFeatureIds: result ? result.denominatorFeatureIds : sortedIds(this.selection.denominator),
    };
    if (errorDetail) packet.errorDetail = errorDetail;
    return Object.freeze(packet);
  }

  private errorPacket(detail: ErrorDetail): OutputPacket {
    return this.packet("Error", this.retained, detail);
  }

  private emit(packet: OutputPacket): void {
    this.lastPacket = packet;
    for (const listener of [...this.packetListeners]) {
      try {
        listener(packet);
      } catch (err) {
        log.error("packet listener threw", err);
      }
    }
    this.notifyChange();
  }

  private buildSnapshot(): LinkSnapshot {
    return {
      state: this.state,
      selection: this.selection,
      lastPacket: this.lastPacket,
      pendingGenerations: [...this.inFlight.keys()],
    };
  }

  private notifyChange(): void {
    this.snapshot = this.buildSnapshot();
    for (const listener of [...this.changeListeners]) listener();
  }
}
