/**
 * SelectionState — numerator/denominator feature groups plus a generation
 * counter. All transitions are pure; every mutation returns a new state with
 * generation + 1, so a generation number identifies exactly one selection.
 */

import type { SlotName } from "@/lib/errors";

export type { SlotName };

export type GroupOrigin =
  | { kind: "features" }
  | { kind: "query"; text: string };

export interface FeatureGroup {
  featureIds: ReadonlySet<string>;
  origin: GroupOrigin;
}

export interface SelectionState {
  numerator: FeatureGroup | null;
  denominator: FeatureGroup | null;
  generation: number;
}

export const EMPTY_SELECTION: SelectionState = {
  numerator: null,
  denominator: null,
  generation: 0,
};

export function isSlotFilled(state: SelectionState, slot: SlotName): boolean {
  const group = state[slot];
  return group !== null && group.featureIds.size > 0;
}

/** Both slots hold at least one feature. */
export function isComplete(state: SelectionState): boolean {
  return isSlotFilled(state, "numerator") && isSlotFilled(state, "denominator");
}

/** Slot a click lands in: first empty slot, otherwise the denominator (numerator is sticky). */
export function clickTarget(state: SelectionState): SlotName {
  if (!isSlotFilled(state, "numerator")) return "numerator";
  return "denominator";
}

function withSlot(state: SelectionState, slot: SlotName, group: FeatureGroup | null): SelectionState {
  const generation = state.generation + 1;
  return slot === "numerator"
    ? { ...state, numerator: group, generation }
    : { ...state, denominator: group, generation };
}

export function applyClick(state: SelectionState, featureId: string): SelectionState {
  return withSlot(state, clickTarget(state), {
    featureIds: new Set([featureId]),
    origin: { kind: "features" },
  });
}

export function applyQueryResult(
  state: SelectionState,
  slot: SlotName,
  text: string,
  featureIds: ReadonlySet<string>,
): SelectionState {
  return withSlot(state, slot, { featureIds, origin: { kind: "query", text } });
}

/** Empty a slot. Clearing an already-empty slot is not a mutation and returns the same state. */
export function applyClear(state: SelectionState, slot: SlotName): SelectionState {
  if (state[slot] === null) return state;
  return withSlot(state, slot, null);
}

export function sortedIds(group: FeatureGroup | null): string[] {
  return group ? [...group.featureIds].sort() : [];
}
