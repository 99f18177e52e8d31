import { createContext, useContext, useCallback, useEffect, useMemo, useSyncExternalStore } from "react";
import type { ReactNode } from "react";
import type { Dataset } from "@/lib/dataset";
import { createInlineRunner } from "@/lib/compute-runner";
import type { ComputeRunner } from "@/lib/compute-runner";
import { LinkController } from "@/lib/link-controller";
import type { DispatchResult, LinkSnapshot } from "@/lib/link-controller";
import { createLinkStore } from "@/lib/link-store";
import { DEFAULT_LINK_CONFIG } from "@/lib/link-config";
import type { LinkConfig } from "@/lib/link-config";
import { setLogLevel } from "@/lib/logger";
import type { SlotName } from "@/lib/selection-state";

interface RatioLinkState {
  dataset: Dataset | null;
  config: LinkConfig;
  snapshot: LinkSnapshot | null;
  clickFeature: (featureId: string) => DispatchResult | null;
  submitQuery: (text: string, slot: SlotName) => DispatchResult | null;
  clearSlot: (slot: SlotName) => DispatchResult | null;
}

const RatioLinkContext = createContext<RatioLinkState>({
  dataset: null,
  config: DEFAULT_LINK_CONFIG,
  snapshot: null,
  clickFeature: () => null,
  submitQuery: () => null,
  clearSlot: () => null,
});

/**
 * Owns the single LinkController for a dataset. Both the rank display and the
 * sample plot read packets from here and send user events back through the
 * dispatch callbacks; neither view talks to the other directly.
 */
export function RatioLinkProvider({
  dataset,
  config = DEFAULT_LINK_CONFIG,
  runner,
  children,
}: {
  dataset: Dataset;
  config?: LinkConfig;
  /** Defaults to an inline runner over the dataset's table. */
  runner?: ComputeRunner;
  children: ReactNode;
}) {
  useEffect(() => {
    setLogLevel(config.logLevel);
  }, [config.logLevel]);

  const controller = useMemo(
    () =>
      new LinkController({
        featureIndex: dataset.featureIndex,
        runner: runner ?? createInlineRunner(dataset.table),
      }),
    [dataset, runner],
  );
  const store = useMemo(() => createLinkStore(controller), [controller]);
  const snapshot = useSyncExternalStore(store.subscribe, store.getSnapshot, store.getSnapshot);

  const clickFeature = useCallback((featureId: string) => controller.clickFeature(featureId), [controller]);
  const submitQuery = useCallback(
    (text: string, slot: SlotName) => controller.submitQuery(text, slot),
    [controller],
  );
  const clearSlot = useCallback((slot: SlotName) => controller.clear(slot), [controller]);

  return (
    <RatioLinkContext.Provider
      value={{ dataset, config, snapshot, clickFeature, submitQuery, clearSlot }}
    >
      {children}
    </RatioLinkContext.Provider>
  );
}

export function useRatioLink() {
  return useContext(RatioLinkContext);
}
