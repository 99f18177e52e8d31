import type { LinkController, LinkSnapshot } from "@/lib/link-controller";

/** `useSyncExternalStore`-shaped view of a LinkController. */
export interface LinkStore {
  subscribe: (onChange: () => void) => () => void;
  getSnapshot: () => LinkSnapshot;
}

export function createLinkStore(controller: LinkController): LinkStore {
  return {
    subscribe: (onChange) => controller.watch(onChange),
    getSnapshot: () => controller.getSnapshot(),
  };
}
