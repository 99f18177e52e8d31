/**
 * Runtime configuration for the ratio link session.
 * Constructed once alongside the dataset; never mutated afterwards.
 */
import { isLogLevel } from "@/lib/logger";
import type { LogLevel } from "@/lib/logger";

export interface LinkConfig {
  logLevel: LogLevel;
  /** Max compiled queries kept per metadata index (LRU). */
  queryCacheLimit: number;
  /** Metadata field the rank display orders by; null = first snapshot rank field. */
  rankField: string | null;
  /** Sample metadata field used to color sample points. */
  categoryField: string | null;
}

export const DEFAULT_LINK_CONFIG: LinkConfig = {
  logLevel: "warn",
  queryCacheLimit: 64,
  rankField: null,
  categoryField: null,
};

export function resolveLinkConfig(overrides: Partial<LinkConfig> = {}): LinkConfig {
  const config: LinkConfig = { ...DEFAULT_LINK_CONFIG, ...overrides };

  if (!isLogLevel(config.logLevel)) {
    throw new Error(`Unknown log level "${String(config.logLevel)}"`);
  }
  if (!Number.isInteger(config.queryCacheLimit) || config.queryCacheLimit < 1) {
    throw new Error(`queryCacheLimit must be a positive integer (got ${config.queryCacheLimit})`);
  }
  return config;
}
