import type { FaviconMeta } from "..";
import { tryCommonPaths } from "./commonPaths";
import { tryFallbackService } from "./fallbackService";
import { tryHtmlDiscovery } from "./html";

export type Strategy = "html" | "common-paths" | "fallback-service";

/** Every strategy answers with a saved filename, or null to pass. */
export type FaviconStrategy = (meta: FaviconMeta) => Promise<string | null>;

export const strategyOrder: readonly Strategy[] = [
  "html",
  "common-paths",
  "fallback-service",
];

const strategyHandlers: {
  [S in Strategy]: FaviconStrategy;
} = {
  html: tryHtmlDiscovery,
  "common-paths": tryCommonPaths,
  "fallback-service": tryFallbackService,
};

export async function resolveWithStrategy(
  meta: FaviconMeta,
  strategy: Strategy,
): Promise<string | null> {
  const fn = strategyHandlers[strategy];

  const logger = meta.logger.child({
    method: fn.name || "resolveWithStrategy",
    strategy,
  });

  return await fn({ ...meta, logger });
}

/**
 * Combine strategies into one that runs them in order and stops at the
 * first non-null result.
 */
export function firstSuccess(strategies: FaviconStrategy[]): FaviconStrategy {
  return async meta => {
    for (const strategy of strategies) {
      const result = await strategy(meta);
      if (result !== null) {
        return result;
      }
    }
    return null;
  };
}

export async function runStrategyChain(
  meta: FaviconMeta,
  strategies: readonly Strategy[] = strategyOrder,
): Promise<string | null> {
  const chain = firstSuccess(
    strategies.map(
      strategy => (m: FaviconMeta) => resolveWithStrategy(m, strategy),
    ),
  );
  return await chain(meta);
}
