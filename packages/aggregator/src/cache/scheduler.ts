import type { RefreshCoordinator } from "./refresh-coordinator.js";

export type RefreshTicker = {
  stop: () => void;
};

/**
 * Warms the cache immediately, then asks for a non-forced refresh on every
 * tick. Ticks that land on a fresh snapshot or an in-flight run are no-ops.
 */
export function startRefreshTicker<T>(
  coordinator: RefreshCoordinator<T>,
  intervalMs: number
): RefreshTicker {
  coordinator.requestRefresh(false);

  const timer = setInterval(() => {
    coordinator.requestRefresh(false);
  }, intervalMs);

  return {
    stop: () => {
      clearInterval(timer);
    }
  };
}
