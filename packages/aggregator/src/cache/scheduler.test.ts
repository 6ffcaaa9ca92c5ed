import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger } from "@agro-news/logger";

import { RefreshCoordinator } from "./refresh-coordinator.js";
import { startRefreshTicker } from "./scheduler.js";

describe("startRefreshTicker", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("warms up immediately and asks for a refresh on every tick until stopped", () => {
    vi.useFakeTimers();
    const coordinator = new RefreshCoordinator({
      name: "quotes",
      ttlMs: 60_000,
      load: async () => [],
      logger: createLogger({ name: "ticker-test", level: "silent" })
    });
    const requestRefresh = vi.spyOn(coordinator, "requestRefresh");

    const ticker = startRefreshTicker(coordinator, 1_000);
    expect(requestRefresh).toHaveBeenCalledTimes(1);

    vi.advanceTimersByTime(3_000);
    expect(requestRefresh).toHaveBeenCalledTimes(4);
    expect(requestRefresh).toHaveBeenLastCalledWith(false);

    ticker.stop();
    vi.advanceTimersByTime(3_000);
    expect(requestRefresh).toHaveBeenCalledTimes(4);
  });
});
