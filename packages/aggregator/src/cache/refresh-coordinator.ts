import type { Logger } from "@agro-news/logger";

import { formatErrorMessage } from "../errors.js";
import { aggregatorMetrics } from "../metrics/registry.js";

export type Snapshot<T> = {
  readonly data: T;
  readonly generatedAt: Date;
};

export type SnapshotRead<T> =
  | { status: "ready"; snapshot: Snapshot<T>; refreshing: boolean }
  | { status: "unavailable"; reason: string };

export type RefreshTicket = "joined" | "fresh" | "cooling-down" | "started";

export type CacheStateName = "empty" | "populating" | "fresh" | "stale";

export type RefreshCoordinatorOptions<T> = {
  name: string;
  ttlMs: number;
  load: (now: Date) => Promise<T>;
  logger: Logger;
  now?: () => Date;
  /** Minimum pause between a failed run and the next non-forced one. */
  retryAfterFailureMs?: number;
};

/**
 * Owns one cache entry. Readers get the last complete snapshot without
 * waiting, except before the first successful load. At most one `load` runs at
 * a time; the snapshot is replaced by reference only after a run completes.
 */
export class RefreshCoordinator<T> {
  private current: Snapshot<T> | null = null;
  private inFlight: Promise<void> | null = null;
  private lastFailure: { at: Date; reason: string } | null = null;

  private readonly name: string;
  private readonly ttlMs: number;
  private readonly load: (now: Date) => Promise<T>;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly retryAfterFailureMs: number;

  constructor(options: RefreshCoordinatorOptions<T>) {
    this.name = options.name;
    this.ttlMs = options.ttlMs;
    this.load = options.load;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
    this.retryAfterFailureMs = options.retryAfterFailureMs ?? 0;
  }

  /**
   * Returns the current snapshot and schedules a background refresh when it is
   * stale. An empty cache waits for the first load instead.
   */
  async getSnapshot(): Promise<SnapshotRead<T>> {
    if (this.current) {
      this.requestRefresh(false);
      return this.ready(this.current);
    }

    const ticket = this.requestRefresh(false);
    if (ticket === "cooling-down") {
      return this.unavailable();
    }

    await this.waitForIdle();

    return this.current ? this.ready(this.current) : this.unavailable();
  }

  requestRefresh(force: boolean): RefreshTicket {
    if (this.inFlight) {
      return "joined";
    }

    const now = this.now();

    if (!force && this.current && !this.isExpired(this.current, now)) {
      return "fresh";
    }

    if (
      !force &&
      this.lastFailure &&
      now.getTime() - this.lastFailure.at.getTime() < this.retryAfterFailureMs
    ) {
      this.logger.debug(
        { cache: this.name, lastFailureAt: this.lastFailure.at.toISOString() },
        "Refresh skipped, last attempt failed recently"
      );
      return "cooling-down";
    }

    this.inFlight = this.run(now).finally(() => {
      this.inFlight = null;
    });

    return "started";
  }

  state(): CacheStateName {
    if (this.inFlight) {
      return "populating";
    }
    if (!this.current) {
      return "empty";
    }
    return this.isExpired(this.current, this.now()) ? "stale" : "fresh";
  }

  peek(): Snapshot<T> | null {
    return this.current;
  }

  async waitForIdle(): Promise<void> {
    while (this.inFlight) {
      await this.inFlight;
    }
  }

  private async run(startedAt: Date): Promise<void> {
    this.logger.info(
      { cache: this.name, startedAt: startedAt.toISOString() },
      "Cache refresh started"
    );

    try {
      const data = await this.load(startedAt);
      this.current = Object.freeze({
        data: deepFreeze(data),
        generatedAt: startedAt
      });
      this.lastFailure = null;
      aggregatorMetrics.refreshRuns.inc({ cache: this.name, status: "success" });
      this.logger.info(
        {
          cache: this.name,
          durationMs: this.now().getTime() - startedAt.getTime()
        },
        "Cache refresh finished"
      );
    } catch (error) {
      const reason = formatErrorMessage(error);
      this.lastFailure = { at: this.now(), reason };
      aggregatorMetrics.refreshRuns.inc({ cache: this.name, status: "failure" });
      this.logger.error(
        { cache: this.name, error, keptSnapshot: this.current !== null },
        `Cache refresh failed: ${reason}`
      );
    }
  }

  private isExpired(snapshot: Snapshot<T>, now: Date) {
    return now.getTime() - snapshot.generatedAt.getTime() >= this.ttlMs;
  }

  private ready(snapshot: Snapshot<T>): SnapshotRead<T> {
    return { status: "ready", snapshot, refreshing: this.inFlight !== null };
  }

  private unavailable(): SnapshotRead<T> {
    return {
      status: "unavailable",
      reason: this.lastFailure?.reason ?? "No data has been loaded yet"
    };
  }
}

function deepFreeze<V>(value: V): V {
  if (typeof value !== "object" || value === null || value instanceof Date) {
    return value;
  }
  if (Object.isFrozen(value)) {
    return value;
  }
  Object.freeze(value);
  for (const nested of Object.values(value)) {
    deepFreeze(nested);
  }
  return value;
}
