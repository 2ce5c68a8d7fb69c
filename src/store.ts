// Knowledge store — time-based cache in front of a data source
// Holds one immutable snapshot; refetches are single-flight and time-bounded.

import { summarize } from "./catalog.js";
import { DataSourceUnavailable, errorMessage } from "./errors.js";
import { log } from "./log.js";
import type { KnowledgeSnapshot, KnowledgeStats, RawRow, StoreStatus } from "./model.js";
import { parseRows } from "./parser.js";
import type { DataSource } from "./sources.js";

export const DEFAULT_CACHE_DURATION_MINUTES = 5;
export const DEFAULT_FETCH_TIMEOUT_MS = 10_000;
export const DEFAULT_RETRIES = 1;

export interface KnowledgeStoreOptions {
  cacheDurationMinutes?: number;
  fetchTimeoutMs?: number;
  /** Extra attempts after a failed or timed-out fetch. */
  retries?: number;
  now?: () => number;
  /** Called when a refetch failed and the previous snapshot is served instead. */
  onWarning?: (message: string, error: DataSourceUnavailable) => void;
}

function defaultWarning(message: string): void {
  log.warn(message);
}

async function withTimeout<T>(
  source: string,
  ms: number,
  run: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new DataSourceUnavailable(source, `timed out after ${ms}ms`));
    }, ms);
  });
  try {
    return await Promise.race([run(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

// A load never rejects; `snapshot` is null when nothing could ever be loaded.
interface LoadOutcome {
  snapshot: KnowledgeSnapshot | null;
  failure: DataSourceUnavailable | null;
}

export class KnowledgeStore {
  private readonly source: DataSource;
  private readonly ttlMs: number;
  private readonly fetchTimeoutMs: number;
  private readonly retries: number;
  private readonly now: () => number;
  private readonly onWarning: (message: string, error: DataSourceUnavailable) => void;

  private current: KnowledgeSnapshot | null = null;
  private invalidated = false;
  /** Bumped by invalidate(); a load only clears `invalidated` for its own generation. */
  private generation = 0;
  private inflight: Promise<LoadOutcome> | null = null;
  private inflightGeneration = -1;
  private lastError: DataSourceUnavailable | null = null;

  constructor(source: DataSource, options: KnowledgeStoreOptions = {}) {
    this.source = source;
    this.ttlMs =
      (options.cacheDurationMinutes ?? DEFAULT_CACHE_DURATION_MINUTES) * 60_000;
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.retries = Math.max(0, options.retries ?? DEFAULT_RETRIES);
    this.now = options.now ?? Date.now;
    this.onWarning = options.onWarning ?? defaultWarning;
  }

  get sourceName(): string {
    return this.source.name;
  }

  /**
   * The cached snapshot while it is fresh, otherwise a new one. When the
   * refetch fails the previous snapshot is returned and `onWarning` fires;
   * without a previous snapshot the call rejects with DataSourceUnavailable.
   */
  async getSnapshot(): Promise<KnowledgeSnapshot> {
    const cached = this.current;
    if (cached && !this.inflight && (await this.isFresh(cached))) {
      return cached;
    }
    const { snapshot, failure } = await this.refetch();
    if (snapshot) return snapshot;
    throw failure ?? new DataSourceUnavailable(this.source.name);
  }

  invalidate(): void {
    this.invalidated = true;
    this.generation++;
  }

  /**
   * Refetch now. A fetch already running when this is called is awaited, not
   * reused. Unlike getSnapshot, a failure rejects even when stale data exists.
   */
  async refresh(): Promise<KnowledgeSnapshot> {
    this.invalidate();
    const { snapshot, failure } = await this.refetch();
    if (failure || !snapshot) throw failure ?? new DataSourceUnavailable(this.source.name);
    return snapshot;
  }

  async stats(): Promise<KnowledgeStats> {
    const snapshot = await this.getSnapshot();
    const stats: KnowledgeStats = { ...summarize(snapshot), stale: this.isStale(snapshot) };
    if (this.lastError) stats.last_error = this.lastError.message;
    return stats;
  }

  status(): StoreStatus {
    const snapshot = this.current;
    const status: StoreStatus = {
      loaded: snapshot !== null,
      stale: snapshot === null || this.isStale(snapshot),
    };
    if (snapshot) {
      status.fetched_at = new Date(snapshot.fetched_at).toISOString();
      status.entries = snapshot.entries.length;
    }
    if (this.lastError) status.last_error = this.lastError.message;
    return status;
  }

  // --- internals ---

  private isStale(snapshot: KnowledgeSnapshot): boolean {
    return this.invalidated || this.now() - snapshot.fetched_at >= this.ttlMs;
  }

  private async isFresh(snapshot: KnowledgeSnapshot): Promise<boolean> {
    if (this.isStale(snapshot)) return false;
    if (!this.source.lastModified) return true;
    const modified = await this.source.lastModified();
    return modified === undefined || modified <= snapshot.fetched_at;
  }

  /**
   * Joins the running load when it started after the latest invalidate(),
   * otherwise queues a new load behind it. Loads never overlap.
   */
  private refetch(): Promise<LoadOutcome> {
    const generation = this.generation;
    if (this.inflight && this.inflightGeneration === generation) return this.inflight;

    const run = this.inflight
      ? this.inflight.then(() => this.load(generation))
      : this.load(generation);
    const pending: Promise<LoadOutcome> = run.finally(() => {
      if (this.inflight === pending) this.inflight = null;
    });
    this.inflight = pending;
    this.inflightGeneration = generation;
    return pending;
  }

  private async load(generation: number): Promise<LoadOutcome> {
    const previous = this.current;
    let rows: RawRow[];
    try {
      rows = await this.fetchWithRetry();
    } catch (err) {
      const failure =
        err instanceof DataSourceUnavailable
          ? err
          : new DataSourceUnavailable(this.source.name, err);
      this.lastError = failure;
      if (!previous) return { snapshot: null, failure };
      this.onWarning(
        `${failure.message}; serving snapshot from ${new Date(previous.fetched_at).toISOString()}`,
        failure
      );
      return { snapshot: previous, failure };
    }

    const { entries, skipped } = parseRows(rows);
    const snapshot: KnowledgeSnapshot = Object.freeze({
      entries: Object.freeze(entries),
      fetched_at: this.now(),
      skipped_rows: skipped,
      source: this.source.name,
    });
    this.current = snapshot;
    this.lastError = null;
    // an invalidate() that landed mid-fetch still forces the next read to refetch
    if (this.generation === generation) this.invalidated = false;

    if (skipped > 0) {
      log.warn(`${this.source.name}: skipped ${skipped} row(s) without a question or answer`);
    }
    log.info(`loaded ${entries.length} question(s) from ${this.source.name}`);
    return { snapshot, failure: null };
  }

  private async fetchWithRetry(): Promise<RawRow[]> {
    let lastFailure: unknown;
    for (let attempt = 0; attempt <= this.retries; attempt++) {
      try {
        return await withTimeout(this.source.name, this.fetchTimeoutMs, (signal) =>
          this.source.fetchRows(signal)
        );
      } catch (err) {
        lastFailure = err;
        log.debug(
          `fetch attempt ${attempt + 1} from ${this.source.name} failed: ${errorMessage(err)}`
        );
      }
    }
    throw lastFailure instanceof DataSourceUnavailable
      ? lastFailure
      : new DataSourceUnavailable(this.source.name, lastFailure);
  }
}
