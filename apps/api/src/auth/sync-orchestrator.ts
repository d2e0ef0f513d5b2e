import type { Logger } from "pino";
import {
  isAuthzError,
  ProviderRejectedError,
  ProviderUnavailableError,
  providerUnavailable,
  staleAndUnreachable,
  SyncWaitAbortedError
} from "./errors.js";
import type { IdentityProviderClient } from "./identity-provider.js";
import type { PermissionCache } from "./permission-cache.js";
import { emptySnapshot } from "./snapshot.js";
import type { CacheEntry, SyncResult, SyncTrigger } from "./types.js";

type RefreshOutcome =
  | { kind: "fetched"; entry: CacheEntry }
  | { kind: "rejected"; error: ProviderRejectedError }
  | { kind: "unavailable"; error: ProviderUnavailableError };

interface InFlightRefresh {
  trigger: SyncTrigger;
  outcome: Promise<RefreshOutcome>;
}

export interface EnsureFreshOptions {
  /** Stops this caller waiting. The refresh itself keeps running. */
  signal?: AbortSignal;
}

export interface SyncOrchestratorOptions {
  cache: PermissionCache;
  provider: IdentityProviderClient;
  logger: Logger;
  /** Sweep refreshes entries whose remaining freshness is at most this long. */
  refreshAheadMs?: number;
  now?: () => Date;
}

function waitFor<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) {
    return promise;
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new SyncWaitAbortedError());
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Single entry point for every permission refresh. At most one provider read
 * per subject is in flight; concurrent callers share its outcome and each
 * interprets it according to its own trigger.
 */
export class SyncOrchestrator {
  private readonly cache: PermissionCache;
  private readonly provider: IdentityProviderClient;
  private readonly logger: Logger;
  private readonly refreshAheadMs: number;
  private readonly now: () => Date;
  private readonly inFlight = new Map<string, InFlightRefresh>();
  private sweepTimer: NodeJS.Timeout | null = null;
  private sweeping = false;

  constructor(options: SyncOrchestratorOptions) {
    this.cache = options.cache;
    this.provider = options.provider;
    this.logger = options.logger.child({ module: "sync-orchestrator" });
    this.refreshAheadMs = options.refreshAheadMs ?? 0;
    this.now = options.now ?? (() => new Date());
  }

  get inFlightCount() {
    return this.inFlight.size;
  }

  async ensureFresh(
    subjectId: string,
    trigger: SyncTrigger,
    options: EnsureFreshOptions = {}
  ): Promise<SyncResult> {
    if (options.signal?.aborted) {
      throw new SyncWaitAbortedError();
    }

    if (trigger === "stale") {
      const cached = this.cache.get(subjectId);
      if (cached && this.cache.isFresh(cached)) {
        return { entry: cached, freshness: "fresh" };
      }
    }

    if (trigger === "force_sync") {
      this.cache.invalidate(subjectId);
    }

    const outcome = await waitFor(this.acquireRefresh(subjectId, trigger), options.signal);
    return this.interpret(subjectId, trigger, outcome);
  }

  forceSync(subjectId: string, options: EnsureFreshOptions = {}): Promise<SyncResult> {
    return this.ensureFresh(subjectId, "force_sync", options);
  }

  invalidate(subjectId: string) {
    const removed = this.cache.invalidate(subjectId);
    this.logger.debug({ subjectId, removed }, "Permission cache entry invalidated");
    return removed;
  }

  /** Refreshes every cached entry that is stale or about to become stale. */
  async sweep(): Promise<number> {
    const due = this.cache
      .entries()
      .filter((entry) => entry.ttlMs - this.cache.ageMs(entry) <= this.refreshAheadMs);

    const results = await Promise.allSettled(
      due.map((entry) => this.ensureFresh(entry.subjectId, "sweep"))
    );

    results.forEach((result, index) => {
      if (result.status === "rejected") {
        this.logger.warn(
          {
            subjectId: due[index]?.subjectId,
            code: isAuthzError(result.reason) ? result.reason.code : undefined
          },
          "Sweep could not refresh permissions"
        );
      }
    });

    return due.length;
  }

  startSweeper(intervalMs: number) {
    if (this.sweepTimer || intervalMs <= 0) {
      return;
    }

    this.sweepTimer = setInterval(() => {
      void this.runScheduledSweep();
    }, intervalMs);
    this.sweepTimer.unref();
    this.logger.info({ intervalMs, refreshAheadMs: this.refreshAheadMs }, "Permission sweeper started");
  }

  stopSweeper() {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  private async runScheduledSweep() {
    if (this.sweeping) {
      return;
    }

    this.sweeping = true;
    try {
      const refreshed = await this.sweep();
      if (refreshed > 0) {
        this.logger.debug({ refreshed }, "Permission sweep finished");
      }
    } catch (error) {
      this.logger.error({ err: error }, "Permission sweep failed");
    } finally {
      this.sweeping = false;
    }
  }

  private acquireRefresh(subjectId: string, trigger: SyncTrigger): Promise<RefreshOutcome> {
    const current = this.inFlight.get(subjectId);
    if (!current) {
      return this.startRefresh(subjectId, trigger);
    }

    // A forced sync must observe provider state from after it was requested,
    // so it queues behind a read that was already running.
    if (trigger === "force_sync" && current.trigger !== "force_sync") {
      return current.outcome.then(
        () => this.inFlight.get(subjectId)?.outcome ?? this.startRefresh(subjectId, trigger)
      );
    }

    return current.outcome;
  }

  private startRefresh(subjectId: string, trigger: SyncTrigger): Promise<RefreshOutcome> {
    const startedAtMs = this.now().getTime();

    const outcome = this.provider
      .fetch(subjectId)
      .then(
        (snapshot): RefreshOutcome => ({
          kind: "fetched",
          entry: this.cache.put(snapshot, this.now())
        }),
        (error: unknown): RefreshOutcome => {
          if (error instanceof ProviderRejectedError) {
            this.cache.invalidate(subjectId);
            return { kind: "rejected", error };
          }

          if (error instanceof ProviderUnavailableError) {
            return { kind: "unavailable", error };
          }

          this.logger.error({ err: error, subjectId }, "Identity provider client failed unexpectedly");
          return {
            kind: "unavailable",
            error: providerUnavailable("Identity provider client failed unexpectedly", null, error)
          };
        }
      )
      .then((result) => {
        this.logger.info(
          {
            subjectId,
            trigger,
            outcome: result.kind,
            durationMs: this.now().getTime() - startedAtMs
          },
          "Permission refresh finished"
        );
        return result;
      })
      .finally(() => {
        this.inFlight.delete(subjectId);
      });

    this.inFlight.set(subjectId, { trigger, outcome });
    return outcome;
  }

  private interpret(subjectId: string, trigger: SyncTrigger, outcome: RefreshOutcome): SyncResult {
    if (outcome.kind === "fetched") {
      return { entry: outcome.entry, freshness: "fresh" };
    }

    if (outcome.kind === "rejected") {
      return {
        entry: Object.freeze({
          subjectId,
          snapshot: emptySnapshot(subjectId),
          fetchedAt: this.now(),
          ttlMs: 0
        }),
        freshness: "revoked"
      };
    }

    if (trigger === "login" || trigger === "force_sync") {
      throw staleAndUnreachable(subjectId, outcome.error);
    }

    const fallback = this.cache.get(subjectId);
    if (!fallback) {
      throw staleAndUnreachable(subjectId, outcome.error);
    }

    if (this.cache.isFresh(fallback)) {
      return { entry: fallback, freshness: "fresh" };
    }

    this.logger.warn(
      { subjectId, trigger, ageMs: this.cache.ageMs(fallback) },
      "Serving stale permissions while the identity provider is unavailable"
    );
    return { entry: fallback, freshness: "degraded" };
  }
}
