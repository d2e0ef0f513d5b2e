import { createDeferred, manualClock, type Deferred } from "@trellis/testkit";
import pino from "pino";
import { describe, expect, it, vi } from "vitest";
import {
  providerRejected,
  providerUnavailable,
  StaleAndUnreachableError,
  SyncWaitAbortedError
} from "./errors.js";
import type { IdentityProviderClient } from "./identity-provider.js";
import { PermissionCache } from "./permission-cache.js";
import { buildSnapshot } from "./snapshot.js";
import { SyncOrchestrator } from "./sync-orchestrator.js";
import type { Snapshot } from "./types.js";

const HOUR_MS = 60 * 60 * 1000;

function vendorSnapshot(subjectId: string, permissions: string[] = ["edit:vendor_info"]) {
  return buildSnapshot({
    subjectId,
    roles: ["vendor"],
    platformPermissions: [],
    memberships: [{ organizationId: "vendor-42", role: "owner", permissions }]
  });
}

function createHarness(options: { refreshAheadMs?: number } = {}) {
  const clock = manualClock("2026-03-01T12:00:00.000Z");
  const cache = new PermissionCache({
    ttlMs: HOUR_MS,
    maxStaleMs: 24 * HOUR_MS,
    maxEntries: 100,
    now: clock.now
  });
  const fetch = vi.fn<(subjectId: string) => Promise<Snapshot>>();
  const provider: IdentityProviderClient = { fetch };
  const orchestrator = new SyncOrchestrator({
    cache,
    provider,
    logger: pino({ level: "silent" }),
    refreshAheadMs: options.refreshAheadMs,
    now: clock.now
  });
  return { clock, cache, fetch, orchestrator };
}

function deferFetches(fetch: ReturnType<typeof createHarness>["fetch"]) {
  const pending: Deferred<Snapshot>[] = [];
  fetch.mockImplementation(() => {
    const deferred = createDeferred<Snapshot>();
    pending.push(deferred);
    return deferred.promise;
  });
  return pending;
}

describe("SyncOrchestrator", () => {
  it("serves fresh entries without calling the provider", async () => {
    const { cache, fetch, orchestrator, clock } = createHarness();
    const entry = cache.put(vendorSnapshot("u1"));
    clock.advance(HOUR_MS - 1);

    const result = await orchestrator.ensureFresh("u1", "stale");

    expect(result).toEqual({ entry, freshness: "fresh" });
    expect(fetch).not.toHaveBeenCalled();
  });

  it("fetches and caches on a miss", async () => {
    const { cache, fetch, orchestrator } = createHarness();
    fetch.mockResolvedValue(vendorSnapshot("u1"));

    const result = await orchestrator.ensureFresh("u1", "stale");

    expect(result.freshness).toBe("fresh");
    expect(result.entry.fetchedAt.toISOString()).toBe("2026-03-01T12:00:00.000Z");
    expect(cache.get("u1")).toBe(result.entry);
    expect(fetch).toHaveBeenCalledWith("u1");
  });

  it("coalesces concurrent refreshes of the same subject into one provider call", async () => {
    const { cache, clock, fetch, orchestrator } = createHarness();
    cache.put(vendorSnapshot("u1"));
    clock.advance(2 * HOUR_MS);
    const pending = deferFetches(fetch);

    const callers = Array.from({ length: 8 }, () => orchestrator.ensureFresh("u1", "stale"));
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(orchestrator.inFlightCount).toBe(1);

    pending[0]?.resolve(vendorSnapshot("u1", ["edit:vendor_info", "manage:vendor_team"]));
    const results = await Promise.all(callers);

    const first = results[0];
    expect(first?.freshness).toBe("fresh");
    for (const result of results) {
      expect(result.entry).toBe(first?.entry);
    }
    expect(orchestrator.inFlightCount).toBe(0);
  });

  it("refreshes different subjects in parallel", async () => {
    const { fetch, orchestrator } = createHarness();
    const pending = deferFetches(fetch);

    const first = orchestrator.ensureFresh("u1", "stale");
    const second = orchestrator.ensureFresh("u2", "stale");
    expect(fetch.mock.calls).toEqual([["u1"], ["u2"]]);

    pending[1]?.resolve(vendorSnapshot("u2"));
    await expect(second).resolves.toMatchObject({ freshness: "fresh" });
    pending[0]?.resolve(vendorSnapshot("u1"));
    await expect(first).resolves.toMatchObject({ freshness: "fresh" });
  });

  it("serves a degraded stale entry when the provider is unavailable", async () => {
    const { cache, clock, fetch, orchestrator } = createHarness();
    const entry = cache.put(vendorSnapshot("u1"));
    clock.advance(2 * HOUR_MS);
    fetch.mockRejectedValue(providerUnavailable("Identity provider returned 503", 503));

    const result = await orchestrator.ensureFresh("u1", "stale");

    expect(result).toEqual({ entry, freshness: "degraded" });
    expect(cache.get("u1")).toBe(entry);
  });

  it("fails closed when the provider is unavailable and nothing is cached", async () => {
    const { fetch, orchestrator } = createHarness();
    fetch.mockRejectedValue(providerUnavailable("Identity provider request failed"));

    await expect(orchestrator.ensureFresh("u1", "stale")).rejects.toBeInstanceOf(
      StaleAndUnreachableError
    );
  });

  it("never serves stale entries on login", async () => {
    const { cache, clock, fetch, orchestrator } = createHarness();
    cache.put(vendorSnapshot("u1"));
    clock.advance(2 * HOUR_MS);
    fetch.mockRejectedValue(providerUnavailable("Identity provider returned 503", 503));

    await expect(orchestrator.ensureFresh("u1", "login")).rejects.toMatchObject({
      code: "stale_and_unreachable",
      message: "Permissions for u1 are unavailable and no usable cache entry exists"
    });
  });

  it("refreshes on login even when the cached entry is fresh", async () => {
    const { cache, fetch, orchestrator } = createHarness();
    cache.put(vendorSnapshot("u1"));
    fetch.mockResolvedValue(vendorSnapshot("u1", ["manage:vendor_team"]));

    const result = await orchestrator.ensureFresh("u1", "login");

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(result.entry.snapshot.globalPermissions).toEqual(["manage:vendor_team"]);
  });

  it("collapses permissions and clears the cache when the provider rejects the subject", async () => {
    const { cache, clock, fetch, orchestrator } = createHarness();
    cache.put(vendorSnapshot("u1"));
    clock.advance(2 * HOUR_MS);
    fetch.mockRejectedValue(providerRejected("Subject u1 is not known to the identity provider"));

    const result = await orchestrator.ensureFresh("u1", "stale");

    expect(result.freshness).toBe("revoked");
    expect(result.entry.snapshot.globalPermissions).toEqual([]);
    expect(result.entry.snapshot.organizationMemberships.size).toBe(0);
    expect(cache.get("u1")).toBeNull();
  });

  it("treats unexpected client failures as unavailability", async () => {
    const { fetch, orchestrator } = createHarness();
    fetch.mockRejectedValue(new Error("socket exploded"));

    await expect(orchestrator.ensureFresh("u1", "stale")).rejects.toBeInstanceOf(
      StaleAndUnreachableError
    );
  });

  it("yields identical snapshots for back-to-back forced syncs", async () => {
    const { fetch, orchestrator } = createHarness();
    fetch.mockImplementation(async (subjectId) => vendorSnapshot(subjectId));

    const first = await orchestrator.forceSync("u1");
    const second = await orchestrator.forceSync("u1");

    expect(fetch).toHaveBeenCalledTimes(2);
    expect(second.entry.snapshot).toEqual(first.entry.snapshot);
    expect(second.entry).not.toBe(first.entry);
  });

  it("does not serve stale entries to a forced sync", async () => {
    const { cache, fetch, orchestrator } = createHarness();
    cache.put(vendorSnapshot("u1"));
    fetch.mockRejectedValue(providerUnavailable("Identity provider returned 502", 502));

    await expect(orchestrator.forceSync("u1")).rejects.toBeInstanceOf(StaleAndUnreachableError);
    expect(cache.get("u1")).toBeNull();
  });

  it("queues a forced sync behind a read that was already running", async () => {
    const { fetch, orchestrator } = createHarness();
    const pending = deferFetches(fetch);

    const lazy = orchestrator.ensureFresh("u1", "stale");
    const forced = orchestrator.forceSync("u1");
    expect(fetch).toHaveBeenCalledTimes(1);

    pending[0]?.resolve(vendorSnapshot("u1", ["read:vendor_info"]));
    await expect(lazy).resolves.toMatchObject({ freshness: "fresh" });
    await vi.waitFor(() => expect(fetch).toHaveBeenCalledTimes(2));

    pending[1]?.resolve(vendorSnapshot("u1", ["manage:vendor_team"]));
    const result = await forced;
    expect(result.entry.snapshot.globalPermissions).toEqual(["manage:vendor_team"]);
  });

  it("lets a caller stop waiting without cancelling the refresh", async () => {
    const { cache, fetch, orchestrator } = createHarness();
    const pending = deferFetches(fetch);
    const controller = new AbortController();

    const waiting = orchestrator.ensureFresh("u1", "stale", { signal: controller.signal });
    controller.abort();
    await expect(waiting).rejects.toBeInstanceOf(SyncWaitAbortedError);

    const later = orchestrator.ensureFresh("u1", "stale");
    pending[0]?.resolve(vendorSnapshot("u1"));
    await expect(later).resolves.toMatchObject({ freshness: "fresh" });

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(cache.get("u1")?.snapshot.globalPermissions).toEqual(["edit:vendor_info"]);
  });

  it("rejects callers whose signal is already aborted", async () => {
    const { fetch, orchestrator } = createHarness();
    const controller = new AbortController();
    controller.abort();

    await expect(
      orchestrator.ensureFresh("u1", "stale", { signal: controller.signal })
    ).rejects.toBeInstanceOf(SyncWaitAbortedError);
    expect(fetch).not.toHaveBeenCalled();
  });

  it("sweeps only entries close to expiry", async () => {
    const { cache, clock, fetch, orchestrator } = createHarness({ refreshAheadMs: 5 * 60 * 1000 });
    cache.put(vendorSnapshot("u-old"));
    clock.advance(56 * 60 * 1000);
    cache.put(vendorSnapshot("u-new"));
    fetch.mockImplementation(async (subjectId) => vendorSnapshot(subjectId));

    const refreshed = await orchestrator.sweep();

    expect(refreshed).toBe(1);
    expect(fetch.mock.calls).toEqual([["u-old"]]);
    expect(cache.get("u-old")?.fetchedAt.toISOString()).toBe("2026-03-01T12:56:00.000Z");
  });

  it("keeps existing entries when a sweep refresh fails", async () => {
    const { cache, clock, fetch, orchestrator } = createHarness({ refreshAheadMs: 5 * 60 * 1000 });
    const entry = cache.put(vendorSnapshot("u1"));
    clock.advance(58 * 60 * 1000);
    fetch.mockRejectedValue(providerUnavailable("Identity provider returned 503", 503));

    await expect(orchestrator.sweep()).resolves.toBe(1);
    expect(cache.get("u1")).toBe(entry);
  });

  it("invalidates entries on request", () => {
    const { cache, orchestrator } = createHarness();
    cache.put(vendorSnapshot("u1"));

    expect(orchestrator.invalidate("u1")).toBe(true);
    expect(cache.get("u1")).toBeNull();
  });
});
