import { manualClock } from "@trellis/testkit";
import { SignJWT } from "jose";
import pino from "pino";
import { describe, expect, it, vi } from "vitest";
import { loadApiConfig } from "../config/index.js";
import { AuthorizationDecisionPoint } from "./decision-point.js";
import {
  providerRejected,
  providerUnavailable,
  StaleAndUnreachableError,
  SyncWaitAbortedError,
  TokenInvalidError
} from "./errors.js";
import { PermissionCache } from "./permission-cache.js";
import { InMemoryResourceStore, type ResourceStore } from "./resource-store.js";
import { buildSnapshot } from "./snapshot.js";
import { SyncOrchestrator } from "./sync-orchestrator.js";
import { ClaimsVerifier } from "./token-verifier.js";
import type { Snapshot } from "./types.js";

const HOUR_MS = 60 * 60 * 1000;
const config = loadApiConfig({
  NODE_ENV: "test",
  AUTH_LOCAL_JWT_SECRET: "test-secret-for-hs256-tokens"
});

const u1Snapshot = buildSnapshot({
  subjectId: "u1",
  roles: ["vendor"],
  platformPermissions: ["view:vendors"],
  memberships: [
    {
      organizationId: "vendor-42",
      role: "owner",
      permissions: ["edit:vendor_info", "manage:payments"]
    }
  ]
});

async function tokenFor(subjectId: string, claims: Record<string, unknown> = {}) {
  return new SignJWT(claims)
    .setProtectedHeader({ alg: "HS256", typ: "JWT" })
    .setIssuer(config.authIssuer)
    .setAudience(config.authAudience)
    .setSubject(subjectId)
    .setIssuedAt()
    .setExpirationTime("10m")
    .sign(new TextEncoder().encode("test-secret-for-hs256-tokens"));
}

function createDecisionPoint(
  resources: ResourceStore = new InMemoryResourceStore([
    { resourceId: "vendor-42", owningOrganizationId: "vendor-42" },
    { resourceId: "vendor-43", owningOrganizationId: "vendor-43" },
    { resourceId: "vendor-legacy", owningOrganizationId: null }
  ])
) {
  const clock = manualClock("2026-03-01T12:00:00.000Z");
  const logger = pino({ level: "silent" });
  const cache = new PermissionCache({
    ttlMs: HOUR_MS,
    maxStaleMs: 24 * HOUR_MS,
    maxEntries: 100,
    now: clock.now
  });
  const fetch = vi.fn<(subjectId: string) => Promise<Snapshot>>();
  const orchestrator = new SyncOrchestrator({ cache, provider: { fetch }, logger, now: clock.now });
  const decisionPoint = new AuthorizationDecisionPoint({
    verifier: new ClaimsVerifier(config),
    orchestrator,
    resources,
    highRiskActions: config.highRiskActions,
    logger
  });
  return { clock, cache, fetch, decisionPoint };
}

describe("AuthorizationDecisionPoint.authorize", () => {
  it("grants actions held in the owning organization", async () => {
    const { fetch, decisionPoint } = createDecisionPoint();
    fetch.mockResolvedValue(u1Snapshot);

    const result = await decisionPoint.authorize(await tokenFor("u1"), "vendor-42", "edit:vendor_info");

    expect(result).toEqual({ allowed: true, reason: "GRANTED", degraded: false, subjectId: "u1" });
  });

  it("keeps permissions inside the organization that granted them", async () => {
    const { fetch, decisionPoint } = createDecisionPoint();
    fetch.mockResolvedValue(u1Snapshot);

    const result = await decisionPoint.authorize(await tokenFor("u1"), "vendor-43", "edit:vendor_info");

    expect(result).toEqual({
      allowed: false,
      reason: "NO_ORG_MEMBERSHIP",
      degraded: false,
      subjectId: "u1"
    });
  });

  it("denies actions the membership does not include", async () => {
    const { fetch, decisionPoint } = createDecisionPoint();
    fetch.mockResolvedValue(u1Snapshot);

    const result = await decisionPoint.authorize(await tokenFor("u1"), "vendor-42", "manage:vendor_team");

    expect(result.reason).toBe("MISSING_PERMISSION");
    expect(result.allowed).toBe(false);
  });

  it("falls back to global permissions for legacy resources", async () => {
    const { fetch, decisionPoint } = createDecisionPoint();
    fetch.mockResolvedValue(u1Snapshot);
    const token = await tokenFor("u1");

    await expect(decisionPoint.authorize(token, "vendor-legacy", "view:vendors")).resolves.toMatchObject({
      allowed: true,
      reason: "GRANTED"
    });
    await expect(decisionPoint.authorize(token, "vendor-legacy", "edit:vendor_info")).resolves.toMatchObject({
      allowed: true,
      reason: "GRANTED"
    });
    await expect(decisionPoint.authorize(token, "vendor-legacy", "read:guests")).resolves.toMatchObject({
      allowed: false,
      reason: "MISSING_PERMISSION"
    });
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it("ignores permissions embedded in the token", async () => {
    const { fetch, decisionPoint } = createDecisionPoint();
    fetch.mockResolvedValue(u1Snapshot);
    const token = await tokenFor("u1", {
      permissions: ["manage:vendor_team"],
      "https://trellis.local/permissions": ["manage:vendor_team"],
      org_id: "vendor-42"
    });

    const result = await decisionPoint.authorize(token, "vendor-42", "manage:vendor_team");

    expect(result.reason).toBe("MISSING_PERMISSION");
  });

  it("denies invalid tokens without contacting the provider", async () => {
    const { fetch, decisionPoint } = createDecisionPoint();

    const result = await decisionPoint.authorize("not-a-jwt", "vendor-42", "edit:vendor_info");

    expect(result).toEqual({
      allowed: false,
      reason: "TOKEN_INVALID",
      degraded: false,
      subjectId: null
    });
    expect(fetch).not.toHaveBeenCalled();
  });

  it("fails closed when the provider is unreachable and nothing is cached", async () => {
    const { fetch, decisionPoint } = createDecisionPoint();
    fetch.mockRejectedValue(providerUnavailable("Identity provider request failed"));

    const result = await decisionPoint.authorize(await tokenFor("u1"), "vendor-legacy", "view:vendors");

    expect(result).toEqual({
      allowed: false,
      reason: "STALE_AND_UNREACHABLE",
      degraded: false,
      subjectId: "u1"
    });
  });

  it("refuses high-risk actions on degraded snapshots", async () => {
    const { cache, clock, fetch, decisionPoint } = createDecisionPoint();
    cache.put(u1Snapshot);
    clock.advance(2 * HOUR_MS);
    fetch.mockRejectedValue(providerUnavailable("Identity provider returned 503", 503));
    const token = await tokenFor("u1");

    await expect(decisionPoint.authorize(token, "vendor-42", "manage:payments")).resolves.toEqual({
      allowed: false,
      reason: "MISSING_PERMISSION",
      degraded: true,
      subjectId: "u1"
    });
    await expect(decisionPoint.authorize(token, "vendor-42", "edit:vendor_info")).resolves.toEqual({
      allowed: true,
      reason: "GRANTED",
      degraded: true,
      subjectId: "u1"
    });
  });

  it("allows high-risk actions on fresh snapshots", async () => {
    const { fetch, decisionPoint } = createDecisionPoint();
    fetch.mockResolvedValue(u1Snapshot);

    const result = await decisionPoint.authorize(await tokenFor("u1"), "vendor-42", "manage:payments");

    expect(result).toEqual({ allowed: true, reason: "GRANTED", degraded: false, subjectId: "u1" });
  });

  it("denies everything for subjects the provider rejects", async () => {
    const { fetch, decisionPoint } = createDecisionPoint();
    fetch.mockRejectedValue(providerRejected("Subject u1 is not known to the identity provider"));
    const token = await tokenFor("u1");

    await expect(decisionPoint.authorize(token, "vendor-42", "edit:vendor_info")).resolves.toMatchObject({
      allowed: false,
      reason: "NO_ORG_MEMBERSHIP"
    });
    await expect(decisionPoint.authorize(token, "vendor-legacy", "view:vendors")).resolves.toMatchObject({
      allowed: false,
      reason: "MISSING_PERMISSION"
    });
  });

  it("denies unknown resources", async () => {
    const { fetch, decisionPoint } = createDecisionPoint();
    fetch.mockResolvedValue(u1Snapshot);

    const result = await decisionPoint.authorize(await tokenFor("u1"), "vendor-99", "edit:vendor_info");

    expect(result).toEqual({
      allowed: false,
      reason: "RESOURCE_NOT_FOUND",
      degraded: false,
      subjectId: "u1"
    });
  });

  it("denies actions outside the permission registry", async () => {
    const { fetch, decisionPoint } = createDecisionPoint();
    fetch.mockResolvedValue(u1Snapshot);

    const result = await decisionPoint.authorize(await tokenFor("u1"), "vendor-42", "edit:vendor-info");

    expect(result.reason).toBe("MISSING_PERMISSION");
    expect(fetch).not.toHaveBeenCalled();
  });

  it("denies when the resource lookup fails", async () => {
    const { fetch, decisionPoint } = createDecisionPoint({
      findResource: async (resourceId) => {
        throw new Error(`invalid input syntax for type integer: "${resourceId}"`);
      }
    });
    fetch.mockResolvedValue(u1Snapshot);

    const result = await decisionPoint.authorize(await tokenFor("u1"), "vendor-42", "edit:vendor_info");

    expect(result).toEqual({
      allowed: false,
      reason: "RESOURCE_NOT_FOUND",
      degraded: false,
      subjectId: "u1"
    });
  });

  it("grants account-level permissions issued by the provider", async () => {
    const { fetch, decisionPoint } = createDecisionPoint();
    fetch.mockResolvedValue(
      buildSnapshot({
        subjectId: "rep-1",
        roles: ["vendor_representative"],
        platformPermissions: ["update:own_vendor", "read:vendors", "respond:inquiries"],
        memberships: []
      })
    );
    const token = await tokenFor("rep-1");

    await expect(decisionPoint.authorize(token, "vendor-legacy", "update:own_vendor")).resolves.toEqual({
      allowed: true,
      reason: "GRANTED",
      degraded: false,
      subjectId: "rep-1"
    });
    await expect(decisionPoint.authorize(token, "vendor-legacy", "respond:inquiries")).resolves.toMatchObject({
      allowed: true,
      reason: "GRANTED"
    });
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it("propagates the caller's cancellation", async () => {
    const { fetch, decisionPoint } = createDecisionPoint();
    fetch.mockResolvedValue(u1Snapshot);
    const controller = new AbortController();
    controller.abort();

    await expect(
      decisionPoint.authorize(await tokenFor("u1"), "vendor-42", "edit:vendor_info", {
        signal: controller.signal
      })
    ).rejects.toBeInstanceOf(SyncWaitAbortedError);
  });
});

describe("AuthorizationDecisionPoint sessions", () => {
  it("refreshes permissions on login", async () => {
    const { cache, fetch, decisionPoint } = createDecisionPoint();
    cache.put(u1Snapshot);
    fetch.mockResolvedValue(u1Snapshot);

    const { identity, sync } = await decisionPoint.login(await tokenFor("u1"));

    expect(identity.subjectId).toBe("u1");
    expect(sync.freshness).toBe("fresh");
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it("fails login when the provider is unreachable", async () => {
    const { cache, fetch, decisionPoint } = createDecisionPoint();
    cache.put(u1Snapshot);
    fetch.mockRejectedValue(providerUnavailable("Identity provider request failed"));

    await expect(decisionPoint.login(await tokenFor("u1"))).rejects.toBeInstanceOf(
      StaleAndUnreachableError
    );
  });

  it("rejects login with an invalid token", async () => {
    const { decisionPoint } = createDecisionPoint();

    await expect(decisionPoint.login("not-a-jwt")).rejects.toBeInstanceOf(TokenInvalidError);
  });

  it("drops the cached entry on logout", async () => {
    const { cache, decisionPoint } = createDecisionPoint();
    cache.put(u1Snapshot);

    const identity = await decisionPoint.logout(await tokenFor("u1"));

    expect(identity.subjectId).toBe("u1");
    expect(cache.get("u1")).toBeNull();
  });

  it("checks platform permissions only against fresh data", async () => {
    const { cache, clock, fetch, decisionPoint } = createDecisionPoint();
    cache.put(
      buildSnapshot({
        subjectId: "admin-1",
        roles: ["admin"],
        platformPermissions: ["manage:permission_sync"],
        memberships: []
      })
    );
    const token = await tokenFor("admin-1");

    await expect(
      decisionPoint.hasPlatformPermission(token, "manage:permission_sync")
    ).resolves.toMatchObject({ allowed: true });

    clock.advance(2 * HOUR_MS);
    fetch.mockRejectedValue(providerUnavailable("Identity provider returned 503", 503));
    await expect(
      decisionPoint.hasPlatformPermission(token, "manage:permission_sync")
    ).resolves.toMatchObject({ allowed: false });
  });
});
