import type { DecisionReason } from "@trellis/contracts";

export type { DecisionReason };

export type SyncTrigger = "login" | "stale" | "force_sync" | "sweep";

export interface OrganizationMembership {
  readonly organizationId: string;
  readonly role: string | null;
  readonly permissions: readonly string[];
}

/**
 * Role, permission and organization data for one subject as reported by the
 * identity provider. `globalPermissions` is the union of every membership's
 * permissions and the subject's platform-level grants.
 */
export interface Snapshot {
  readonly subjectId: string;
  readonly globalRoles: readonly string[];
  readonly globalPermissions: readonly string[];
  readonly organizationMemberships: ReadonlyMap<string, OrganizationMembership>;
}

export interface CacheEntry {
  readonly subjectId: string;
  readonly snapshot: Snapshot;
  readonly fetchedAt: Date;
  readonly ttlMs: number;
}

/**
 * How trustworthy the entry returned by the sync orchestrator is.
 * - `fresh`: younger than its TTL or fetched just now.
 * - `degraded`: stale, served because the provider was unavailable.
 * - `revoked`: the provider rejected the subject; the snapshot is empty.
 */
export type Freshness = "fresh" | "degraded" | "revoked";

export interface SyncResult {
  readonly entry: CacheEntry;
  readonly freshness: Freshness;
}

export interface PermissionHints {
  readonly roles: readonly string[];
  readonly permissions: readonly string[];
  readonly organizationId: string | null;
}

export interface VerifiedIdentity {
  readonly subjectId: string;
  readonly expiresAt: Date;
  /** Claims copied into the token at issuance. Never used for decisions. */
  readonly hints: PermissionHints;
  readonly rawClaims: Record<string, unknown>;
}

export interface Resource {
  readonly resourceId: string;
  /** Null for resources created before organization-based isolation. */
  readonly owningOrganizationId: string | null;
}

export type ScopeBasis = "legacy_global" | "organization" | "no_membership";

export interface EffectivePermissions {
  readonly basis: ScopeBasis;
  readonly organizationId: string | null;
  readonly permissions: ReadonlySet<string>;
}

export interface AuthorizationDecision {
  readonly allowed: boolean;
  readonly reason: DecisionReason;
  readonly degraded: boolean;
  readonly subjectId: string | null;
}
