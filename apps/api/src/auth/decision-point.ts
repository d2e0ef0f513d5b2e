import type { Logger } from "pino";
import { StaleAndUnreachableError, TokenInvalidError } from "./errors.js";
import { isKnownPermission } from "./permissions.js";
import type { ResourceStore } from "./resource-store.js";
import { scope } from "./scope-resolver.js";
import type { EnsureFreshOptions, SyncOrchestrator } from "./sync-orchestrator.js";
import type { ClaimsVerifier } from "./token-verifier.js";
import type {
  AuthorizationDecision,
  DecisionReason,
  Resource,
  SyncResult,
  VerifiedIdentity
} from "./types.js";

export interface DecisionPointOptions {
  verifier: Pick<ClaimsVerifier, "verify">;
  orchestrator: SyncOrchestrator;
  resources: ResourceStore;
  /** Actions refused while only a degraded snapshot is available. */
  highRiskActions: Iterable<string>;
  logger: Logger;
}

export interface SessionSync {
  identity: VerifiedIdentity;
  sync: SyncResult;
}

function decision(
  reason: DecisionReason,
  subjectId: string | null,
  degraded = false
): AuthorizationDecision {
  return {
    allowed: reason === "GRANTED",
    reason,
    degraded,
    subjectId
  };
}

/**
 * Combines token verification, permission refresh and resource scoping into
 * one decision. Every failure resolves to a denial; a resource that cannot be
 * looked up is treated as missing. The only error that escapes `authorize` is
 * the caller's own cancellation.
 */
export class AuthorizationDecisionPoint {
  private readonly verifier: Pick<ClaimsVerifier, "verify">;
  private readonly orchestrator: SyncOrchestrator;
  private readonly resources: ResourceStore;
  private readonly highRiskActions: ReadonlySet<string>;
  private readonly logger: Logger;

  constructor(options: DecisionPointOptions) {
    this.verifier = options.verifier;
    this.orchestrator = options.orchestrator;
    this.resources = options.resources;
    this.highRiskActions = new Set(options.highRiskActions);
    this.logger = options.logger.child({ module: "decision-point" });
  }

  async authorize(
    token: string,
    resourceId: string,
    action: string,
    options: EnsureFreshOptions = {}
  ): Promise<AuthorizationDecision> {
    let identity: VerifiedIdentity;
    try {
      identity = await this.verifier.verify(token);
    } catch (error) {
      if (error instanceof TokenInvalidError) {
        this.logger.debug({ resourceId, action, detail: error.message }, "Token rejected");
        return decision("TOKEN_INVALID", null);
      }
      throw error;
    }

    const subjectId = identity.subjectId;
    if (!isKnownPermission(action)) {
      this.logger.warn(
        { subjectId, resourceId, action },
        "Authorization requested for unknown action"
      );
      return decision("MISSING_PERMISSION", subjectId);
    }

    let sync: SyncResult;
    try {
      sync = await this.orchestrator.ensureFresh(subjectId, "stale", options);
    } catch (error) {
      if (error instanceof StaleAndUnreachableError) {
        this.logger.warn({ subjectId, resourceId, action }, error.message);
        return decision("STALE_AND_UNREACHABLE", subjectId);
      }
      throw error;
    }

    let resource: Resource | null;
    try {
      resource = await this.resources.findResource(resourceId);
    } catch (error) {
      this.logger.error({ err: error, subjectId, resourceId, action }, "Resource lookup failed");
      return decision("RESOURCE_NOT_FOUND", subjectId);
    }

    if (!resource) {
      this.logger.debug(
        { subjectId, resourceId, action },
        "Authorization requested for unknown resource"
      );
      return decision("RESOURCE_NOT_FOUND", subjectId);
    }

    const degraded = sync.freshness === "degraded";
    const effective = scope(sync.entry.snapshot, resource);

    if (effective.basis === "no_membership") {
      this.logger.debug(
        { subjectId, resourceId, action, organizationId: effective.organizationId },
        "Subject is not a member of the owning organization"
      );
      return decision("NO_ORG_MEMBERSHIP", subjectId, degraded);
    }

    if (!effective.permissions.has(action)) {
      this.logger.debug(
        { subjectId, resourceId, action, basis: effective.basis, freshness: sync.freshness },
        "Permission missing"
      );
      return decision("MISSING_PERMISSION", subjectId, degraded);
    }

    if (degraded && this.highRiskActions.has(action)) {
      this.logger.warn(
        { subjectId, resourceId, action, fetchedAt: sync.entry.fetchedAt.toISOString() },
        "High-risk action refused on degraded permissions"
      );
      return decision("MISSING_PERMISSION", subjectId, true);
    }

    return decision("GRANTED", subjectId, degraded);
  }

  /** Verifies the token and refreshes the subject's permissions without serving stale data. */
  async login(token: string, options: EnsureFreshOptions = {}): Promise<SessionSync> {
    const identity = await this.verifier.verify(token);
    const sync = await this.orchestrator.ensureFresh(identity.subjectId, "login", options);
    return { identity, sync };
  }

  async logout(token: string): Promise<VerifiedIdentity> {
    const identity = await this.verifier.verify(token);
    this.orchestrator.invalidate(identity.subjectId);
    return identity;
  }

  forceSync(subjectId: string, options: EnsureFreshOptions = {}): Promise<SyncResult> {
    return this.orchestrator.forceSync(subjectId, options);
  }

  /**
   * Checks a platform-level permission such as the sync administration grant.
   * Degraded snapshots never satisfy it.
   */
  async hasPlatformPermission(
    token: string,
    permission: string,
    options: EnsureFreshOptions = {}
  ): Promise<{ identity: VerifiedIdentity; allowed: boolean }> {
    const identity = await this.verifier.verify(token);
    const sync = await this.orchestrator.ensureFresh(identity.subjectId, "stale", options);
    const allowed =
      sync.freshness === "fresh" && sync.entry.snapshot.globalPermissions.includes(permission);
    return { identity, allowed };
  }
}
