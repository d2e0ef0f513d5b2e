import type { SubjectSyncSummary } from "@trellis/contracts";
import type { SyncResult } from "../../auth/types.js";

export function toSyncSummary(result: SyncResult): SubjectSyncSummary {
  const { snapshot, fetchedAt } = result.entry;

  return {
    subjectId: snapshot.subjectId,
    status: result.freshness === "revoked" ? "revoked" : "synced",
    fetchedAt: fetchedAt.toISOString(),
    roles: [...snapshot.globalRoles],
    permissions: [...snapshot.globalPermissions],
    organizations: [...snapshot.organizationMemberships.values()].map((membership) => ({
      organizationId: membership.organizationId,
      role: membership.role,
      permissions: [...membership.permissions]
    }))
  };
}
