import type { EffectivePermissions, Resource, Snapshot } from "./types.js";

/**
 * Narrows a snapshot to the permissions that apply to one resource.
 *
 * Resources without an owning organization predate tenant isolation and are
 * checked against the subject's global permissions. Every other resource is
 * checked against the membership for its owner only; a permission held in a
 * different organization never applies.
 */
export function scope(snapshot: Snapshot, resource: Resource): EffectivePermissions {
  if (resource.owningOrganizationId === null) {
    return {
      basis: "legacy_global",
      organizationId: null,
      permissions: new Set(snapshot.globalPermissions)
    };
  }

  const membership = snapshot.organizationMemberships.get(resource.owningOrganizationId);
  if (!membership) {
    return {
      basis: "no_membership",
      organizationId: resource.owningOrganizationId,
      permissions: new Set()
    };
  }

  return {
    basis: "organization",
    organizationId: membership.organizationId,
    permissions: new Set(membership.permissions)
  };
}
