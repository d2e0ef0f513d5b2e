import type { OrganizationMembership, Snapshot } from "./types.js";

export interface SnapshotInput {
  subjectId: string;
  roles: Iterable<string>;
  platformPermissions: Iterable<string>;
  memberships: Iterable<{
    organizationId: string;
    role: string | null;
    permissions: Iterable<string>;
  }>;
}

function sortedUnique(values: Iterable<string>): readonly string[] {
  const cleaned = [...values].map((value) => value.trim()).filter((value) => value.length > 0);
  return Object.freeze([...new Set(cleaned)].sort());
}

/**
 * Builds an immutable snapshot. Arrays are de-duplicated and sorted so two
 * reads of unchanged provider data produce equal snapshots.
 */
export function buildSnapshot(input: SnapshotInput): Snapshot {
  const memberships = new Map<string, OrganizationMembership>();

  for (const membership of input.memberships) {
    const existing = memberships.get(membership.organizationId);
    const permissions = sortedUnique([
      ...(existing?.permissions ?? []),
      ...membership.permissions
    ]);
    memberships.set(
      membership.organizationId,
      Object.freeze({
        organizationId: membership.organizationId,
        role: existing?.role ?? membership.role,
        permissions
      })
    );
  }

  const orderedMemberships = new Map(
    [...memberships.entries()].sort(([left], [right]) => left.localeCompare(right))
  );

  const globalPermissions = sortedUnique([
    ...input.platformPermissions,
    ...[...orderedMemberships.values()].flatMap((membership) => membership.permissions)
  ]);

  return Object.freeze({
    subjectId: input.subjectId,
    globalRoles: sortedUnique(input.roles),
    globalPermissions,
    organizationMemberships: orderedMemberships
  });
}

export function emptySnapshot(subjectId: string): Snapshot {
  return buildSnapshot({ subjectId, roles: [], platformPermissions: [], memberships: [] });
}
