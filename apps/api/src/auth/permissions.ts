export const PERMISSIONS = [
  "create:events",
  "read:events",
  "update:events",
  "delete:events",
  "manage:vendor_relationships",
  "view:vendors",
  "inquire:vendors",
  "read:vendor_info",
  "edit:vendor_info",
  "manage:vendor_bookings",
  "read:vendor_inquiries",
  "respond:vendor_inquiries",
  "view:vendor_analytics",
  "manage:vendor_team",
  "manage:vendor_images",
  "manage:guests",
  "read:guests",
  "invite:guests",
  "edit:schedules",
  "read:schedules",
  "access:analytics",
  "export:reports",
  "manage:payments",
  "view:payments",
  "plan:wedding",
  "view:wedding",
  "manage:permission_sync",
  // Account and profile
  "read:own_profile",
  "update:own_profile",
  "read:vendors",
  "update:own_vendor",
  "create:inquiries",
  "read:inquiries",
  "manage:events",
  "invite:users",
  // Legacy, superseded by the organization-scoped vendor permissions
  "manage:vendor_business",
  "respond:inquiries"
] as const;

export type Permission = (typeof PERMISSIONS)[number];

export const ORGANIZATION_ROLES = ["owner", "manager", "employee", "representative"] as const;

export type OrganizationRole = (typeof ORGANIZATION_ROLES)[number];

const KNOWN_PERMISSIONS: ReadonlySet<string> = new Set(PERMISSIONS);

const BASE_ORGANIZATION_PERMISSIONS: readonly Permission[] = [
  "read:vendor_info",
  "read:vendor_inquiries"
];

const ORGANIZATION_ROLE_PERMISSIONS: Record<OrganizationRole, readonly Permission[]> = {
  owner: [
    ...BASE_ORGANIZATION_PERMISSIONS,
    "edit:vendor_info",
    "manage:vendor_bookings",
    "respond:vendor_inquiries",
    "view:vendor_analytics",
    "manage:vendor_team"
  ],
  manager: [
    ...BASE_ORGANIZATION_PERMISSIONS,
    "edit:vendor_info",
    "manage:vendor_bookings",
    "respond:vendor_inquiries",
    "view:vendor_analytics",
    "manage:vendor_team"
  ],
  employee: [...BASE_ORGANIZATION_PERMISSIONS, "manage:vendor_bookings", "respond:vendor_inquiries"],
  representative: [...BASE_ORGANIZATION_PERMISSIONS, "respond:vendor_inquiries"]
};

export function isKnownPermission(value: string): value is Permission {
  return KNOWN_PERMISSIONS.has(value);
}

export function isOrganizationRole(value: string): value is OrganizationRole {
  return (ORGANIZATION_ROLES as readonly string[]).includes(value);
}

/** Default grant for an organization role; empty for roles outside the template set. */
export function permissionsForOrganizationRole(role: string | null): readonly Permission[] {
  if (!role) {
    return [];
  }

  const normalized = role.trim().toLowerCase();
  return isOrganizationRole(normalized) ? ORGANIZATION_ROLE_PERMISSIONS[normalized] : [];
}

export function unknownPermissions(values: Iterable<string>): string[] {
  return [...values].filter((value) => !isKnownPermission(value));
}
