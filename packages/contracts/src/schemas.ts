import { z } from "zod";

export const HealthStatusSchema = z.literal("ok");

export const HealthResponseSchema = z.object({
  status: HealthStatusSchema,
  timestamp: z.string().datetime()
});

export const ApiErrorSchema = z.object({
  code: z.string().min(1),
  message: z.string().min(1)
});

export const UnauthorizedErrorSchema = ApiErrorSchema.extend({
  code: z.literal("token_invalid")
});

export const ForbiddenErrorSchema = ApiErrorSchema.extend({
  code: z.literal("permission_denied")
});

export const ServiceUnavailableErrorSchema = ApiErrorSchema.extend({
  code: z.literal("stale_and_unreachable")
});

export const DECISION_REASONS = [
  "GRANTED",
  "MISSING_PERMISSION",
  "NO_ORG_MEMBERSHIP",
  "STALE_AND_UNREACHABLE",
  "TOKEN_INVALID",
  "RESOURCE_NOT_FOUND"
] as const;

export const DecisionReasonSchema = z.enum(DECISION_REASONS);

export const AuthorizeRequestSchema = z.object({
  resourceId: z.string().trim().min(1),
  action: z.string().trim().min(1),
  token: z.string().min(1).optional()
});

export const AuthorizeResponseSchema = z.object({
  allowed: z.boolean(),
  reason: DecisionReasonSchema,
  degraded: z.boolean()
});

export const OrganizationMembershipSchema = z.object({
  organizationId: z.string().min(1),
  role: z.string().min(1).nullable(),
  permissions: z.array(z.string().min(1))
});

export const SyncStatusSchema = z.enum(["synced", "revoked"]);

export const SubjectSyncSummarySchema = z.object({
  subjectId: z.string().min(1),
  status: SyncStatusSchema,
  fetchedAt: z.string().datetime(),
  roles: z.array(z.string()),
  permissions: z.array(z.string()),
  organizations: z.array(OrganizationMembershipSchema)
});

export const SubjectIdParamsSchema = z.object({
  subjectId: z.string().trim().min(1)
});

export type HealthResponse = z.infer<typeof HealthResponseSchema>;
export type ApiError = z.infer<typeof ApiErrorSchema>;
export type DecisionReason = z.infer<typeof DecisionReasonSchema>;
export type AuthorizeRequest = z.infer<typeof AuthorizeRequestSchema>;
export type AuthorizeResponse = z.infer<typeof AuthorizeResponseSchema>;
export type OrganizationMembershipBody = z.infer<typeof OrganizationMembershipSchema>;
export type SyncStatus = z.infer<typeof SyncStatusSchema>;
export type SubjectSyncSummary = z.infer<typeof SubjectSyncSummarySchema>;
