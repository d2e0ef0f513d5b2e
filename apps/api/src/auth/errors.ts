export const AUTHZ_ERROR_CODES = [
  "token_invalid",
  "provider_unavailable",
  "provider_rejected",
  "stale_and_unreachable",
  "sync_wait_aborted"
] as const;

export type AuthzErrorCode = (typeof AUTHZ_ERROR_CODES)[number];

export class AuthzError extends Error {
  readonly code: AuthzErrorCode;

  constructor(code: AuthzErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AuthzError";
    this.code = code;
  }
}

export class TokenInvalidError extends AuthzError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("token_invalid", message, options);
    this.name = "TokenInvalidError";
  }
}

export class ProviderUnavailableError extends AuthzError {
  readonly statusCode: number | null;

  constructor(message: string, statusCode: number | null = null, options?: { cause?: unknown }) {
    super("provider_unavailable", message, options);
    this.name = "ProviderUnavailableError";
    this.statusCode = statusCode;
  }
}

export class ProviderRejectedError extends AuthzError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("provider_rejected", message, options);
    this.name = "ProviderRejectedError";
  }
}

export class StaleAndUnreachableError extends AuthzError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("stale_and_unreachable", message, options);
    this.name = "StaleAndUnreachableError";
  }
}

export class SyncWaitAbortedError extends AuthzError {
  constructor(message = "Caller stopped waiting for the permission refresh") {
    super("sync_wait_aborted", message);
    this.name = "SyncWaitAbortedError";
  }
}

export function tokenInvalid(message: string, cause?: unknown) {
  return new TokenInvalidError(message, { cause });
}

export function providerUnavailable(message: string, statusCode: number | null = null, cause?: unknown) {
  return new ProviderUnavailableError(message, statusCode, { cause });
}

export function providerRejected(message: string, cause?: unknown) {
  return new ProviderRejectedError(message, { cause });
}

export function staleAndUnreachable(subjectId: string, cause?: unknown) {
  return new StaleAndUnreachableError(
    `Permissions for ${subjectId} are unavailable and no usable cache entry exists`,
    { cause }
  );
}

export function isAuthzError(error: unknown): error is AuthzError {
  return error instanceof AuthzError;
}
