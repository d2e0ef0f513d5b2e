import {
  createRemoteJWKSet,
  errors as joseErrors,
  jwtVerify,
  type JWTPayload,
  type JWTVerifyGetKey
} from "jose";
import { tokenInvalid, TokenInvalidError } from "./errors.js";
import type { PermissionHints, VerifiedIdentity } from "./types.js";
import type { ApiConfig } from "../config/index.js";

export type ClaimsVerifierConfig = Pick<
  ApiConfig,
  | "authIssuer"
  | "authAudience"
  | "authJwksUri"
  | "authLocalJwtSecret"
  | "authClockToleranceSeconds"
  | "authClaimsNamespace"
>;

export function parseBearerToken(header: string | undefined): string {
  if (!header) {
    throw tokenInvalid("Missing Authorization header");
  }

  const match = header.match(/^Bearer\s+(.+)$/iu);
  if (!match) {
    throw tokenInvalid("Authorization header must be a Bearer token");
  }

  const token = match[1]?.trim();
  if (!token) {
    throw tokenInvalid("Authorization header must include a token");
  }

  return token;
}

function claimAsString(payload: JWTPayload, key: string): string | null {
  const value = payload[key];
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : null;
}

function claimAsStringList(payload: JWTPayload, key: string): string[] {
  const value = payload[key];
  if (!Array.isArray(value)) {
    return [];
  }

  return value
    .filter((entry): entry is string => typeof entry === "string")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function describeVerificationFailure(error: unknown): string {
  if (error instanceof joseErrors.JWTExpired) {
    return "Token has expired";
  }

  if (error instanceof joseErrors.JWTClaimValidationFailed) {
    return `Token claim validation failed: ${error.claim}`;
  }

  if (error instanceof joseErrors.JWSSignatureVerificationFailed) {
    return "Token signature is invalid";
  }

  if (error instanceof joseErrors.JWKSNoMatchingKey) {
    return "Token was not signed by a published key";
  }

  if (error instanceof joseErrors.JWKSTimeout) {
    return "Signing keys could not be retrieved";
  }

  if (error instanceof joseErrors.JOSEAlgNotAllowed) {
    return "Token signing algorithm is not allowed";
  }

  return "Token is malformed";
}

interface VerifyOptions {
  issuer: string;
  audience: string;
  clockTolerance: number;
}

interface KeySource {
  verify(token: string, options: VerifyOptions): Promise<JWTPayload>;
}

function buildKeySource(config: ClaimsVerifierConfig, jwks?: JWTVerifyGetKey): KeySource {
  const keySet = jwks ?? (config.authJwksUri ? createRemoteJWKSet(new URL(config.authJwksUri)) : null);
  if (keySet) {
    return {
      verify: async (token, options) => {
        const { payload } = await jwtVerify(token, keySet, {
          ...options,
          algorithms: ["RS256"],
          requiredClaims: ["sub", "exp"]
        });
        return payload;
      }
    };
  }

  if (config.authLocalJwtSecret) {
    const sharedSecret = new TextEncoder().encode(config.authLocalJwtSecret);
    return {
      verify: async (token, options) => {
        const { payload } = await jwtVerify(token, sharedSecret, {
          ...options,
          algorithms: ["HS256"],
          requiredClaims: ["sub", "exp"]
        });
        return payload;
      }
    };
  }

  return {
    verify: async () => {
      throw tokenInvalid("Token verification is not configured");
    }
  };
}

/**
 * Checks signature, issuer, audience and expiry of identity provider tokens.
 * Permissions embedded in the token are returned as hints only.
 */
export class ClaimsVerifier {
  private readonly config: ClaimsVerifierConfig;
  private readonly keySource: KeySource;

  constructor(config: ClaimsVerifierConfig, options: { jwks?: JWTVerifyGetKey } = {}) {
    this.config = config;
    this.keySource = buildKeySource(config, options.jwks);
  }

  async verify(token: string): Promise<VerifiedIdentity> {
    let payload: JWTPayload;
    try {
      payload = await this.keySource.verify(token, {
        issuer: this.config.authIssuer,
        audience: this.config.authAudience,
        clockTolerance: this.config.authClockToleranceSeconds
      });
    } catch (error) {
      if (error instanceof TokenInvalidError) {
        throw error;
      }
      throw tokenInvalid(describeVerificationFailure(error), error);
    }

    const subjectId = claimAsString(payload, "sub");
    if (!subjectId) {
      throw tokenInvalid("Token is missing subject claim");
    }

    if (typeof payload.exp !== "number") {
      throw tokenInvalid("Token is missing expiry claim");
    }

    return {
      subjectId,
      expiresAt: new Date(payload.exp * 1000),
      hints: this.readHints(payload),
      rawClaims: { ...payload }
    };
  }

  async verifyAuthorizationHeader(header: string | undefined): Promise<VerifiedIdentity> {
    return this.verify(parseBearerToken(header));
  }

  private readHints(payload: JWTPayload): PermissionHints {
    const namespace = this.config.authClaimsNamespace;
    const permissions = new Set([
      ...claimAsStringList(payload, "permissions"),
      ...claimAsStringList(payload, `${namespace}permissions`)
    ]);

    return {
      roles: [...new Set(claimAsStringList(payload, `${namespace}roles`))],
      permissions: [...permissions],
      organizationId: claimAsString(payload, "org_id")
    };
  }
}
