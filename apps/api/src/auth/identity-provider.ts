import type { Logger } from "pino";
import { z } from "zod";
import type { ApiConfig, StaticSubject } from "../config/index.js";
import {
  isAuthzError,
  ProviderUnavailableError,
  providerRejected,
  providerUnavailable
} from "./errors.js";
import { permissionsForOrganizationRole } from "./permissions.js";
import { buildSnapshot } from "./snapshot.js";
import type { Snapshot } from "./types.js";

/**
 * Reads a subject's roles, permissions and organization memberships.
 * Fails with `ProviderRejectedError` or `ProviderUnavailableError`; never retries.
 */
export interface IdentityProviderClient {
  fetch(subjectId: string): Promise<Snapshot>;
}

const PAGE_SIZE = 100;
const MAX_PAGES = 10;
const TOKEN_EXPIRY_MARGIN_MS = 60_000;

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().int().positive().default(86_400)
});

const RoleSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1)
});

const PermissionSchema = z.object({
  permission_name: z.string().min(1),
  resource_server_identifier: z.string().optional()
});

const OrganizationSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional()
});

/**
 * `subject`: a 404 means the subject itself is gone.
 * `empty`: a 404 means the organization or role was removed mid-read.
 */
type NotFoundPolicy = "subject" | "empty";

interface ReadContext {
  subjectId: string;
  signal: AbortSignal;
  timedOut(): boolean;
  accessToken: string;
  rolePermissions: Map<string, Promise<string[]>>;
}

export interface ManagementApiClientOptions {
  baseUrl: string;
  clientId: string;
  clientSecret: string;
  audience: string;
  timeoutMs: number;
  logger: Logger;
  fetchImpl?: typeof globalThis.fetch;
  now?: () => Date;
}

export class ManagementApiClient implements IdentityProviderClient {
  private readonly baseUrl: string;
  private readonly clientId: string;
  private readonly clientSecret: string;
  private readonly audience: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly fetchImpl: typeof globalThis.fetch;
  private readonly now: () => Date;
  private cachedToken: { value: string; expiresAtMs: number } | null = null;

  constructor(options: ManagementApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/u, "");
    this.clientId = options.clientId;
    this.clientSecret = options.clientSecret;
    this.audience = options.audience;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger.child({ module: "identity-provider" });
    this.fetchImpl = options.fetchImpl ?? globalThis.fetch;
    this.now = options.now ?? (() => new Date());
  }

  async fetch(subjectId: string): Promise<Snapshot> {
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    try {
      const accessToken = await this.getAccessToken(controller.signal, () => timedOut);
      const context: ReadContext = {
        subjectId,
        signal: controller.signal,
        timedOut: () => timedOut,
        accessToken,
        rolePermissions: new Map()
      };

      const userPath = `/api/v2/users/${encodeURIComponent(subjectId)}`;
      const [roles, permissions, organizations] = await Promise.all([
        this.getList(context, `${userPath}/roles`, RoleSchema, "subject"),
        this.getList(context, `${userPath}/permissions`, PermissionSchema, "subject"),
        this.getList(context, `${userPath}/organizations`, OrganizationSchema, "subject")
      ]);

      const memberships = await Promise.all(
        organizations.map((organization) => this.readMembership(context, organization.id))
      );

      return buildSnapshot({
        subjectId,
        roles: roles.map((role) => role.name),
        platformPermissions: permissions.map((permission) => permission.permission_name),
        memberships
      });
    } catch (error) {
      controller.abort();
      if (isAuthzError(error)) {
        this.logger.warn(
          {
            subjectId,
            code: error.code,
            statusCode: error instanceof ProviderUnavailableError ? error.statusCode : undefined,
            cause: error.cause instanceof Error ? error.cause.message : undefined
          },
          error.message
        );
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }

  private async readMembership(context: ReadContext, organizationId: string) {
    const memberRoles = await this.getList(
      context,
      `/api/v2/organizations/${encodeURIComponent(organizationId)}/members/${encodeURIComponent(
        context.subjectId
      )}/roles`,
      RoleSchema,
      "empty"
    );

    const rolePermissions = await Promise.all(
      memberRoles.map((role) => this.readRolePermissions(context, role.id))
    );
    const roleNames = memberRoles.map((role) => role.name).sort();

    return {
      organizationId,
      role: roleNames[0] ?? null,
      permissions: [
        ...rolePermissions.flat(),
        ...roleNames.flatMap((roleName) => permissionsForOrganizationRole(roleName))
      ]
    };
  }

  private readRolePermissions(context: ReadContext, roleId: string): Promise<string[]> {
    const existing = context.rolePermissions.get(roleId);
    if (existing) {
      return existing;
    }

    const pending = this.getList(
      context,
      `/api/v2/roles/${encodeURIComponent(roleId)}/permissions`,
      PermissionSchema,
      "empty"
    ).then((permissions) => permissions.map((permission) => permission.permission_name));
    context.rolePermissions.set(roleId, pending);
    return pending;
  }

  private async getAccessToken(signal: AbortSignal, timedOut: () => boolean): Promise<string> {
    const nowMs = this.now().getTime();
    if (this.cachedToken && this.cachedToken.expiresAtMs - TOKEN_EXPIRY_MARGIN_MS > nowMs) {
      return this.cachedToken.value;
    }

    const response = await this.send(`${this.baseUrl}/oauth/token`, signal, timedOut, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        accept: "application/json"
      },
      body: JSON.stringify({
        grant_type: "client_credentials",
        client_id: this.clientId,
        client_secret: this.clientSecret,
        audience: this.audience
      })
    });

    if (!response.ok) {
      throw providerUnavailable(
        `Identity provider token request failed (${response.status})`,
        response.status
      );
    }

    const parsed = TokenResponseSchema.safeParse(await this.readJson(response, signal, timedOut));
    if (!parsed.success) {
      throw providerUnavailable("Identity provider token response is malformed", response.status);
    }

    this.cachedToken = {
      value: parsed.data.access_token,
      expiresAtMs: nowMs + parsed.data.expires_in * 1000
    };
    return parsed.data.access_token;
  }

  /** Reads every page of a management API listing. */
  private async getList<T extends z.ZodTypeAny>(
    context: ReadContext,
    path: string,
    itemSchema: T,
    notFound: NotFoundPolicy
  ): Promise<z.output<T>[]> {
    const pageSchema = z.array(itemSchema);
    const items: z.output<T>[] = [];

    for (let page = 0; page < MAX_PAGES; page += 1) {
      const batch = await this.getPage(
        context,
        `${path}?per_page=${PAGE_SIZE}&page=${String(page)}`,
        pageSchema
      );

      if (batch === null) {
        if (notFound === "subject") {
          throw providerRejected(`Subject ${context.subjectId} is not known to the identity provider`);
        }
        this.logger.debug(
          { subjectId: context.subjectId, path },
          "Identity provider listing not found, reading it as empty"
        );
        return [];
      }

      items.push(...batch);
      if (batch.length < PAGE_SIZE) {
        return items;
      }
    }

    throw providerUnavailable(
      `Identity provider listing ${path} exceeds ${String(MAX_PAGES * PAGE_SIZE)} entries`
    );
  }

  /** Resolves to null on 404. */
  private async getPage<T extends z.ZodTypeAny>(
    context: ReadContext,
    path: string,
    schema: T
  ): Promise<z.output<T> | null> {
    const response = await this.send(`${this.baseUrl}${path}`, context.signal, context.timedOut, {
      method: "GET",
      headers: {
        accept: "application/json",
        authorization: `Bearer ${context.accessToken}`
      }
    });

    if (response.status === 401 || response.status === 403) {
      this.cachedToken = null;
      throw providerUnavailable(
        `Identity provider refused the service credentials (${response.status})`,
        response.status
      );
    }

    if (response.status === 404) {
      return null;
    }

    if (response.status === 429 || response.status >= 500) {
      throw providerUnavailable(`Identity provider returned ${response.status}`, response.status);
    }

    if (!response.ok) {
      throw providerRejected(`Identity provider rejected the request (${response.status})`);
    }

    const parsed = schema.safeParse(await this.readJson(response, context.signal, context.timedOut));
    if (!parsed.success) {
      throw providerRejected(
        `Identity provider returned a malformed response for ${path.split("?")[0] ?? path}`,
        parsed.error
      );
    }

    return parsed.data;
  }

  private async send(
    url: string,
    signal: AbortSignal,
    timedOut: () => boolean,
    init: RequestInit
  ): Promise<Response> {
    try {
      return await this.fetchImpl(url, { ...init, signal });
    } catch (error) {
      throw this.transportFailure(error, timedOut());
    }
  }

  private async readJson(
    response: Response,
    signal: AbortSignal,
    timedOut: () => boolean
  ): Promise<unknown> {
    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw this.transportFailure(error, timedOut() || signal.aborted);
    }

    try {
      return JSON.parse(text) as unknown;
    } catch {
      return undefined;
    }
  }

  private transportFailure(error: unknown, timedOut: boolean) {
    if (timedOut) {
      return providerUnavailable(
        `Identity provider did not respond within ${String(this.timeoutMs)}ms`,
        null,
        error
      );
    }

    return providerUnavailable("Identity provider request failed", null, error);
  }
}

/**
 * Serves snapshots from configuration. Unknown subjects are rejected the
 * same way the management API rejects them.
 */
export class StaticIdentityProvider implements IdentityProviderClient {
  private readonly subjects: Map<string, StaticSubject>;

  constructor(subjects: readonly StaticSubject[]) {
    this.subjects = new Map(subjects.map((subject) => [subject.subjectId, subject]));
  }

  async fetch(subjectId: string): Promise<Snapshot> {
    const subject = this.subjects.get(subjectId);
    if (!subject) {
      throw providerRejected(`Subject ${subjectId} is not known to the identity provider`);
    }

    return buildSnapshot({
      subjectId,
      roles: subject.roles,
      platformPermissions: subject.permissions,
      memberships: subject.organizations.map((membership) => ({
        organizationId: membership.organizationId,
        role: membership.role,
        permissions: membership.permissions ?? permissionsForOrganizationRole(membership.role)
      }))
    });
  }
}

export function createIdentityProvider(
  config: Pick<
    ApiConfig,
    "idpBaseUrl" | "idpClientId" | "idpClientSecret" | "idpAudience" | "idpTimeoutMs" | "idpStaticSubjects"
  >,
  logger: Logger,
  fetchImpl?: typeof globalThis.fetch
): IdentityProviderClient {
  if (!config.idpBaseUrl) {
    logger.warn(
      { subjects: config.idpStaticSubjects.length },
      "IDP_BASE_URL is not set; serving permissions from IDP_STATIC_SUBJECTS_JSON"
    );
    return new StaticIdentityProvider(config.idpStaticSubjects);
  }

  if (!config.idpClientId || !config.idpClientSecret) {
    throw new Error("IDP_CLIENT_ID and IDP_CLIENT_SECRET are required when IDP_BASE_URL is set");
  }

  return new ManagementApiClient({
    baseUrl: config.idpBaseUrl,
    clientId: config.idpClientId,
    clientSecret: config.idpClientSecret,
    audience: config.idpAudience ?? `${config.idpBaseUrl}/api/v2/`,
    timeoutMs: config.idpTimeoutMs,
    logger,
    fetchImpl
  });
}
