import type { ResourceSeed } from "../config/index.js";
import type { Resource } from "./types.js";

interface QueryResult<Row extends Record<string, unknown>> {
  rows: Row[];
}

export interface Queryable {
  query<Row extends Record<string, unknown>>(
    query: string,
    values?: unknown[]
  ): Promise<QueryResult<Row>>;
}

/** Read-only lookup of resource ownership. */
export interface ResourceStore {
  findResource(resourceId: string): Promise<Resource | null>;
}

export class InMemoryResourceStore implements ResourceStore {
  private readonly resources: Map<string, Resource>;

  constructor(seeds: readonly ResourceSeed[] = []) {
    this.resources = new Map(
      seeds.map((seed) => [
        seed.resourceId,
        { resourceId: seed.resourceId, owningOrganizationId: seed.owningOrganizationId }
      ])
    );
  }

  async findResource(resourceId: string): Promise<Resource | null> {
    return this.resources.get(resourceId) ?? null;
  }
}

export class PostgresResourceStore implements ResourceStore {
  constructor(private readonly db: Queryable) {}

  async findResource(resourceId: string): Promise<Resource | null> {
    const result = await this.db.query<{ id: string | number; organization_id: string | null }>(
      `
        SELECT id, organization_id
        FROM vendors
        WHERE id = $1
        LIMIT 1
      `,
      [resourceId]
    );

    const row = result.rows[0];
    if (!row) {
      return null;
    }

    return {
      resourceId: String(row.id),
      owningOrganizationId: row.organization_id
    };
  }
}
