import type { Pool, PoolClient, QueryResult, QueryResultRow } from "pg";

import { dbLogger } from "../config/logger";
import {
  type CountryCandidate,
  type CountryQuery,
  type CountryRecord,
  type OrderingField,
  type RefreshStatus,
} from "../models/country";
import type { WritePlan } from "../utils/classify";
import { StorageError } from "../utils/errors";

/**
 * Storage seam shared by the refresh pipeline and the read endpoints.
 */
export interface CountryStore {
  listNames(): Promise<string[]>;
  /** Applies inserts and updates atomically, returning the number written. */
  bulkWrite(plan: WritePlan, refreshedAt: Date): Promise<number>;
  listAll(): Promise<CountryRecord[]>;
  list(query: CountryQuery): Promise<CountryRecord[]>;
  findByName(name: string): Promise<CountryRecord | null>;
  deleteByName(name: string): Promise<boolean>;
  getStatus(): Promise<RefreshStatus>;
}

export interface SqlStatement {
  text: string;
  values: unknown[];
}

type CountryRow = {
  id: number;
  name: string;
  capital: string | null;
  region: string | null;
  population: number;
  currency_code: string | null;
  exchange_rate: number | null;
  estimated_gdp: number | null;
  flag_url: string | null;
  last_refreshed_at: Date;
};

type StatusRow = {
  total_countries: number;
  last_refreshed_at: Date | null;
};

const COLUMNS =
  "id, name, capital, region, population, currency_code, exchange_rate, estimated_gdp, flag_url, last_refreshed_at";

const ORDER_COLUMNS: Record<OrderingField, string> = {
  name: "name",
  population: "population",
  exchange_rate: "exchange_rate",
  estimated_gdp: "estimated_gdp",
  last_refreshed_at: "last_refreshed_at",
};

const UNNEST_CANDIDATES = `unnest(
    $1::text[], $2::text[], $3::text[], $4::bigint[],
    $5::text[], $6::float8[], $7::float8[], $8::text[]
  ) AS t(name, capital, region, population, currency_code, exchange_rate, estimated_gdp, flag_url)`;

function candidateColumns(candidates: CountryCandidate[]): unknown[] {
  return [
    candidates.map((c) => c.name),
    candidates.map((c) => c.capital),
    candidates.map((c) => c.region),
    candidates.map((c) => c.population),
    candidates.map((c) => c.currency_code),
    candidates.map((c) => c.exchange_rate),
    candidates.map((c) => c.estimated_gdp),
    candidates.map((c) => c.flag_url),
  ];
}

export function buildInsertStatement(
  candidates: CountryCandidate[],
  refreshedAt: Date
): SqlStatement {
  return {
    text: `
      INSERT INTO countries
      (name, capital, region, population, currency_code, exchange_rate, estimated_gdp, flag_url, last_refreshed_at)
      SELECT t.name, t.capital, t.region, t.population, t.currency_code, t.exchange_rate, t.estimated_gdp, t.flag_url, $9::timestamptz
      FROM ${UNNEST_CANDIDATES};
    `,
    values: [...candidateColumns(candidates), refreshedAt.toISOString()],
  };
}

export function buildUpdateStatement(
  candidates: CountryCandidate[],
  refreshedAt: Date
): SqlStatement {
  return {
    text: `
      UPDATE countries AS c SET
        name = t.name,
        capital = t.capital,
        region = t.region,
        population = t.population,
        currency_code = t.currency_code,
        exchange_rate = t.exchange_rate,
        estimated_gdp = t.estimated_gdp,
        flag_url = t.flag_url,
        last_refreshed_at = $9::timestamptz
      FROM ${UNNEST_CANDIDATES}
      WHERE LOWER(c.name) = LOWER(t.name);
    `,
    values: [...candidateColumns(candidates), refreshedAt.toISOString()],
  };
}

export function buildListQuery(query: CountryQuery): SqlStatement {
  const values: unknown[] = [];
  const where: string[] = [];

  if (query.region !== undefined) {
    values.push(query.region.toLowerCase());
    where.push(`LOWER(region) = $${String(values.length)}`);
  }

  if (query.currency_code !== undefined) {
    values.push(query.currency_code.toUpperCase());
    where.push(`UPPER(currency_code) = $${String(values.length)}`);
  }

  let order = "ORDER BY id";
  if (query.ordering !== undefined) {
    const column = ORDER_COLUMNS[query.ordering.field];
    const direction = query.ordering.direction === "desc" ? "DESC" : "ASC";
    order = `ORDER BY ${column} ${direction} NULLS LAST, id`;
  }

  let page = "";
  if (query.limit !== undefined) {
    values.push(query.limit);
    page += ` LIMIT $${String(values.length)}`;
  }
  if (query.offset !== undefined) {
    values.push(query.offset);
    page += ` OFFSET $${String(values.length)}`;
  }

  const whereClause = where.length > 0 ? ` WHERE ${where.join(" AND ")}` : "";
  return {
    text: `SELECT ${COLUMNS} FROM countries${whereClause} ${order}${page};`,
    values,
  };
}

function toRecord(row: CountryRow): CountryRecord {
  return {
    id: row.id,
    name: row.name,
    capital: row.capital,
    region: row.region,
    population: row.population,
    currency_code: row.currency_code,
    exchange_rate: row.exchange_rate,
    estimated_gdp: row.estimated_gdp,
    flag_url: row.flag_url,
    last_refreshed_at: row.last_refreshed_at.toISOString(),
  };
}

export class PgCountryRepository implements CountryStore {
  constructor(private readonly pool: Pool) {}

  private async execute<R extends QueryResultRow>(
    text: string,
    values: unknown[] = []
  ): Promise<QueryResult<R>> {
    try {
      return await this.pool.query<R>(text, values);
    } catch (error) {
      dbLogger.error({ err: error }, "Query failed");
      throw new StorageError("Database query failed", {
        cause: error,
      });
    }
  }

  async listNames(): Promise<string[]> {
    const result = await this.execute<{ name: string }>(
      "SELECT name FROM countries;"
    );
    return result.rows.map((row) => row.name);
  }

  async bulkWrite(plan: WritePlan, refreshedAt: Date): Promise<number> {
    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      dbLogger.error({ err: error }, "Could not acquire a connection");
      throw new StorageError("Failed to save data to the database", {
        cause: error,
      });
    }

    try {
      await client.query("BEGIN");
      if (plan.inserts.length > 0) {
        const insert = buildInsertStatement(plan.inserts, refreshedAt);
        await client.query(insert.text, insert.values);
      }
      if (plan.updates.length > 0) {
        const update = buildUpdateStatement(plan.updates, refreshedAt);
        const result = await client.query(update.text, update.values);
        // A row deleted after classification would otherwise vanish silently
        if (result.rowCount !== plan.updates.length) {
          throw new Error(
            `Updated ${result.rowCount ?? 0} of ${plan.updates.length} countries`
          );
        }
      }
      await client.query(
        `INSERT INTO refresh_status (id, last_refreshed_at) VALUES (1, $1::timestamptz)
         ON CONFLICT (id) DO UPDATE SET last_refreshed_at = EXCLUDED.last_refreshed_at;`,
        [refreshedAt.toISOString()]
      );
      await client.query("COMMIT");
    } catch (error) {
      dbLogger.error({ err: error }, "Bulk write failed, rolling back");
      try {
        await client.query("ROLLBACK");
      } catch (rollbackError) {
        dbLogger.error({ err: rollbackError }, "Rollback failed");
      }
      throw new StorageError("Failed to save data to the database", {
        cause: error,
      });
    } finally {
      client.release();
    }

    dbLogger.info(
      { inserted: plan.inserts.length, updated: plan.updates.length },
      "Bulk write committed"
    );
    return plan.inserts.length + plan.updates.length;
  }

  async listAll(): Promise<CountryRecord[]> {
    return this.list({});
  }

  async list(query: CountryQuery): Promise<CountryRecord[]> {
    const { text, values } = buildListQuery(query);
    const result = await this.execute<CountryRow>(text, values);
    return result.rows.map(toRecord);
  }

  async findByName(name: string): Promise<CountryRecord | null> {
    const result = await this.execute<CountryRow>(
      `SELECT ${COLUMNS} FROM countries WHERE LOWER(name) = LOWER($1);`,
      [name.trim()]
    );
    const row = result.rows[0];
    return row === undefined ? null : toRecord(row);
  }

  async deleteByName(name: string): Promise<boolean> {
    const result = await this.execute(
      "DELETE FROM countries WHERE LOWER(name) = LOWER($1) RETURNING id;",
      [name.trim()]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async getStatus(): Promise<RefreshStatus> {
    const result = await this.execute<StatusRow>(`
      SELECT
        (SELECT COUNT(*)::int FROM countries) AS total_countries,
        (SELECT last_refreshed_at FROM refresh_status WHERE id = 1) AS last_refreshed_at;
    `);
    const row = result.rows[0];
    return {
      total_countries: row?.total_countries ?? 0,
      last_refreshed_at: row?.last_refreshed_at?.toISOString() ?? null,
    };
  }
}
