import type { Pool } from "pg";

import { dbLogger } from "./logger";

export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS countries (
    id SERIAL PRIMARY KEY,
    name TEXT NOT NULL,
    capital TEXT,
    region TEXT,
    population BIGINT NOT NULL CHECK (population >= 0),
    currency_code TEXT,
    exchange_rate DOUBLE PRECISION,
    estimated_gdp DOUBLE PRECISION CHECK (estimated_gdp >= 0),
    flag_url TEXT,
    last_refreshed_at TIMESTAMPTZ NOT NULL
  );

  CREATE UNIQUE INDEX IF NOT EXISTS countries_name_key ON countries (LOWER(name));

  CREATE TABLE IF NOT EXISTS refresh_status (
    id SMALLINT PRIMARY KEY CHECK (id = 1),
    last_refreshed_at TIMESTAMPTZ
  );
`;

export const initializeDB = async (pool: Pool): Promise<void> => {
  await pool.query(SCHEMA_SQL);
  dbLogger.info("Database initialized successfully");
};
