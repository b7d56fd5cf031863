import pg from "pg";

import { env } from "./env";
import { dbLogger } from "./logger";

const { Pool, types } = pg;

// BIGINT population comes back as a JS number instead of a string
types.setTypeParser(types.builtins.INT8, (val: string) => parseInt(val, 10));

const poolConfig: pg.PoolConfig = {
  connectionString: env.DATABASE_URL,
  ssl: env.DATABASE_SSL ? { rejectUnauthorized: false } : undefined,
  max: 10,
  idleTimeoutMillis: 30_000,
  connectionTimeoutMillis: 5000,
};

const pool = new Pool(poolConfig);

pool.on("error", (err) => {
  dbLogger.error({ err }, "Idle database client error");
});

export async function closePool(): Promise<void> {
  await pool.end();
  dbLogger.info("Database connection closed");
}

export default pool;
