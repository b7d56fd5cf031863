import { createApp } from "./app";
import pool, { closePool } from "./config/db";
import { env } from "./config/env";
import { initializeDB } from "./config/initDB";
import { serverLogger } from "./config/logger";
import { PgCountryRepository } from "./repositories/countries.repository";
import { RefreshService } from "./services/refresh.service";

await initializeDB(pool);

const store = new PgCountryRepository(pool);
const refreshService = new RefreshService({
  store,
  config: {
    countriesUrl: env.COUNTRIES_API_URL,
    ratesUrl: env.EXCHANGE_RATE_API_URL,
    sourceTimeoutMs: env.SOURCE_TIMEOUT_MS,
    gdpPerCapitaProxy: env.GDP_PER_CAPITA_PROXY,
    summaryImagePath: env.SUMMARY_IMAGE_PATH,
    flagTimeoutMs: env.FLAG_TIMEOUT_MS,
  },
});

const app = createApp({
  store,
  refreshService,
  summaryImagePath: env.SUMMARY_IMAGE_PATH,
});

const server = app.listen(env.PORT, () => {
  serverLogger.info({ port: env.PORT }, "Server is running");
});

function shutdown(signal: string): void {
  serverLogger.info({ signal }, "Shutting down");
  server.close(() => {
    closePool()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        serverLogger.error({ err }, "Error closing database pool");
        process.exit(1);
      });
  });
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
