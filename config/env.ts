import "dotenv/config";

import { fileURLToPath } from "node:url";

import { z } from "zod";

const DEFAULT_SUMMARY_IMAGE_PATH = fileURLToPath(
  new URL("../cache/summary.png", import.meta.url)
);

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((value) => value === "true" || value === "1");

export const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z
    .string()
    .url()
    .default("postgresql://localhost:5432/countries"),
  DATABASE_SSL: booleanFlag,
  COUNTRIES_API_URL: z
    .string()
    .url()
    .default(
      "https://restcountries.com/v2/all?fields=name,capital,region,population,flag,currencies"
    ),
  EXCHANGE_RATE_API_URL: z
    .string()
    .url()
    .default("https://open.er-api.com/v6/latest/USD"),
  SOURCE_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  FLAG_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  GDP_PER_CAPITA_PROXY: z.coerce.number().positive().default(1500),
  SUMMARY_IMAGE_PATH: z.string().min(1).default(DEFAULT_SUMMARY_IMAGE_PATH),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return result.data;
}

export const env = loadEnv();
