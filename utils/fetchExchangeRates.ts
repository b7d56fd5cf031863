import { z } from "zod";

import { sourceLogger } from "../config/logger";
import type { RawRateRecord } from "../models/country";

import { SourceMalformedError, type SourceName } from "./errors";
import { formatIssues } from "./fetchCountryData";
import { fetchJson, type SourceRequestOptions } from "./httpClient";

export const RATES_SOURCE: SourceName = "Open Exchange Rate API";

export const ExchangeRateResponseSchema = z.object({
  result: z.string().optional(),
  base_code: z.string().optional(),
  time_last_update_utc: z.string().optional(),
  rates: z.record(z.string(), z.number().finite()),
});

export type ExchangeRateResponse = z.infer<typeof ExchangeRateResponseSchema>;

export function parseExchangeRates(payload: unknown): RawRateRecord[] {
  const result = ExchangeRateResponseSchema.safeParse(payload);
  if (!result.success) {
    throw new SourceMalformedError(RATES_SOURCE, formatIssues(result.error));
  }

  const { result: status, rates } = result.data;
  if (status !== undefined && status !== "success") {
    throw new SourceMalformedError(RATES_SOURCE, [
      `result: expected "success", received "${status}"`,
    ]);
  }

  return Object.entries(rates).map(([code, rate]) => ({
    currency_code: code.trim().toUpperCase(),
    rate,
  }));
}

export async function fetchExchangeRates(
  url: string,
  options: SourceRequestOptions
): Promise<RawRateRecord[]> {
  sourceLogger.info({ url }, "Fetching exchange rates");

  const payload = await fetchJson(RATES_SOURCE, url, options);
  const rates = parseExchangeRates(payload);

  sourceLogger.debug({ rateCount: rates.length }, "Successfully fetched rates");
  return rates;
}
