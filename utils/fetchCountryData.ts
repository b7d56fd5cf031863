import { z } from "zod";

import { sourceLogger } from "../config/logger";
import type { RawCountryRecord } from "../models/country";

import { SourceMalformedError, type SourceName } from "./errors";
import { fetchJson, type SourceRequestOptions } from "./httpClient";

export const COUNTRIES_SOURCE: SourceName = "REST Countries API";

const optionalText = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed === undefined || trimmed === "" ? null : trimmed;
  });

export const CurrencySchema = z.object({
  code: z.string().nullish(),
  name: z.string().nullish(),
  symbol: z.string().nullish(),
});

export const CountrySchema = z.object({
  name: z.string().trim().min(1),
  capital: optionalText,
  region: optionalText,
  population: z.number().int().nonnegative().nullish(),
  flag: optionalText,
  currencies: z.array(CurrencySchema).nullish(),
});

export const CountriesResponseSchema = z.array(CountrySchema);

export type Country = z.infer<typeof CountrySchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0
      ? `${issue.path.join(".")}: ${issue.message}`
      : issue.message
  );
}

/**
 * Map a provider country onto the raw record the reconciler consumes.
 * The first listed currency is the country's currency.
 */
export function toRawCountry(country: Country): RawCountryRecord {
  const code = country.currencies?.[0]?.code?.trim();

  return {
    name: country.name,
    capital: country.capital,
    region: country.region,
    population: country.population ?? 0,
    currency_code: code === undefined || code === "" ? null : code.toUpperCase(),
    flag_url: country.flag,
  };
}

export function parseCountries(payload: unknown): RawCountryRecord[] {
  const result = CountriesResponseSchema.safeParse(payload);
  if (!result.success) {
    throw new SourceMalformedError(COUNTRIES_SOURCE, formatIssues(result.error));
  }
  return result.data.map(toRawCountry);
}

export async function fetchCountryData(
  url: string,
  options: SourceRequestOptions
): Promise<RawCountryRecord[]> {
  sourceLogger.info({ url }, "Fetching countries");

  const payload = await fetchJson(COUNTRIES_SOURCE, url, options);
  const countries = parseCountries(payload);

  sourceLogger.debug(
    { countryCount: countries.length },
    "Successfully fetched countries"
  );
  return countries;
}
