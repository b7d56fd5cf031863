/**
 * Country record shapes, from raw provider payloads to the persisted row.
 */

export interface RawCountryRecord {
  name: string;
  capital: string | null;
  region: string | null;
  population: number;
  currency_code: string | null;
  flag_url: string | null;
}

export interface RawRateRecord {
  currency_code: string;
  rate: number;
}

/** A reconciled record ready to be written, without storage-owned fields. */
export interface CountryCandidate {
  name: string;
  capital: string | null;
  region: string | null;
  population: number;
  currency_code: string | null;
  exchange_rate: number | null;
  estimated_gdp: number | null;
  flag_url: string | null;
}

export interface CountryRecord extends CountryCandidate {
  id: number;
  last_refreshed_at: string;
}

export interface RefreshStatus {
  total_countries: number;
  last_refreshed_at: string | null;
}

export interface RefreshOutcome {
  status: "success";
  countries_processed: number;
  inserted: number;
  updated: number;
  last_refreshed_at: string;
}

export const ORDERING_FIELDS = [
  "name",
  "population",
  "exchange_rate",
  "estimated_gdp",
  "last_refreshed_at",
] as const;

export type OrderingField = (typeof ORDERING_FIELDS)[number];

export interface CountryOrdering {
  field: OrderingField;
  direction: "asc" | "desc";
}

export interface CountryQuery {
  region?: string;
  currency_code?: string;
  ordering?: CountryOrdering;
  limit?: number;
  offset?: number;
}

/** Natural-key form of a country name. */
export function nameKey(name: string): string {
  return name.trim().toLowerCase();
}
