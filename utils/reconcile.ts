import {
  nameKey,
  type CountryCandidate,
  type RawCountryRecord,
  type RawRateRecord,
} from "../models/country";

export interface ReconcileOptions {
  /** Per-capita output proxy used by the GDP estimate. */
  gdpPerCapitaProxy: number;
}

/**
 * Estimated GDP for one country, rounded to cents. Null unless both the
 * population and a positive exchange rate are known.
 */
export function estimateGdp(
  population: number,
  exchangeRate: number | null,
  gdpPerCapitaProxy: number
): number | null {
  if (exchangeRate === null || exchangeRate <= 0 || population <= 0) {
    return null;
  }
  return Math.round(population * gdpPerCapitaProxy * exchangeRate * 100) / 100;
}

export function buildRateIndex(rates: RawRateRecord[]): Map<string, number> {
  const index = new Map<string, number>();
  for (const { currency_code, rate } of rates) {
    index.set(currency_code.toUpperCase(), rate);
  }
  return index;
}

/**
 * Join countries with exchange rates by currency code.
 *
 * Countries whose currency has no rate are kept with a null rate and GDP.
 * When a name appears twice the later record wins, in the position of the
 * first one.
 */
export function reconcileCountries(
  countries: RawCountryRecord[],
  rates: RawRateRecord[],
  options: ReconcileOptions
): CountryCandidate[] {
  const rateIndex = buildRateIndex(rates);
  const byName = new Map<string, CountryCandidate>();

  for (const country of countries) {
    const code = country.currency_code?.toUpperCase() ?? null;
    const exchangeRate = code === null ? null : (rateIndex.get(code) ?? null);

    byName.set(nameKey(country.name), {
      name: country.name,
      capital: country.capital,
      region: country.region,
      population: country.population,
      currency_code: code,
      exchange_rate: exchangeRate,
      estimated_gdp: estimateGdp(
        country.population,
        exchangeRate,
        options.gdpPerCapitaProxy
      ),
      flag_url: country.flag_url,
    });
  }

  return [...byName.values()];
}
