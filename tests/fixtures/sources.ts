import { vi } from "vitest";

import type { FetchFn } from "../../utils/httpClient";

export const COUNTRIES_URL = "https://countries.test/v2/all";
export const RATES_URL = "https://rates.test/v6/latest/USD";

export const testland = {
  name: "Testland",
  capital: "Test City",
  region: "Africa",
  population: 1000,
  flag: "https://flags.test/tst.svg",
  currencies: [{ code: "TST", name: "Test dollar", symbol: "T$" }],
};

export const mockovia = {
  name: "Mockovia",
  capital: "Mockburg",
  region: "Europe",
  population: 5000,
  flag: "https://flags.test/mck.svg",
  currencies: [{ code: "mck", name: "Mock mark", symbol: "M" }],
};

export const nowhereland = {
  name: "Nowhereland",
  capital: null,
  region: "Oceania",
  population: 250,
  flag: "https://flags.test/nwl.svg",
  currencies: [{ code: "NWL", name: "Null coin", symbol: "N" }],
};

export const sampleCountries = [testland, mockovia, nowhereland];

export const sampleRates = {
  result: "success",
  base_code: "USD",
  time_last_update_utc: "Wed, 01 Jan 2025 00:00:01 +0000",
  rates: { USD: 1, TST: 2, MCK: 0.5 },
};

export type StubBody = unknown | Error | Response;

export interface SourceStubs {
  countries: StubBody;
  rates: StubBody;
}

function respond(body: StubBody): Promise<Response> {
  if (body instanceof Error) {
    return Promise.reject(body);
  }
  if (body instanceof Response) {
    return Promise.resolve(body);
  }
  return Promise.resolve(
    new Response(JSON.stringify(body), {
      status: 200,
      headers: { "content-type": "application/json" },
    })
  );
}

/**
 * Fetch stub that serves the two provider URLs from `stubs` and answers
 * 404 for anything else (flag downloads included).
 */
export function createFetchStub(stubs: SourceStubs) {
  return vi.fn<FetchFn>((input) => {
    const url = input instanceof Request ? input.url : input.toString();
    if (url === COUNTRIES_URL) return respond(stubs.countries);
    if (url === RATES_URL) return respond(stubs.rates);
    return Promise.resolve(new Response("not found", { status: 404 }));
  });
}
