import { describe, it, expect } from "vitest";

import type { RawCountryRecord } from "../../../models/country";
import {
  buildRateIndex,
  estimateGdp,
  reconcileCountries,
} from "../../../utils/reconcile";

const options = { gdpPerCapitaProxy: 1500 };

function raw(overrides: Partial<RawCountryRecord>): RawCountryRecord {
  return {
    name: "Testland",
    capital: "Test City",
    region: "Africa",
    population: 1000,
    currency_code: "TST",
    flag_url: "https://flags.test/tst.svg",
    ...overrides,
  };
}

describe("utils/reconcile", () => {
  describe("estimateGdp", () => {
    it("should multiply population, proxy and rate", () => {
      expect(estimateGdp(1000, 2, 1500)).toBe(3_000_000);
    });

    it("should round to cents", () => {
      expect(estimateGdp(3, 0.333, 1500)).toBe(1498.5);
    });

    it("should return null without a rate", () => {
      expect(estimateGdp(1000, null, 1500)).toBeNull();
    });

    it("should return null for zero population", () => {
      expect(estimateGdp(0, 2, 1500)).toBeNull();
    });

    it("should return null for non-positive rates", () => {
      expect(estimateGdp(1000, 0, 1500)).toBeNull();
      expect(estimateGdp(1000, -3, 1500)).toBeNull();
    });
  });

  describe("buildRateIndex", () => {
    it("should key rates by upper-cased code with last value winning", () => {
      const index = buildRateIndex([
        { currency_code: "tst", rate: 1 },
        { currency_code: "TST", rate: 4 },
      ]);
      expect(index.get("TST")).toBe(4);
      expect(index.size).toBe(1);
    });
  });

  describe("reconcileCountries", () => {
    it("should attach the matching rate and compute GDP", () => {
      const [record] = reconcileCountries(
        [raw({})],
        [{ currency_code: "TST", rate: 2 }],
        options
      );
      expect(record).toEqual({
        name: "Testland",
        capital: "Test City",
        region: "Africa",
        population: 1000,
        currency_code: "TST",
        exchange_rate: 2,
        estimated_gdp: 3_000_000,
        flag_url: "https://flags.test/tst.svg",
      });
    });

    it("should match currency codes case-insensitively", () => {
      const [record] = reconcileCountries(
        [raw({ currency_code: "tst" })],
        [{ currency_code: "TST", rate: 2 }],
        options
      );
      expect(record?.currency_code).toBe("TST");
      expect(record?.exchange_rate).toBe(2);
    });

    it("should keep countries whose currency has no rate", () => {
      const [record] = reconcileCountries(
        [raw({ currency_code: "ZZZ" })],
        [{ currency_code: "TST", rate: 2 }],
        options
      );
      expect(record?.exchange_rate).toBeNull();
      expect(record?.estimated_gdp).toBeNull();
    });

    it("should keep countries without a currency", () => {
      const [record] = reconcileCountries(
        [raw({ currency_code: null })],
        [{ currency_code: "TST", rate: 2 }],
        options
      );
      expect(record?.currency_code).toBeNull();
      expect(record?.exchange_rate).toBeNull();
      expect(record?.estimated_gdp).toBeNull();
    });

    it("should leave GDP null when population is zero", () => {
      const [record] = reconcileCountries(
        [raw({ population: 0 })],
        [{ currency_code: "TST", rate: 2 }],
        options
      );
      expect(record?.exchange_rate).toBe(2);
      expect(record?.estimated_gdp).toBeNull();
    });

    it("should let the last duplicate name win in the first position", () => {
      const records = reconcileCountries(
        [
          raw({ name: "Testland", population: 1 }),
          raw({ name: "Mockovia" }),
          raw({ name: "TESTLAND", population: 7 }),
        ],
        [],
        options
      );
      expect(records.map((r) => [r.name, r.population])).toEqual([
        ["TESTLAND", 7],
        ["Mockovia", 1000],
      ]);
    });
  });
});
