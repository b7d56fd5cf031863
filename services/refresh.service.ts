/**
 * Refresh pipeline: fetch both sources, reconcile, classify, write, render.
 *
 * Both fetches run concurrently under one AbortController so that the first
 * failure cancels the other request. Nothing is written unless both sources
 * succeed, and the write itself is a single transaction.
 */

import { refreshLogger } from "../config/logger";
import type { RefreshOutcome } from "../models/country";
import type { CountryStore } from "../repositories/countries.repository";
import { classifyCandidates } from "../utils/classify";
import { fetchCountryData } from "../utils/fetchCountryData";
import { fetchExchangeRates } from "../utils/fetchExchangeRates";
import {
  generateSummaryImage,
  type SummaryImageOptions,
} from "../utils/generateSummaryImage";
import type { FetchFn } from "../utils/httpClient";
import { reconcileCountries } from "../utils/reconcile";

export interface RefreshConfig {
  countriesUrl: string;
  ratesUrl: string;
  sourceTimeoutMs: number;
  gdpPerCapitaProxy: number;
  summaryImagePath: string;
  flagTimeoutMs: number;
}

export type SummaryRenderer = typeof generateSummaryImage;

export interface RefreshDeps {
  store: CountryStore;
  config: RefreshConfig;
  fetchImpl?: FetchFn;
  renderSummary?: SummaryRenderer;
  now?: () => Date;
}

export class RefreshService {
  private inflight: Promise<RefreshOutcome> | null = null;
  private readonly renderSummary: SummaryRenderer;
  private readonly now: () => Date;

  constructor(private readonly deps: RefreshDeps) {
    this.renderSummary = deps.renderSummary ?? generateSummaryImage;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Run a refresh. A call made while another refresh is in flight joins
   * that refresh and receives its outcome.
   */
  refresh(): Promise<RefreshOutcome> {
    if (this.inflight !== null) {
      refreshLogger.info("Refresh already in progress, joining it");
      return this.inflight;
    }

    const run = (async () => {
      try {
        return await this.run();
      } finally {
        this.inflight = null;
      }
    })();

    this.inflight = run;
    return run;
  }

  isRunning(): boolean {
    return this.inflight !== null;
  }

  private async run(): Promise<RefreshOutcome> {
    const { store, config, fetchImpl } = this.deps;
    const refreshedAt = this.now();
    refreshLogger.info(
      { refreshedAt: refreshedAt.toISOString() },
      "Country data refresh initiated"
    );

    const controller = new AbortController();
    const sourceOptions = {
      timeoutMs: config.sourceTimeoutMs,
      signal: controller.signal,
      fetchImpl,
    };
    const cancelSibling = (error: unknown): never => {
      controller.abort();
      throw error;
    };

    const [countries, rates] = await Promise.all([
      fetchCountryData(config.countriesUrl, sourceOptions).catch(cancelSibling),
      fetchExchangeRates(config.ratesUrl, sourceOptions).catch(cancelSibling),
    ]).catch((error: unknown) => {
      refreshLogger.error({ err: error }, "Refresh aborted: source fetch failed");
      throw error;
    });
    refreshLogger.info(
      { countries: countries.length, rates: rates.length },
      "Fetched both sources"
    );

    const candidates = reconcileCountries(countries, rates, {
      gdpPerCapitaProxy: config.gdpPerCapitaProxy,
    });

    const plan = classifyCandidates(candidates, await store.listNames());
    refreshLogger.info(
      { inserts: plan.inserts.length, updates: plan.updates.length },
      "Classified candidates"
    );

    const processed = await store.bulkWrite(plan, refreshedAt);

    if (processed > 0) {
      await this.render(store, refreshedAt);
    }

    refreshLogger.info({ processed }, "Country data refresh completed");
    return {
      status: "success",
      countries_processed: processed,
      inserted: plan.inserts.length,
      updated: plan.updates.length,
      last_refreshed_at: refreshedAt.toISOString(),
    };
  }

  // The data is committed by now, so a rendering failure is only logged.
  private async render(store: CountryStore, refreshedAt: Date): Promise<void> {
    const options: SummaryImageOptions = {
      outputPath: this.deps.config.summaryImagePath,
      flagTimeoutMs: this.deps.config.flagTimeoutMs,
      fetchImpl: this.deps.fetchImpl,
    };
    try {
      const records = await store.listAll();
      await this.renderSummary(records, refreshedAt, options);
    } catch (error) {
      refreshLogger.error({ err: error }, "Failed to generate summary image");
    }
  }
}
