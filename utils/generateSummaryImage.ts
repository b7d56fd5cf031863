import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";

import { createCanvas, loadImage, type Image } from "@napi-rs/canvas";

import { imageLogger } from "../config/logger";
import type { CountryRecord } from "../models/country";

import type { FetchFn } from "./httpClient";

const WIDTH = 1000;
const HEIGHT = 800;
const TOP_COUNT = 5;

export interface GdpEntry {
  name: string;
  estimated_gdp: number;
  flag_url: string | null;
}

export interface SummaryStats {
  total_countries: number;
  total_gdp: number;
  highest: GdpEntry | null;
  lowest: GdpEntry | null;
  without_rate: number;
  top: GdpEntry[];
}

export interface SummaryImageOptions {
  outputPath: string;
  flagTimeoutMs: number;
  fetchImpl?: FetchFn;
}

export function buildSummary(records: CountryRecord[]): SummaryStats {
  const withGdp: GdpEntry[] = [];
  for (const record of records) {
    if (record.estimated_gdp !== null) {
      withGdp.push({
        name: record.name,
        estimated_gdp: record.estimated_gdp,
        flag_url: record.flag_url,
      });
    }
  }
  withGdp.sort((a, b) => b.estimated_gdp - a.estimated_gdp);

  const totalGdp = withGdp.reduce((sum, entry) => sum + entry.estimated_gdp, 0);

  return {
    total_countries: records.length,
    total_gdp: Math.round(totalGdp * 100) / 100,
    highest: withGdp[0] ?? null,
    lowest: withGdp[withGdp.length - 1] ?? null,
    without_rate: records.filter((r) => r.exchange_rate === null).length,
    top: withGdp.slice(0, TOP_COUNT),
  };
}

const billions = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function formatGdp(value: number): string {
  return `$${billions.format(value / 1_000_000_000)} Billion`;
}

/** Download and decode a flag. Returns null when it cannot be used. */
export async function loadFlag(
  url: string,
  timeoutMs: number,
  fetchImpl: FetchFn = fetch
): Promise<Image | null> {
  try {
    const response = await fetchImpl(url, {
      signal: AbortSignal.timeout(timeoutMs),
    });
    if (!response.ok) {
      imageLogger.warn({ url, status: response.status }, "Skipping flag");
      return null;
    }
    const bytes = Buffer.from(await response.arrayBuffer());
    return await loadImage(bytes);
  } catch (error) {
    imageLogger.warn({ url, err: error }, "Skipping flag");
    return null;
  }
}

export async function renderSummaryImage(
  summary: SummaryStats,
  refreshedAt: Date,
  flags: (Image | null)[]
): Promise<Buffer> {
  const canvas = createCanvas(WIDTH, HEIGHT);
  const ctx = canvas.getContext("2d");

  ctx.fillStyle = "#f7f9fb";
  ctx.fillRect(0, 0, WIDTH, HEIGHT);

  ctx.fillStyle = "#003366";
  ctx.font = "bold 36px sans-serif";
  ctx.fillText("Country Data Summary", 50, 70);

  ctx.font = "22px sans-serif";
  ctx.fillStyle = "#333333";
  ctx.fillText(`Total Countries Cached: ${String(summary.total_countries)}`, 50, 130);
  ctx.fillText(
    `Last Refreshed: ${refreshedAt.toISOString().replace("T", " ").slice(0, 19)} UTC`,
    50,
    165
  );
  ctx.fillText(`Total Estimated GDP: ${formatGdp(summary.total_gdp)}`, 50, 200);
  if (summary.highest !== null && summary.lowest !== null) {
    ctx.fillText(
      `Highest: ${summary.highest.name}  |  Lowest: ${summary.lowest.name}`,
      50,
      235
    );
  }
  ctx.fillText(
    `Countries without an exchange rate: ${String(summary.without_rate)}`,
    50,
    270
  );

  ctx.fillStyle = "#003366";
  ctx.font = "bold 28px sans-serif";
  ctx.fillText(`Top ${String(TOP_COUNT)} Countries by Estimated GDP:`, 50, 340);

  ctx.font = "22px sans-serif";
  ctx.fillStyle = "#141414";
  let y = 380;
  summary.top.forEach((entry, i) => {
    const flag = flags[i];
    if (flag !== undefined && flag !== null) {
      ctx.drawImage(flag, 60, y, 60, 40);
    }
    ctx.fillText(
      `${String(i + 1)}. ${entry.name} - GDP: ${formatGdp(entry.estimated_gdp)}`,
      140,
      y + 28
    );
    y += 80;
  });

  return canvas.encode("png");
}

/**
 * Render the summary and replace the artifact at `outputPath`.
 */
export async function generateSummaryImage(
  records: CountryRecord[],
  refreshedAt: Date,
  options: SummaryImageOptions
): Promise<string> {
  const summary = buildSummary(records);
  const flags = await Promise.all(
    summary.top.map((entry) =>
      entry.flag_url === null
        ? Promise.resolve(null)
        : loadFlag(entry.flag_url, options.flagTimeoutMs, options.fetchImpl)
    )
  );
  imageLogger.debug(
    { flags: flags.filter((flag) => flag !== null).length },
    "Fetched flag images"
  );

  const png = await renderSummaryImage(summary, refreshedAt, flags);

  await mkdir(path.dirname(options.outputPath), { recursive: true });
  const tmpPath = `${options.outputPath}.${String(process.pid)}.tmp`;
  await writeFile(tmpPath, png);
  await rename(tmpPath, options.outputPath);

  imageLogger.info({ path: options.outputPath }, "Summary image generated");
  return options.outputPath;
}

/** Current artifact bytes, or null when no summary has been generated. */
export async function readSummaryImage(
  imagePath: string
): Promise<Buffer | null> {
  try {
    return await readFile(imagePath);
  } catch (error) {
    if (
      error instanceof Error &&
      "code" in error &&
      error.code === "ENOENT"
    ) {
      return null;
    }
    throw error;
  }
}
