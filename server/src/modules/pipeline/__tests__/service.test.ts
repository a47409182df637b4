import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { PipelineConfig } from "../../../config";
import { ConversionError, PipelineError, ScrapeError } from "../../../lib/errors";
import {
  captureError,
  createClock,
  makeEntries,
  makeRates,
  makeSnapshot,
  makeTempDir,
  silentLogger,
  testConfig,
} from "../../../testing/fixtures";
import type { ExchangeRateTable } from "../../rates/types";
import type { SkinCatalogSnapshot } from "../../skins/types";
import { createPipelineContext, PRICE_CACHE_FILE, RATE_CACHE_FILE } from "../context";
import { getCatalogReport, getDisplayPrice, isBusy, refresh } from "../service";

const browserDown = () => new ScrapeError("BrowserUnavailable", "primary", "Browser failed to start: no binary");

describe("price pipeline", () => {
  let dir: string;
  let clock: ReturnType<typeof createClock>;

  const primaryFetch = vi.fn<() => Promise<SkinCatalogSnapshot>>();
  const fallbackFetch = vi.fn<() => Promise<SkinCatalogSnapshot>>();
  const fetchRates = vi.fn<() => Promise<ExchangeRateTable>>();

  const buildContext = (overrides: Partial<PipelineConfig> = {}) =>
    createPipelineContext(testConfig(dir, overrides), {
      sources: {
        primary: { kind: "primary", fetch: primaryFetch },
        fallback: { kind: "fallback", fetch: fallbackFetch },
      },
      rateProvider: { fetchRates },
      logger: silentLogger,
      now: clock.now,
    });

  const readJson = async (file: string): Promise<unknown> =>
    JSON.parse(await fs.readFile(path.join(dir, file), "utf8"));

  const seedPriceCache = (fetchedAt: string, count: number) =>
    fs.writeFile(
      path.join(dir, PRICE_CACHE_FILE),
      JSON.stringify({
        fetchedAt,
        ttlSeconds: 3600,
        sourceUsed: "primary",
        entries: makeEntries(count),
        quality: { rowsSeen: count, malformedRows: 0, duplicateNames: [] },
      }),
      "utf8",
    );

  const seedRateCache = (fetchedAt: string) =>
    fs.writeFile(
      path.join(dir, RATE_CACHE_FILE),
      JSON.stringify({ fetchedAt, ttlSeconds: 3600, baseCurrency: "USD", rates: makeRates() }),
      "utf8",
    );

  beforeEach(async () => {
    dir = await makeTempDir();
    clock = createClock("2026-01-01T10:00:00.000Z");
    primaryFetch.mockReset();
    fallbackFetch.mockReset();
    fetchRates.mockReset();
    primaryFetch.mockImplementation(async () => makeSnapshot("primary", 500, clock.now().toISOString()));
    fallbackFetch.mockImplementation(async () => makeSnapshot("fallback", 496, clock.now().toISOString()));
    fetchRates.mockImplementation(async () => ({
      baseCurrency: "USD",
      rates: makeRates(),
      fetchedAt: clock.now().toISOString(),
    }));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("prices a fresh primary scrape and caches it", async () => {
    const ctx = buildContext();

    const price = await getDisplayPrice(ctx, "eur");

    expect(price).toMatchObject({
      currency: "EUR",
      totalVP: 500 * 1775,
      skinCount: 500,
      source: "primary",
      stale: false,
      warnings: [],
      rate: 0.9,
    });
    expect(price.amount).toBe(500 * 1775 * ctx.config.usdPerVp * 0.9);
    expect(fallbackFetch).not.toHaveBeenCalled();
    expect(await readJson(PRICE_CACHE_FILE)).toMatchObject({
      fetchedAt: "2026-01-01T10:00:00.000Z",
      ttlSeconds: 3600,
      sourceUsed: "primary",
    });
    expect(await readJson(RATE_CACHE_FILE)).toMatchObject({ baseCurrency: "USD" });
  });

  it("uses the fallback when the browser is unavailable", async () => {
    primaryFetch.mockRejectedValue(browserDown());

    const price = await getDisplayPrice(buildContext(), "USD");

    expect(price.source).toBe("fallback");
    expect(price.skinCount).toBe(496);
    expect(primaryFetch).toHaveBeenCalledTimes(1);
    expect(fallbackFetch).toHaveBeenCalledTimes(1);
  });

  it("serves the stale cache when both sources fall short", async () => {
    await seedPriceCache("2026-01-01T07:00:00.000Z", 420);
    primaryFetch.mockRejectedValue(browserDown());
    fallbackFetch.mockImplementation(async () => makeSnapshot("fallback", 300));

    const price = await getDisplayPrice(buildContext(), "USD");

    expect(price.stale).toBe(true);
    expect(price.skinCount).toBe(420);
    expect(price.skinsFetchedAt).toBe("2026-01-01T07:00:00.000Z");
    expect(price.warnings).toHaveLength(1);
    expect(price.warnings[0]).toContain("may be outdated");
    expect(fallbackFetch).toHaveBeenCalledTimes(1);
    expect(await readJson(PRICE_CACHE_FILE)).toMatchObject({ fetchedAt: "2026-01-01T07:00:00.000Z" });
  });

  it("fails with NoDataAvailable when nothing is cached", async () => {
    primaryFetch.mockRejectedValue(browserDown());
    fallbackFetch.mockImplementation(async () => makeSnapshot("fallback", 300));

    const ctx = buildContext();

    const error = await captureError(getDisplayPrice(ctx, "USD"));

    expect(error).toBeInstanceOf(PipelineError);
    expect(error).toHaveProperty("kind", "NoDataAvailable");
    expect(error).toHaveProperty("resource", "skins");
    expect(isBusy(ctx)).toBe(false);
    await expect(fs.access(path.join(dir, PRICE_CACHE_FILE))).rejects.toThrow();
    expect(await readJson(RATE_CACHE_FILE)).toMatchObject({ baseCurrency: "USD" });
  });

  it("tries the fallback when the primary snapshot is too small", async () => {
    primaryFetch.mockImplementation(async () => makeSnapshot("primary", 300));
    fallbackFetch.mockImplementation(async () => makeSnapshot("fallback", 500, clock.now().toISOString()));

    const price = await getDisplayPrice(buildContext(), "USD");

    expect(price.source).toBe("fallback");
    expect(price.skinCount).toBe(500);
    expect(primaryFetch).toHaveBeenCalledTimes(1);
    expect(fallbackFetch).toHaveBeenCalledTimes(1);
    expect(await readJson(PRICE_CACHE_FILE)).toMatchObject({
      fetchedAt: "2026-01-01T10:00:00.000Z",
      sourceUsed: "fallback",
      quality: { rowsSeen: 500, malformedRows: 0, duplicateNames: [] },
    });
  });

  it("falls through on unexpected source errors", async () => {
    primaryFetch.mockRejectedValue(new TypeError("cannot read properties of undefined"));

    const price = await getDisplayPrice(buildContext(), "USD");

    expect(price.source).toBe("fallback");
  });

  it("uses a fresh cache without touching the sources", async () => {
    await seedPriceCache("2026-01-01T09:30:00.000Z", 496);
    await seedRateCache("2026-01-01T09:30:00.000Z");

    const price = await getDisplayPrice(buildContext(), "GBP");

    expect(price.skinCount).toBe(496);
    expect(price.stale).toBe(false);
    expect(primaryFetch).not.toHaveBeenCalled();
    expect(fetchRates).not.toHaveBeenCalled();
  });

  it("rejects an unsupported currency before fetching anything", async () => {
    const error = await captureError(getDisplayPrice(buildContext(), "JPY"));

    expect(error).toBeInstanceOf(ConversionError);
    expect(error).toHaveProperty("kind", "UnsupportedCurrency");
    expect(primaryFetch).not.toHaveBeenCalled();
    expect(fetchRates).not.toHaveBeenCalled();
  });

  it("serves stale rates when the rate API fails", async () => {
    await seedRateCache("2026-01-01T06:00:00.000Z");
    fetchRates.mockRejectedValue(new Error("rate API down"));

    const price = await getDisplayPrice(buildContext(), "EUR");

    expect(price.stale).toBe(true);
    expect(price.ratesFetchedAt).toBe("2026-01-01T06:00:00.000Z");
    expect(price.warnings).toEqual([
      "Exchange rates are from 2026-01-01T06:00:00.000Z and may be outdated (rate API down)",
    ]);
  });

  it("fails with NoDataAvailable when rates are missing entirely", async () => {
    fetchRates.mockRejectedValue(new Error("rate API down"));

    const ctx = buildContext();

    const error = await captureError(getDisplayPrice(ctx, "EUR"));

    expect(error).toHaveProperty("resource", "rates");
    expect(isBusy(ctx)).toBe(false);
    expect(await readJson(PRICE_CACHE_FILE)).toMatchObject({ sourceUsed: "primary" });
  });

  it("keeps the new snapshot when the cache cannot be written", async () => {
    const blocker = path.join(dir, "blocker");
    await fs.writeFile(blocker, "file, not a directory", "utf8");
    const ctx = createPipelineContext(testConfig(blocker), {
      sources: {
        primary: { kind: "primary", fetch: primaryFetch },
        fallback: { kind: "fallback", fetch: fallbackFetch },
      },
      rateProvider: { fetchRates },
      logger: silentLogger,
      now: clock.now,
    });

    const price = await getDisplayPrice(ctx, "USD");

    expect(price.skinCount).toBe(500);
    expect(price.stale).toBe(false);
  });

  it("shares one load between concurrent requests", async () => {
    const ctx = buildContext();

    const pending = Promise.all([getDisplayPrice(ctx, "USD"), getDisplayPrice(ctx, "EUR")]);
    expect(isBusy(ctx)).toBe(true);
    const [usd, eur] = await pending;

    expect(usd.totalVP).toBe(eur.totalVP);
    expect(primaryFetch).toHaveBeenCalledTimes(1);
    expect(fetchRates).toHaveBeenCalledTimes(1);
    expect(isBusy(ctx)).toBe(false);
  });

  it("reloads once the in-memory copy expires", async () => {
    const ctx = buildContext();
    await getDisplayPrice(ctx, "USD");
    await getDisplayPrice(ctx, "USD");
    expect(primaryFetch).toHaveBeenCalledTimes(1);

    clock.advance(3600_000);
    await getDisplayPrice(ctx, "USD");

    expect(primaryFetch).toHaveBeenCalledTimes(2);
  });

  it("memoizes quotes until refresh", async () => {
    const ctx = buildContext({ quoteTtlMs: 60_000 });

    const first = await getDisplayPrice(ctx, "CAD");
    expect(await getDisplayPrice(ctx, "CAD")).toBe(first);

    await refresh(ctx);
    expect(await getDisplayPrice(ctx, "CAD")).not.toBe(first);
  });

  it("re-reads the cache on a plain refresh and scrapes again on force", async () => {
    const ctx = buildContext();
    await getDisplayPrice(ctx, "USD");

    const plain = await refresh(ctx);
    expect(plain.skinCount).toBe(500);
    expect(primaryFetch).toHaveBeenCalledTimes(1);

    clock.advance(60_000);
    const forced = await refresh(ctx, { force: true });

    expect(forced).toEqual({
      skinCount: 500,
      totalVP: 500 * 1775,
      source: "primary",
      stale: false,
      warnings: [],
      skinsFetchedAt: "2026-01-01T10:01:00.000Z",
      ratesFetchedAt: "2026-01-01T10:01:00.000Z",
    });
    expect(primaryFetch).toHaveBeenCalledTimes(2);
    expect(fetchRates).toHaveBeenCalledTimes(2);
  });

  it("shares one run between overlapping refreshes", async () => {
    const ctx = buildContext();

    const [first, second] = await Promise.all([refresh(ctx, { force: true }), refresh(ctx, { force: true })]);

    expect(second).toBe(first);
    expect(primaryFetch).toHaveBeenCalledTimes(1);
    expect(isBusy(ctx)).toBe(false);
  });

  it("runs a forced refresh after a plain one that is already running", async () => {
    const ctx = buildContext();

    const plain = refresh(ctx);
    const forced = await refresh(ctx, { force: true });

    expect(forced).not.toBe(await plain);
    expect(primaryFetch).toHaveBeenCalledTimes(2);
    expect(fetchRates).toHaveBeenCalledTimes(2);
    expect(isBusy(ctx)).toBe(false);
  });

  it("builds a verification report for the current catalog", async () => {
    primaryFetch.mockImplementation(async () => ({
      entries: [...makeEntries(495), { name: "Odd One", priceVP: 1234 }],
      fetchedAt: clock.now().toISOString(),
      sourceUsed: "primary",
      quality: { rowsSeen: 500, malformedRows: 4, duplicateNames: ["Test Skin 7"] },
    }));

    const report = await getCatalogReport(buildContext({ minCatalogSize: 496 }));

    expect(report.summary.totalSkins).toBe(496);
    expect(report.editions).toEqual({ Premium: 495 });
    expect(report.unexpectedPrices).toEqual({ "1234": 1 });
    expect(report.passed).toBe(true);
    expect(report.grade).toBe("excellent");
    expect(report.malformedRows).toBe(4);
    expect(report.duplicateNames).toEqual(["Test Skin 7"]);
    expect(report.qualityPercent).toBeCloseTo(99.2, 10);
  });
});
