import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import pino from "pino";
import { USD_PER_VP, type PipelineConfig } from "../config";
import { SUPPORTED_CURRENCIES } from "../modules/currency/currencies";
import type { SkinCatalogSnapshot, SkinEntry, SourceKind } from "../modules/skins/types";

export const silentLogger = pino({ level: "silent" });

/** Часы, которые тест двигает вручную. */
export const createClock = (iso: string) => {
  let current = Date.parse(iso);
  return {
    now: () => new Date(current),
    advance: (ms: number) => {
      current += ms;
    },
  };
};

export const makeTempDir = () => fs.mkdtemp(path.join(os.tmpdir(), "vp-price-"));

export const makeEntries = (count: number, priceVP = 1775): SkinEntry[] =>
  Array.from({ length: count }, (_, index) => ({ name: `Test Skin ${index + 1}`, priceVP }));

export const makeSnapshot = (
  sourceUsed: SourceKind,
  count: number,
  fetchedAt = "2026-01-01T10:00:00.000Z",
): SkinCatalogSnapshot => ({
  entries: makeEntries(count),
  fetchedAt,
  sourceUsed,
  quality: { rowsSeen: count, malformedRows: 0, duplicateNames: [] },
});

/** USD 1, EUR 0.9, остальные поддерживаемые валюты 2. */
export const makeRates = (): Record<string, number> =>
  Object.fromEntries(
    SUPPORTED_CURRENCIES.map((code) => [code, code === "USD" ? 1 : code === "EUR" ? 0.9 : 2]),
  );

const sortableTable = (rows: string[]) =>
  `<table class="wikitable sortable"><tr><th>Name</th><th>Edition</th><th>Price</th></tr>${rows.join("")}</table>`;

export const skinRow = (name: string, price: string | number) =>
  `<tr><td>${name}</td><td>Premium</td><td data-sort-value="${price}">${price}</td></tr>`;

/** Страница: сначала таблица не про скины, потом две таблицы скинов. */
export const skinPage = (firstTableRows: string[], secondTableRows: string[]) =>
  `<html><body>${sortableTable([skinRow("Bundle Overview", 9999)])}${sortableTable(firstTableRows)}${sortableTable(
    secondTableRows,
  )}</body></html>`;

export const testConfig = (cacheDir: string, overrides: Partial<PipelineConfig> = {}): PipelineConfig => ({
  wikiUrl: "https://wiki.test/Weapon_Skins",
  ratesApiUrl: "https://rates.test/latest/USD",
  userAgent: "test-agent",
  chromiumExecutablePath: undefined,
  cacheDir,
  minCatalogSize: 496,
  priceCacheTtlSeconds: 3600,
  rateCacheTtlSeconds: 3600,
  httpTimeoutMs: 1000,
  pageLoadTimeoutMs: 1000,
  tableWaitTimeoutMs: 1000,
  primaryAttempts: 1,
  retryBaseDelayMs: 0,
  staleRetrySeconds: 60,
  quoteTtlMs: 0,
  usdPerVp: USD_PER_VP,
  ...overrides,
});

/** Возвращает причину отказа промиса; падает, если он выполнился. */
export const captureError = (promise: Promise<unknown>): Promise<unknown> =>
  promise.then(
    () => {
      throw new Error("Expected the promise to reject");
    },
    (error: unknown) => error,
  );
