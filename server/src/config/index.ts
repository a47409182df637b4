/**
 * Настройки сервера. Любое значение переопределяется переменной окружения
 * (.env подгружает точка входа).
 */

const readNumber = (name: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) => {
  const raw = Number(process.env[name]);
  const value = Number.isFinite(raw) && process.env[name] !== "" ? raw : fallback;
  return Math.max(min, Math.min(max, value));
};

const readString = (name: string, fallback: string) => {
  const value = process.env[name]?.trim();
  return value ? value : fallback;
};

/** Пустая или отсутствующая переменная даёт undefined. */
const readOptionalString = (name: string): string | undefined => {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
};

/** Набор 11 000 VP стоит 99.99 USD во внутриигровом магазине. */
export const VP_BUNDLE_SIZE = 11_000;
export const VP_BUNDLE_PRICE_USD = 99.99;
export const USD_PER_VP = VP_BUNDLE_PRICE_USD / VP_BUNDLE_SIZE;

export interface PipelineConfig {
  wikiUrl: string;
  ratesApiUrl: string;
  userAgent: string;
  /** Свой бинарник Chromium; без него playwright-core ищет свою установку. */
  chromiumExecutablePath: string | undefined;
  cacheDir: string;
  /** Сколько записей нужно снимку, чтобы заменить кэш. */
  minCatalogSize: number;
  priceCacheTtlSeconds: number;
  rateCacheTtlSeconds: number;
  httpTimeoutMs: number;
  pageLoadTimeoutMs: number;
  tableWaitTimeoutMs: number;
  primaryAttempts: number;
  retryBaseDelayMs: number;
  staleRetrySeconds: number;
  quoteTtlMs: number;
  usdPerVp: number;
}

export const loadPipelineConfig = (): PipelineConfig => ({
  wikiUrl: readString("SKINS_WIKI_URL", "https://valorant.fandom.com/wiki/Weapon_Skins"),
  ratesApiUrl: readString("RATES_API_URL", "https://open.er-api.com/v6/latest/USD"),
  userAgent: readString(
    "USER_AGENT",
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  ),
  chromiumExecutablePath: readOptionalString("CHROMIUM_EXECUTABLE_PATH"),
  cacheDir: readString("CACHE_DIR", "cache"),
  // размер каталога на 2025-08; поднять, когда вики вырастет
  minCatalogSize: readNumber("MIN_CATALOG_SIZE", 496, 1),
  priceCacheTtlSeconds: readNumber("PRICE_CACHE_TTL_SECONDS", 6 * 60 * 60, 60),
  rateCacheTtlSeconds: readNumber("RATE_CACHE_TTL_SECONDS", 24 * 60 * 60, 60),
  httpTimeoutMs: readNumber("HTTP_TIMEOUT_MS", 10_000, 1_000, 120_000),
  pageLoadTimeoutMs: readNumber("PAGE_LOAD_TIMEOUT_MS", 30_000, 1_000, 180_000),
  tableWaitTimeoutMs: readNumber("TABLE_WAIT_TIMEOUT_MS", 10_000, 500, 120_000),
  primaryAttempts: readNumber("PRIMARY_ATTEMPTS", 2, 1, 5),
  retryBaseDelayMs: readNumber("RETRY_BASE_DELAY_MS", 1_000, 0, 60_000),
  staleRetrySeconds: readNumber("STALE_RETRY_SECONDS", 300, 0),
  quoteTtlMs: readNumber("QUOTE_TTL_MS", 60_000, 0),
  usdPerVp: USD_PER_VP,
});

export const PORT = readNumber("PORT", 5174, 1, 65_535);
export const LOG_LEVEL = readString("LOG_LEVEL", "info");
