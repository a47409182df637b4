import path from "node:path";
import { LRUCache } from "lru-cache";
import type { PipelineConfig } from "../../config";
import { createHttpClient } from "../../lib/http";
import { createLogger, type Logger } from "../../lib/logger";
import { JsonFileCache } from "../cache/fileCache";
import { cachedCatalogSchema, cachedRatesSchema, type CachedCatalog, type CachedRates } from "../cache/schemas";
import { SUPPORTED_CURRENCIES, type CurrencyCode } from "../currency/currencies";
import { createRateProvider } from "../rates/provider";
import type { ExchangeRateProvider } from "../rates/types";
import { createBrowserSource, launchChromium } from "../skins/browserSource";
import { createHttpSource } from "../skins/httpSource";
import type { SkinPriceSource, SourceKind } from "../skins/types";
import type { DisplayPrice, LoadedCatalog, LoadedRates, RefreshSummary } from "./types";

export const PRICE_CACHE_FILE = "skin_prices.json";
export const RATE_CACHE_FILE = "exchange_rates.json";

export interface PipelineDependencies {
  sources: Record<SourceKind, SkinPriceSource>;
  rateProvider: ExchangeRateProvider;
  priceCache: JsonFileCache<CachedCatalog>;
  rateCache: JsonFileCache<CachedRates>;
  logger: Logger;
  now: () => Date;
}

/** Прогон refresh в процессе; `forced` означает, что файлы кэша уже удаляются. */
export interface PendingRefresh {
  forced: boolean;
  promise: Promise<RefreshSummary>;
}

/** Временные копии в памяти; источником истины остаются файлы кэша. */
export interface PipelineState {
  catalog: LoadedCatalog | null;
  rates: LoadedRates | null;
  pendingCatalog: Promise<LoadedCatalog> | null;
  pendingRates: Promise<LoadedRates> | null;
  pendingRefresh: PendingRefresh | null;
  quotes: LRUCache<CurrencyCode, DisplayPrice>;
}

export interface PipelineContext extends PipelineDependencies {
  config: PipelineConfig;
  state: PipelineState;
}

/**
 * Собирает пайплайн из настроек. Тесты подменяют источники, провайдер
 * курсов или часы через `overrides`.
 */
export const createPipelineContext = (
  config: PipelineConfig,
  overrides: Partial<PipelineDependencies> = {},
): PipelineContext => {
  const now = overrides.now ?? (() => new Date());
  const logger = overrides.logger ?? createLogger("pipeline");
  const client = createHttpClient({ timeoutMs: config.httpTimeoutMs, userAgent: config.userAgent });

  const sources = overrides.sources ?? {
    primary: createBrowserSource({
      url: config.wikiUrl,
      launch: launchChromium({ userAgent: config.userAgent, executablePath: config.chromiumExecutablePath }),
      logger: logger.child({ source: "primary" }),
      pageLoadTimeoutMs: config.pageLoadTimeoutMs,
      tableWaitTimeoutMs: config.tableWaitTimeoutMs,
      attempts: config.primaryAttempts,
      retryBaseDelayMs: config.retryBaseDelayMs,
      now,
    }),
    fallback: createHttpSource({
      url: config.wikiUrl,
      client,
      logger: logger.child({ source: "fallback" }),
      now,
    }),
  };

  return {
    config,
    sources,
    rateProvider:
      overrides.rateProvider ??
      createRateProvider({ url: config.ratesApiUrl, client, logger: logger.child({ component: "rates" }), now }),
    priceCache:
      overrides.priceCache ??
      new JsonFileCache({
        filePath: path.join(config.cacheDir, PRICE_CACHE_FILE),
        ttlSeconds: config.priceCacheTtlSeconds,
        schema: cachedCatalogSchema,
        logger,
        now,
      }),
    rateCache:
      overrides.rateCache ??
      new JsonFileCache({
        filePath: path.join(config.cacheDir, RATE_CACHE_FILE),
        ttlSeconds: config.rateCacheTtlSeconds,
        schema: cachedRatesSchema,
        logger,
        now,
      }),
    logger,
    now,
    state: {
      catalog: null,
      rates: null,
      pendingCatalog: null,
      pendingRates: null,
      pendingRefresh: null,
      quotes: new LRUCache<CurrencyCode, DisplayPrice>({ max: SUPPORTED_CURRENCIES.length }),
    },
  };
};
