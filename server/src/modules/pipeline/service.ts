import { ConversionError, describeError, PipelineError } from "../../lib/errors";
import { convert, storePrice } from "../currency/converter";
import { isSupportedCurrency, normalizeCurrencyCode } from "../currency/currencies";
import { buildVerificationReport, totalVP, verifySnapshot } from "../skins/verification";
import { SOURCE_ORDER, type SkinCatalogSnapshot, type VerificationReport } from "../skins/types";
import type { ExchangeRateTable } from "../rates/types";
import type { PendingRefresh, PipelineContext } from "./context";
import type { DisplayPrice, LoadedCatalog, LoadedRates, RefreshOptions, RefreshSummary } from "./types";

const nowMs = (ctx: PipelineContext) => ctx.now().getTime();

/**
 * Ветка скинов: свежий кэш, затем основной источник, затем запасной
 * (каждый проверяется перед записью в кэш), затем устаревший кэш,
 * иначе NoDataAvailable.
 */
const loadCatalog = async (ctx: PipelineContext): Promise<LoadedCatalog> => {
  const log = ctx.logger.child({ resource: "skins" });
  const cached = await ctx.priceCache.read();

  if (cached && ctx.priceCache.isFresh(cached)) {
    log.info({ fetchedAt: cached.fetchedAt, entries: cached.payload.entries.length }, "Using cached skin prices");
    return {
      snapshot: { ...cached.payload, fetchedAt: cached.fetchedAt },
      stale: false,
      expiresAt: nowMs(ctx) + ctx.priceCache.remainingMs(cached),
    };
  }

  const failures: string[] = [];
  let lastError: unknown = null;

  for (const kind of SOURCE_ORDER) {
    let snapshot: SkinCatalogSnapshot;
    try {
      snapshot = await ctx.sources[kind].fetch();
      verifySnapshot(snapshot, ctx.config.minCatalogSize);
    } catch (error) {
      lastError = error;
      failures.push(`${kind}: ${describeError(error)}`);
      log.warn({ source: kind, reason: describeError(error) }, "Skin price source failed");
      continue;
    }

    let expiresAt = nowMs(ctx) + ctx.config.priceCacheTtlSeconds * 1000;
    try {
      const record = await ctx.priceCache.write({
        sourceUsed: snapshot.sourceUsed,
        entries: [...snapshot.entries],
        quality: snapshot.quality,
      });
      expiresAt = nowMs(ctx) + ctx.priceCache.remainingMs(record);
    } catch (error) {
      log.error({ err: error }, "Could not persist skin prices, keeping them in memory only");
    }
    log.info({ source: kind, entries: snapshot.entries.length }, "Fetched fresh skin prices");
    return { snapshot, stale: false, expiresAt };
  }

  if (cached) {
    const warning = `Skin prices are from ${cached.fetchedAt} and may be outdated (${failures.join("; ")})`;
    log.warn({ fetchedAt: cached.fetchedAt }, "Serving stale skin prices");
    return {
      snapshot: { ...cached.payload, fetchedAt: cached.fetchedAt },
      stale: true,
      warning,
      expiresAt: nowMs(ctx) + ctx.config.staleRetrySeconds * 1000,
    };
  }

  throw new PipelineError("skins", lastError);
};

/** Ветка курсов: как ветка скинов, но с одним живым источником. */
const loadRates = async (ctx: PipelineContext): Promise<LoadedRates> => {
  const log = ctx.logger.child({ resource: "rates" });
  const cached = await ctx.rateCache.read();
  const fromCache = (fetchedAt: string): ExchangeRateTable => ({
    baseCurrency: cached?.payload.baseCurrency ?? "USD",
    rates: { ...cached?.payload.rates },
    fetchedAt,
  });

  if (cached && ctx.rateCache.isFresh(cached)) {
    log.info({ fetchedAt: cached.fetchedAt }, "Using cached exchange rates");
    return {
      table: fromCache(cached.fetchedAt),
      stale: false,
      expiresAt: nowMs(ctx) + ctx.rateCache.remainingMs(cached),
    };
  }

  let table: ExchangeRateTable;
  try {
    table = await ctx.rateProvider.fetchRates();
  } catch (error) {
    log.warn({ reason: describeError(error) }, "Exchange rate fetch failed");
    if (!cached) throw new PipelineError("rates", error);
    return {
      table: fromCache(cached.fetchedAt),
      stale: true,
      warning: `Exchange rates are from ${cached.fetchedAt} and may be outdated (${describeError(error)})`,
      expiresAt: nowMs(ctx) + ctx.config.staleRetrySeconds * 1000,
    };
  }

  let expiresAt = nowMs(ctx) + ctx.config.rateCacheTtlSeconds * 1000;
  try {
    const record = await ctx.rateCache.write({ baseCurrency: table.baseCurrency, rates: table.rates });
    expiresAt = nowMs(ctx) + ctx.rateCache.remainingMs(record);
  } catch (error) {
    log.error({ err: error }, "Could not persist exchange rates, keeping them in memory only");
  }
  return { table, stale: false, expiresAt };
};

/** Текущий каталог: копия в памяти или уже идущая загрузка. */
export const currentCatalog = async (ctx: PipelineContext): Promise<LoadedCatalog> => {
  const { state } = ctx;
  if (state.catalog && state.catalog.expiresAt > nowMs(ctx)) return state.catalog;
  state.pendingCatalog ??= loadCatalog(ctx)
    .then((catalog) => {
      state.catalog = catalog;
      return catalog;
    })
    .finally(() => {
      state.pendingCatalog = null;
    });
  return state.pendingCatalog;
};

export const currentRates = async (ctx: PipelineContext): Promise<LoadedRates> => {
  const { state } = ctx;
  if (state.rates && state.rates.expiresAt > nowMs(ctx)) return state.rates;
  state.pendingRates ??= loadRates(ctx)
    .then((rates) => {
      state.rates = rates;
      return rates;
    })
    .finally(() => {
      state.pendingRates = null;
    });
  return state.pendingRates;
};

const collectWarnings = (...warnings: (string | undefined)[]) =>
  warnings.filter((warning): warning is string => Boolean(warning));

/**
 * Грузит каталог и курсы параллельно и ждёт обе ветки, даже если одна упала:
 * запрос завершается только когда фоновых записей в кэш уже нет.
 */
const loadInputs = async (ctx: PipelineContext): Promise<[LoadedCatalog, LoadedRates]> => {
  const [catalog, rates] = await Promise.allSettled([currentCatalog(ctx), currentRates(ctx)]);
  if (catalog.status === "rejected") throw catalog.reason;
  if (rates.status === "rejected") throw rates.reason;
  return [catalog.value, rates.value];
};

/**
 * Цена всего каталога скинов в `currency`. Неподдерживаемая валюта
 * отклоняется до любой загрузки.
 */
export const getDisplayPrice = async (ctx: PipelineContext, currency: string): Promise<DisplayPrice> => {
  const code = normalizeCurrencyCode(currency);
  if (!isSupportedCurrency(code)) {
    throw new ConversionError("UnsupportedCurrency", code);
  }

  const quoted = ctx.state.quotes.get(code);
  if (quoted) return quoted;

  const [catalog, rates] = await loadInputs(ctx);
  const total = totalVP(catalog.snapshot.entries);
  const converted = convert(total, code, rates.table, ctx.config.usdPerVp);
  const store = storePrice(total, code);

  const price: DisplayPrice = {
    currency: code,
    amount: converted.amount,
    formatted: converted.formatted,
    rate: converted.rate,
    storeAmount: store.amount,
    storeFormatted: store.formatted,
    totalVP: total,
    skinCount: catalog.snapshot.entries.length,
    source: catalog.snapshot.sourceUsed,
    stale: catalog.stale || rates.stale,
    warnings: collectWarnings(catalog.warning, rates.warning),
    skinsFetchedAt: catalog.snapshot.fetchedAt,
    ratesFetchedAt: rates.table.fetchedAt,
  };

  const ttl = Math.min(ctx.config.quoteTtlMs, catalog.expiresAt - nowMs(ctx), rates.expiresAt - nowMs(ctx));
  if (ttl > 0) ctx.state.quotes.set(code, price, { ttl });
  return price;
};

const runRefresh = async (ctx: PipelineContext, options: RefreshOptions): Promise<RefreshSummary> => {
  const { state } = ctx;
  await Promise.allSettled([state.pendingCatalog, state.pendingRates]);

  state.catalog = null;
  state.rates = null;
  state.quotes.clear();
  if (options.force) {
    const cleared = await Promise.allSettled([ctx.priceCache.clear(), ctx.rateCache.clear()]);
    for (const result of cleared) {
      if (result.status === "rejected") throw result.reason;
    }
    ctx.logger.info("Cache files cleared");
  }

  const [catalog, rates] = await loadInputs(ctx);
  return {
    skinCount: catalog.snapshot.entries.length,
    totalVP: totalVP(catalog.snapshot.entries),
    source: catalog.snapshot.sourceUsed,
    stale: catalog.stale || rates.stale,
    warnings: collectWarnings(catalog.warning, rates.warning),
    skinsFetchedAt: catalog.snapshot.fetchedAt,
    ratesFetchedAt: rates.table.fetchedAt,
  };
};

/**
 * Сбрасывает состояние в памяти и запускает загрузку заново. С `force`
 * сначала удаляются оба файла кэша, и данные берутся только из источников.
 * Перекрывающиеся вызовы делят один прогон; `force`, пришедший во время
 * обычного прогона, ставит принудительный прогон следом за ним.
 */
export const refresh = (ctx: PipelineContext, options: RefreshOptions = {}): Promise<RefreshSummary> => {
  const { state } = ctx;
  const force = options.force === true;
  const running = state.pendingRefresh;
  if (running && (running.forced || !force)) return running.promise;

  const previous = running ? Promise.allSettled([running.promise]) : Promise.resolve();
  const pending: PendingRefresh = {
    forced: force,
    promise: previous
      .then(() => runRefresh(ctx, { force }))
      .finally(() => {
        if (state.pendingRefresh === pending) state.pendingRefresh = null;
      }),
  };
  state.pendingRefresh = pending;
  return pending.promise;
};

export const isBusy = (ctx: PipelineContext) =>
  ctx.state.pendingCatalog !== null || ctx.state.pendingRates !== null || ctx.state.pendingRefresh !== null;

/** Отчёт проверки для текущего каталога. */
export const getCatalogReport = async (ctx: PipelineContext): Promise<VerificationReport> => {
  const catalog = await currentCatalog(ctx);
  return buildVerificationReport(catalog.snapshot, ctx.config.minCatalogSize);
};
