import { Router, type Response } from "express";
import { z } from "zod";
import { CacheError, ConversionError, describeError, PipelineError, RateError, ScrapeError, VerificationError } from "../../lib/errors";
import { createLogger } from "../../lib/logger";
import { CURRENCIES, SUPPORTED_CURRENCIES } from "../currency/currencies";
import type { PipelineContext } from "./context";
import { getCatalogReport, getDisplayPrice, isBusy, refresh } from "./service";

const log = createLogger("api");

const refreshBodySchema = z.object({ force: z.boolean().optional() });

export interface ErrorResponse {
  status: number;
  body: { error: string; message: string } & Record<string, unknown>;
}

/** Переводит ошибки пайплайна в HTTP-статусы; неизвестные дают 500. */
export const toErrorResponse = (error: unknown): ErrorResponse => {
  if (error instanceof ConversionError) {
    return {
      status: error.kind === "UnsupportedCurrency" ? 400 : 422,
      body: { error: error.kind, message: error.message, currency: error.currency },
    };
  }
  if (error instanceof PipelineError) {
    return {
      status: 503,
      body: { error: error.kind, message: error.message, resource: error.resource, reason: describeError(error.cause) },
    };
  }
  if (error instanceof ScrapeError || error instanceof RateError || error instanceof VerificationError) {
    return { status: 502, body: { error: error.kind, message: error.message } };
  }
  if (error instanceof CacheError) {
    return { status: 500, body: { error: error.kind, message: error.message, path: error.path } };
  }
  return { status: 500, body: { error: "Internal", message: describeError(error) } };
};

const handleError = (response: Response, error: unknown) => {
  const { status, body } = toErrorResponse(error);
  if (status >= 500) log.error({ err: error, status }, "Request failed");
  else log.info({ status, error: body.error }, "Request rejected");
  return response.status(status).json(body);
};

/**
 * Маршруты API цен, монтируются под /api.
 */
export const createPriceRouter = (ctx: PipelineContext): Router => {
  const router = Router();

  /** GET /api/currencies */
  router.get("/currencies", (_request, response) => {
    response.json(
      SUPPORTED_CURRENCIES.map((code) => ({
        code,
        label: CURRENCIES[code].label,
        symbol: CURRENCIES[code].symbol,
      })),
    );
  });

  /**
   * GET /api/price?currency=EUR
   * Сумма каталога в одной валюте; по умолчанию USD.
   */
  router.get("/price", async (request, response) => {
    try {
      const currency = String(request.query.currency ?? "USD");
      return response.json(await getDisplayPrice(ctx, currency));
    } catch (error) {
      return handleError(response, error);
    }
  });

  /**
   * POST /api/refresh { force?: boolean }
   * Перезагружает оба источника; `force` ещё и удаляет файлы кэша.
   */
  router.post("/refresh", async (request, response) => {
    const parsed = refreshBodySchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return response.status(400).json({ error: "InvalidBody", message: "Expected { force?: boolean }" });
    }
    try {
      const wasBusy = isBusy(ctx);
      const summary = await refresh(ctx, parsed.data);
      return response.json({ ...summary, waitedForRunningLoad: wasBusy });
    } catch (error) {
      return handleError(response, error);
    }
  });

  /** GET /api/skins/stats */
  router.get("/skins/stats", async (_request, response) => {
    try {
      return response.json(await getCatalogReport(ctx));
    } catch (error) {
      return handleError(response, error);
    }
  });

  return router;
};
