import { z } from "zod";
import { RateError } from "../../lib/errors";
import { describeTransportFailure, isSuccessStatus, type HttpClient, type HttpResponse } from "../../lib/http";
import type { Logger } from "../../lib/logger";
import { SUPPORTED_CURRENCIES } from "../currency/currencies";
import type { ExchangeRateProvider, ExchangeRateTable } from "./types";

/** Цены VP привязаны к USD, поэтому база таблицы только USD. */
export const REFERENCE_CURRENCY = "USD";

/** Принимает формат open.er-api.com и классический `{ base, rates }`. */
const ratesResponseSchema = z.object({
  result: z.string().optional(),
  base_code: z.string().optional(),
  base: z.string().optional(),
  rates: z.record(z.string(), z.number()),
});

export interface RateProviderOptions {
  url: string;
  client: HttpClient;
  logger: Logger;
  now?: () => Date;
}

export const createRateProvider = ({ url, client, logger, now }: RateProviderOptions): ExchangeRateProvider => ({
  fetchRates: async (): Promise<ExchangeRateTable> => {
    let response: HttpResponse;
    try {
      response = await client.get(url, { headers: { Accept: "application/json" } });
    } catch (error) {
      throw new RateError("HttpError", `GET ${url} failed: ${describeTransportFailure(error)}`, { cause: error });
    }
    if (!isSuccessStatus(response.status)) {
      throw new RateError("HttpError", `GET ${url} returned HTTP ${response.status}`, { status: response.status });
    }

    const parsed = ratesResponseSchema.safeParse(response.data);
    if (!parsed.success || parsed.data.result === "error") {
      throw new RateError("InvalidPayload", `Rate API at ${url} returned an unexpected payload`, {
        cause: parsed.success ? undefined : parsed.error,
      });
    }

    const baseCurrency = (parsed.data.base_code ?? parsed.data.base ?? REFERENCE_CURRENCY).toUpperCase();
    if (baseCurrency !== REFERENCE_CURRENCY) {
      throw new RateError("InvalidPayload", `Rate API base is ${baseCurrency}, expected ${REFERENCE_CURRENCY}`);
    }

    const rates: Record<string, number> = { [REFERENCE_CURRENCY]: 1 };
    for (const [code, rate] of Object.entries(parsed.data.rates)) {
      if (Number.isFinite(rate) && rate > 0) rates[code.toUpperCase()] = rate;
    }

    const missing = SUPPORTED_CURRENCIES.find((code) => rates[code] === undefined);
    if (missing) {
      throw new RateError("MissingCurrency", `Rate API has no rate for ${missing}`, { currency: missing });
    }

    logger.info({ currencies: Object.keys(rates).length }, "Fetched exchange rates");
    return {
      baseCurrency,
      rates,
      fetchedAt: (now ? now() : new Date()).toISOString(),
    };
  },
});
