import { ConversionError } from "../../lib/errors";
import type { ExchangeRateTable } from "../rates/types";
import { CURRENCIES, isSupportedCurrency, type CurrencyCode } from "./currencies";

export interface ConvertedPrice {
  currency: CurrencyCode;
  amount: number;
  formatted: string;
  rate: number;
}

export interface StorePrice {
  amount: number;
  formatted: string;
}

const amountFormat = new Intl.NumberFormat("en-US", { minimumFractionDigits: 2, maximumFractionDigits: 2 });

/** "€1,234.50", "MYR99.00" */
export const formatAmount = (amount: number, currency: CurrencyCode): string =>
  `${CURRENCIES[currency].symbol}${amountFormat.format(amount)}`;

/**
 * Переводит сумму VP в `targetCurrency`: VP -> USD по фиксированной цене
 * магазина, затем USD -> целевая валюта по таблице курсов.
 */
export const convert = (
  totalVP: number,
  targetCurrency: string,
  rates: ExchangeRateTable,
  usdPerVp: number,
): ConvertedPrice => {
  if (!isSupportedCurrency(targetCurrency)) {
    throw new ConversionError("UnsupportedCurrency", targetCurrency);
  }
  const rate = rates.rates[targetCurrency];
  if (typeof rate !== "number" || !Number.isFinite(rate) || rate <= 0) {
    throw new ConversionError("MissingRate", targetCurrency);
  }
  const amount = totalVP * usdPerVp * rate;
  return { currency: targetCurrency, amount, formatted: formatAmount(amount, targetCurrency), rate };
};

/** Сколько стоит сумма VP по цене набора в магазине региона. */
export const storePrice = (totalVP: number, currency: CurrencyCode): StorePrice => {
  const { storeBundleVP, storeBundlePrice } = CURRENCIES[currency];
  const amount = (totalVP / storeBundleVP) * storeBundlePrice;
  return { amount, formatted: formatAmount(amount, currency) };
};
