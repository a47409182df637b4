export const SUPPORTED_CURRENCIES = [
  "USD",
  "AUD",
  "BRL",
  "CAD",
  "EUR",
  "INR",
  "MYR",
  "MXN",
  "NZD",
  "RUB",
  "SGD",
  "TRY",
  "GBP",
] as const;

export type CurrencyCode = (typeof SUPPORTED_CURRENCIES)[number];

export interface CurrencyInfo {
  code: CurrencyCode;
  label: string;
  symbol: string;
  /** VP в самом большом наборе региона и его местная цена. */
  storeBundleVP: number;
  storeBundlePrice: number;
}

export const CURRENCIES: Record<CurrencyCode, CurrencyInfo> = {
  USD: { code: "USD", label: "United States Dollar", symbol: "$", storeBundleVP: 11000, storeBundlePrice: 99.99 },
  AUD: { code: "AUD", label: "Australian Dollar", symbol: "A$", storeBundleVP: 9750, storeBundlePrice: 129.99 },
  BRL: { code: "BRL", label: "Brazilian Real", symbol: "R$", storeBundleVP: 11500, storeBundlePrice: 349.9 },
  CAD: { code: "CAD", label: "Canadian Dollar", symbol: "CA$", storeBundleVP: 11000, storeBundlePrice: 139.99 },
  EUR: { code: "EUR", label: "Euro", symbol: "€", storeBundleVP: 11000, storeBundlePrice: 100 },
  INR: { code: "INR", label: "Indian Rupee", symbol: "₹", storeBundleVP: 11000, storeBundlePrice: 7900 },
  MYR: { code: "MYR", label: "Malaysian Ringgit", symbol: "MYR", storeBundleVP: 6750, storeBundlePrice: 199.9 },
  MXN: { code: "MXN", label: "Mexican Peso", symbol: "MX$", storeBundleVP: 12400, storeBundlePrice: 1999 },
  NZD: { code: "NZD", label: "New Zealand Dollar", symbol: "NZ$", storeBundleVP: 9750, storeBundlePrice: 144.99 },
  RUB: { code: "RUB", label: "Russian Ruble", symbol: "₽", storeBundleVP: 11000, storeBundlePrice: 5990 },
  SGD: { code: "SGD", label: "Singapore Dollar", symbol: "SGD", storeBundleVP: 10500, storeBundlePrice: 128.98 },
  TRY: { code: "TRY", label: "Turkish Lira", symbol: "₺", storeBundleVP: 8500, storeBundlePrice: 700 },
  GBP: { code: "GBP", label: "Pound Sterling", symbol: "£", storeBundleVP: 11500, storeBundlePrice: 90 },
};

export const isSupportedCurrency = (code: string): code is CurrencyCode =>
  SUPPORTED_CURRENCIES.some((supported) => supported === code);

/** Обрезает пробелы и переводит в верхний регистр ("eur " -> "EUR"). */
export const normalizeCurrencyCode = (code: string) => code.trim().toUpperCase();
