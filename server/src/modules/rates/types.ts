/** Курсы из `baseCurrency` (здесь всегда USD) в другие валюты. */
export interface ExchangeRateTable {
  baseCurrency: string;
  rates: Record<string, number>;
  fetchedAt: string;
}

export interface ExchangeRateProvider {
  fetchRates(): Promise<ExchangeRateTable>;
}
