import type { CurrencyCode } from "../currency/currencies";
import type { ExchangeRateTable } from "../rates/types";
import type { SkinCatalogSnapshot, SourceKind } from "../skins/types";

export interface LoadedCatalog {
  snapshot: SkinCatalogSnapshot;
  /** true, если отдан устаревший кэш после отказа всех источников. */
  stale: boolean;
  warning?: string;
  /** Epoch ms, после которого копию в памяти нужно перезагрузить. */
  expiresAt: number;
}

export interface LoadedRates {
  table: ExchangeRateTable;
  stale: boolean;
  warning?: string;
  expiresAt: number;
}

/** Всё, что нужно слою представления для одной валюты. */
export interface DisplayPrice {
  currency: CurrencyCode;
  amount: number;
  formatted: string;
  rate: number;
  storeAmount: number;
  storeFormatted: string;
  totalVP: number;
  skinCount: number;
  source: SourceKind;
  stale: boolean;
  warnings: string[];
  skinsFetchedAt: string;
  ratesFetchedAt: string;
}

export interface RefreshSummary {
  skinCount: number;
  totalVP: number;
  source: SourceKind;
  stale: boolean;
  warnings: string[];
  skinsFetchedAt: string;
  ratesFetchedAt: string;
}

export interface RefreshOptions {
  /** Удалить оба файла кэша и загрузить всё из источников. */
  force?: boolean;
}
