/** Какой скрапер получил снимок, в порядке попыток. */
export const SOURCE_ORDER = ["primary", "fallback"] as const;
export type SourceKind = (typeof SOURCE_ORDER)[number];

/** Скин и его цена в магазине в VP. */
export interface SkinEntry {
  readonly name: string;
  readonly priceVP: number;
}

/** Сколько строк таблиц прочитано и сколько из них отброшено. */
export interface ParseQuality {
  rowsSeen: number;
  malformedRows: number;
  /** Повторы имён; в каталоге остаётся первое вхождение. */
  duplicateNames: string[];
}

/** Полный снимок таблицы скинов на момент `fetchedAt`. */
export interface SkinCatalogSnapshot {
  entries: readonly SkinEntry[];
  fetchedAt: string;
  sourceUsed: SourceKind;
  quality: ParseQuality;
}

/** Результат разбора таблиц вики до превращения в снимок. */
export interface ParsedCatalog extends ParseQuality {
  entries: SkinEntry[];
  tablesFound: number;
}

/** Общий контракт браузерного и HTTP-скрапера. */
export interface SkinPriceSource {
  readonly kind: SourceKind;
  fetch(): Promise<SkinCatalogSnapshot>;
}

export interface CatalogSummary {
  totalSkins: number;
  totalVP: number;
  averageVP: number;
  minVP: number;
  maxVP: number;
  rangeVP: number;
}

export type CoverageGrade = "excellent" | "good" | "acceptable" | "poor";

export interface VerificationReport {
  summary: CatalogSummary;
  editions: Record<string, number>;
  unexpectedPrices: Record<string, number>;
  expected: number;
  coveragePercent: number;
  grade: CoverageGrade;
  passed: boolean;
  malformedRows: number;
  duplicateNames: string[];
  /** Доля прочитанных строк, давших валидную запись, в процентах. */
  qualityPercent: number;
  sourceUsed: SourceKind;
  fetchedAt: string;
}
