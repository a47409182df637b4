import { VerificationError } from "../../lib/errors";
import type {
  CatalogSummary,
  CoverageGrade,
  SkinCatalogSnapshot,
  SkinEntry,
  VerificationReport,
} from "./types";

/** Известные ценовые уровни магазина; остальные цены попадают в unexpectedPrices. */
export const EDITION_BY_PRICE: Record<number, string> = {
  875: "Select",
  1275: "Deluxe",
  1775: "Premium",
  2175: "Exclusive",
  2375: "Exclusive",
  2675: "Exclusive",
  2475: "Ultra",
  2975: "Ultra",
  1750: "Select (melee)",
  2550: "Deluxe (melee)",
  3550: "Premium (melee)",
  4350: "Exclusive (melee)",
  5350: "Exclusive (melee)",
  4950: "Ultra (melee)",
  5950: "Ultra (melee)",
};

/**
 * Отклоняет снимок, который меньше известного каталога: короткий результат
 * означает сломанный источник, а не удалённые скины.
 */
export const verifySnapshot = (snapshot: SkinCatalogSnapshot, minCatalogSize: number): void => {
  const found = snapshot.entries.length;
  if (found < minCatalogSize) {
    throw new VerificationError(found, minCatalogSize);
  }
};

export const totalVP = (entries: readonly SkinEntry[]): number =>
  entries.reduce((sum, entry) => sum + entry.priceVP, 0);

export const summarizeCatalog = (entries: readonly SkinEntry[]): CatalogSummary => {
  if (!entries.length) {
    return { totalSkins: 0, totalVP: 0, averageVP: 0, minVP: 0, maxVP: 0, rangeVP: 0 };
  }
  const prices = entries.map((entry) => entry.priceVP);
  const sum = totalVP(entries);
  const minVP = Math.min(...prices);
  const maxVP = Math.max(...prices);
  return {
    totalSkins: entries.length,
    totalVP: sum,
    averageVP: sum / entries.length,
    minVP,
    maxVP,
    rangeVP: maxVP - minVP,
  };
};

export const gradeCoverage = (coveragePercent: number): CoverageGrade => {
  if (coveragePercent >= 95) return "excellent";
  if (coveragePercent >= 80) return "good";
  if (coveragePercent >= 60) return "acceptable";
  return "poor";
};

/** Процент строк таблиц, из которых получилась запись (повторы считаются валидными). */
export const parseQualityPercent = (rowsSeen: number, malformedRows: number): number =>
  rowsSeen > 0 ? ((rowsSeen - malformedRows) / rowsSeen) * 100 : 0;

export const buildVerificationReport = (
  snapshot: SkinCatalogSnapshot,
  expected: number,
): VerificationReport => {
  const editions: Record<string, number> = {};
  const unexpectedPrices: Record<string, number> = {};

  for (const { priceVP } of snapshot.entries) {
    const edition = EDITION_BY_PRICE[priceVP];
    if (edition) {
      editions[edition] = (editions[edition] ?? 0) + 1;
    } else {
      unexpectedPrices[String(priceVP)] = (unexpectedPrices[String(priceVP)] ?? 0) + 1;
    }
  }

  const found = snapshot.entries.length;
  const coveragePercent = expected > 0 ? (found / expected) * 100 : 0;
  const { rowsSeen, malformedRows, duplicateNames } = snapshot.quality;

  return {
    summary: summarizeCatalog(snapshot.entries),
    editions,
    unexpectedPrices,
    expected,
    coveragePercent,
    grade: gradeCoverage(coveragePercent),
    passed: found >= expected,
    malformedRows,
    duplicateNames: [...duplicateNames],
    qualityPercent: parseQualityPercent(rowsSeen, malformedRows),
    sourceUsed: snapshot.sourceUsed,
    fetchedAt: snapshot.fetchedAt,
  };
};
