import * as cheerio from "cheerio";
import type { ParsedCatalog, SkinEntry } from "./types";

export const SKIN_TABLE_SELECTOR = "table.wikitable.sortable";

/** Таблицы скинов: 2-я и 3-я сортируемые таблицы на странице. */
export const TARGET_TABLE_INDEXES = [1, 2];

/** Числа вне диапазона не цены VP (годы, количества, id). */
const MIN_PLAUSIBLE_VP = 800;
const MAX_PLAUSIBLE_VP = 6000;

const PLACEHOLDER_NAMES = new Set(["", "-", "—", "–"]);

const normalizeText = (text: string) => text.replace(/\s+/g, " ").trim();

/**
 * Разбирает ячейку цены ("1,775", "2 175 VP") в целое число.
 * null, если после очистки осталось не целое неотрицательное число.
 */
export const parseVpPrice = (text: string): number | null => {
  const cleaned = text.replace(/[\s,]/g, "").replace(/VP$/i, "");
  if (!/^\d+$/.test(cleaned)) return null;
  const value = Number.parseInt(cleaned, 10);
  return Number.isSafeInteger(value) ? value : null;
};

/** Первая правдоподобная сумма VP в тексте ("Bundle: 1,775"). */
export const findPlausibleVpPrice = (text: string): number | null => {
  const match = text.match(/\b(\d{1,3}(?:,\d{3})+|\d{3,4})\b/);
  if (!match) return null;
  const value = Number.parseInt(match[1].replace(/,/g, ""), 10);
  return value >= MIN_PLAUSIBLE_VP && value <= MAX_PLAUSIBLE_VP ? value : null;
};

/**
 * Достаёт строки скинов из таблиц вики. null, если нужных таблиц нет,
 * то есть вёрстка поменялась. Строки без имени или цены пропускаются
 * и считаются.
 */
export const parseSkinTables = (html: string): ParsedCatalog | null => {
  const $ = cheerio.load(html);
  const tables = $(SKIN_TABLE_SELECTOR).toArray();
  if (tables.length < 2) return null;

  const entries: SkinEntry[] = [];
  const seen = new Set<string>();
  const duplicateNames: string[] = [];
  let rowsSeen = 0;
  let malformedRows = 0;

  for (const index of TARGET_TABLE_INDEXES) {
    const table = tables[index];
    if (!table) continue;

    const rows = $(table).find("tr").toArray().slice(1);
    for (const row of rows) {
      const cells = $(row).children("td");
      if (!cells.length) continue;
      rowsSeen += 1;

      const name = normalizeText(cells.first().text());
      const sortCell = cells.filter("[data-sort-value]").first();
      const priceVP = sortCell.length
        ? parseVpPrice(sortCell.text())
        : cells
            .toArray()
            .map((cell) => findPlausibleVpPrice(normalizeText($(cell).text())))
            .find((price) => price !== null) ?? null;
      if (PLACEHOLDER_NAMES.has(name) || priceVP === null) {
        malformedRows += 1;
        continue;
      }
      if (seen.has(name)) {
        duplicateNames.push(name);
        continue;
      }
      seen.add(name);
      entries.push({ name, priceVP });
    }
  }

  return { entries, tablesFound: tables.length, rowsSeen, malformedRows, duplicateNames };
};

export interface TableDescription {
  index: number;
  classes: string;
  rows: number;
  headers: string[];
  sampleRow: string[];
}

/** Структура всех таблиц страницы, для разбора смены вёрстки. */
export const describeTables = (html: string): TableDescription[] => {
  const $ = cheerio.load(html);
  return $("table")
    .toArray()
    .map((table, index) => {
      const rows = $(table).find("tr");
      const headers = rows
        .first()
        .children("th, td")
        .toArray()
        .map((cell) => normalizeText($(cell).text()));
      const sampleRow = rows
        .eq(1)
        .children("td")
        .toArray()
        .map((cell) => normalizeText($(cell).text()));
      return {
        index,
        classes: $(table).attr("class") ?? "",
        rows: rows.length,
        headers,
        sampleRow,
      };
    });
};
