import { z } from "zod";
import { SOURCE_ORDER } from "../skins/types";

export const skinEntrySchema = z.object({
  name: z.string().min(1),
  priceVP: z.number().int().nonnegative(),
});

export const parseQualitySchema = z.object({
  rowsSeen: z.number().int().nonnegative(),
  malformedRows: z.number().int().nonnegative(),
  duplicateNames: z.array(z.string()),
});

/** Содержимое файла кэша цен: записи, источник и качество разбора. */
export const cachedCatalogSchema = z.object({
  sourceUsed: z.enum(SOURCE_ORDER),
  entries: z.array(skinEntrySchema),
  quality: parseQualitySchema,
});

export type CachedCatalog = z.infer<typeof cachedCatalogSchema>;

/** Содержимое файла кэша курсов валют. */
export const cachedRatesSchema = z.object({
  baseCurrency: z.string().length(3),
  rates: z.record(z.string(), z.number().positive()),
});

export type CachedRates = z.infer<typeof cachedRatesSchema>;
