import { ScrapeError } from "../../lib/errors";
import { describeTransportFailure, isSuccessStatus, type HttpClient, type HttpResponse } from "../../lib/http";
import type { Logger } from "../../lib/logger";
import { parseSkinTables } from "./parser";
import type { SkinCatalogSnapshot, SkinPriceSource } from "./types";

export interface HttpSourceOptions {
  url: string;
  client: HttpClient;
  logger: Logger;
  now?: () => Date;
}

/**
 * Запасной парсер: обычный GET и разбор статического HTML. Цен, которые
 * вики дописывает на клиенте, здесь нет, поэтому строк обычно меньше,
 * чем у браузерного источника.
 */
export const createHttpSource = ({ url, client, logger, now }: HttpSourceOptions): SkinPriceSource => ({
  kind: "fallback",
  fetch: async (): Promise<SkinCatalogSnapshot> => {
    let response: HttpResponse;
    try {
      response = await client.get(url, {
        responseType: "text",
        headers: { Accept: "text/html,application/xhtml+xml" },
      });
    } catch (error) {
      throw new ScrapeError("HttpError", "fallback", `GET ${url} failed: ${describeTransportFailure(error)}`, {
        cause: error,
      });
    }

    if (!isSuccessStatus(response.status)) {
      throw new ScrapeError("HttpError", "fallback", `GET ${url} returned HTTP ${response.status}`, {
        status: response.status,
      });
    }
    if (typeof response.data !== "string") {
      throw new ScrapeError("ParseError", "fallback", `GET ${url} did not return an HTML document`);
    }

    const parsed = parseSkinTables(response.data);
    if (!parsed) {
      throw new ScrapeError("ParseError", "fallback", "Static HTML lacks the weapon skin tables");
    }

    logger.info(
      {
        entries: parsed.entries.length,
        malformedRows: parsed.malformedRows,
        duplicates: parsed.duplicateNames.length,
      },
      "Parsed skins table over HTTP",
    );

    return {
      entries: parsed.entries,
      fetchedAt: (now ? now() : new Date()).toISOString(),
      sourceUsed: "fallback",
      quality: {
        rowsSeen: parsed.rowsSeen,
        malformedRows: parsed.malformedRows,
        duplicateNames: parsed.duplicateNames,
      },
    };
  },
});
