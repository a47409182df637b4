import "dotenv/config";
import { loadPipelineConfig } from "../config";
import { describeError } from "../lib/errors";
import { createHttpClient, isSuccessStatus } from "../lib/http";
import { createLogger } from "../lib/logger";
import { describeTables, TARGET_TABLE_INDEXES } from "../modules/skins/parser";

const log = createLogger("inspect-tables");

/**
 * Печатает структуру всех wikitable на странице скинов. Нужен, чтобы понять,
 * какие индексы таблиц читать парсеру после смены вёрстки вики.
 */
const main = async () => {
  const config = loadPipelineConfig();
  const client = createHttpClient({ timeoutMs: config.httpTimeoutMs, userAgent: config.userAgent });
  const response = await client.get(config.wikiUrl, { responseType: "text" });
  if (!isSuccessStatus(response.status) || typeof response.data !== "string") {
    throw new Error(`GET ${config.wikiUrl} returned HTTP ${response.status}`);
  }

  const tables = describeTables(response.data);
  log.info({ url: config.wikiUrl, tables: tables.length }, "Found tables");
  for (const table of tables) {
    log.info({ ...table, parsed: TARGET_TABLE_INDEXES.includes(table.index) }, `Table ${table.index}`);
  }
};

main().catch((error: unknown) => {
  log.error({ reason: describeError(error) }, "Table inspection failed");
  process.exitCode = 1;
});
