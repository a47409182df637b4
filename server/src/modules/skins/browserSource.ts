import { chromium } from "playwright-core";
import { describeError, ScrapeError } from "../../lib/errors";
import type { Logger } from "../../lib/logger";
import { parseSkinTables, SKIN_TABLE_SELECTOR } from "./parser";
import type { SkinCatalogSnapshot, SkinPriceSource } from "./types";

/** Часть страницы браузера, которой пользуется парсер. */
export interface BrowserPage {
  goto(url: string, options: { waitUntil: "networkidle"; timeout: number }): Promise<unknown>;
  waitForSelector(selector: string, options: { timeout: number }): Promise<unknown>;
  content(): Promise<string>;
}

export interface BrowserSession {
  newPage(): Promise<BrowserPage>;
  close(): Promise<void>;
}

export type BrowserLauncher = () => Promise<BrowserSession>;

const CHROMIUM_ARGS = [
  "--no-sandbox",
  "--disable-setuid-sandbox",
  "--disable-dev-shm-usage",
  "--disable-gpu",
  "--no-first-run",
  "--no-zygote",
];

export interface ChromiumOptions {
  userAgent: string;
  executablePath?: string;
}

/**
 * Запускает headless Chromium через playwright-core. Бинарник не входит в пакет:
 * берётся из локальной установки Playwright или из executablePath,
 * а его отсутствие всплывает ошибкой запуска.
 */
export const launchChromium =
  ({ userAgent, executablePath }: ChromiumOptions): BrowserLauncher =>
  async () => {
    const browser = await chromium.launch({
      headless: true,
      args: CHROMIUM_ARGS,
      executablePath,
    });
    return {
      newPage: async () => {
        const page = await browser.newPage({
          userAgent,
          viewport: { width: 1920, height: 1080 },
          extraHTTPHeaders: { "Accept-Language": "en-US,en;q=0.5" },
        });
        return {
          goto: (url, options) => page.goto(url, options),
          waitForSelector: (selector, options) => page.waitForSelector(selector, options),
          content: () => page.content(),
        };
      },
      close: () => browser.close(),
    };
  };

const isTimeout = (error: unknown) => error instanceof Error && error.name === "TimeoutError";

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

export interface BrowserSourceOptions {
  url: string;
  launch: BrowserLauncher;
  logger: Logger;
  pageLoadTimeoutMs: number;
  tableWaitTimeoutMs: number;
  attempts: number;
  retryBaseDelayMs: number;
  now?: () => Date;
}

/**
 * Рендерит страницу вики в headless-браузере и разбирает готовые таблицы.
 * Каждая попытка открывает свою сессию браузера и закрывает её на выходе.
 */
export const createBrowserSource = (options: BrowserSourceOptions): SkinPriceSource => {
  const { url, launch, logger, now } = options;

  const renderOnce = async (): Promise<string> => {
    let session: BrowserSession;
    try {
      session = await launch();
    } catch (error) {
      throw new ScrapeError("BrowserUnavailable", "primary", `Browser failed to start: ${describeError(error)}`, {
        cause: error,
      });
    }

    try {
      const page = await session.newPage();
      try {
        await page.goto(url, { waitUntil: "networkidle", timeout: options.pageLoadTimeoutMs });
      } catch (error) {
        if (isTimeout(error)) {
          throw new ScrapeError(
            "PageLoadTimeout",
            "primary",
            `${url} did not load within ${options.pageLoadTimeoutMs}ms`,
            { cause: error },
          );
        }
        throw new ScrapeError("NavigationFailed", "primary", `Navigation to ${url} failed: ${describeError(error)}`, {
          cause: error,
        });
      }

      try {
        await page.waitForSelector(SKIN_TABLE_SELECTOR, { timeout: options.tableWaitTimeoutMs });
      } catch (error) {
        throw new ScrapeError(
          "TableNotFound",
          "primary",
          `No ${SKIN_TABLE_SELECTOR} rendered within ${options.tableWaitTimeoutMs}ms`,
          { cause: error },
        );
      }

      return await page.content();
    } finally {
      try {
        await session.close();
      } catch (error) {
        logger.warn({ err: error }, "Failed to close browser session");
      }
    }
  };

  const scrapeOnce = async (): Promise<SkinCatalogSnapshot> => {
    const html = await renderOnce();
    const parsed = parseSkinTables(html);
    if (!parsed) {
      throw new ScrapeError("TableNotFound", "primary", "Rendered page lacks the weapon skin tables");
    }
    logger.info(
      {
        entries: parsed.entries.length,
        malformedRows: parsed.malformedRows,
        duplicates: parsed.duplicateNames.length,
      },
      "Parsed rendered skins table",
    );
    return {
      entries: parsed.entries,
      fetchedAt: (now ? now() : new Date()).toISOString(),
      sourceUsed: "primary",
      quality: {
        rowsSeen: parsed.rowsSeen,
        malformedRows: parsed.malformedRows,
        duplicateNames: parsed.duplicateNames,
      },
    };
  };

  return {
    kind: "primary",
    fetch: async () => {
      for (let attempt = 0; ; attempt++) {
        try {
          return await scrapeOnce();
        } catch (error) {
          const lastAttempt = attempt + 1 >= options.attempts;
          const retriable = error instanceof ScrapeError && error.kind !== "BrowserUnavailable";
          if (lastAttempt || !retriable) throw error;
          const delay = options.retryBaseDelayMs * 2 ** attempt;
          logger.warn(
            { attempt: attempt + 1, attempts: options.attempts, delay, reason: describeError(error) },
            "Browser scrape failed, retrying",
          );
          await sleep(delay);
        }
      }
    },
  };
};
