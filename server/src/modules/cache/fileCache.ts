import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { CacheError } from "../../lib/errors";
import type { Logger } from "../../lib/logger";

/** Закэшированные данные и отметка, по которой судят о свежести. */
export interface CacheRecord<T> {
  payload: T;
  fetchedAt: string;
  ttlSeconds: number;
}

const envelopeSchema = z
  .object({
    fetchedAt: z.string().datetime({ offset: true }),
    ttlSeconds: z.number().int().positive(),
  })
  .passthrough();

export interface JsonFileCacheOptions<T> {
  filePath: string;
  ttlSeconds: number;
  /** Проверяет поля данных, лежащие рядом с отметкой. */
  schema: z.ZodType<T>;
  logger: Logger;
  now?: () => Date;
}

const isMissingFile = (error: unknown) =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * JSON-кэш на одну запись. В файле рядом лежат `fetchedAt`, `ttlSeconds`
 * и поля самих данных. Всё, что не читается или не проходит проверку,
 * считается промахом.
 */
export class JsonFileCache<T extends object> {
  readonly filePath: string;
  readonly ttlSeconds: number;
  private readonly schema: z.ZodType<T>;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: JsonFileCacheOptions<T>) {
    this.filePath = options.filePath;
    this.ttlSeconds = options.ttlSeconds;
    this.schema = options.schema;
    this.logger = options.logger.child({ cacheFile: path.basename(options.filePath) });
    this.now = options.now ?? (() => new Date());
  }

  async read(): Promise<CacheRecord<T> | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.debug("Cache file absent");
      } else {
        this.logger.warn({ err: error }, "Cache file unreadable, treating as miss");
      }
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.logger.warn({ err: error }, "Cache file is not valid JSON, treating as miss");
      return null;
    }

    const envelope = envelopeSchema.safeParse(json);
    const payload = this.schema.safeParse(json);
    if (!envelope.success || !payload.success) {
      const issues = [
        ...(envelope.success ? [] : envelope.error.issues),
        ...(payload.success ? [] : payload.error.issues),
      ].map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
      this.logger.warn({ issues: issues.slice(0, 5) }, "Cache file failed validation, treating as miss");
      return null;
    }

    return {
      payload: payload.data,
      fetchedAt: envelope.data.fetchedAt,
      ttlSeconds: envelope.data.ttlSeconds,
    };
  }

  /** Сохраняет данные с текущим временем и TTL этого кэша. */
  async write(payload: T): Promise<CacheRecord<T>> {
    const record: CacheRecord<T> = {
      payload,
      fetchedAt: this.now().toISOString(),
      ttlSeconds: this.ttlSeconds,
    };
    const body = JSON.stringify(
      { fetchedAt: record.fetchedAt, ttlSeconds: record.ttlSeconds, ...payload },
      null,
      2,
    );
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tempPath, body, "utf8");
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs
        .rm(tempPath, { force: true })
        .catch((cleanupError: unknown) => this.logger.debug({ err: cleanupError }, "Temp file cleanup failed"));
      throw new CacheError(this.filePath, error);
    }
    this.logger.debug({ fetchedAt: record.fetchedAt }, "Cache written");
    return record;
  }

  isFresh(record: CacheRecord<T>): boolean {
    const fetchedAtMs = Date.parse(record.fetchedAt);
    return this.now().getTime() - fetchedAtMs < record.ttlSeconds * 1000;
  }

  /** Миллисекунды до устаревания (после него отрицательные). */
  remainingMs(record: CacheRecord<T>): number {
    return Date.parse(record.fetchedAt) + record.ttlSeconds * 1000 - this.now().getTime();
  }

  /** Удаляет файл, следующее чтение будет промахом. */
  async clear(): Promise<void> {
    try {
      await fs.rm(this.filePath, { force: true });
    } catch (error) {
      throw new CacheError(this.filePath, error);
    }
  }
}
