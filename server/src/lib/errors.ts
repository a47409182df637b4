import type { SourceKind } from "../modules/skins/types";

/**
 * Ошибки пайплайна цен. У каждого класса есть дискриминант `kind` и контекст
 * для вызывающего. Ошибки нижнего уровня (axios, playwright, fs, zod)
 * переводятся в эти классы на границе компонента.
 */

export type ScrapeErrorKind =
  | "BrowserUnavailable"
  | "PageLoadTimeout"
  | "NavigationFailed"
  | "TableNotFound"
  | "HttpError"
  | "ParseError";

export class ScrapeError extends Error {
  readonly kind: ScrapeErrorKind;
  readonly source: SourceKind;
  readonly status?: number;

  constructor(
    kind: ScrapeErrorKind,
    source: SourceKind,
    message: string,
    options: { status?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "ScrapeError";
    this.kind = kind;
    this.source = source;
    this.status = options.status;
  }
}

export class VerificationError extends Error {
  readonly kind = "CountBelowThreshold" as const;
  readonly found: number;
  readonly expected: number;

  constructor(found: number, expected: number) {
    super(`Catalog has ${found} skins, expected at least ${expected}`);
    this.name = "VerificationError";
    this.found = found;
    this.expected = expected;
  }
}

export type RateErrorKind = "HttpError" | "InvalidPayload" | "MissingCurrency";

export class RateError extends Error {
  readonly kind: RateErrorKind;
  readonly status?: number;
  readonly currency?: string;

  constructor(
    kind: RateErrorKind,
    message: string,
    options: { status?: number; currency?: string; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "RateError";
    this.kind = kind;
    this.status = options.status;
    this.currency = options.currency;
  }
}

export type ConversionErrorKind = "UnsupportedCurrency" | "MissingRate";

export class ConversionError extends Error {
  readonly kind: ConversionErrorKind;
  readonly currency: string;

  constructor(kind: ConversionErrorKind, currency: string) {
    super(
      kind === "UnsupportedCurrency"
        ? `Currency ${currency} is not supported`
        : `No exchange rate available for ${currency}`,
    );
    this.name = "ConversionError";
    this.kind = kind;
    this.currency = currency;
  }
}

export class CacheError extends Error {
  readonly kind = "IOError" as const;
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Cache file ${path} is not writable`, { cause });
    this.name = "CacheError";
    this.path = path;
  }
}

export type PipelineResource = "skins" | "rates";

export class PipelineError extends Error {
  readonly kind = "NoDataAvailable" as const;
  readonly resource: PipelineResource;

  constructor(resource: PipelineResource, cause: unknown) {
    super(
      resource === "skins"
        ? "No skin prices available: every source failed and nothing is cached"
        : "No exchange rates available: the rate API failed and nothing is cached",
      { cause },
    );
    this.name = "PipelineError";
    this.resource = resource;
  }
}

/** Короткая причина для логов и предупреждений. */
export const describeError = (error: unknown): string => {
  if (error instanceof ScrapeError || error instanceof RateError) {
    return error.status ? `${error.kind} (${error.status}): ${error.message}` : `${error.kind}: ${error.message}`;
  }
  if (error instanceof VerificationError) return `${error.kind}: ${error.message}`;
  return error instanceof Error ? error.message : String(error);
};
