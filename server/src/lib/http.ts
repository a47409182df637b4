import axios, { type AxiosRequestConfig } from "axios";

/** Минимальный ответ, на который опираются парсеры и провайдер курсов. */
export interface HttpResponse {
  status: number;
  data: unknown;
}

export interface HttpClient {
  get(url: string, requestConfig?: AxiosRequestConfig): Promise<HttpResponse>;
}

/**
 * Клиент на axios. Статусы не из 2xx не бросаются, а возвращаются:
 * вызывающий сам кладёт статус в свою ошибку.
 */
export const createHttpClient = ({
  timeoutMs,
  userAgent,
}: {
  timeoutMs: number;
  userAgent: string;
}): HttpClient => {
  const instance = axios.create({
    timeout: timeoutMs,
    headers: { "User-Agent": userAgent },
    validateStatus: () => true,
  });
  return {
    get: (url, requestConfig) => instance.get<unknown>(url, requestConfig),
  };
};

export const isSuccessStatus = (status: number) => status >= 200 && status < 300;

/** Описание сетевой ошибки axios (таймаут, DNS, обрыв). */
export const describeTransportFailure = (error: unknown): string => {
  if (axios.isAxiosError(error)) {
    if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
      return `request timed out (${error.message})`;
    }
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
};
