import Bottleneck from 'bottleneck';
import pRetry from 'p-retry';
import type { Logger } from 'pino';
import pino from 'pino';
import { fetch, type Dispatcher, type RequestInit } from 'undici';
import { z } from 'zod';

type Primitive = string | number | boolean;
export type QueryParams = Record<string, Primitive | undefined>;

export type YahooClientOptions = {
  baseUrl: string;
  logger?: Logger;
  dispatcher?: Dispatcher;
  rateLimitRps?: number;
  requestTimeoutMs?: number;
  retryCount?: number;
  userAgent?: string;
};

export type ChartQuery = {
  interval: string;
  range?: string;
  period1?: number;
  period2?: number;
};

const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;
const DEFAULT_RETRY_COUNT = 2;
const DEFAULT_RATE_LIMIT_RPS = 2;
export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

const nullableNumbers = z.array(z.number().nullable());

export const chartResultSchema = z.object({
  meta: z
    .object({
      symbol: z.string(),
      currency: z.string().nullish(),
      exchangeTimezoneName: z.string().nullish()
    })
    .passthrough(),
  timestamp: z.array(z.number().int()).optional(),
  indicators: z.object({
    quote: z
      .array(
        z.object({
          open: nullableNumbers.optional(),
          high: nullableNumbers.optional(),
          low: nullableNumbers.optional(),
          close: nullableNumbers.optional(),
          volume: nullableNumbers.optional()
        })
      )
      .default([])
  })
});

export const chartResponseSchema = z.object({
  chart: z.object({
    result: z.array(chartResultSchema).nullable(),
    error: z
      .object({
        code: z.string(),
        description: z.string()
      })
      .nullable()
  })
});

export type ChartResult = z.infer<typeof chartResultSchema>;
export type ChartResponse = z.infer<typeof chartResponseSchema>;

export function buildSortedQueryString(params: QueryParams = {}): string {
  const entries = Object.entries(params)
    .filter(([, value]) => value !== undefined)
    .sort(([left], [right]) => left.localeCompare(right));

  const query = new URLSearchParams();
  for (const [key, value] of entries) {
    query.set(key, String(value));
  }

  return query.toString();
}

export class YahooChartClient {
  private readonly baseUrl: string;
  private readonly logger: Logger;
  private readonly dispatcher?: Dispatcher;
  private readonly limiter: Bottleneck;
  private readonly requestTimeoutMs: number;
  private readonly retryCount: number;
  private readonly userAgent: string;

  constructor(options: YahooClientOptions) {
    this.baseUrl = options.baseUrl;
    this.logger = options.logger ?? pino({ name: 'yahoo-client' });
    this.dispatcher = options.dispatcher;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.retryCount = options.retryCount ?? DEFAULT_RETRY_COUNT;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;

    const rateLimitRps = options.rateLimitRps ?? DEFAULT_RATE_LIMIT_RPS;
    const minTimeMs = Math.ceil(1000 / Math.max(1, rateLimitRps));
    this.limiter = new Bottleneck({ maxConcurrent: 1, minTime: minTimeMs });
  }

  async getChart(symbol: string, query: ChartQuery): Promise<ChartResponse> {
    const params = buildSortedQueryString({
      interval: query.interval,
      range: query.period1 === undefined ? query.range : undefined,
      period1: query.period1,
      period2: query.period2,
      includePrePost: false
    });
    const path = `/v8/finance/chart/${encodeURIComponent(symbol)}?${params}`;

    const body = await this.withRetry(() => this.scheduleRequest(path), 'getChart');
    const parsed = chartResponseSchema.safeParse(body);

    if (!parsed.success) {
      throw new YahooPayloadError(`Unexpected chart payload: ${parsed.error.message}`);
    }

    return parsed.data;
  }

  private async withRetry<T>(fn: () => Promise<T>, action: string): Promise<T> {
    return pRetry(
      async () => {
        try {
          return await fn();
        } catch (error: unknown) {
          if (!this.isRetryableError(error)) {
            throw new pRetry.AbortError(error instanceof Error ? error : String(error));
          }

          throw error;
        }
      },
      {
        retries: this.retryCount,
        factor: 2,
        minTimeout: 100,
        maxTimeout: 2000,
        onFailedAttempt: (error) => {
          this.logger.warn(
            {
              action,
              attemptNumber: error.attemptNumber,
              retriesLeft: error.retriesLeft,
              errorMessage: error.message
            },
            'Yahoo request attempt failed'
          );
        }
      }
    );
  }

  private async scheduleRequest(path: string): Promise<unknown> {
    return this.limiter.schedule(async () => {
      const url = new URL(path, this.baseUrl).toString();

      const controller = new AbortController();
      const timeoutHandle = setTimeout(() => controller.abort(), this.requestTimeoutMs);

      try {
        this.logger.debug({ path }, 'Sending Yahoo request');

        const init: RequestInit = {
          method: 'GET',
          headers: { Accept: 'application/json', 'User-Agent': this.userAgent },
          signal: controller.signal,
          dispatcher: this.dispatcher
        };
        const response = await fetch(url, init);

        if (!response.ok) {
          const bodyText = await response.text();
          throw new YahooHttpError(response.status, bodyText || response.statusText);
        }

        return await response.json();
      } catch (error: unknown) {
        if (isAbortError(error)) {
          throw new YahooNetworkError('Request timeout reached');
        }

        throw error;
      } finally {
        clearTimeout(timeoutHandle);
      }
    });
  }

  private isRetryableError(error: unknown): boolean {
    if (error instanceof YahooHttpError) {
      return error.statusCode === 429 || (error.statusCode >= 500 && error.statusCode < 600);
    }

    if (error instanceof YahooNetworkError) {
      return true;
    }

    return error instanceof TypeError;
  }
}

export class YahooHttpError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = 'YahooHttpError';
    this.statusCode = statusCode;
  }
}

export class YahooNetworkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'YahooNetworkError';
  }
}

export class YahooPayloadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'YahooPayloadError';
  }
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}
