import {
  RawKlinePageSchema,
  type IKlineSource,
  type KlinePageRequest,
  type RawKline,
} from '@klinevault/schemas';
import { createLogger, UpstreamFetchFailedError } from '@klinevault/utils';

const logger = createLogger('binance:fetch');

export const DEFAULT_BINANCE_BASE_URL = 'https://api.binance.com';
export const DEFAULT_KLINES_PATH = '/api/v3/klines';
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export interface BinanceRestClientOptions {
  /** Defaults to https://api.binance.com (Binance.US works the same way) */
  baseUrl?: string;
  /** Defaults to /api/v3/klines */
  klinesPath?: string;
  /** Per-request timeout */
  timeoutMs?: number;
  /** Fetch implementation (defaults to the global one) */
  fetch?: typeof fetch;
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

/**
 * Binance REST API client
 *
 * Only the public klines endpoint is used, so no API key is involved.
 * Each call returns one page; paging is PaginatedKlineFetcher's job.
 *
 * Reference: https://developers.binance.com/docs/binance-spot-api-docs/rest-api
 */
export class BinanceRestClient implements IKlineSource {
  private readonly baseUrl: string;
  private readonly klinesPath: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options?: BinanceRestClientOptions) {
    this.baseUrl = (options?.baseUrl ?? DEFAULT_BINANCE_BASE_URL).replace(/\/+$/, '');
    const path = options?.klinesPath ?? DEFAULT_KLINES_PATH;
    this.klinesPath = path.startsWith('/') ? path : `/${path}`;
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.fetchImpl = options?.fetch ?? fetch;
  }

  /**
   * Fetch one page of raw klines
   *
   * Binance /api/v3/klines returns up to 1000 rows per request, oldest first.
   *
   * @throws UpstreamFetchFailedError on transport errors, timeouts, non-2xx
   * statuses and bodies that are not an array of kline rows
   */
  async getKlinePage(request: KlinePageRequest): Promise<RawKline[]> {
    const params = new URLSearchParams({
      symbol: request.symbol,
      interval: request.interval,
      limit: request.limit.toString(),
      startTime: request.startTime.toString(),
    });

    if (request.endTime !== undefined) {
      params.append('endTime', request.endTime.toString());
    }

    const url = `${this.baseUrl}${this.klinesPath}?${params.toString()}`;
    const context = { symbol: request.symbol, interval: request.interval, target: url };

    logger.debug(
      { event: 'klines_request', ...context, startTime: request.startTime, endTime: request.endTime },
      'Making Binance API request'
    );

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'GET',
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      const timedOut = isTimeout(err);
      const message = timedOut
        ? `Binance request timed out after ${this.timeoutMs}ms`
        : `Binance request failed: ${err instanceof Error ? err.message : String(err)}`;
      logger.error({ event: 'klines_transport_error', ...context, timedOut }, message);
      throw new UpstreamFetchFailedError(message, { ...context, cause: err });
    }

    if (!response.ok) {
      const errorText = await response
        .text()
        .catch((err: unknown) => `<unreadable body: ${String(err)}>`);
      logger.error(
        {
          event: 'klines_http_error',
          ...context,
          status: response.status,
          statusText: response.statusText,
          error: errorText.slice(0, 500),
        },
        'Binance API request failed'
      );
      throw new UpstreamFetchFailedError(
        `Binance API error: ${response.status} ${response.statusText}`,
        { ...context, status: response.status }
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      // The timeout signal still covers reading the body
      if (isTimeout(err)) {
        const message = `Binance request timed out after ${this.timeoutMs}ms`;
        logger.error({ event: 'klines_transport_error', ...context, timedOut: true }, message);
        throw new UpstreamFetchFailedError(message, {
          ...context,
          status: response.status,
          retryable: true,
          cause: err,
        });
      }
      throw new UpstreamFetchFailedError('Binance API returned a non-JSON body', {
        ...context,
        status: response.status,
        retryable: false,
        cause: err,
      });
    }

    const parsed = RawKlinePageSchema.safeParse(body);
    if (!parsed.success) {
      logger.error(
        { event: 'klines_malformed', ...context, issues: parsed.error.issues.slice(0, 3) },
        'Binance API returned an unexpected body'
      );
      throw new UpstreamFetchFailedError('Binance API returned an unexpected body', {
        ...context,
        status: response.status,
        retryable: false,
        cause: parsed.error,
      });
    }

    return parsed.data;
  }
}
