import { createHmac } from 'crypto';
import axios, { AxiosInstance } from 'axios';
import {
  CrossMarginAccountResponse,
  ExchangeClient,
  ExchangeCredentials,
  FuturesAccountResponse,
  FuturesBalanceEntry,
  IsolatedMarginAccountResponse,
  SpotAccountResponse,
  TickerPrice,
} from './exchange-client.interface';
import { ExchangeApiError } from './exchange-errors';

export interface BinanceClientOptions {
  spotBaseUrl: string;
  futuresBaseUrl: string;
  coinFuturesBaseUrl: string;
  timeoutMs: number;
  recvWindow: number;
  /** Injected in tests; defaults to a fresh axios instance */
  http?: AxiosInstance;
  now?: () => number;
}

type QueryParams = Record<string, string | number>;

/**
 * HMAC-SHA256 signature over the exact query string sent.
 */
export function signQuery(query: string, secret: string): string {
  return createHmac('sha256', secret).update(query).digest('hex');
}

function toQueryString(params: QueryParams): string {
  return new URLSearchParams(
    Object.entries(params).map(([key, value]): [string, string] => [key, String(value)]),
  ).toString();
}

function readErrorBody(data: unknown): { code?: number; msg?: string } {
  if (typeof data !== 'object' || data === null) {
    return {};
  }
  const code = 'code' in data && typeof data.code === 'number' ? data.code : undefined;
  const msg = 'msg' in data && typeof data.msg === 'string' ? data.msg : undefined;
  return { code, msg };
}

// Converts axios failures to ExchangeApiError carrying status and exchange code.
function toExchangeApiError(error: unknown, path: string): ExchangeApiError {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      const { code, msg } = readErrorBody(error.response.data);
      const message = msg ?? error.response.statusText ?? error.message;
      return new ExchangeApiError(
        `${path} failed: HTTP ${error.response.status}${code !== undefined ? ` (${code})` : ''}: ${message}`,
        error.response.status,
        code,
      );
    }
    const timedOut = error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT';
    return new ExchangeApiError(`${path} failed: ${error.message}`, undefined, undefined, timedOut);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ExchangeApiError(`${path} failed: ${message}`);
}

/**
 * Read-only client for the spot, USD-M futures and COIN-M futures APIs.
 *
 * Signed endpoints append `timestamp`, `recvWindow` and an HMAC `signature`
 * to the query string and send the key in `X-MBX-APIKEY`.
 */
export class BinanceClient implements ExchangeClient {
  private readonly http: AxiosInstance;
  private readonly now: () => number;

  constructor(
    private readonly options: BinanceClientOptions,
    private readonly credentials?: ExchangeCredentials,
  ) {
    this.http = options.http ?? axios.create({ timeout: options.timeoutMs });
    this.now = options.now ?? Date.now;
  }

  getSpotAccount(): Promise<SpotAccountResponse> {
    return this.signedGet(this.options.spotBaseUrl, '/api/v3/account');
  }

  getFuturesBalances(): Promise<FuturesBalanceEntry[]> {
    return this.signedGet(this.options.futuresBaseUrl, '/fapi/v2/balance');
  }

  getFuturesAccount(): Promise<FuturesAccountResponse> {
    return this.signedGet(this.options.futuresBaseUrl, '/fapi/v2/account');
  }

  getCoinFuturesBalances(): Promise<FuturesBalanceEntry[]> {
    return this.signedGet(this.options.coinFuturesBaseUrl, '/dapi/v1/balance');
  }

  getCrossMarginAccount(): Promise<CrossMarginAccountResponse> {
    return this.signedGet(this.options.spotBaseUrl, '/sapi/v1/margin/account');
  }

  getIsolatedMarginAccount(): Promise<IsolatedMarginAccountResponse> {
    return this.signedGet(this.options.spotBaseUrl, '/sapi/v1/margin/isolated/account');
  }

  /** Latest price of every listed pair (public) */
  getAllPrices(): Promise<TickerPrice[]> {
    return this.get(this.options.spotBaseUrl, '/api/v3/ticker/price');
  }

  /** Latest price of one pair (public) */
  getPrice(pair: string): Promise<TickerPrice> {
    return this.get(this.options.spotBaseUrl, '/api/v3/ticker/price', { symbol: pair });
  }

  private signedGet<T>(baseUrl: string, path: string, params: QueryParams = {}): Promise<T> {
    if (!this.credentials) {
      return Promise.reject(new ExchangeApiError(`${path} requires API credentials`, 401));
    }
    const query = toQueryString({
      ...params,
      recvWindow: this.options.recvWindow,
      timestamp: this.now(),
    });
    const signature = signQuery(query, this.credentials.apiSecret);

    return this.request<T>(`${baseUrl}${path}?${query}&signature=${signature}`, path, {
      'X-MBX-APIKEY': this.credentials.apiKey,
    });
  }

  private get<T>(baseUrl: string, path: string, params: QueryParams = {}): Promise<T> {
    const query = toQueryString(params);
    return this.request<T>(query ? `${baseUrl}${path}?${query}` : `${baseUrl}${path}`, path);
  }

  private async request<T>(url: string, path: string, headers: Record<string, string> = {}): Promise<T> {
    try {
      const response = await this.http.request<T>({
        method: 'GET',
        url,
        headers,
        timeout: this.options.timeoutMs,
      });
      return response.data;
    } catch (error) {
      throw toExchangeApiError(error, path);
    }
  }
}
