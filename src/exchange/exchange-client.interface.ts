// Raw payloads as the exchange REST API returns them.
// Amounts arrive as decimal strings and are parsed by the readers.

export interface SpotAccountResponse {
  balances: Array<{ asset: string; free: string; locked: string }>;
}

export interface FuturesBalanceEntry {
  asset: string;
  balance: string;
}

export interface FuturesAccountResponse {
  positions: Array<{ symbol: string; unrealizedProfit: string }>;
}

export interface CrossMarginAccountResponse {
  userAssets: Array<{
    asset: string;
    free: string;
    locked: string;
    borrowed: string;
    interest: string;
    netAsset: string;
  }>;
}

export interface IsolatedMarginAsset {
  asset: string;
  netAsset: string;
}

export interface IsolatedMarginAccountResponse {
  assets?: Array<{
    symbol?: string;
    enabled?: boolean;
    baseAsset?: IsolatedMarginAsset;
    quoteAsset?: IsolatedMarginAsset;
  }>;
}

export interface TickerPrice {
  symbol: string;
  price: string;
}

/** Read-only view of one exchange account, bound to one credential. */
export interface ExchangeClient {
  getSpotAccount(): Promise<SpotAccountResponse>;
  getFuturesBalances(): Promise<FuturesBalanceEntry[]>;
  getFuturesAccount(): Promise<FuturesAccountResponse>;
  getCoinFuturesBalances(): Promise<FuturesBalanceEntry[]>;
  getCrossMarginAccount(): Promise<CrossMarginAccountResponse>;
  getIsolatedMarginAccount(): Promise<IsolatedMarginAccountResponse>;
  getAllPrices(): Promise<TickerPrice[]>;
  getPrice(pair: string): Promise<TickerPrice>;
}

export interface ExchangeCredentials {
  apiKey: string;
  apiSecret: string;
}

export const EXCHANGE_CLIENT_FACTORY = Symbol('EXCHANGE_CLIENT_FACTORY');

/**
 * Creates clients per credential. Public endpoints (prices) work
 * without credentials.
 */
export interface ExchangeClientFactory {
  create(credentials?: ExchangeCredentials): ExchangeClient;
}
