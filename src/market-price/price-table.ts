import Decimal from 'decimal.js';
import { TickerPrice } from '../exchange/exchange-client.interface';
import { parseAmount } from '../common/utils/decimal.util';

/**
 * Point-in-time prices for every listed pair, keyed by pair symbol (BTCUSDT).
 * Built once per aggregation pass and shared read-only by every valuation.
 * A missing pair is the normal "unpriceable" case, not an error.
 */
export class PriceTable {
  private readonly prices: ReadonlyMap<string, Decimal>;

  constructor(prices: Map<string, Decimal>) {
    this.prices = new Map(prices);
  }

  /** Drops rows whose price is missing, unparseable or not positive */
  static fromTickers(tickers: TickerPrice[]): PriceTable {
    const prices = new Map<string, Decimal>();
    for (const ticker of tickers) {
      const price = parseAmount(ticker.price);
      if (ticker.symbol && price.greaterThan(0)) {
        prices.set(ticker.symbol, price);
      }
    }
    return new PriceTable(prices);
  }

  static empty(): PriceTable {
    return new PriceTable(new Map());
  }

  /** O(1) lookup - undefined if the pair is not listed */
  priceOf(pair: string): Decimal | undefined {
    return this.prices.get(pair);
  }

  /** Price of asset+quote, e.g. quotePrice('BTC', 'USDT') reads BTCUSDT */
  quotePrice(asset: string, quoteAsset: string): Decimal | undefined {
    return this.prices.get(`${asset}${quoteAsset}`);
  }

  get size(): number {
    return this.prices.size;
  }

  pairs(): string[] {
    return Array.from(this.prices.keys());
  }
}
