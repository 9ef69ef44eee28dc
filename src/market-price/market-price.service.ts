import { Inject, Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { EXCHANGE_CLIENT_FACTORY, ExchangeClient, ExchangeClientFactory, TickerPrice } from '../exchange/exchange-client.interface';
import { classifyExchangeError } from '../exchange/exchange-errors';
import { PricingUnavailableError } from '../common/errors/wallet.errors';
import { parseAmount } from '../common/utils/decimal.util';
import { PriceTable } from './price-table';

/**
 * Market prices for valuation, pulled from the public ticker endpoint.
 * No live feeds: every aggregation pass takes its own snapshot.
 */
@Injectable()
export class MarketPriceService {
  private readonly logger = new Logger(MarketPriceService.name);

  constructor(
    @Inject(EXCHANGE_CLIENT_FACTORY) private readonly clientFactory: ExchangeClientFactory,
  ) {}

  /**
   * Fetches every listed pair price.
   * A partial table would silently zero out assets, so any failure is fatal for the pass.
   * @throws PricingUnavailableError if the price endpoint cannot be read
   */
  async fetchPriceTable(): Promise<PriceTable> {
    let tickers: TickerPrice[];
    try {
      tickers = await this.clientFactory.create().getAllPrices();
    } catch (error) {
      const cause = classifyExchangeError(error);
      this.logger.error(`Price table unavailable: ${cause.message}`);
      throw new PricingUnavailableError(`Price table unavailable: ${cause.message}`, cause.code, { cause });
    }
    if (!Array.isArray(tickers)) {
      throw new PricingUnavailableError('Price table unavailable: unexpected ticker payload');
    }

    const table = PriceTable.fromTickers(tickers);
    if (table.size === 0) {
      this.logger.error('Price table unavailable: ticker endpoint returned no priced pairs');
      throw new PricingUnavailableError('Price table unavailable: ticker endpoint returned no priced pairs');
    }
    this.logger.debug(`Loaded ${table.size} pair prices`);
    return table;
  }

  /**
   * Single pair lookup through an account's own client.
   * Returns undefined when the pair is unlisted or the lookup fails.
   */
  async fetchPairPrice(client: ExchangeClient, pair: string): Promise<Decimal | undefined> {
    try {
      const ticker = await client.getPrice(pair);
      const price = parseAmount(ticker.price);
      return price.greaterThan(0) ? price : undefined;
    } catch (error) {
      this.logger.warn(`No price for ${pair}: ${classifyExchangeError(error).message}`);
      return undefined;
    }
  }
}
