import { Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { ExchangeClient, IsolatedMarginAccountResponse } from '../../exchange/exchange-client.interface';
import { MarketPriceService } from '../../market-price/market-price.service';
import { ZERO, parseAmount } from '../../common/utils/decimal.util';
import { AccountType, PairValue } from '../entities/account-type.entity';
import { AccountReader, ReaderContext, ReaderResult, readAccount } from './account-reader.interface';

type IsolatedPair = NonNullable<IsolatedMarginAccountResponse['assets']>[number];

/**
 * Isolated margin, valued per pair in quote currency.
 *
 * Only pairs the exchange flags as enabled count. The base leg is priced with
 * the pair's own base+quote ticker; if that lookup fails the base leg is zero
 * and the other pairs are unaffected. The quote leg counts only when it is
 * already the quote currency.
 */
@Injectable()
export class IsolatedMarginReader implements AccountReader<AccountType.ISOLATED_MARGIN> {
  readonly type = AccountType.ISOLATED_MARGIN;

  constructor(private readonly marketPriceService: MarketPriceService) {}

  read(client: ExchangeClient, ctx: ReaderContext): Promise<ReaderResult<AccountType.ISOLATED_MARGIN>> {
    return readAccount(this.type, async () => {
      const account = await client.getIsolatedMarginAccount();
      const enabledPairs = (account.assets ?? []).filter((pair) => pair.enabled === true);

      const values = await Promise.all(
        enabledPairs.map((pair) => this.valuePair(client, pair, ctx.quoteAsset)),
      );
      return values.filter((value) => value.netValue.greaterThan(0));
    });
  }

  private async valuePair(client: ExchangeClient, pair: IsolatedPair, quoteAsset: string): Promise<PairValue> {
    let baseValue: Decimal = ZERO;
    const baseNet = parseAmount(pair.baseAsset?.netAsset);
    if (pair.baseAsset && baseNet.greaterThan(0)) {
      const price = await this.marketPriceService.fetchPairPrice(client, `${pair.baseAsset.asset}${quoteAsset}`);
      baseValue = price ? baseNet.times(price) : ZERO;
    }

    const quoteValue = pair.quoteAsset?.asset === quoteAsset ? parseAmount(pair.quoteAsset.netAsset) : ZERO;

    return { symbol: pair.symbol ?? 'UNKNOWN', netValue: baseValue.plus(quoteValue) };
  }
}
