import { Inject, Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { ZERO } from '../common/utils/decimal.util';
import { PriceTable } from '../market-price/price-table';
import { AccountType, AssetBalance, BalanceRecords, PairValue } from './entities/account-type.entity';
import { positiveOnly } from './readers/account-reader.interface';

export type ValuationRule<T extends AccountType> = (
  records: BalanceRecords[T],
  prices: PriceTable,
  quoteAsset: string,
) => Decimal;

// Quote asset taken as-is, everything else through asset+quote; unpriced assets are skipped.
function valueAssetBalances(balances: AssetBalance[], prices: PriceTable, quoteAsset: string): Decimal {
  return positiveOnly(balances).reduce((sum, balance) => {
    if (balance.asset === quoteAsset) {
      return sum.plus(balance.quantity);
    }
    const price = prices.quotePrice(balance.asset, quoteAsset);
    return price ? sum.plus(balance.quantity.times(price)) : sum;
  }, ZERO);
}

// Isolated pairs arrive already converted by their reader.
function sumPairValues(pairs: PairValue[]): Decimal {
  return pairs.reduce((sum, pair) => sum.plus(pair.netValue), ZERO);
}

export const VALUATION_RULES: { [T in AccountType]: ValuationRule<T> } = {
  [AccountType.SPOT]: valueAssetBalances,
  [AccountType.USDT_FUTURES]: valueAssetBalances,
  [AccountType.COIN_FUTURES]: valueAssetBalances,
  [AccountType.CROSS_MARGIN]: valueAssetBalances,
  [AccountType.ISOLATED_MARGIN]: sumPairValues,
};

/**
 * Converts normalized balances into one quote-currency total.
 * Decimal accumulation throughout; the result is independent of input order.
 */
@Injectable()
export class ValuationService {
  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  value<T extends AccountType>(records: BalanceRecords[T], prices: PriceTable, type: T): Decimal {
    const rule: ValuationRule<T> = VALUATION_RULES[type];
    return rule(records, prices, this.config.quoteAsset);
  }
}
