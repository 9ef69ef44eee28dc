import { Injectable } from '@nestjs/common';
import { ExchangeClient } from '../../exchange/exchange-client.interface';
import { ZERO, parseAmount } from '../../common/utils/decimal.util';
import { AccountType, AssetBalance } from '../entities/account-type.entity';
import { AccountReader, ReaderContext, ReaderResult, positiveOnly, readAccount } from './account-reader.interface';

/**
 * USD-M wallet balances with open-position PnL folded into the quote leg.
 * Unrealized profit is not tracked per asset: the whole sum lands on the
 * quote-currency row, which is created when the wallet has none.
 */
@Injectable()
export class UsdtFuturesReader implements AccountReader<AccountType.USDT_FUTURES> {
  readonly type = AccountType.USDT_FUTURES;

  read(client: ExchangeClient, ctx: ReaderContext): Promise<ReaderResult<AccountType.USDT_FUTURES>> {
    return readAccount(this.type, async () => {
      const [rows, account] = await Promise.all([
        client.getFuturesBalances(),
        client.getFuturesAccount(),
      ]);

      const unrealizedProfit = (account.positions ?? []).reduce(
        (sum, position) => sum.plus(parseAmount(position.unrealizedProfit)),
        ZERO,
      );

      const balances: AssetBalance[] = rows.map((row) => ({
        asset: row.asset,
        quantity: parseAmount(row.balance),
      }));

      if (!unrealizedProfit.isZero()) {
        const quoteRow = balances.find((balance) => balance.asset === ctx.quoteAsset);
        if (quoteRow) {
          quoteRow.quantity = quoteRow.quantity.plus(unrealizedProfit);
        } else {
          balances.push({ asset: ctx.quoteAsset, quantity: unrealizedProfit });
        }
      }

      return positiveOnly(balances);
    });
  }
}
