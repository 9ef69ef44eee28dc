import { Injectable } from '@nestjs/common';
import { ExchangeClient } from '../../exchange/exchange-client.interface';
import { parseAmount } from '../../common/utils/decimal.util';
import { AccountType } from '../entities/account-type.entity';
import { AccountReader, ReaderResult, positiveOnly, readAccount } from './account-reader.interface';

// COIN-M wallet balances. Unrealized PnL is not folded in, unlike USD-M.
@Injectable()
export class CoinFuturesReader implements AccountReader<AccountType.COIN_FUTURES> {
  readonly type = AccountType.COIN_FUTURES;

  read(client: ExchangeClient): Promise<ReaderResult<AccountType.COIN_FUTURES>> {
    return readAccount(this.type, async () => {
      const rows = await client.getCoinFuturesBalances();
      return positiveOnly(
        rows.map((row) => ({ asset: row.asset, quantity: parseAmount(row.balance) })),
      );
    });
  }
}
