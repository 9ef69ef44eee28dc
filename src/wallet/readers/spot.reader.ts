import { Injectable } from '@nestjs/common';
import { ExchangeClient } from '../../exchange/exchange-client.interface';
import { parseAmount } from '../../common/utils/decimal.util';
import { AccountType } from '../entities/account-type.entity';
import { AccountReader, ReaderResult, positiveOnly, readAccount } from './account-reader.interface';

// Spot holdings: free + locked per asset.
@Injectable()
export class SpotReader implements AccountReader<AccountType.SPOT> {
  readonly type = AccountType.SPOT;

  read(client: ExchangeClient): Promise<ReaderResult<AccountType.SPOT>> {
    return readAccount(this.type, async () => {
      const account = await client.getSpotAccount();
      return positiveOnly(
        account.balances.map((row) => ({
          asset: row.asset,
          quantity: parseAmount(row.free).plus(parseAmount(row.locked)),
        })),
      );
    });
  }
}
