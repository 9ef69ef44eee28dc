import { Injectable } from '@nestjs/common';
import { ExchangeClient } from '../../exchange/exchange-client.interface';
import { parseAmount } from '../../common/utils/decimal.util';
import { AccountType } from '../entities/account-type.entity';
import { AccountReader, ReaderResult, positiveOnly, readAccount } from './account-reader.interface';

/**
 * Cross margin net assets: free + locked - borrowed - interest.
 * Accounts that never enabled margin fail the fetch; the aggregator counts that as 0.
 */
@Injectable()
export class CrossMarginReader implements AccountReader<AccountType.CROSS_MARGIN> {
  readonly type = AccountType.CROSS_MARGIN;

  read(client: ExchangeClient): Promise<ReaderResult<AccountType.CROSS_MARGIN>> {
    return readAccount(this.type, async () => {
      const account = await client.getCrossMarginAccount();
      return positiveOnly(
        account.userAssets.map((row) => ({
          asset: row.asset,
          quantity: parseAmount(row.free)
            .plus(parseAmount(row.locked))
            .minus(parseAmount(row.borrowed))
            .minus(parseAmount(row.interest)),
        })),
      );
    });
  }
}
