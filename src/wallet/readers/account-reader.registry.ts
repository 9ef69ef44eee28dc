import { Injectable } from '@nestjs/common';
import { AccountType } from '../entities/account-type.entity';
import { AccountReader } from './account-reader.interface';
import { SpotReader } from './spot.reader';
import { UsdtFuturesReader } from './usdt-futures.reader';
import { CoinFuturesReader } from './coin-futures.reader';
import { CrossMarginReader } from './cross-margin.reader';
import { IsolatedMarginReader } from './isolated-margin.reader';

export type ReaderTable = { [T in AccountType]: AccountReader<T> };

// Lookup table from account type to its reader.
@Injectable()
export class AccountReaderRegistry {
  private readonly readers: ReaderTable;

  constructor(
    spot: SpotReader,
    usdtFutures: UsdtFuturesReader,
    coinFutures: CoinFuturesReader,
    crossMargin: CrossMarginReader,
    isolatedMargin: IsolatedMarginReader,
  ) {
    this.readers = {
      [AccountType.SPOT]: spot,
      [AccountType.USDT_FUTURES]: usdtFutures,
      [AccountType.COIN_FUTURES]: coinFutures,
      [AccountType.CROSS_MARGIN]: crossMargin,
      [AccountType.ISOLATED_MARGIN]: isolatedMargin,
    };
  }

  get<T extends AccountType>(type: T): ReaderTable[T] {
    return this.readers[type];
  }
}
