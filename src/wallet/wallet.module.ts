import { Module } from '@nestjs/common';
import { ExchangeModule } from '../exchange/exchange.module';
import { MarketPriceModule } from '../market-price/market-price.module';
import { AccountReaderRegistry } from './readers/account-reader.registry';
import { SpotReader } from './readers/spot.reader';
import { UsdtFuturesReader } from './readers/usdt-futures.reader';
import { CoinFuturesReader } from './readers/coin-futures.reader';
import { CrossMarginReader } from './readers/cross-margin.reader';
import { IsolatedMarginReader } from './readers/isolated-margin.reader';
import { ValuationService } from './valuation.service';
import { WalletAggregatorService } from './wallet-aggregator.service';

@Module({
  imports: [ExchangeModule, MarketPriceModule],
  providers: [
    SpotReader,
    UsdtFuturesReader,
    CoinFuturesReader,
    CrossMarginReader,
    IsolatedMarginReader,
    AccountReaderRegistry,
    ValuationService,
    WalletAggregatorService,
  ],
  exports: [WalletAggregatorService, ValuationService],
})
export class WalletModule {}
