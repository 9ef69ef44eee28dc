import { Module } from '@nestjs/common';
import { CredentialsModule } from '../credentials/credentials.module';
import { MarketPriceModule } from '../market-price/market-price.module';
import { SnapshotsModule } from '../snapshots/snapshots.module';
import { WalletModule } from '../wallet/wallet.module';
import { PortfolioAggregatorService } from './portfolio-aggregator.service';
import { PortfolioController } from './portfolio.controller';
import { PortfolioService } from './portfolio.service';

@Module({
  imports: [CredentialsModule, SnapshotsModule, MarketPriceModule, WalletModule],
  controllers: [PortfolioController],
  providers: [
    PortfolioAggregatorService, // aggregateAll across credentials
    PortfolioService,           // aggregate, record, history, trend
  ],
})
export class PortfolioModule {}
