import { Module } from '@nestjs/common';
import { ExchangeModule } from '../exchange/exchange.module';
import { MarketPriceService } from './market-price.service';

@Module({
  imports: [ExchangeModule],
  providers: [MarketPriceService],
  exports: [MarketPriceService],
})
export class MarketPriceModule {}
