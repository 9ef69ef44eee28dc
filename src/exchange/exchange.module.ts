import { Module } from '@nestjs/common';
import { BinanceClientFactory } from './binance-client.factory';
import { EXCHANGE_CLIENT_FACTORY } from './exchange-client.interface';

@Module({
  providers: [{ provide: EXCHANGE_CLIENT_FACTORY, useClass: BinanceClientFactory }],
  exports: [EXCHANGE_CLIENT_FACTORY],
})
export class ExchangeModule {}
