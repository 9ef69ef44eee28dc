import { Inject, Injectable } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { BinanceClient } from './binance-client';
import { ExchangeClient, ExchangeClientFactory, ExchangeCredentials } from './exchange-client.interface';

@Injectable()
export class BinanceClientFactory implements ExchangeClientFactory {
  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  create(credentials?: ExchangeCredentials): ExchangeClient {
    return new BinanceClient(
      {
        spotBaseUrl: this.config.spotBaseUrl,
        futuresBaseUrl: this.config.futuresBaseUrl,
        coinFuturesBaseUrl: this.config.coinFuturesBaseUrl,
        timeoutMs: this.config.exchangeTimeoutMs,
        recvWindow: this.config.recvWindow,
      },
      credentials,
    );
  }
}
