import { ModuleMetadata } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { ConfigModule } from '../config/config.module';
import { EXCHANGE_CLIENT_FACTORY } from '../exchange/exchange-client.interface';
import { FakeExchangeClientFactory } from './fake-exchange-client';
import { testConfig } from './test-config';

/**
 * Compiles real modules with the exchange swapped for fakes and the
 * environment replaced by test settings (memory storage).
 */
export function compileWithFakeExchange(
  metadata: ModuleMetadata,
  factory: FakeExchangeClientFactory,
  config: AppConfig = testConfig(),
): Promise<TestingModule> {
  return Test.createTestingModule({
    ...metadata,
    imports: [ConfigModule, ...(metadata.imports ?? [])],
  })
    .overrideProvider(APP_CONFIG)
    .useValue(config)
    .overrideProvider(EXCHANGE_CLIENT_FACTORY)
    .useValue(factory)
    .compile();
}
