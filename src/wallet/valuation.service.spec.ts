import { Test, TestingModule } from '@nestjs/testing';
import { APP_CONFIG } from '../config/app.config';
import { toDecimal } from '../common/utils/decimal.util';
import { PriceTable } from '../market-price/price-table';
import { testConfig } from '../testing/test-config';
import { AccountType, AssetBalance } from './entities/account-type.entity';
import { ValuationService } from './valuation.service';

describe('ValuationService', () => {
  let service: ValuationService;

  const prices = PriceTable.fromTickers([
    { symbol: 'BTCUSDT', price: '50000' },
    { symbol: 'ETHUSDT', price: '2500' },
  ]);

  const balance = (asset: string, quantity: string): AssetBalance => ({ asset, quantity: toDecimal(quantity) });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [ValuationService, { provide: APP_CONFIG, useValue: testConfig() }],
    }).compile();

    service = module.get<ValuationService>(ValuationService);
  });

  it('should take the quote asset at face value', () => {
    const value = service.value([balance('USDT', '100')], prices, AccountType.SPOT);

    expect(value.toString()).toBe('100');
  });

  it('should convert other assets through their quote pair', () => {
    const value = service.value(
      [balance('BTC', '0.01'), balance('ETH', '2'), balance('USDT', '10')],
      prices,
      AccountType.COIN_FUTURES,
    );

    expect(value.toString()).toBe('5510');
  });

  it('should skip assets without a price', () => {
    const value = service.value([balance('FOO', '1000'), balance('USDT', '1')], prices, AccountType.CROSS_MARGIN);

    expect(value.toString()).toBe('1');
  });

  it('should ignore non-positive quantities', () => {
    const value = service.value([balance('USDT', '-20'), balance('USDT', '0')], prices, AccountType.USDT_FUTURES);

    expect(value.isZero()).toBe(true);
  });

  it('should sum isolated pair values as given', () => {
    const value = service.value(
      [
        { symbol: 'BTCUSDT', netValue: toDecimal('5200') },
        { symbol: 'ETHUSDT', netValue: toDecimal('0.5') },
      ],
      prices,
      AccountType.ISOLATED_MARGIN,
    );

    expect(value.toString()).toBe('5200.5');
  });

  it('should not depend on record order', () => {
    const records = [balance('BTC', '0.1'), balance('USDT', '0.3'), balance('ETH', '0.2')];

    const forward = service.value(records, prices, AccountType.SPOT);
    const backward = service.value([...records].reverse(), prices, AccountType.SPOT);

    expect(forward.equals(backward)).toBe(true);
    expect(forward.toString()).toBe('5500.3');
  });

  it('should value against a configured quote asset', async () => {
    const module = await Test.createTestingModule({
      providers: [ValuationService, { provide: APP_CONFIG, useValue: testConfig({ quoteAsset: 'BTC' }) }],
    }).compile();
    const btcValuation = module.get<ValuationService>(ValuationService);
    const btcPrices = PriceTable.fromTickers([{ symbol: 'ETHBTC', price: '0.05' }]);

    const value = btcValuation.value([balance('ETH', '2'), balance('BTC', '1')], btcPrices, AccountType.SPOT);

    expect(value.toString()).toBe('1.1');
  });
});
