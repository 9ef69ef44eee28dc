import { toDecimal, toNumber } from '../common/utils/decimal.util';
import { ExchangeApiError } from '../exchange/exchange-errors';
import { PriceTable } from '../market-price/price-table';
import { FakeExchangeClient, FakeExchangeClientFactory } from '../testing/fake-exchange-client';
import { compileWithFakeExchange } from '../testing/testing-module';
import { AccountType } from '../wallet/entities/account-type.entity';
import { walletValuesToNumbers } from '../wallet/entities/wallet-value-map';
import { WalletModule } from '../wallet/wallet.module';
import { PortfolioAggregatorService } from './portfolio-aggregator.service';

describe('PortfolioAggregatorService', () => {
  const ctx = { sessionId: 'session-1' };
  const prices = PriceTable.fromTickers([{ symbol: 'ETHUSDT', price: '2500' }]);
  const recordedAt = new Date('2024-03-01T12:00:00Z');

  const credentialA = { apiName: 'a', apiKey: 'key-a', apiSecret: 'test-secret' };
  const credentialB = { apiName: 'b', apiKey: 'key-b', apiSecret: 'test-secret' };

  const healthyClient = () =>
    new FakeExchangeClient({
      spot: { balances: [{ asset: 'USDT', free: '100', locked: '0' }] },
      futuresBalances: [{ asset: 'USDT', balance: '50' }],
      futuresAccount: { positions: [] },
    });

  const createService = async (clients: Record<string, FakeExchangeClient>): Promise<PortfolioAggregatorService> => {
    const module = await compileWithFakeExchange(
      { imports: [WalletModule], providers: [PortfolioAggregatorService] },
      new FakeExchangeClientFactory(clients),
    );
    return module.get<PortfolioAggregatorService>(PortfolioAggregatorService);
  };

  it('should compute totals and profit for one credential', async () => {
    const service = await createService({ 'key-a': healthyClient() });

    const snapshot = await service.aggregateAll(
      [credentialA],
      [{ apiName: 'a', totalInvestment: toDecimal(100) }],
      prices,
      ctx,
      recordedAt,
    );

    expect(walletValuesToNumbers(snapshot.accounts[0].values, toNumber)).toEqual({
      spot: 100,
      usdt_futures: 50,
      coin_futures: 0,
      cross_margin: 0,
      isolated_margin: 0,
    });
    expect(snapshot.totalValue.toNumber()).toBe(150);
    expect(snapshot.totalInvestment.toNumber()).toBe(100);
    expect(snapshot.profitAmount.toNumber()).toBe(50);
    expect(snapshot.profitRate.toNumber()).toBe(50);
    expect(snapshot.failures).toEqual([]);
    expect(snapshot.sessionId).toBe('session-1');
    expect(snapshot.recordedAt).toBe(recordedAt);
    expect(Object.isFrozen(snapshot)).toBe(true);
  });

  it('should keep a failed credential out of totals but not out of investment', async () => {
    const service = await createService({
      'key-a': healthyClient(),
      'key-b': new FakeExchangeClient({ spot: new ExchangeApiError('raw', 401, -2015) }),
    });

    const snapshot = await service.aggregateAll(
      [credentialA, credentialB],
      [
        { apiName: 'a', totalInvestment: toDecimal(100) },
        { apiName: 'b', totalInvestment: toDecimal(50) },
      ],
      prices,
      ctx,
      recordedAt,
    );

    expect(snapshot.accounts.map((account) => account.apiName)).toEqual(['a']);
    expect(snapshot.failures).toEqual([
      {
        apiName: 'b',
        kind: 'PermissionError',
        reason: 'spot unavailable: Invalid API key, IP, or permissions for action (code -2015)',
        code: -2015,
        accountType: AccountType.SPOT,
      },
    ]);
    expect(snapshot.totalInvestment.toNumber()).toBe(150);
    expect(snapshot.totalValue.toNumber()).toBe(150);
    expect(snapshot.profitAmount.toNumber()).toBe(0);
    expect(snapshot.profitRate.toNumber()).toBe(0);
  });

  it('should record a credential whose client cannot be created as a transport failure', async () => {
    const service = await createService({ 'key-a': healthyClient() });

    const snapshot = await service.aggregateAll(
      [credentialA, { apiName: 'c', apiKey: 'key-c', apiSecret: 'test-secret' }],
      [],
      prices,
      ctx,
      recordedAt,
    );

    expect(snapshot.failures).toEqual([
      { apiName: 'c', kind: 'TransportError', reason: 'No fake client for key key-c', code: undefined },
    ]);
    expect(snapshot.totalValue.toNumber()).toBe(150);
  });

  it('should keep tolerated account failures on the credential', async () => {
    const service = await createService({
      'key-a': new FakeExchangeClient({
        spot: { balances: [{ asset: 'USDT', free: '100', locked: '0' }] },
        coinFuturesBalances: new ExchangeApiError('denied', 403),
      }),
    });

    const snapshot = await service.aggregateAll([credentialA], [], prices, ctx, recordedAt);

    expect(snapshot.failures).toEqual([]);
    expect(snapshot.accounts[0].warnings).toEqual([
      {
        accountType: AccountType.COIN_FUTURES,
        kind: 'PermissionError',
        reason: 'coin_futures unavailable: denied',
        code: undefined,
      },
    ]);
    expect(toNumber(snapshot.accounts[0].values[AccountType.COIN_FUTURES])).toBe(0);
    expect(snapshot.totalValue.toNumber()).toBe(100);
  });

  it('should carry no warnings for a fully readable credential', async () => {
    const service = await createService({ 'key-a': healthyClient() });

    const snapshot = await service.aggregateAll([credentialA], [], prices, ctx, recordedAt);

    expect(snapshot.accounts[0].warnings).toEqual([]);
  });

  it('should report zero profit rate when nothing is invested', async () => {
    const service = await createService({ 'key-a': healthyClient() });

    const snapshot = await service.aggregateAll([credentialA], [], prices, ctx, recordedAt);

    expect(snapshot.profitAmount.toNumber()).toBe(150);
    expect(snapshot.profitRate.isZero()).toBe(true);
  });

  it('should count an unpriced isolated pair as zero without touching other pairs', async () => {
    const service = await createService({
      'key-a': new FakeExchangeClient({
        spot: { balances: [] },
        isolatedMargin: {
          assets: [
            {
              symbol: 'BTCUSDT',
              enabled: true,
              baseAsset: { asset: 'BTC', netAsset: '0.001' },
              quoteAsset: { asset: 'USDT', netAsset: '0' },
            },
            {
              symbol: 'ETHUSDT',
              enabled: true,
              baseAsset: { asset: 'ETH', netAsset: '0.01' },
              quoteAsset: { asset: 'USDT', netAsset: '30' },
            },
          ],
        },
        pairPrices: { ETHUSDT: '2500' },
      }),
    });

    const snapshot = await service.aggregateAll([credentialA], [], prices, ctx, recordedAt);

    expect(toNumber(snapshot.totalsByType[AccountType.ISOLATED_MARGIN])).toBe(55);
    expect(snapshot.totalValue.toNumber()).toBe(55);
  });

  it('should return an empty snapshot for no credentials', async () => {
    const service = await createService({});

    const snapshot = await service.aggregateAll([], [], PriceTable.empty(), ctx, recordedAt);

    expect(snapshot.accounts).toEqual([]);
    expect(snapshot.totalValue.isZero()).toBe(true);
    expect(snapshot.profitRate.isZero()).toBe(true);
  });
});
