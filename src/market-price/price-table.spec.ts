import { PriceTable } from './price-table';

describe('PriceTable', () => {
  const table = PriceTable.fromTickers([
    { symbol: 'BTCUSDT', price: '50000.00' },
    { symbol: 'ETHUSDT', price: '2500.5' },
    { symbol: 'DEADUSDT', price: '0.00000000' },
    { symbol: 'BADUSDT', price: 'n/a' },
    { symbol: '', price: '1' },
  ]);

  it('should keep only positive, parseable prices', () => {
    expect(table.size).toBe(2);
    expect(table.pairs()).toEqual(['BTCUSDT', 'ETHUSDT']);
    expect(table.priceOf('DEADUSDT')).toBeUndefined();
    expect(table.priceOf('BADUSDT')).toBeUndefined();
  });

  it('should look up pairs by symbol', () => {
    expect(table.priceOf('ETHUSDT')?.toString()).toBe('2500.5');
    expect(table.priceOf('SOLUSDT')).toBeUndefined();
  });

  it('should resolve asset prices against the quote asset', () => {
    expect(table.quotePrice('BTC', 'USDT')?.toNumber()).toBe(50000);
    expect(table.quotePrice('BTC', 'BUSD')).toBeUndefined();
  });

  it('should build an empty table', () => {
    expect(PriceTable.empty().size).toBe(0);
  });
});
