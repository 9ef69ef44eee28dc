import { toDecimal } from '../common/utils/decimal.util';
import { PortfolioSnapshot } from '../portfolio/entities/portfolio-snapshot.entity';
import { FakeQueryable } from '../testing/fake-queryable';
import { AccountType } from '../wallet/entities/account-type.entity';
import { coalesceWalletValues, walletValuesToNumbers } from '../wallet/entities/wallet-value-map';
import { PostgresSnapshotStore } from './postgres-snapshot.store';

describe('PostgresSnapshotStore', () => {
  const ctx = { sessionId: 'session-1' };
  const recordedAt = new Date('2024-03-01T12:00:00Z');

  const values = coalesceWalletValues({
    [AccountType.SPOT]: toDecimal(100),
    [AccountType.USDT_FUTURES]: toDecimal('50.5'),
  });
  const snapshot: PortfolioSnapshot = {
    id: '9b2d7c1e-0000-4000-8000-000000000001',
    sessionId: 'session-1',
    accounts: [{ apiName: 'main', values, totalValue: toDecimal('150.5'), warnings: [] }],
    failures: [{ apiName: 'broken', kind: 'AuthError', reason: 'spot unavailable: denied', accountType: AccountType.SPOT }],
    totalsByType: values,
    totalValue: toDecimal('150.5'),
    totalInvestment: toDecimal(100),
    profitAmount: toDecimal('50.5'),
    profitRate: toDecimal('50.5'),
    recordedAt,
  };

  it('should create the table and its session index', async () => {
    const db = new FakeQueryable();

    await new PostgresSnapshotStore(db).ensureSchema();

    expect(db.queries).toHaveLength(2);
    expect(db.queries[0].text).toContain('CREATE TABLE IF NOT EXISTS balance_history');
    expect(db.queries[1].text).toBe(
      'CREATE INDEX IF NOT EXISTS balance_history_session_time ON balance_history (session_id, recorded_at)',
    );
  });

  it('should insert one row of totals per snapshot, like the memory store', async () => {
    const db = new FakeQueryable();

    await new PostgresSnapshotStore(db).append(ctx, snapshot);

    expect(db.queries[0].text).toContain('INSERT INTO balance_history');
    expect(db.queries[0].text).not.toContain('accounts');
    expect(db.queries[0].values).toEqual([
      '9b2d7c1e-0000-4000-8000-000000000001',
      'session-1',
      '100',
      '50.5',
      '0',
      '0',
      '0',
      '150.5',
      '100',
      '50.5',
      '50.5',
      recordedAt,
    ]);
  });

  it('should read rows back as history points', async () => {
    const db = new FakeQueryable().willReturn({
      spot_value: '100',
      futures_value: '50.5',
      coin_futures_value: '0',
      cross_margin_value: '0',
      isolated_margin_value: '0',
      total_value: '150.5',
      total_investment: '100',
      profit_amount: '50.5',
      profit_rate: '50.5',
      recorded_at: recordedAt,
    });
    const since = new Date('2024-03-01T00:00:00Z');

    const [point] = await new PostgresSnapshotStore(db).query(ctx, since);

    expect(db.queries[0].values).toEqual(['session-1', since]);
    expect(db.queries[0].text).toContain('ORDER BY recorded_at ASC');
    expect(point.recordedAt).toBe(recordedAt);
    expect(walletValuesToNumbers(point.totalsByType, (value) => value.toNumber())).toEqual({
      spot: 100,
      usdt_futures: 50.5,
      coin_futures: 0,
      cross_margin: 0,
      isolated_margin: 0,
    });
    expect(point.totalValue.toString()).toBe('150.5');
    expect(point.profitRate.toString()).toBe('50.5');
  });

  it('should pass a null window when no start is given', async () => {
    const db = new FakeQueryable();

    await expect(new PostgresSnapshotStore(db).query(ctx)).resolves.toEqual([]);
    expect(db.queries[0].values).toEqual(['session-1', null]);
  });

  it('should clear only the session', async () => {
    const db = new FakeQueryable();

    await new PostgresSnapshotStore(db).clear(ctx);

    expect(db.queries).toEqual([
      { text: 'DELETE FROM balance_history WHERE session_id = $1', values: ['session-1'] },
    ]);
  });
});
