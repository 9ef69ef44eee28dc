import { SessionContext } from '../common/interfaces/session-context.interface';
import { Queryable, Row } from '../database/queryable.interface';
import { readDate, readDecimal } from '../database/row.util';
import { HistoryPoint, PortfolioSnapshot } from '../portfolio/entities/portfolio-snapshot.entity';
import { AccountType } from '../wallet/entities/account-type.entity';
import { coalesceWalletValues } from '../wallet/entities/wallet-value-map';
import { SnapshotStore } from './snapshot-store.interface';

function toHistoryPoint(row: Row): HistoryPoint {
  return {
    recordedAt: readDate(row, 'recorded_at'),
    totalsByType: coalesceWalletValues({
      [AccountType.SPOT]: readDecimal(row, 'spot_value'),
      [AccountType.USDT_FUTURES]: readDecimal(row, 'futures_value'),
      [AccountType.COIN_FUTURES]: readDecimal(row, 'coin_futures_value'),
      [AccountType.CROSS_MARGIN]: readDecimal(row, 'cross_margin_value'),
      [AccountType.ISOLATED_MARGIN]: readDecimal(row, 'isolated_margin_value'),
    }),
    totalValue: readDecimal(row, 'total_value'),
    totalInvestment: readDecimal(row, 'total_investment'),
    profitAmount: readDecimal(row, 'profit_amount'),
    profitRate: readDecimal(row, 'profit_rate'),
  };
}

/**
 * balance_history table: one row per snapshot, totals per account type as
 * NUMERIC columns. Like the memory store it keeps totals only.
 */
export class PostgresSnapshotStore implements SnapshotStore {
  constructor(private readonly db: Queryable) {}

  async ensureSchema(): Promise<void> {
    await this.db.query(`
      CREATE TABLE IF NOT EXISTS balance_history (
        id UUID PRIMARY KEY,
        session_id VARCHAR(64) NOT NULL,
        spot_value NUMERIC NOT NULL DEFAULT 0,
        futures_value NUMERIC NOT NULL DEFAULT 0,
        coin_futures_value NUMERIC NOT NULL DEFAULT 0,
        cross_margin_value NUMERIC NOT NULL DEFAULT 0,
        isolated_margin_value NUMERIC NOT NULL DEFAULT 0,
        total_value NUMERIC NOT NULL DEFAULT 0,
        total_investment NUMERIC NOT NULL DEFAULT 0,
        profit_amount NUMERIC NOT NULL DEFAULT 0,
        profit_rate NUMERIC NOT NULL DEFAULT 0,
        recorded_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `);
    await this.db.query(
      'CREATE INDEX IF NOT EXISTS balance_history_session_time ON balance_history (session_id, recorded_at)',
    );
  }

  async append(ctx: SessionContext, snapshot: PortfolioSnapshot): Promise<void> {
    const totals = snapshot.totalsByType;

    await this.db.query(
      `INSERT INTO balance_history (
         id, session_id, spot_value, futures_value, coin_futures_value,
         cross_margin_value, isolated_margin_value, total_value, total_investment,
         profit_amount, profit_rate, recorded_at
       ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)`,
      [
        snapshot.id,
        ctx.sessionId,
        totals[AccountType.SPOT].toString(),
        totals[AccountType.USDT_FUTURES].toString(),
        totals[AccountType.COIN_FUTURES].toString(),
        totals[AccountType.CROSS_MARGIN].toString(),
        totals[AccountType.ISOLATED_MARGIN].toString(),
        snapshot.totalValue.toString(),
        snapshot.totalInvestment.toString(),
        snapshot.profitAmount.toString(),
        snapshot.profitRate.toString(),
        snapshot.recordedAt,
      ],
    );
  }

  async query(ctx: SessionContext, since?: Date): Promise<HistoryPoint[]> {
    const { rows } = await this.db.query(
      `SELECT spot_value, futures_value, coin_futures_value, cross_margin_value,
              isolated_margin_value, total_value, total_investment, profit_amount,
              profit_rate, recorded_at
       FROM balance_history
       WHERE session_id = $1 AND ($2::timestamptz IS NULL OR recorded_at >= $2)
       ORDER BY recorded_at ASC`,
      [ctx.sessionId, since ?? null],
    );
    return rows.map(toHistoryPoint);
  }

  async clear(ctx: SessionContext): Promise<void> {
    await this.db.query('DELETE FROM balance_history WHERE session_id = $1', [ctx.sessionId]);
  }
}
