import { SessionContext } from '../common/interfaces/session-context.interface';
import { HistoryPoint, PortfolioSnapshot } from '../portfolio/entities/portfolio-snapshot.entity';

export const SNAPSHOT_STORE = Symbol('SNAPSHOT_STORE');

/**
 * Append-only time series of portfolio snapshots per session.
 */
export interface SnapshotStore {
  append(ctx: SessionContext, snapshot: PortfolioSnapshot): Promise<void>;
  /** Points recorded at or after `since`, oldest first */
  query(ctx: SessionContext, since?: Date): Promise<HistoryPoint[]>;
  clear(ctx: SessionContext): Promise<void>;
}
