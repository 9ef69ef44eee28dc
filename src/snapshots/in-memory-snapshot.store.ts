import { SessionContext } from '../common/interfaces/session-context.interface';
import { HistoryPoint, PortfolioSnapshot, toHistoryPoint } from '../portfolio/entities/portfolio-snapshot.entity';
import { SnapshotStore } from './snapshot-store.interface';

export class InMemorySnapshotStore implements SnapshotStore {
  private history: Map<string, HistoryPoint[]> = new Map();

  async append(ctx: SessionContext, snapshot: PortfolioSnapshot): Promise<void> {
    const points = this.history.get(ctx.sessionId) ?? [];
    points.push(toHistoryPoint(snapshot));
    // stable sort keeps insertion order for equal timestamps
    points.sort((a, b) => a.recordedAt.getTime() - b.recordedAt.getTime());
    this.history.set(ctx.sessionId, points);
  }

  async query(ctx: SessionContext, since?: Date): Promise<HistoryPoint[]> {
    const points = this.history.get(ctx.sessionId) ?? [];
    if (!since) {
      return [...points];
    }
    return points.filter((point) => point.recordedAt.getTime() >= since.getTime());
  }

  async clear(ctx: SessionContext): Promise<void> {
    this.history.delete(ctx.sessionId);
  }
}
