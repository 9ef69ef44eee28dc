import { Inject, Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { SessionContext } from '../common/interfaces/session-context.interface';
import { ZERO, profitRate, toUSD } from '../common/utils/decimal.util';
import { CREDENTIAL_STORE, CredentialStore } from '../credentials/credential-store.interface';
import { InvestmentConfig } from '../credentials/entities/credential.entity';
import { MarketPriceService } from '../market-price/market-price.service';
import { PriceTable } from '../market-price/price-table';
import { SNAPSHOT_STORE, SnapshotStore } from '../snapshots/snapshot-store.interface';
import { HistoryPoint, PortfolioSnapshot } from './entities/portfolio-snapshot.entity';
import { PortfolioAggregatorService } from './portfolio-aggregator.service';

const HOUR_MS = 60 * 60 * 1000;

export interface TrendPoint {
  recordedAt: Date;
  totalValue: Decimal;
  profitRate: Decimal;
}

// Operations exposed to the HTTP layer. Every call is scoped by an explicit session.
@Injectable()
export class PortfolioService {
  private readonly logger = new Logger(PortfolioService.name);

  constructor(
    @Inject(CREDENTIAL_STORE) private readonly credentials: CredentialStore,
    @Inject(SNAPSHOT_STORE) private readonly snapshots: SnapshotStore,
    private readonly marketPriceService: MarketPriceService,
    private readonly aggregator: PortfolioAggregatorService,
  ) {}

  /**
   * Values every configured credential of the session.
   * Per-credential failures are reported inside the snapshot, never thrown.
   * With no credentials configured the exchange is not called at all.
   * @throws PricingUnavailableError if the price table cannot be fetched
   */
  async aggregatePortfolio(ctx: SessionContext): Promise<PortfolioSnapshot> {
    const records = await this.credentials.list(ctx);
    const investments: InvestmentConfig[] = records.map((record) => ({
      apiName: record.apiName,
      totalInvestment: record.totalInvestment,
    }));

    const prices = records.length > 0
      ? await this.marketPriceService.fetchPriceTable()
      : PriceTable.empty();

    return this.aggregator.aggregateAll(records, investments, prices, ctx);
  }

  /**
   * Aggregates, persists the snapshot, then returns it with the history
   * (which already includes it).
   */
  async recordAndFetchHistory(
    ctx: SessionContext,
    sinceHours?: number,
  ): Promise<{ snapshot: PortfolioSnapshot; history: HistoryPoint[] }> {
    const snapshot = await this.aggregatePortfolio(ctx);
    await this.snapshots.append(ctx, snapshot);
    this.logger.log(`[${ctx.sessionId}] recorded snapshot ${snapshot.id} total=${toUSD(snapshot.totalValue)}`);

    const history = await this.getHistory(ctx, sinceHours);
    return { snapshot, history };
  }

  /** Recorded history, oldest first, optionally limited to the last N hours */
  getHistory(ctx: SessionContext, sinceHours?: number, now: Date = new Date()): Promise<HistoryPoint[]> {
    const since = sinceHours !== undefined ? new Date(now.getTime() - sinceHours * HOUR_MS) : undefined;
    return this.snapshots.query(ctx, since);
  }

  /**
   * Profit rate of each history point against the investment configured now.
   * Empty when nothing is invested.
   */
  async getProfitTrend(ctx: SessionContext, sinceHours?: number): Promise<TrendPoint[]> {
    const records = await this.credentials.list(ctx);
    const investment = records.reduce((sum, record) => sum.plus(record.totalInvestment), ZERO);
    if (investment.lessThanOrEqualTo(0)) {
      return [];
    }

    const history = await this.getHistory(ctx, sinceHours);
    return history.map((point) => ({
      recordedAt: point.recordedAt,
      totalValue: point.totalValue,
      profitRate: profitRate(point.totalValue, investment),
    }));
  }
}
