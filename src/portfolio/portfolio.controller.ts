import { Controller, Get, HttpCode, HttpStatus, Param, Post, Query } from '@nestjs/common';
import { toNumber, toPercent, toUSD } from '../common/utils/decimal.util';
import { walletValuesToNumbers } from '../wallet/entities/wallet-value-map';
import { HistoryPoint, PortfolioSnapshot } from './entities/portfolio-snapshot.entity';
import { HistoryQueryDto } from './dto/history-query.dto';
import { HistoryPointDto, RecordSnapshotResponseDto, TrendPointDto } from './dto/history-response.dto';
import { PortfolioResponseDto } from './dto/portfolio-response.dto';
import { PortfolioService } from './portfolio.service';

// Decimals become numbers only here, at the response boundary.
function toSnapshotResponse(snapshot: PortfolioSnapshot): PortfolioResponseDto {
  return {
    id: snapshot.id,
    sessionId: snapshot.sessionId,
    accounts: snapshot.accounts.map((account) => ({
      apiName: account.apiName,
      values: walletValuesToNumbers(account.values, toNumber),
      totalValue: toNumber(account.totalValue),
      warnings: account.warnings.map((warning) => ({ ...warning })),
    })),
    failures: snapshot.failures.map((failure) => ({ ...failure })),
    totalsByType: walletValuesToNumbers(snapshot.totalsByType, toNumber),
    totalValue: toNumber(snapshot.totalValue),
    totalInvestment: toNumber(snapshot.totalInvestment),
    profitAmount: toNumber(snapshot.profitAmount),
    profitRate: toNumber(snapshot.profitRate),
    display: {
      totalInvestment: toUSD(snapshot.totalInvestment),
      totalValue: toUSD(snapshot.totalValue),
      profitAmount: toUSD(snapshot.profitAmount),
      profitRate: toPercent(snapshot.profitRate),
    },
    recordedAt: snapshot.recordedAt.toISOString(),
  };
}

function toHistoryResponse(point: HistoryPoint): HistoryPointDto {
  return {
    recordedAt: point.recordedAt.toISOString(),
    totalsByType: walletValuesToNumbers(point.totalsByType, toNumber),
    totalValue: toNumber(point.totalValue),
    totalInvestment: toNumber(point.totalInvestment),
    profitAmount: toNumber(point.profitAmount),
    profitRate: toNumber(point.profitRate),
  };
}

@Controller('sessions/:sessionId/portfolio')
export class PortfolioController {
  constructor(private readonly portfolioService: PortfolioService) {}

  /**
   * Values all configured accounts right now without recording.
   *
   * GET /sessions/:sessionId/portfolio
   * @returns 200 with totals and per-credential failures, 503 if prices are unavailable
   */
  @Get()
  @HttpCode(HttpStatus.OK)
  async getPortfolio(@Param('sessionId') sessionId: string): Promise<PortfolioResponseDto> {
    const snapshot = await this.portfolioService.aggregatePortfolio({ sessionId });
    return toSnapshotResponse(snapshot);
  }

  /**
   * Values, records a snapshot and returns it with the history.
   *
   * POST /sessions/:sessionId/portfolio/snapshots?hours=24
   */
  @Post('snapshots')
  @HttpCode(HttpStatus.CREATED)
  async recordSnapshot(
    @Param('sessionId') sessionId: string,
    @Query() query: HistoryQueryDto,
  ): Promise<RecordSnapshotResponseDto> {
    const { snapshot, history } = await this.portfolioService.recordAndFetchHistory({ sessionId }, query.hours);
    return {
      snapshot: toSnapshotResponse(snapshot),
      history: history.map(toHistoryResponse),
    };
  }

  /**
   * GET /sessions/:sessionId/portfolio/history?hours=24
   */
  @Get('history')
  @HttpCode(HttpStatus.OK)
  async getHistory(
    @Param('sessionId') sessionId: string,
    @Query() query: HistoryQueryDto,
  ): Promise<HistoryPointDto[]> {
    const history = await this.portfolioService.getHistory({ sessionId }, query.hours);
    return history.map(toHistoryResponse);
  }

  /**
   * Profit rate per recorded point against the current investment.
   *
   * GET /sessions/:sessionId/portfolio/trend?hours=24
   */
  @Get('trend')
  @HttpCode(HttpStatus.OK)
  async getTrend(
    @Param('sessionId') sessionId: string,
    @Query() query: HistoryQueryDto,
  ): Promise<TrendPointDto[]> {
    const trend = await this.portfolioService.getProfitTrend({ sessionId }, query.hours);
    return trend.map((point) => ({
      recordedAt: point.recordedAt.toISOString(),
      totalValue: toNumber(point.totalValue),
      profitRate: toNumber(point.profitRate),
    }));
  }
}
