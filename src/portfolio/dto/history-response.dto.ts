import { AccountType } from '../../wallet/entities/account-type.entity';
import { PortfolioResponseDto } from './portfolio-response.dto';

export interface HistoryPointDto {
  recordedAt: string;
  totalsByType: Record<AccountType, number>;
  totalValue: number;
  totalInvestment: number;
  profitAmount: number;
  profitRate: number;
}

// Profit rate over time against the currently configured investment
export interface TrendPointDto {
  recordedAt: string;
  totalValue: number;
  profitRate: number;
}

export interface RecordSnapshotResponseDto {
  snapshot: PortfolioResponseDto;
  history: HistoryPointDto[];
}
