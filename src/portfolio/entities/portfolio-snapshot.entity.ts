import Decimal from 'decimal.js';
import { WalletErrorKind } from '../../common/errors/wallet.errors';
import { AccountType, WalletValueMap } from '../../wallet/entities/account-type.entity';

// Account type that could not be read and was counted as 0.
export interface AccountWarning {
  accountType: AccountType;
  kind: WalletErrorKind;
  reason: string;
  code?: number;
}

// Value of one credential that was read successfully.
export interface AccountValuation {
  apiName: string;
  values: WalletValueMap;
  totalValue: Decimal;
  warnings: readonly AccountWarning[];
}

// Credential excluded from totals, with the reason it failed.
export interface CredentialFailure {
  apiName: string;
  kind: WalletErrorKind;
  reason: string;
  code?: number;
  accountType?: AccountType;   // the fatal account type, when one was read
}

// Result of one aggregation pass. Frozen once built.
export interface PortfolioSnapshot {
  readonly id: string;
  readonly sessionId: string;
  readonly accounts: readonly AccountValuation[];
  readonly failures: readonly CredentialFailure[];
  readonly totalsByType: WalletValueMap;
  readonly totalValue: Decimal;
  readonly totalInvestment: Decimal;
  readonly profitAmount: Decimal;    // totalValue - totalInvestment
  readonly profitRate: Decimal;      // percent, 0 when nothing invested
  readonly recordedAt: Date;
}

// One persisted snapshot as history returns it.
export interface HistoryPoint {
  recordedAt: Date;
  totalsByType: WalletValueMap;
  totalValue: Decimal;
  totalInvestment: Decimal;
  profitAmount: Decimal;
  profitRate: Decimal;
}

export function toHistoryPoint(snapshot: PortfolioSnapshot): HistoryPoint {
  return {
    recordedAt: snapshot.recordedAt,
    totalsByType: snapshot.totalsByType,
    totalValue: snapshot.totalValue,
    totalInvestment: snapshot.totalInvestment,
    profitAmount: snapshot.profitAmount,
    profitRate: snapshot.profitRate,
  };
}
