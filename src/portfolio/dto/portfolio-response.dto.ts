import { AccountType } from '../../wallet/entities/account-type.entity';
import { WalletErrorKind } from '../../common/errors/wallet.errors';

// Unreadable account type that was counted as 0
export interface AccountWarningDto {
  accountType: AccountType;
  kind: WalletErrorKind;
  reason: string;
  code?: number;
}

// Value of one credential per account type
export interface AccountValuationDto {
  apiName: string;
  values: Record<AccountType, number>;
  totalValue: number;
  warnings: AccountWarningDto[];
}

export interface CredentialFailureDto {
  apiName: string;
  kind: WalletErrorKind;
  reason: string;
  code?: number;
  accountType?: AccountType;
}

// Complete portfolio snapshot
export interface PortfolioResponseDto {
  id: string;
  sessionId: string;
  accounts: AccountValuationDto[];
  failures: CredentialFailureDto[];
  totalsByType: Record<AccountType, number>;
  totalValue: number;            // sum over every account type
  totalInvestment: number;       // all configured credentials
  profitAmount: number;
  profitRate: number;            // percent
  display: {
    totalInvestment: string;     // "100.00"
    totalValue: string;
    profitAmount: string;
    profitRate: string;          // "50.00%"
  };
  recordedAt: string;
}
