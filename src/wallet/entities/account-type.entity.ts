import Decimal from 'decimal.js';

export enum AccountType {
  SPOT = 'spot',
  USDT_FUTURES = 'usdt_futures',
  COIN_FUTURES = 'coin_futures',
  CROSS_MARGIN = 'cross_margin',
  ISOLATED_MARGIN = 'isolated_margin',
}

// Fixed iteration order for maps, logs and responses.
export const ACCOUNT_TYPES: readonly AccountType[] = [
  AccountType.SPOT,
  AccountType.USDT_FUTURES,
  AccountType.COIN_FUTURES,
  AccountType.CROSS_MARGIN,
  AccountType.ISOLATED_MARGIN,
];

// Holding of one asset, already netted (free + locked, minus debt for margin).
export interface AssetBalance {
  asset: string;
  quantity: Decimal;
}

// Isolated margin pair, already converted to quote currency by its reader.
export interface PairValue {
  symbol: string;
  netValue: Decimal;
}

// Record shape each account type's reader produces.
export interface BalanceRecords {
  [AccountType.SPOT]: AssetBalance[];
  [AccountType.USDT_FUTURES]: AssetBalance[];
  [AccountType.COIN_FUTURES]: AssetBalance[];
  [AccountType.CROSS_MARGIN]: AssetBalance[];
  [AccountType.ISOLATED_MARGIN]: PairValue[];
}

// Quote-currency value per account type. Always carries all five keys.
export type WalletValueMap = Readonly<Record<AccountType, Decimal>>;
