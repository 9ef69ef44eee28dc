import { plainToInstance, Transform } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsPositive,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export const APP_CONFIG = Symbol('APP_CONFIG');

export type StorageDriver = 'memory' | 'postgres';

const toInt = ({ value }: { value: unknown }) =>
  typeof value === 'string' && value.trim() !== '' ? Number(value) : value;

const toUpper = ({ value }: { value: unknown }) =>
  typeof value === 'string' ? value.trim().toUpperCase() : value;

// Runtime settings, read from the environment once at bootstrap.
export class AppConfig {
  @Transform(toInt)
  @IsInt()
  @Min(1)
  @Max(65535)
  port: number = 3000;

  // Common unit every asset is valued in
  @Transform(toUpper)
  @IsString()
  @IsNotEmpty()
  quoteAsset: string = 'USDT';

  @IsUrl({ require_tld: false })
  spotBaseUrl: string = 'https://api.binance.com';

  @IsUrl({ require_tld: false })
  futuresBaseUrl: string = 'https://fapi.binance.com';

  @IsUrl({ require_tld: false })
  coinFuturesBaseUrl: string = 'https://dapi.binance.com';

  /** Per-request timeout; a timed-out read counts as unavailable */
  @Transform(toInt)
  @IsInt()
  @IsPositive()
  exchangeTimeoutMs: number = 10000;

  @Transform(toInt)
  @IsInt()
  @Min(1)
  @Max(60000)
  recvWindow: number = 5000;

  @IsIn(['memory', 'postgres'])
  storageDriver: StorageDriver = 'memory';

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  databaseUrl?: string;
}

const ENV_KEYS: Record<string, keyof AppConfig> = {
  PORT: 'port',
  QUOTE_ASSET: 'quoteAsset',
  EXCHANGE_SPOT_URL: 'spotBaseUrl',
  EXCHANGE_FUTURES_URL: 'futuresBaseUrl',
  EXCHANGE_COIN_FUTURES_URL: 'coinFuturesBaseUrl',
  EXCHANGE_TIMEOUT_MS: 'exchangeTimeoutMs',
  EXCHANGE_RECV_WINDOW: 'recvWindow',
  STORAGE_DRIVER: 'storageDriver',
  DATABASE_URL: 'databaseUrl',
};

/**
 * Maps environment variables onto AppConfig and validates them.
 * Unset variables keep the class defaults.
 * @throws Error listing every invalid setting
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const plain: Record<string, string> = {};
  for (const [envKey, field] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      plain[field] = value;
    }
  }

  const config = plainToInstance(AppConfig, plain);
  const errors = validateSync(config, { skipMissingProperties: false });
  if (errors.length > 0) {
    const details = errors
      .map((error) => `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid configuration - ${details}`);
  }
  if (config.storageDriver === 'postgres' && !config.databaseUrl) {
    throw new Error('Invalid configuration - DATABASE_URL is required when STORAGE_DRIVER=postgres');
  }
  return config;
}
