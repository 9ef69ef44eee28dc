import { Inject, Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { AccountUnavailableError } from '../common/errors/wallet.errors';
import { SessionContext } from '../common/interfaces/session-context.interface';
import { EXCHANGE_CLIENT_FACTORY, ExchangeClient, ExchangeClientFactory } from '../exchange/exchange-client.interface';
import { PriceTable } from '../market-price/price-table';
import { Credential } from '../credentials/entities/credential.entity';
import { ACCOUNT_TYPES, AccountType, WalletValueMap } from './entities/account-type.entity';
import { coalesceWalletValues } from './entities/wallet-value-map';
import { AccountReaderRegistry } from './readers/account-reader.registry';
import { ReaderContext } from './readers/account-reader.interface';
import { ValuationService } from './valuation.service';

// A credential without readable spot or USD-M futures is reported as failed.
export const FATAL_ACCOUNT_TYPES: ReadonlySet<AccountType> = new Set([
  AccountType.SPOT,
  AccountType.USDT_FUTURES,
]);

export type WalletAggregation =
  | { ok: true; values: WalletValueMap; tolerated: AccountUnavailableError[] }
  | { ok: false; failure: AccountUnavailableError };

type AccountOutcome =
  | { ok: true; type: AccountType; value: Decimal }
  | { ok: false; failure: AccountUnavailableError };

/**
 * Values all five account types of one credential.
 * Reads run concurrently; the merge walks account types in fixed order,
 * so completion order never changes the result.
 */
@Injectable()
export class WalletAggregatorService {
  private readonly logger = new Logger(WalletAggregatorService.name);

  constructor(
    private readonly readers: AccountReaderRegistry,
    private readonly valuation: ValuationService,
    @Inject(EXCHANGE_CLIENT_FACTORY) private readonly clientFactory: ExchangeClientFactory,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  async aggregate(credential: Credential, prices: PriceTable, ctx: SessionContext): Promise<WalletAggregation> {
    const client = this.clientFactory.create({
      apiKey: credential.apiKey,
      apiSecret: credential.apiSecret,
    });
    const readerCtx: ReaderContext = { quoteAsset: this.config.quoteAsset };

    const outcomes = await Promise.all(
      ACCOUNT_TYPES.map((type) => this.valueAccount(type, client, prices, readerCtx)),
    );

    const values: Partial<Record<AccountType, Decimal>> = {};
    const tolerated: AccountUnavailableError[] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) {
        values[outcome.type] = outcome.value;
        continue;
      }
      if (FATAL_ACCOUNT_TYPES.has(outcome.failure.accountType)) {
        this.logger.error(`[${ctx.sessionId}/${credential.apiName}] ${outcome.failure.message}`);
        return { ok: false, failure: outcome.failure };
      }
      this.logger.warn(`[${ctx.sessionId}/${credential.apiName}] ${outcome.failure.message}; counting as 0`);
      tolerated.push(outcome.failure);
    }

    return { ok: true, values: coalesceWalletValues(values), tolerated };
  }

  private async valueAccount<T extends AccountType>(
    type: T,
    client: ExchangeClient,
    prices: PriceTable,
    ctx: ReaderContext,
  ): Promise<AccountOutcome> {
    const result = await this.readers.get(type).read(client, ctx);
    if (!result.ok) {
      return { ok: false, failure: result.failure };
    }
    return { ok: true, type, value: this.valuation.value(result.records, prices, type) };
  }
}
