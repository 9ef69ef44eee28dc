import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { SessionContext } from '../common/interfaces/session-context.interface';
import { ZERO, profitRate, toUSD } from '../common/utils/decimal.util';
import { classifyExchangeError } from '../exchange/exchange-errors';
import { PriceTable } from '../market-price/price-table';
import { Credential, InvestmentConfig } from '../credentials/entities/credential.entity';
import { sumWalletValues, totalOf } from '../wallet/entities/wallet-value-map';
import { WalletAggregation, WalletAggregatorService } from '../wallet/wallet-aggregator.service';
import { AccountValuation, AccountWarning, CredentialFailure, PortfolioSnapshot } from './entities/portfolio-snapshot.entity';

type CredentialOutcome =
  | { ok: true; account: AccountValuation }
  | { ok: false; failure: CredentialFailure };

/**
 * Sums wallet values across every configured credential.
 *
 * A credential that fails is listed in `failures` and left out of the totals;
 * it never aborts the pass. Account types that were unreadable but tolerated
 * stay on the credential as `warnings`. Investment is summed over ALL configured
 * credentials, reachable or not, so an outage lowers the profit figure
 * instead of hiding the missing money.
 */
@Injectable()
export class PortfolioAggregatorService {
  private readonly logger = new Logger(PortfolioAggregatorService.name);

  constructor(private readonly walletAggregator: WalletAggregatorService) {}

  async aggregateAll(
    credentials: Credential[],
    investments: InvestmentConfig[],
    prices: PriceTable,
    ctx: SessionContext,
    recordedAt: Date = new Date(),
  ): Promise<PortfolioSnapshot> {
    const outcomes = await Promise.all(
      credentials.map((credential) => this.aggregateCredential(credential, prices, ctx)),
    );

    // configured order, not completion order
    const accounts: AccountValuation[] = [];
    const failures: CredentialFailure[] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) {
        accounts.push(Object.freeze(outcome.account));
      } else {
        failures.push(Object.freeze(outcome.failure));
      }
    }

    const totalsByType = sumWalletValues(accounts.map((account) => account.values));
    const totalValue = totalOf(totalsByType);
    const totalInvestment = investments.reduce(
      (sum, investment) => sum.plus(investment.totalInvestment),
      ZERO,
    );
    const profitAmount = totalValue.minus(totalInvestment);

    this.logger.log(
      `[${ctx.sessionId}] ${accounts.length}/${credentials.length} accounts valued, total=${toUSD(totalValue)}`,
    );

    return Object.freeze({
      id: uuidv4(),
      sessionId: ctx.sessionId,
      accounts: Object.freeze(accounts),
      failures: Object.freeze(failures),
      totalsByType,
      totalValue,
      totalInvestment,
      profitAmount,
      profitRate: profitRate(totalValue, totalInvestment),
      recordedAt,
    });
  }

  private async aggregateCredential(
    credential: Credential,
    prices: PriceTable,
    ctx: SessionContext,
  ): Promise<CredentialOutcome> {
    let aggregation: WalletAggregation;
    try {
      aggregation = await this.walletAggregator.aggregate(credential, prices, ctx);
    } catch (error) {
      const cause = classifyExchangeError(error);
      this.logger.error(`[${ctx.sessionId}/${credential.apiName}] aggregation failed: ${cause.message}`);
      return {
        ok: false,
        failure: { apiName: credential.apiName, kind: cause.kind, reason: cause.message, code: cause.code },
      };
    }

    if (!aggregation.ok) {
      const { failure } = aggregation;
      return {
        ok: false,
        failure: {
          apiName: credential.apiName,
          kind: failure.reason.kind,
          reason: failure.message,
          code: failure.code,
          accountType: failure.accountType,
        },
      };
    }

    const values = aggregation.values;
    const warnings: AccountWarning[] = aggregation.tolerated.map((failure) => ({
      accountType: failure.accountType,
      kind: failure.reason.kind,
      reason: failure.message,
      code: failure.code,
    }));
    const account: AccountValuation = {
      apiName: credential.apiName,
      values,
      totalValue: totalOf(values),
      warnings: Object.freeze(warnings),
    };
    return { ok: true, account };
  }
}
