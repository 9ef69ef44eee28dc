import { BadRequestException, Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { SessionContext } from '../common/interfaces/session-context.interface';
import { toDecimal } from '../common/utils/decimal.util';
import { EXCHANGE_CLIENT_FACTORY, ExchangeClientFactory } from '../exchange/exchange-client.interface';
import { classifyExchangeError } from '../exchange/exchange-errors';
import { SNAPSHOT_STORE, SnapshotStore } from '../snapshots/snapshot-store.interface';
import { CREDENTIAL_STORE, CredentialStore } from './credential-store.interface';
import { CreateCredentialDto, MAX_INVESTMENT } from './dto/create-credential.dto';
import { Credential, CredentialRecord } from './entities/credential.entity';

/** Shows only the first and last four characters of a key */
export function maskKey(key: string): string {
  if (key.length <= 8) {
    return '*'.repeat(key.length);
  }
  return `${key.slice(0, 4)}…${key.slice(-4)}`;
}

// Setup flow: validate, probe the exchange, persist. Also reset.
@Injectable()
export class CredentialsService {
  private readonly logger = new Logger(CredentialsService.name);

  constructor(
    @Inject(CREDENTIAL_STORE) private readonly credentials: CredentialStore,
    @Inject(SNAPSHOT_STORE) private readonly snapshots: SnapshotStore,
    @Inject(EXCHANGE_CLIENT_FACTORY) private readonly clientFactory: ExchangeClientFactory,
  ) {}

  /**
   * Saves a credential after checking it can read spot and futures balances.
   * Replaces any credential already saved under the same apiName.
   * @throws BadRequestException on invalid investment or a rejected probe
   */
  async saveCredential(ctx: SessionContext, dto: CreateCredentialDto): Promise<CredentialRecord> {
    if (!Number.isFinite(dto.totalInvestment) || dto.totalInvestment < 0) {
      throw new BadRequestException('Investment amount must be a non-negative number');
    }
    if (dto.totalInvestment > MAX_INVESTMENT) {
      throw new BadRequestException(`Investment amount cannot exceed ${MAX_INVESTMENT}`);
    }

    const credential: Credential = {
      apiName: dto.apiName.trim(),
      apiKey: dto.apiKey.trim(),
      apiSecret: dto.apiSecret.trim(),
    };
    await this.probe(credential);

    const existing = await this.credentials.get(ctx, credential.apiName);
    const record = await this.credentials.save(ctx, credential, toDecimal(dto.totalInvestment));
    this.logger.log(`[${ctx.sessionId}] ${existing ? 'replaced' : 'saved'} credential '${record.apiName}'`);
    return record;
  }

  listCredentials(ctx: SessionContext): Promise<CredentialRecord[]> {
    return this.credentials.list(ctx);
  }

  /** @throws NotFoundException if no credential has that name */
  async removeCredential(ctx: SessionContext, apiName: string): Promise<void> {
    const removed = await this.credentials.remove(ctx, apiName);
    if (!removed) {
      throw new NotFoundException(`No credential named '${apiName}'`);
    }
    this.logger.log(`[${ctx.sessionId}] removed credential '${apiName}'`);
  }

  /** Clears every credential and the whole snapshot history of the session */
  async reset(ctx: SessionContext): Promise<void> {
    await this.credentials.clear(ctx);
    await this.snapshots.clear(ctx);
    this.logger.log(`[${ctx.sessionId}] configuration and history cleared`);
  }

  // Read-only calls that need the spot and futures read scopes.
  private async probe(credential: Credential): Promise<void> {
    const client = this.clientFactory.create({ apiKey: credential.apiKey, apiSecret: credential.apiSecret });
    try {
      await client.getSpotAccount();
      await client.getFuturesBalances();
    } catch (error) {
      const failure = classifyExchangeError(error);
      this.logger.warn(`Credential '${credential.apiName}' rejected: ${failure.kind} ${failure.message}`);
      throw new BadRequestException({
        message: `API validation failed: ${failure.message}`,
        kind: failure.kind,
        code: failure.code,
      });
    }
  }
}
