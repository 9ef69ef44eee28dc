import Decimal from 'decimal.js';
import { SessionContext } from '../common/interfaces/session-context.interface';
import { CredentialStore } from './credential-store.interface';
import { Credential, CredentialRecord } from './entities/credential.entity';

// Process-local store; contents are lost on restart.
export class InMemoryCredentialStore implements CredentialStore {
  private sessions: Map<string, Map<string, CredentialRecord>> = new Map();

  async get(ctx: SessionContext, apiName: string): Promise<CredentialRecord | undefined> {
    return this.sessions.get(ctx.sessionId)?.get(apiName);
  }

  async list(ctx: SessionContext): Promise<CredentialRecord[]> {
    return Array.from(this.sessions.get(ctx.sessionId)?.values() ?? []);
  }

  async save(ctx: SessionContext, credential: Credential, totalInvestment: Decimal): Promise<CredentialRecord> {
    let records = this.sessions.get(ctx.sessionId);
    if (!records) {
      records = new Map();
      this.sessions.set(ctx.sessionId, records);
    }
    const record: CredentialRecord = {
      sessionId: ctx.sessionId,
      apiName: credential.apiName,
      apiKey: credential.apiKey,
      apiSecret: credential.apiSecret,
      totalInvestment,
      createdAt: records.get(credential.apiName)?.createdAt ?? new Date(),
    };
    records.set(credential.apiName, record);
    return record;
  }

  async remove(ctx: SessionContext, apiName: string): Promise<boolean> {
    return this.sessions.get(ctx.sessionId)?.delete(apiName) ?? false;
  }

  async clear(ctx: SessionContext): Promise<void> {
    this.sessions.delete(ctx.sessionId);
  }
}
