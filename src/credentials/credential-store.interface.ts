import Decimal from 'decimal.js';
import { SessionContext } from '../common/interfaces/session-context.interface';
import { Credential, CredentialRecord } from './entities/credential.entity';

export const CREDENTIAL_STORE = Symbol('CREDENTIAL_STORE');

/**
 * Keyed record store of credentials per session.
 * Saving an existing (session, apiName) replaces it.
 */
export interface CredentialStore {
  get(ctx: SessionContext, apiName: string): Promise<CredentialRecord | undefined>;
  /** Oldest first */
  list(ctx: SessionContext): Promise<CredentialRecord[]>;
  save(ctx: SessionContext, credential: Credential, totalInvestment: Decimal): Promise<CredentialRecord>;
  remove(ctx: SessionContext, apiName: string): Promise<boolean>;
  clear(ctx: SessionContext): Promise<void>;
}
