import Decimal from 'decimal.js';
import { SessionContext } from '../common/interfaces/session-context.interface';
import { Queryable, Row } from '../database/queryable.interface';
import { readDate, readDecimal, readString } from '../database/row.util';
import { CredentialStore } from './credential-store.interface';
import { Credential, CredentialRecord } from './entities/credential.entity';

const COLUMNS = 'session_id, api_name, api_key, api_secret, total_investment, created_at';

function toRecord(row: Row): CredentialRecord {
  return {
    sessionId: readString(row, 'session_id'),
    apiName: readString(row, 'api_name'),
    apiKey: readString(row, 'api_key'),
    apiSecret: readString(row, 'api_secret'),
    totalInvestment: readDecimal(row, 'total_investment'),
    createdAt: readDate(row, 'created_at'),
  };
}

export class PostgresCredentialStore implements CredentialStore {
  constructor(private readonly db: Queryable) {}

  async ensureSchema(): Promise<void> {
    await this.db.query(`
      CREATE TABLE IF NOT EXISTS user_config (
        session_id VARCHAR(64) NOT NULL,
        api_name VARCHAR(255) NOT NULL,
        api_key VARCHAR(255) NOT NULL,
        api_secret VARCHAR(255) NOT NULL,
        total_investment NUMERIC NOT NULL DEFAULT 0,
        created_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
        PRIMARY KEY (session_id, api_name)
      )
    `);
  }

  async get(ctx: SessionContext, apiName: string): Promise<CredentialRecord | undefined> {
    const { rows } = await this.db.query(
      `SELECT ${COLUMNS} FROM user_config WHERE session_id = $1 AND api_name = $2`,
      [ctx.sessionId, apiName],
    );
    return rows.length > 0 ? toRecord(rows[0]) : undefined;
  }

  async list(ctx: SessionContext): Promise<CredentialRecord[]> {
    const { rows } = await this.db.query(
      `SELECT ${COLUMNS} FROM user_config WHERE session_id = $1 ORDER BY created_at ASC, api_name ASC`,
      [ctx.sessionId],
    );
    return rows.map(toRecord);
  }

  async save(ctx: SessionContext, credential: Credential, totalInvestment: Decimal): Promise<CredentialRecord> {
    const { rows } = await this.db.query(
      `INSERT INTO user_config (session_id, api_name, api_key, api_secret, total_investment)
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT (session_id, api_name) DO UPDATE SET
         api_key = EXCLUDED.api_key,
         api_secret = EXCLUDED.api_secret,
         total_investment = EXCLUDED.total_investment
       RETURNING ${COLUMNS}`,
      [ctx.sessionId, credential.apiName, credential.apiKey, credential.apiSecret, totalInvestment.toString()],
    );
    if (rows.length === 0) {
      throw new Error(`Saving credential '${credential.apiName}' returned no row`);
    }
    return toRecord(rows[0]);
  }

  async remove(ctx: SessionContext, apiName: string): Promise<boolean> {
    const { rows } = await this.db.query(
      'DELETE FROM user_config WHERE session_id = $1 AND api_name = $2 RETURNING api_name',
      [ctx.sessionId, apiName],
    );
    return rows.length > 0;
  }

  async clear(ctx: SessionContext): Promise<void> {
    await this.db.query('DELETE FROM user_config WHERE session_id = $1', [ctx.sessionId]);
  }
}
