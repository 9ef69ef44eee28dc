import Decimal from 'decimal.js';

// One exchange account's API key pair. (session, apiName) is unique.
export interface Credential {
  apiName: string;
  apiKey: string;
  apiSecret: string;
}

// Initial investment configured against one credential.
export interface InvestmentConfig {
  apiName: string;
  totalInvestment: Decimal;   // >= 0
}

// Stored form: credential plus its investment, scoped to a session.
export interface CredentialRecord extends Credential {
  sessionId: string;
  totalInvestment: Decimal;
  createdAt: Date;
}
