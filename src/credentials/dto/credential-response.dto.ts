// Stored credential as listed back to the client. Secrets never leave the service.
export interface CredentialResponseDto {
  apiName: string;
  apiKey: string;          // masked, e.g. "abcd…wxyz"
  totalInvestment: number;
  createdAt: string;
}
