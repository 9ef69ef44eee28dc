// Explicit per-request scope for config and history lookups.
export interface SessionContext {
  sessionId: string;
}
