/**
 * Append-only record of one model invocation
 */
export interface ModelUsageRecord {
  id: number;
  modelName: string;
  tokensUsed: number;
  responseTimeMs: number | null;
  timestamp: string;
}

export interface ModelUsageSummary {
  modelName: string;
  calls: number;
  totalTokens: number;
  avgResponseTimeMs: number | null;
}
