import type { ModelUsageRecord, ModelUsageSummary } from '../entities/ModelUsage.js';

/**
 * Interface for model usage persistence
 */
export interface IModelUsageRepository {
  recordUsage(modelName: string, tokensUsed: number, responseTimeMs?: number): ModelUsageRecord;

  getUsageByModel(): ModelUsageSummary[];
}
