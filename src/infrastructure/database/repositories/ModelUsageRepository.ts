import type { IModelUsageRepository } from '../../../core/interfaces/IModelUsageRepository.js';
import type { ModelUsageRecord, ModelUsageSummary } from '../../../core/entities/ModelUsage.js';
import type { DatabaseManager } from '../DatabaseManager.js';

interface ModelUsageRow {
  id: number;
  model_name: string;
  tokens_used: number;
  response_time: number | null;
  timestamp: string;
}

interface ModelUsageSummaryRow {
  model_name: string;
  calls: number;
  total_tokens: number;
  avg_response_time: number | null;
}

/**
 * SQLite implementation of the append-only model usage log
 */
export class ModelUsageRepository implements IModelUsageRepository {
  constructor(private db: DatabaseManager) {}

  recordUsage(modelName: string, tokensUsed: number, responseTimeMs?: number): ModelUsageRecord {
    const row = this.db.withConnection((conn) => {
      const { lastInsertRowid } = conn
        .prepare('INSERT INTO model_usage (model_name, tokens_used, response_time) VALUES (?, ?, ?)')
        .run(modelName, tokensUsed, responseTimeMs ?? null);

      return conn
        .prepare<[number | bigint], ModelUsageRow>('SELECT * FROM model_usage WHERE id = ?')
        .get(lastInsertRowid);
    });

    if (!row) {
      throw new Error(`Model usage record not found after insert for ${modelName}`);
    }
    return {
      id: row.id,
      modelName: row.model_name,
      tokensUsed: row.tokens_used,
      responseTimeMs: row.response_time,
      timestamp: row.timestamp,
    };
  }

  getUsageByModel(): ModelUsageSummary[] {
    const rows = this.db.executeQuery<ModelUsageSummaryRow>(`
      SELECT
        model_name,
        COUNT(*) AS calls,
        SUM(tokens_used) AS total_tokens,
        AVG(response_time) AS avg_response_time
      FROM model_usage
      GROUP BY model_name
      ORDER BY calls DESC, model_name
    `);

    return rows.map((row) => ({
      modelName: row.model_name,
      calls: row.calls,
      totalTokens: row.total_tokens,
      avgResponseTimeMs: row.avg_response_time,
    }));
  }
}
