export interface DatabaseStatistics {
  totalConversations: number;
  totalMessages: number;
  totalTokens: number;
  dbSizeBytes: number;
  dbSizeMb: number;
}

/**
 * One row of `pragma_table_info`
 */
export interface TableColumnInfo {
  cid: number;
  name: string;
  type: string;
  notnull: number;
  dflt_value: string | null;
  pk: number;
}
