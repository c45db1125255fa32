export type RetrievalMode = 'local' | 'global' | 'hybrid';

export interface KnowledgeBaseQuery {
  query: string;
  mode: RetrievalMode;
}

export type KnowledgeBaseQueryResult =
  | { success: true; content: string; status_code: number }
  | { success: false; error: string; status_code?: number };

export interface KnowledgeBaseDocument {
  text: string;
  metadata: Record<string, unknown>;
}

export type InsertResult =
  | {
      success: true;
      message: string;
      document_id?: string;
      entities_extracted: unknown[];
      relationships_created: number;
    }
  | { success: false; error: string };

export type BatchInsertResult =
  | {
      success: true;
      message: string;
      documents_processed: number;
      total_entities: number;
      total_relationships: number;
    }
  | { success: false; error: string };

export interface KnowledgeBaseStats {
  total_documents?: number;
  total_entities?: number;
  total_relationships?: number;
}

export type KnowledgeBaseStatus =
  | {
      available: true;
      status: 'online';
      knowledge_base_stats: KnowledgeBaseStats;
      server_info: Record<string, unknown>;
      last_updated: string;
    }
  | { available: false; error: string };

export interface RetrievalClient {
  query(request: KnowledgeBaseQuery): Promise<KnowledgeBaseQueryResult>;
}

export interface DocumentInsertClient {
  insert(text: string, metadata?: Record<string, unknown>): Promise<InsertResult>;
  batchInsert(documents: KnowledgeBaseDocument[]): Promise<BatchInsertResult>;
}

export interface StatusClient {
  status(): Promise<KnowledgeBaseStatus>;
}

export interface WebSearchClient {
  /** Resolves to the direct answer, or undefined when the search found none. */
  qnaSearch(query: string): Promise<string | undefined>;
}

export type ApiType = 'weather' | 'stock' | 'calculation' | 'general';

export interface ToolApiClient {
  call(query: string, apiType: ApiType): Promise<Record<string, unknown>>;
}

/**
 * Everything a workflow run talks to besides the language model. Clients are
 * shared across concurrent runs and must not hold per-run state.
 * `webSearch` is absent when no search provider is configured.
 */
export interface WorkflowDependencies {
  retrieval: RetrievalClient;
  insert: DocumentInsertClient;
  status: StatusClient;
  toolApis: ToolApiClient;
  webSearch?: WebSearchClient;
}
