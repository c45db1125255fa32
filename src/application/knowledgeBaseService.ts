import {
  BatchInsertResult,
  InsertResult,
  KnowledgeBaseDocument,
  KnowledgeBaseStatus,
  RetrievalMode,
  WorkflowDependencies,
} from '../domain/interfaces/collaborators';
import { FinalResponse, createFinalResponse } from '../domain/models/stepResults';
import { retrieveFromKnowledgeBase } from '../domain/services/retrievalRouter';
import { SessionHistoryStore } from '../services/sessionHistory';
import { createLogger } from '../utils/logger';

const logger = createLogger('KnowledgeBaseService');

export interface DocumentInput {
  text: string;
  title?: string;
  source?: string;
}

export interface KnowledgeBaseStatusReport {
  status: KnowledgeBaseStatus;
  summary: string;
}

type KnowledgeBaseDependencies = Pick<WorkflowDependencies, 'retrieval' | 'insert' | 'status'>;

export function formatKnowledgeBaseStatus(status: KnowledgeBaseStatus): string {
  if (!status.available) {
    return `Knowledge base unavailable: ${status.error}`;
  }
  const stats = status.knowledge_base_stats;
  return [
    'Knowledge base status: online',
    `Documents: ${stats.total_documents ?? 'N/A'}`,
    `Entities: ${stats.total_entities ?? 'N/A'}`,
    `Relationships: ${stats.total_relationships ?? 'N/A'}`,
    `Last updated: ${status.last_updated}`,
  ].join('\n');
}

/** Direct knowledge-base access that bypasses the workflow: single-shot queries, indexing and status. */
export class KnowledgeBaseService {
  constructor(
    private deps: KnowledgeBaseDependencies,
    private history: SessionHistoryStore,
  ) {}

  async directQuery(query: string, mode: RetrievalMode = 'hybrid', sessionId?: string): Promise<FinalResponse> {
    logger.info(`Direct knowledge base query (mode: ${mode}): ${query.substring(0, 100)}`);

    const record = await retrieveFromKnowledgeBase(query, mode, this.deps);
    const metadata: Record<string, unknown> = {
      mode,
      query,
      tool: 'direct_query',
      timestamp: new Date().toISOString(),
    };

    let response: FinalResponse;
    if (record.num_results > 0 && record.documents.length > 0) {
      response = createFinalResponse({
        answer: record.documents[0],
        confidence: 0.8,
        sources: [`LightRAG (${mode} mode)`],
        metadata,
      });
    } else {
      response = createFinalResponse({
        answer: `No relevant information found for: ${query}`,
        confidence: 0.1,
        sources: ['LightRAG (no results)'],
        metadata: { ...metadata, error: 'No results found' },
      });
    }

    if (sessionId) {
      this.history.recordQuery(sessionId, query, response);
    }
    return response;
  }

  async addDocument(document: DocumentInput, sessionId?: string): Promise<InsertResult> {
    logger.info(`Adding document to knowledge base: ${document.title || 'Untitled'}`);

    const metadata: Record<string, unknown> = {};
    if (document.title) {
      metadata.title = document.title;
    }
    if (document.source) {
      metadata.source = document.source;
    }
    metadata.added_at = new Date().toISOString();

    const result = await this.deps.insert.insert(document.text, metadata);
    if (result.success) {
      logger.info(`Document indexed: ${result.message}`);
      if (sessionId) {
        this.history.recordDocuments(sessionId, 1);
      }
    } else {
      logger.warn(`Failed to index document: ${result.error}`);
    }
    return result;
  }

  async batchAddDocuments(documents: DocumentInput[], sessionId?: string): Promise<BatchInsertResult> {
    logger.info(`Batch adding ${documents.length} documents to knowledge base`);

    const addedAt = new Date().toISOString();
    const prepared: KnowledgeBaseDocument[] = documents.map(doc => ({
      text: doc.text,
      metadata: {
        title: doc.title ?? '',
        source: doc.source ?? '',
        added_at: addedAt,
      },
    }));

    const result = await this.deps.insert.batchInsert(prepared);
    if (result.success) {
      logger.info(`Batch indexing completed: ${result.message}`);
      if (sessionId) {
        this.history.recordDocuments(sessionId, documents.length);
      }
    } else {
      logger.warn(`Batch indexing failed: ${result.error}`);
    }
    return result;
  }

  async knowledgeBaseStatus(): Promise<KnowledgeBaseStatusReport> {
    const status = await this.deps.status.status();
    return { status, summary: formatKnowledgeBaseStatus(status) };
  }
}
