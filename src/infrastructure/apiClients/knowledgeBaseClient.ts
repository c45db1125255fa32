import { z } from 'zod';
import { KnowledgeBaseSettings } from '../../config';
import { createLogger } from '../../utils/logger';
import {
  BatchInsertResult,
  DocumentInsertClient,
  InsertResult,
  KnowledgeBaseDocument,
  KnowledgeBaseQuery,
  KnowledgeBaseQueryResult,
  KnowledgeBaseStatus,
  RetrievalClient,
  StatusClient,
} from '../../domain/interfaces/collaborators';

const logger = createLogger('KnowledgeBaseClient');

export type KnowledgeBaseFailureKind = 'timeout' | 'connection' | 'http' | 'parse';

export class KnowledgeBaseClientError extends Error {
  constructor(
    message: string,
    public kind: KnowledgeBaseFailureKind,
    public statusCode?: number,
    public responseText?: string,
  ) {
    super(message);
    this.name = "KnowledgeBaseClientError";
  }
}

const QueryResponseSchema = z.object({
  response: z.string().optional(),
}).passthrough();

const InsertResponseSchema = z.object({
  document_id: z.string().optional(),
  entities: z.array(z.unknown()).optional(),
  relationships: z.number().optional(),
}).passthrough();

const BatchInsertResponseSchema = z.object({
  documents_processed: z.number().optional(),
  total_entities: z.number().optional(),
  total_relationships: z.number().optional(),
}).passthrough();

const StatusResponseSchema = z.object({
  kb_stats: z.object({
    total_documents: z.number().optional(),
    total_entities: z.number().optional(),
    total_relationships: z.number().optional(),
  }).passthrough().default({}),
  server_info: z.record(z.unknown()).default({}),
}).passthrough();

interface JsonResponse {
  status: number;
  data: unknown;
}

/**
 * HTTP client for a LightRAG-style knowledge-base service. One instance is
 * shared by every workflow run; it keeps no per-request state.
 */
export class KnowledgeBaseClient implements RetrievalClient, DocumentInsertClient, StatusClient {
  private baseUrl: string;
  private queryPath: string;
  private timeoutMs: number;

  constructor(settings: { knowledge_base: KnowledgeBaseSettings }) {
    const url = settings.knowledge_base.base_url;
    this.baseUrl = url.endsWith('/') ? url.slice(0, -1) : url;
    this.queryPath = settings.knowledge_base.query_path;
    this.timeoutMs = settings.knowledge_base.timeout_ms;

    logger.info(`Knowledge base client initialized for ${this.baseUrl} (timeout ${this.timeoutMs}ms)`);
  }

  get queryUrl(): string {
    return `${this.baseUrl}${this.queryPath}`;
  }

  private async requestJson(method: 'GET' | 'POST', path: string, body?: unknown): Promise<JsonResponse> {
    const url = `${this.baseUrl}${path}`;
    let response: Response;

    try {
      response = await fetch(url, {
        method,
        headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        throw new KnowledgeBaseClientError(`Request to ${url} timed out after ${this.timeoutMs}ms`, 'timeout');
      }
      throw new KnowledgeBaseClientError(
        `Could not connect to ${url}: ${error instanceof Error ? error.message : String(error)}`,
        'connection'
      );
    }

    const text = await response.text();
    if (!response.ok) {
      throw new KnowledgeBaseClientError(
        `${response.status} ${response.statusText}`.trim(),
        'http',
        response.status,
        text
      );
    }

    try {
      return { status: response.status, data: JSON.parse(text) };
    } catch (error) {
      throw new KnowledgeBaseClientError(
        error instanceof Error ? error.message : String(error),
        'parse',
        response.status
      );
    }
  }

  async query(request: KnowledgeBaseQuery): Promise<KnowledgeBaseQueryResult> {
    logger.info(`Querying knowledge base: ${this.queryUrl} with mode: ${request.mode}`);

    try {
      const { status, data } = await this.requestJson('POST', this.queryPath, {
        query: request.query,
        mode: request.mode,
      });
      const parsed = QueryResponseSchema.safeParse(data);
      if (!parsed.success) {
        return { success: false, error: `Invalid JSON response from RAG API: ${parsed.error.message}`, status_code: status };
      }

      logger.info('Successfully received response from knowledge base');
      return { success: true, content: parsed.data.response ?? '', status_code: status };
    } catch (error) {
      if (!(error instanceof KnowledgeBaseClientError)) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(`Unexpected error querying knowledge base: ${message}`);
        return { success: false, error: `Unexpected error: ${message}` };
      }

      logger.error(`Knowledge base query failed (${error.kind}): ${error.message}`);
      switch (error.kind) {
        case 'timeout':
          return { success: false, error: 'Request timeout while querying RAG API' };
        case 'connection':
          return { success: false, error: `Could not connect to RAG API at ${this.queryUrl}` };
        case 'http':
          return { success: false, error: `HTTP error from RAG API: ${error.message}`, status_code: error.statusCode };
        case 'parse':
          return { success: false, error: `Invalid JSON response from RAG API: ${error.message}`, status_code: error.statusCode };
      }
    }
  }

  async insert(text: string, metadata: Record<string, unknown> = {}): Promise<InsertResult> {
    try {
      const { data } = await this.requestJson('POST', '/insert', { text, metadata });
      const result = InsertResponseSchema.parse(data);
      return {
        success: true,
        message: 'Document successfully indexed in LightRAG',
        document_id: result.document_id,
        entities_extracted: result.entities ?? [],
        relationships_created: result.relationships ?? 0,
      };
    } catch (error) {
      if (error instanceof KnowledgeBaseClientError && error.kind === 'http') {
        return { success: false, error: `LightRAG insertion failed: ${error.statusCode} - ${error.responseText ?? ''}` };
      }
      return {
        success: false,
        error: `Error inserting document into LightRAG: ${error instanceof Error ? error.message : String(error)}`,
      };
    }
  }

  async batchInsert(documents: KnowledgeBaseDocument[]): Promise<BatchInsertResult> {
    try {
      const { data } = await this.requestJson('POST', '/batch_insert', { documents });
      const result = BatchInsertResponseSchema.parse(data);
      return {
        success: true,
        message: `Successfully indexed ${documents.length} documents`,
        documents_processed: result.documents_processed ?? documents.length,
        total_entities: result.total_entities ?? 0,
        total_relationships: result.total_relationships ?? 0,
      };
    } catch (error) {
      if (error instanceof KnowledgeBaseClientError && error.kind === 'http') {
        return { success: false, error: `LightRAG batch insertion failed: ${error.statusCode} - ${error.responseText ?? ''}` };
      }
      return {
        success: false,
        error: `Error batch inserting documents: ${error instanceof Error ? error.message : String(error)}`,
      };
    }
  }

  async status(): Promise<KnowledgeBaseStatus> {
    try {
      const { data } = await this.requestJson('GET', '/status');
      const result = StatusResponseSchema.parse(data);
      return {
        available: true,
        status: 'online',
        knowledge_base_stats: result.kb_stats,
        server_info: result.server_info,
        last_updated: new Date().toISOString(),
      };
    } catch (error) {
      if (error instanceof KnowledgeBaseClientError) {
        if (error.kind === 'http') {
          return { available: false, error: `LightRAG status check failed: ${error.statusCode}` };
        }
        if (error.kind === 'timeout' || error.kind === 'connection') {
          return { available: false, error: `LightRAG not reachable at ${this.baseUrl}` };
        }
      }
      return {
        available: false,
        error: `Error checking LightRAG status: ${error instanceof Error ? error.message : String(error)}`,
      };
    }
  }
}
