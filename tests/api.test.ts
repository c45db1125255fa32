import request from 'supertest';
import { createApp } from '../src/app';
import { AppServices } from '../src/api/appServices';
import { KnowledgeBaseService } from '../src/application/knowledgeBaseService';
import { AppSettings } from '../src/config';
import {
  BatchInsertResult,
  InsertResult,
  KnowledgeBaseDocument,
  KnowledgeBaseStatus,
  WorkflowDependencies,
} from '../src/domain/interfaces/collaborators';
import { FinalResponse, createFinalResponse } from '../src/domain/models/stepResults';
import { RateLimiter } from '../src/services/rateLimiter';
import { SessionHistoryStore } from '../src/services/sessionHistory';

const appSettings: AppSettings = {
  name: 'Agentic RAG Workflow',
  version: '0.1.0',
  host: '127.0.0.1',
  port: 8000,
  log_level: 'INFO',
  cors_allowed_origins_str: '*',
  rate_limit_max_requests: 100,
  rate_limit_per_seconds: 60,
};

const onlineStatus: KnowledgeBaseStatus = {
  available: true,
  status: 'online',
  knowledge_base_stats: { total_documents: 1, total_entities: 2, total_relationships: 3 },
  server_info: {},
  last_updated: '2024-01-01T00:00:00.000Z',
};

const workflowAnswer = createFinalResponse({ answer: 'Hi there', confidence: 0.9, sources: ['LightRAG'] });

const createServices = () => {
  const dependencies: WorkflowDependencies = {
    retrieval: { query: jest.fn(async () => ({ success: true as const, content: 'Stored fact.', status_code: 200 })) },
    insert: {
      insert: jest.fn(async (): Promise<InsertResult> => ({
        success: true,
        message: 'Document successfully indexed in LightRAG',
        document_id: 'doc-1',
        entities_extracted: [],
        relationships_created: 0,
      })),
      batchInsert: jest.fn(async (documents: KnowledgeBaseDocument[]): Promise<BatchInsertResult> => ({
        success: true,
        message: `Successfully indexed ${documents.length} documents`,
        documents_processed: documents.length,
        total_entities: 0,
        total_relationships: 0,
      })),
    },
    status: { status: jest.fn(async () => onlineStatus) },
    toolApis: { call: jest.fn(async () => ({})) },
  };
  const history = new SessionHistoryStore();
  const run = jest.fn(async (): Promise<FinalResponse> => workflowAnswer);
  const services: AppServices = {
    engine: { run },
    dependencies,
    knowledgeBase: new KnowledgeBaseService(dependencies, history),
    history,
  };
  return { services, dependencies, history, run };
};

describe('HTTP API', () => {
  describe('POST /query', () => {
    test('runs the workflow and records the session', async () => {
      const { services, history, run } = createServices();

      const res = await request(createApp(services, appSettings))
        .post('/query')
        .send({ query: '  What is a graph?  ', session_id: 'session-a' });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        success: true,
        data: {
          session_id: 'session-a',
          response: {
            answer: 'Hi there',
            confidence: 0.9,
            sources: ['LightRAG'],
            metadata: {},
            retry_count: 0,
          },
        },
      });
      expect(run).toHaveBeenCalledWith('What is a graph?', services.dependencies);
      expect(history.get('session-a')?.query_history).toEqual(['What is a graph?']);
      expect(res.headers['x-correlation-id']).toMatch(/^req_/);
    });

    test('issues a session id when none is given', async () => {
      const { services } = createServices();

      const res = await request(createApp(services, appSettings)).post('/query').send({ query: 'hello' });

      expect(res.status).toBe(200);
      expect(res.body.data.session_id).toMatch(/^session-/);
    });

    test('rejects an empty query', async () => {
      const { services, run } = createServices();

      const res = await request(createApp(services, appSettings)).post('/query').send({ query: '   ' });

      expect(res.status).toBe(400);
      expect(res.body.success).toBe(false);
      expect(res.body.error.code).toBe('VALIDATION_ERROR');
      expect(res.body.error.details).toEqual([
        { field: 'query', message: 'Query cannot be empty', code: 'too_small' },
      ]);
      expect(run).not.toHaveBeenCalled();
    });

    test('rejects malformed JSON', async () => {
      const { services } = createServices();

      const res = await request(createApp(services, appSettings))
        .post('/query')
        .set('Content-Type', 'application/json')
        .send('{"query":');

      expect(res.status).toBe(400);
      expect(res.body.error.message).toBe('Invalid JSON body');
    });

    test('reports engine failures as internal errors', async () => {
      const { services, run } = createServices();
      run.mockRejectedValueOnce(new Error('boom'));

      const res = await request(createApp(services, appSettings)).post('/query').send({ query: 'hello' });

      expect(res.status).toBe(500);
      expect(res.body.error).toMatchObject({ message: 'Internal server error', code: 'INTERNAL_SERVER_ERROR', statusCode: 500 });
      expect(res.body.error.correlationId).toBe(res.headers['x-correlation-id']);
    });
  });

  describe('POST /query/direct', () => {
    test('queries the knowledge base in the requested mode', async () => {
      const { services, dependencies } = createServices();

      const res = await request(createApp(services, appSettings))
        .post('/query/direct')
        .send({ query: 'Define graph', mode: 'local', session_id: 'session-b' });

      expect(res.status).toBe(200);
      expect(res.body.data.session_id).toBe('session-b');
      expect(res.body.data.response.answer).toBe('Stored fact.');
      expect(res.body.data.response.sources).toEqual(['LightRAG (local mode)']);
      expect(dependencies.retrieval.query).toHaveBeenCalledWith({ query: 'Define graph', mode: 'local' });
    });

    test('rejects an unknown mode', async () => {
      const { services } = createServices();

      const res = await request(createApp(services, appSettings))
        .post('/query/direct')
        .send({ query: 'Define graph', mode: 'naive' });

      expect(res.status).toBe(400);
      expect(res.body.error.details[0].field).toBe('mode');
    });
  });

  describe('documents', () => {
    test('indexes a single document', async () => {
      const { services, history } = createServices();

      const res = await request(createApp(services, appSettings))
        .post('/documents')
        .send({ text: 'Graphs are made of nodes.', title: 'Graphs', session_id: 'session-c' });

      expect(res.status).toBe(201);
      expect(res.body.data).toMatchObject({ success: true, document_id: 'doc-1' });
      expect(history.get('session-c')?.documents_added).toBe(1);
    });

    test('maps an indexing failure to a bad gateway', async () => {
      const { services, dependencies } = createServices();
      jest.mocked(dependencies.insert.insert).mockResolvedValueOnce({
        success: false,
        error: 'LightRAG insertion failed: 500 - oops',
      });

      const res = await request(createApp(services, appSettings)).post('/documents').send({ text: 'x' });

      expect(res.status).toBe(502);
      expect(res.body.error).toMatchObject({
        message: 'LightRAG insertion failed: 500 - oops',
        code: 'EXTERNAL_SERVICE_ERROR',
      });
    });

    test('indexes a batch', async () => {
      const { services } = createServices();

      const res = await request(createApp(services, appSettings))
        .post('/documents/batch')
        .send({ documents: [{ text: 'one' }, { text: 'two' }] });

      expect(res.status).toBe(201);
      expect(res.body.data.documents_processed).toBe(2);
    });

    test('rejects an empty batch', async () => {
      const { services } = createServices();

      const res = await request(createApp(services, appSettings)).post('/documents/batch').send({ documents: [] });

      expect(res.status).toBe(400);
      expect(res.body.error.details[0].message).toBe('At least one document is required');
    });
  });

  describe('GET /knowledge-base/status', () => {
    test('returns the formatted summary', async () => {
      const { services } = createServices();

      const res = await request(createApp(services, appSettings)).get('/knowledge-base/status');

      expect(res.status).toBe(200);
      expect(res.body.data.summary).toBe(
        'Knowledge base status: online\nDocuments: 1\nEntities: 2\nRelationships: 3\nLast updated: 2024-01-01T00:00:00.000Z'
      );
    });

    test('answers 503 when the knowledge base is unreachable', async () => {
      const { services, dependencies } = createServices();
      jest.mocked(dependencies.status.status).mockResolvedValue({ available: false, error: 'LightRAG not reachable at http://kb.test' });

      const res = await request(createApp(services, appSettings)).get('/knowledge-base/status');

      expect(res.status).toBe(503);
      expect(res.body.success).toBe(false);
      expect(res.body.data.summary).toBe('Knowledge base unavailable: LightRAG not reachable at http://kb.test');
    });
  });

  describe('history', () => {
    test('returns and clears a session', async () => {
      const { services, history } = createServices();
      history.recordQuery('session-d', 'earlier', workflowAnswer);
      const app = createApp(services, appSettings);

      const fetched = await request(app).get('/history/session-d');
      expect(fetched.status).toBe(200);
      expect(fetched.body.data.query_history).toEqual(['earlier']);

      const cleared = await request(app).delete('/history/session-d');
      expect(cleared.status).toBe(200);
      expect(cleared.body).toEqual({ success: true, data: { session_id: 'session-d', cleared: true } });
      expect(history.get('session-d')?.query_history).toEqual([]);
    });

    test('answers 404 for unknown sessions', async () => {
      const { services } = createServices();
      const app = createApp(services, appSettings);

      const fetched = await request(app).get('/history/unknown');
      expect(fetched.status).toBe(404);
      expect(fetched.body.error.message).toBe('Session unknown not found');

      const cleared = await request(app).delete('/history/unknown');
      expect(cleared.status).toBe(404);
    });

    test('rejects malformed session ids', async () => {
      const { services } = createServices();

      const res = await request(createApp(services, appSettings)).get('/history/bad.id');

      expect(res.status).toBe(400);
      expect(res.body.error.details[0].field).toBe('sessionId');
    });
  });

  describe('GET /health', () => {
    test('is healthy when every service is', async () => {
      const { services } = createServices();
      services.llmStatus = () => ({ state: 'CLOSED', failures: 0, requestCount: 4 });

      const res = await request(createApp(services, appSettings)).get('/health');

      expect(res.status).toBe(200);
      expect(res.body.data.status).toBe('healthy');
      expect(res.body.data.services.knowledge_base.status).toBe('healthy');
      expect(res.body.data.services.llm).toMatchObject({ status: 'healthy', state: 'CLOSED' });
    });

    test('is unhealthy when the language model breaker is open', async () => {
      const { services } = createServices();
      services.llmStatus = () => ({ state: 'OPEN', failures: 5, requestCount: 5 });

      const res = await request(createApp(services, appSettings)).get('/health');

      expect(res.status).toBe(503);
      expect(res.body.data.services.llm.status).toBe('degraded');
    });

    test('is unhealthy when the knowledge base is down', async () => {
      const { services, dependencies } = createServices();
      jest.mocked(dependencies.status.status).mockResolvedValue({ available: false, error: 'LightRAG status check failed: 503' });

      const res = await request(createApp(services, appSettings)).get('/health');

      expect(res.status).toBe(503);
      expect(res.body.data.services.knowledge_base).toMatchObject({
        status: 'unhealthy',
        error: 'LightRAG status check failed: 503',
      });
    });
  });

  describe('authentication', () => {
    const securedSettings: AppSettings = { ...appSettings, auth_token: 'test-secret' };

    test('requires the bearer token on API routes', async () => {
      const { services } = createServices();
      const app = createApp(services, securedSettings);

      const missing = await request(app).post('/query').send({ query: 'hello' });
      expect(missing.status).toBe(401);
      expect(missing.body.error.code).toBe('AUTHENTICATION_ERROR');
      expect(missing.headers['www-authenticate']).toBe('Bearer');

      const wrong = await request(app).post('/query').set('Authorization', 'Bearer wrong-token').send({ query: 'hello' });
      expect(wrong.status).toBe(401);
      expect(wrong.body.error.message).toBe('Invalid credentials');

      const ok = await request(app).post('/query').set('Authorization', 'Bearer test-secret').send({ query: 'hello' });
      expect(ok.status).toBe(200);
    });

    test('leaves the health check open', async () => {
      const { services } = createServices();

      const res = await request(createApp(services, securedSettings)).get('/health');

      expect(res.status).toBe(200);
    });
  });

  test('limits the request rate per client', async () => {
    const { services } = createServices();
    const app = createApp(services, { ...appSettings, rate_limit_max_requests: 1 });

    const first = await request(app).get('/history/unknown');
    expect(first.status).toBe(404);
    expect(first.headers['x-ratelimit-remaining']).toBe('0');

    const second = await request(app).get('/history/unknown');
    expect(second.status).toBe(429);
    expect(second.body.error.code).toBe('RATE_LIMIT_ERROR');
  });

  test('uses the shared rate limiter when one is provided', async () => {
    const { services } = createServices();
    const limiter = new RateLimiter({ maxRequests: 1, perSeconds: 60 });
    services.rateLimiter = limiter;
    const app = createApp(services, appSettings);

    const first = await request(app).get('/history/unknown');
    const second = await request(app).get('/history/unknown');
    limiter.destroy();

    expect(first.status).toBe(404);
    expect(second.status).toBe(429);
    expect(second.headers['retry-after']).toBeDefined();
  });

  test('answers unknown routes with 404', async () => {
    const { services } = createServices();

    const res = await request(createApp(services, appSettings)).get('/nope');

    expect(res.status).toBe(404);
    expect(res.body.error.message).toBe('Route GET /nope not found');
  });
});
