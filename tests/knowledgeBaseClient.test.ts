import { KnowledgeBaseClient } from '../src/infrastructure/apiClients/knowledgeBaseClient';

const settings = {
  knowledge_base: {
    base_url: 'http://kb.test/',
    query_path: '/query',
    timeout_ms: 1000,
  },
};

const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

const namedError = (name: string, message: string): Error => {
  const error = new Error(message);
  error.name = name;
  return error;
};

describe('KnowledgeBaseClient', () => {
  let fetchSpy: jest.SpiedFunction<typeof fetch>;
  let client: KnowledgeBaseClient;

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
    client = new KnowledgeBaseClient(settings);
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  describe('query', () => {
    test('posts the query and mode and returns the content', async () => {
      fetchSpy.mockResolvedValue(jsonResponse({ response: 'Entities and relations.' }));

      const result = await client.query({ query: 'What is a graph?', mode: 'local' });

      expect(result).toEqual({ success: true, content: 'Entities and relations.', status_code: 200 });
      expect(fetchSpy).toHaveBeenCalledTimes(1);
      const [url, init] = fetchSpy.mock.calls[0];
      expect(url).toBe('http://kb.test/query');
      expect(init?.method).toBe('POST');
      expect(init?.body).toBe(JSON.stringify({ query: 'What is a graph?', mode: 'local' }));
    });

    test('treats a missing response field as empty content', async () => {
      fetchSpy.mockResolvedValue(jsonResponse({ other: 1 }));

      expect(await client.query({ query: 'q', mode: 'hybrid' })).toEqual({ success: true, content: '', status_code: 200 });
    });

    test('reports HTTP errors', async () => {
      fetchSpy.mockResolvedValue(new Response('boom', { status: 500, statusText: 'Internal Server Error' }));

      expect(await client.query({ query: 'q', mode: 'hybrid' })).toEqual({
        success: false,
        error: 'HTTP error from RAG API: 500 Internal Server Error',
        status_code: 500,
      });
    });

    test('reports timeouts', async () => {
      fetchSpy.mockRejectedValue(namedError('TimeoutError', 'The operation was aborted due to timeout'));

      expect(await client.query({ query: 'q', mode: 'hybrid' })).toEqual({
        success: false,
        error: 'Request timeout while querying RAG API',
      });
    });

    test('reports connection failures', async () => {
      fetchSpy.mockRejectedValue(new TypeError('fetch failed'));

      expect(await client.query({ query: 'q', mode: 'hybrid' })).toEqual({
        success: false,
        error: 'Could not connect to RAG API at http://kb.test/query',
      });
    });

    test('reports invalid JSON', async () => {
      fetchSpy.mockResolvedValue(new Response('not json', { status: 200 }));

      const result = await client.query({ query: 'q', mode: 'hybrid' });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toMatch(/^Invalid JSON response from RAG API: /);
        expect(result.status_code).toBe(200);
      }
    });
  });

  describe('insert', () => {
    test('indexes a document with its metadata', async () => {
      fetchSpy.mockResolvedValue(jsonResponse({ document_id: 'doc-1', entities: ['a', 'b'], relationships: 3 }));

      const result = await client.insert('Some text', { title: 'Doc' });

      expect(result).toEqual({
        success: true,
        message: 'Document successfully indexed in LightRAG',
        document_id: 'doc-1',
        entities_extracted: ['a', 'b'],
        relationships_created: 3,
      });
      const [url, init] = fetchSpy.mock.calls[0];
      expect(url).toBe('http://kb.test/insert');
      expect(init?.body).toBe(JSON.stringify({ text: 'Some text', metadata: { title: 'Doc' } }));
    });

    test('reports a rejected insertion', async () => {
      fetchSpy.mockResolvedValue(new Response('bad document', { status: 422, statusText: 'Unprocessable Entity' }));

      expect(await client.insert('Some text')).toEqual({
        success: false,
        error: 'LightRAG insertion failed: 422 - bad document',
      });
    });
  });

  describe('batchInsert', () => {
    test('defaults counts the server leaves out', async () => {
      fetchSpy.mockResolvedValue(jsonResponse({ total_entities: 7 }));

      const result = await client.batchInsert([
        { text: 'one', metadata: {} },
        { text: 'two', metadata: {} },
      ]);

      expect(result).toEqual({
        success: true,
        message: 'Successfully indexed 2 documents',
        documents_processed: 2,
        total_entities: 7,
        total_relationships: 0,
      });
      expect(fetchSpy.mock.calls[0][0]).toBe('http://kb.test/batch_insert');
    });
  });

  describe('status', () => {
    test('returns knowledge base statistics', async () => {
      fetchSpy.mockResolvedValue(jsonResponse({
        kb_stats: { total_documents: 12, total_entities: 40, total_relationships: 55 },
        server_info: { version: '1.0' },
      }));

      const status = await client.status();

      expect(status.available).toBe(true);
      if (status.available) {
        expect(status.knowledge_base_stats).toEqual({ total_documents: 12, total_entities: 40, total_relationships: 55 });
        expect(status.server_info).toEqual({ version: '1.0' });
      }
      expect(fetchSpy.mock.calls[0][0]).toBe('http://kb.test/status');
      expect(fetchSpy.mock.calls[0][1]?.method).toBe('GET');
    });

    test('reports an unreachable server', async () => {
      fetchSpy.mockRejectedValue(new TypeError('fetch failed'));

      expect(await client.status()).toEqual({ available: false, error: 'LightRAG not reachable at http://kb.test' });
    });

    test('reports a failing status endpoint', async () => {
      fetchSpy.mockResolvedValue(new Response('', { status: 503, statusText: 'Service Unavailable' }));

      expect(await client.status()).toEqual({ available: false, error: 'LightRAG status check failed: 503' });
    });
  });
});
