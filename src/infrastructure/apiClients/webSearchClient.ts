import { z } from 'zod';
import { WebSearchSettings } from '../../config';
import { createLogger } from '../../utils/logger';
import { WebSearchClient } from '../../domain/interfaces/collaborators';

const logger = createLogger('WebSearchClient');

export class WebSearchClientError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WebSearchClientError";
  }
}

const SearchResponseSchema = z.object({
  answer: z.string().nullish(),
  error: z.string().optional(),
}).passthrough();

/** Question-answering search against a Tavily-compatible `/search` endpoint. */
export class TavilySearchClient implements WebSearchClient {
  private baseUrl: string;
  private apiKey: string;
  private timeoutMs: number;

  constructor(settings: { web_search: WebSearchSettings & { api_key: string } }) {
    const url = settings.web_search.base_url;
    this.baseUrl = url.endsWith('/') ? url.slice(0, -1) : url;
    this.apiKey = settings.web_search.api_key;
    this.timeoutMs = settings.web_search.timeout_ms;

    logger.info(`Web search client initialized for ${this.baseUrl}`);
  }

  async qnaSearch(query: string): Promise<string | undefined> {
    if (!query || query.trim().length === 0) {
      throw new WebSearchClientError("Query cannot be empty");
    }

    logger.info(`Searching the web for: ${query.substring(0, 100)}`);

    const response = await fetch(`${this.baseUrl}/search`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        api_key: this.apiKey,
        query,
        search_depth: 'advanced',
        include_answer: true,
        max_results: 5,
      }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw new WebSearchClientError(`Web search request failed: ${response.status} ${response.statusText}`);
    }

    const data = SearchResponseSchema.parse(await response.json());
    if (data.error) {
      throw new WebSearchClientError(`Web search API error: ${data.error}`);
    }

    return data.answer || undefined;
  }
}

/** Returns undefined when no API key is configured, which the router reports as "not available". */
export function createWebSearchClient(settings: { web_search: WebSearchSettings }): WebSearchClient | undefined {
  const apiKey = settings.web_search.api_key;
  if (!apiKey) {
    logger.warn('Web search API key not configured. Internet retrieval is disabled.');
    return undefined;
  }
  return new TavilySearchClient({ web_search: { ...settings.web_search, api_key: apiKey } });
}
