import { createLogger } from '../../utils/logger';
import {
  ApiType,
  RetrievalMode,
  WorkflowDependencies,
} from '../interfaces/collaborators';
import { createRetrievalRecord, RetrievalRecord, SourceSelection } from '../models/stepResults';
import { errorMessage } from './exceptions';

const logger = createLogger('RetrievalRouter');

export const KNOWLEDGE_BASE_SOURCE = 'lightrag';

const LOCAL_MODE_CUES = ['what is', 'define', 'definition', 'meaning'];
const GLOBAL_MODE_CUES = ['compare', 'relationship', 'overview', 'summary', 'summarize', 'analyze'];

const API_TYPE_CUES: ReadonlyArray<{ type: Exclude<ApiType, 'general'>; cues: string[] }> = [
  { type: 'weather', cues: ['weather', 'temperature', 'rain', 'sunny', 'cloudy', 'forecast'] },
  { type: 'stock', cues: ['stock', 'price', 'market', 'trading', 'shares'] },
  { type: 'calculation', cues: ['calculate', 'math', 'compute', '+', '-', '*', '/', 'equation'] },
];

const containsAny = (text: string, cues: string[]): boolean => cues.some(cue => text.includes(cue));

/** Picks the knowledge-base query mode from lexical cues in the query. */
export function determineRetrievalMode(query: string): RetrievalMode {
  const lowered = query.toLowerCase();
  if (containsAny(lowered, LOCAL_MODE_CUES)) {
    return 'local';
  }
  if (containsAny(lowered, GLOBAL_MODE_CUES)) {
    return 'global';
  }
  return 'hybrid';
}

export function determineApiType(query: string): ApiType {
  const lowered = query.toLowerCase();
  const match = API_TYPE_CUES.find(entry => containsAny(lowered, entry.cues));
  return match ? match.type : 'general';
}

export async function retrieveFromKnowledgeBase(
  query: string,
  mode: RetrievalMode,
  deps: Pick<WorkflowDependencies, 'retrieval'>
): Promise<RetrievalRecord> {
  try {
    const result = await deps.retrieval.query({ query, mode });

    if (!result.success) {
      return createRetrievalRecord({
        documents: [`LightRAG query failed: ${result.error}`],
        metadata: [{ error: result.error, mode, query, status_code: result.status_code ?? 'unknown' }],
        source: `${KNOWLEDGE_BASE_SOURCE}_error`,
        num_results: 0,
      });
    }

    if (!result.content) {
      return createRetrievalRecord({
        documents: ['No relevant documents found in LightRAG knowledge base'],
        metadata: [{ source: 'lightrag_empty', mode, query, status_code: result.status_code }],
        source: `${KNOWLEDGE_BASE_SOURCE}_empty`,
        num_results: 0,
      });
    }

    const documents = [result.content];
    return createRetrievalRecord({
      documents,
      metadata: [{ source: 'lightrag_response', mode, query, status_code: result.status_code }],
      source: KNOWLEDGE_BASE_SOURCE,
      num_results: documents.length,
    });
  } catch (error) {
    const message = errorMessage(error);
    logger.error(`Knowledge base retrieval failed: ${message}`);
    return createRetrievalRecord({
      documents: [`Error retrieving from LightRAG: ${message}`],
      metadata: [{ error: message, mode, query }],
      source: `${KNOWLEDGE_BASE_SOURCE}_error`,
      num_results: 0,
    });
  }
}

async function searchWeb(query: string, deps: WorkflowDependencies): Promise<RetrievalRecord> {
  if (!deps.webSearch) {
    return createRetrievalRecord({
      web_answer: 'Web search not available - web search client not configured',
      source: 'web_search_error',
      num_results: 0,
    });
  }

  try {
    const answer = await deps.webSearch.qnaSearch(query);
    return createRetrievalRecord({
      web_answer: answer || 'No relevant information found on the web',
      source: 'internet',
      num_results: answer ? 1 : 0,
    });
  } catch (error) {
    const message = errorMessage(error);
    logger.error(`Web search failed: ${message}`);
    return createRetrievalRecord({
      web_answer: `Error in web search: ${message}`,
      source: 'web_search_error',
      num_results: 0,
    });
  }
}

async function callToolApi(query: string, deps: WorkflowDependencies): Promise<RetrievalRecord> {
  const apiType = determineApiType(query);
  try {
    const apiData = await deps.toolApis.call(query, apiType);
    return createRetrievalRecord({
      api_data: apiData,
      source: `api_${apiType}`,
      num_results: 1,
    });
  } catch (error) {
    const message = errorMessage(error);
    logger.error(`Tool API '${apiType}' failed: ${message}`);
    return createRetrievalRecord({
      api_data: { error: `API call failed: ${message}` },
      source: `api_${apiType}_error`,
      num_results: 0,
    });
  }
}

/**
 * Dispatches retrieval to the collaborator matching the selected primary
 * source. Never rejects: failures come back as error-tagged records with
 * zero results.
 */
export async function routeRetrieval(
  selection: Pick<SourceSelection, 'primary_source'>,
  query: string,
  deps: WorkflowDependencies
): Promise<RetrievalRecord> {
  switch (selection.primary_source) {
    case 'internet':
      logger.info('Searching internet');
      return searchWeb(query, deps);
    case 'tools_apis':
      logger.info('Calling tools & APIs');
      return callToolApi(query, deps);
    case 'vector_database':
    default: {
      const mode = determineRetrievalMode(query);
      logger.info(`Querying knowledge base in '${mode}' mode`);
      return retrieveFromKnowledgeBase(query, mode, deps);
    }
  }
}
