import { KnowledgeBaseService } from '../application/knowledgeBaseService';
import { WorkflowEngine } from '../application/workflowEngine';
import { WorkflowDependencies } from '../domain/interfaces/collaborators';
import { RateLimiter } from '../services/rateLimiter';
import { SessionHistoryStore } from '../services/sessionHistory';

export interface LLMStatus {
  state: string;
  failures: number;
  requestCount: number;
}

/** Everything the HTTP layer calls into. Built once in main, replaced with fakes in tests. */
export interface AppServices {
  engine: Pick<WorkflowEngine, 'run'>;
  dependencies: WorkflowDependencies;
  knowledgeBase: KnowledgeBaseService;
  history: SessionHistoryStore;
  llmStatus?: () => LLMStatus;
  /** Shared limiter for the API routes; one is created from the app settings when absent. */
  rateLimiter?: RateLimiter;
}
