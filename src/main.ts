import { createApp } from './app';
import { AppServices } from './api/appServices';
import { KnowledgeBaseService } from './application/knowledgeBaseService';
import { WorkflowEngine } from './application/workflowEngine';
import { settings } from './config';
import { WorkflowDependencies } from './domain/interfaces/collaborators';
import { KnowledgeBaseClient } from './infrastructure/apiClients/knowledgeBaseClient';
import { StubToolApiClient } from './infrastructure/apiClients/toolApiClient';
import { createWebSearchClient } from './infrastructure/apiClients/webSearchClient';
import { ChatCompletionClient } from './services/llm';
import { RateLimiter } from './services/rateLimiter';
import { SessionHistoryStore } from './services/sessionHistory';
import { createLogger } from './utils/logger';

const logger = createLogger('Main');

export const buildServices = (): AppServices => {
  const knowledgeBase = new KnowledgeBaseClient(settings);
  const dependencies: WorkflowDependencies = {
    retrieval: knowledgeBase,
    insert: knowledgeBase,
    status: knowledgeBase,
    toolApis: new StubToolApiClient(),
    webSearch: createWebSearchClient(settings),
  };

  const llm = new ChatCompletionClient(settings);
  const history = new SessionHistoryStore();

  return {
    engine: WorkflowEngine.fromSettings(settings, llm),
    dependencies,
    knowledgeBase: new KnowledgeBaseService(dependencies, history),
    history,
    llmStatus: () => llm.getServiceStatus(),
    rateLimiter: new RateLimiter({
      maxRequests: settings.app.rate_limit_max_requests,
      perSeconds: settings.app.rate_limit_per_seconds,
    }),
  };
};

const services = buildServices();
const app = createApp(services);
const { host, port } = settings.app;

const server = app.listen(port, host, () => {
  logger.info(`Server is running on http://${host}:${port}`);
});

const shutdown = (signal: string): void => {
  logger.info(`${signal} received, closing server`);
  services.rateLimiter?.destroy();
  server.close(error => {
    if (error) {
      logger.error(`Error while closing server: ${error.message}`);
      process.exit(1);
    }
    process.exit(0);
  });
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
