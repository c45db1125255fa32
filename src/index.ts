export { createApp } from './app';
export type { AppServices } from './api/appServices';
export { settings, loadRuntimeSettings } from './config';
export type { RuntimeSettings, WorkflowSettings } from './config';
export { WorkflowEngine, WORKFLOW_TRANSITIONS, TERMINAL, nextStep } from './application/workflowEngine';
export { KnowledgeBaseService, formatKnowledgeBaseStatus } from './application/knowledgeBaseService';
export { createWorkflowAgents } from './domain/agents/workflowAgents';
export type { WorkflowAgents } from './domain/agents/workflowAgents';
export { StructuredAgent, TextAgent, extractJsonObject } from './domain/agents/structuredAgent';
export * from './domain/interfaces/collaborators';
export * from './domain/models/stepResults';
export { WorkflowStep, createWorkflowState } from './domain/models/workflowState';
export type { WorkflowState, StepTraceEntry } from './domain/models/workflowState';
export { routeRetrieval, determineRetrievalMode, determineApiType } from './domain/services/retrievalRouter';
export { enhanceQuery } from './domain/services/queryEnhancer';
export { decide, normalizeGrading, computeOverallScore } from './domain/services/gradingGate';
export { evaluateArithmetic, ArithmeticError } from './domain/utils/arithmetic';
export * from './domain/services/exceptions';
export { KnowledgeBaseClient, KnowledgeBaseClientError } from './infrastructure/apiClients/knowledgeBaseClient';
export { TavilySearchClient, createWebSearchClient } from './infrastructure/apiClients/webSearchClient';
export { StubToolApiClient, runCalculation } from './infrastructure/apiClients/toolApiClient';
export { ChatCompletionClient, CircuitBreaker, LLMServiceError } from './services/llm';
export type { LLMClient, LLMRequest } from './services/llm';
export { SessionHistoryStore } from './services/sessionHistory';
