import { LLMClient } from '../../services/llm';
import {
  ContextCompilation,
  ContextCompilationSchema,
  GradingResponse,
  GradingResponseSchema,
  RewriteResult,
  RewriteResultSchema,
  SourceSelection,
  SourceSelectionSchema,
} from '../models/stepResults';
import {
  CONTEXT_COMPILER_PROMPT,
  GRADER_PROMPT,
  QUERY_REWRITER_PROMPT,
  RESPONSE_GENERATOR_PROMPT,
  SOURCE_SELECTOR_PROMPT,
  contextCompilationPrompt,
  detailsCheckPrompt,
  gradingPrompt,
  responsePrompt,
  rewritePrompt,
  sourceSelectionPrompt,
} from './prompts';
import { StructuredAgent, TextAgent } from './structuredAgent';

export interface ContextCompilationInput {
  query: string;
  retrievedContext: string;
  externalContext: string;
}

export interface ResponseInput {
  query: string;
  context: string;
}

export interface GradingInput {
  query: string;
  context: string;
  response: string;
}

/** The language-model decisions a workflow run makes. */
export interface WorkflowAgents {
  rewriteQuery(query: string): Promise<RewriteResult>;
  /** Returns the clarification verdict as free text; the engine looks for "yes" in it. */
  checkDetails(query: string): Promise<string>;
  selectSource(query: string): Promise<SourceSelection>;
  compileContext(input: ContextCompilationInput): Promise<ContextCompilation>;
  generateResponse(input: ResponseInput): Promise<string>;
  gradeResponse(input: GradingInput): Promise<GradingResponse>;
}

export interface AgentGenerationSettings {
  temperature: number;
  maxTokens: number;
}

export function createWorkflowAgents(llm: LLMClient, generation: AgentGenerationSettings): WorkflowAgents {
  const common = { temperature: generation.temperature, maxTokens: generation.maxTokens };

  const rewriter = new StructuredAgent(llm, RewriteResultSchema, {
    name: 'query_rewriter',
    systemPrompt: QUERY_REWRITER_PROMPT,
    ...common,
  });
  const sourceSelector = new StructuredAgent(llm, SourceSelectionSchema, {
    name: 'source_selector',
    systemPrompt: SOURCE_SELECTOR_PROMPT,
    ...common,
  });
  const contextCompiler = new StructuredAgent(llm, ContextCompilationSchema, {
    name: 'context_compiler',
    systemPrompt: CONTEXT_COMPILER_PROMPT,
    ...common,
  });
  const responder = new TextAgent(llm, {
    name: 'response_generator',
    systemPrompt: RESPONSE_GENERATOR_PROMPT,
    ...common,
  });
  const grader = new StructuredAgent(llm, GradingResponseSchema, {
    name: 'grader',
    systemPrompt: GRADER_PROMPT,
    ...common,
  });

  return {
    rewriteQuery: query => rewriter.run(rewritePrompt(query)),
    checkDetails: async query => (await rewriter.run(detailsCheckPrompt(query))).rewritten_query,
    selectSource: query => sourceSelector.run(sourceSelectionPrompt(query)),
    compileContext: input =>
      contextCompiler.run(contextCompilationPrompt(input.query, input.retrievedContext, input.externalContext)),
    generateResponse: input => responder.run(responsePrompt(input.query, input.context)),
    gradeResponse: input => grader.run(gradingPrompt(input.query, input.context, input.response)),
  };
}
