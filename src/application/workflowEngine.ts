import { RuntimeSettings, WorkflowSettings } from '../config';
import { WorkflowAgents, createWorkflowAgents } from '../domain/agents/workflowAgents';
import { WorkflowDependencies } from '../domain/interfaces/collaborators';
import { FinalResponse, RetrievalRecord, createFinalResponse } from '../domain/models/stepResults';
import { WorkflowState, WorkflowStep, createWorkflowState, stepName } from '../domain/models/workflowState';
import {
  InvalidTransitionError,
  ProcessingError,
  StepExecutionError,
  errorMessage,
} from '../domain/services/exceptions';
import { decide, normalizeGrading } from '../domain/services/gradingGate';
import { enhanceQuery } from '../domain/services/queryEnhancer';
import { routeRetrieval } from '../domain/services/retrievalRouter';
import { ChatCompletionClient, LLMClient } from '../services/llm';
import { createLogger } from '../utils/logger';

const logger = createLogger('WorkflowEngine');

export type StepSignal =
  | 'next'
  | 'needs_details'
  | 'clear'
  | 'accept'
  | 'retry'
  | 'done'
  | 'loop'
  | 'exhausted';

export const TERMINAL = 'terminal';

export type Transition = WorkflowStep | typeof TERMINAL;

export const WORKFLOW_TRANSITIONS: Readonly<Record<WorkflowStep, Partial<Record<StepSignal, Transition>>>> = {
  [WorkflowStep.START]: { next: WorkflowStep.REWRITE_QUERY },
  [WorkflowStep.REWRITE_QUERY]: { next: WorkflowStep.UPDATED_QUERY },
  [WorkflowStep.UPDATED_QUERY]: { next: WorkflowStep.CHECK_DETAILS },
  [WorkflowStep.CHECK_DETAILS]: { needs_details: WorkflowStep.SELECT_SOURCE, clear: WorkflowStep.RETRY_GATE },
  [WorkflowStep.SELECT_SOURCE]: { next: WorkflowStep.RETRIEVE },
  [WorkflowStep.RETRIEVE]: { next: WorkflowStep.COMPILE_CONTEXT },
  [WorkflowStep.COMPILE_CONTEXT]: { next: WorkflowStep.ENHANCE_PROMPT },
  [WorkflowStep.ENHANCE_PROMPT]: { next: WorkflowStep.GENERATE_RESPONSE },
  [WorkflowStep.GENERATE_RESPONSE]: { next: WorkflowStep.GRADE_RESPONSE },
  [WorkflowStep.GRADE_RESPONSE]: { accept: WorkflowStep.FINAL_RESPONSE, retry: WorkflowStep.RETRY_GATE },
  [WorkflowStep.FINAL_RESPONSE]: { done: TERMINAL },
  [WorkflowStep.RETRY_GATE]: { loop: WorkflowStep.REWRITE_QUERY, exhausted: TERMINAL },
};

export function nextStep(step: WorkflowStep, signal: StepSignal): Transition {
  const target = WORKFLOW_TRANSITIONS[step][signal];
  if (target === undefined) {
    throw new InvalidTransitionError(stepName(step), signal);
  }
  return target;
}

export const MAX_RETRIES_NOTE = '\n\n[Note: Answer quality may be limited due to max retries reached]';
export const NO_ANSWER_TEXT = 'No answer could be generated for this query.';

interface StepOutcome {
  signal: StepSignal;
  summary: string;
}

type StepHandler = (state: WorkflowState, deps: WorkflowDependencies) => Promise<StepOutcome>;

export type WorkflowEngineConfig = Pick<WorkflowSettings, 'max_retries' | 'acceptance_threshold'>;

export interface RunOptions {
  runId?: string;
}

function requireResult<T>(value: T | undefined, label: string, step: WorkflowStep): T {
  if (value === undefined) {
    throw new ProcessingError(`${label} is not available at step ${stepName(step)}`);
  }
  return value;
}

function formatExternalContext(retrieval: RetrievalRecord): string {
  let external = '';
  if (retrieval.web_answer) {
    external += `Web Search: ${retrieval.web_answer}\n`;
  }
  if (retrieval.api_data) {
    external += `API Data: ${JSON.stringify(retrieval.api_data)}\n`;
  }
  return external;
}

/**
 * Runs the twelve-step rewrite, retrieve, generate and grade loop. The engine
 * keeps no per-run state, so one instance serves concurrent runs.
 */
export class WorkflowEngine {
  private handlers: Record<WorkflowStep, StepHandler>;

  constructor(private config: WorkflowEngineConfig, private agents: WorkflowAgents) {
    if (!Number.isInteger(config.max_retries) || config.max_retries < 0) {
      throw new ProcessingError(`max_retries must be a non-negative integer, got ${config.max_retries}`);
    }
    if (config.acceptance_threshold < 0 || config.acceptance_threshold > 1) {
      throw new ProcessingError(`acceptance_threshold must be within [0, 1], got ${config.acceptance_threshold}`);
    }

    this.handlers = {
      [WorkflowStep.START]: async state => ({
        signal: 'next',
        summary: `Accepted query: ${state.original_query.substring(0, 100)}`,
      }),
      [WorkflowStep.REWRITE_QUERY]: state => this.rewriteQuery(state),
      [WorkflowStep.UPDATED_QUERY]: async state => ({
        signal: 'next',
        summary: `Query: ${requireResult(state.rewrite_result, 'Rewrite result', WorkflowStep.UPDATED_QUERY).rewritten_query}`,
      }),
      [WorkflowStep.CHECK_DETAILS]: state => this.checkDetails(state),
      [WorkflowStep.SELECT_SOURCE]: state => this.selectSource(state),
      [WorkflowStep.RETRIEVE]: (state, deps) => this.retrieve(state, deps),
      [WorkflowStep.COMPILE_CONTEXT]: state => this.compileContext(state),
      [WorkflowStep.ENHANCE_PROMPT]: async state => this.enhancePrompt(state),
      [WorkflowStep.GENERATE_RESPONSE]: state => this.generateResponse(state),
      [WorkflowStep.GRADE_RESPONSE]: state => this.gradeResponse(state),
      [WorkflowStep.FINAL_RESPONSE]: async state => this.finalResponse(state),
      [WorkflowStep.RETRY_GATE]: async state => this.retryGate(state),
    };

    logger.info(
      `WorkflowEngine initialized (max_retries=${config.max_retries}, acceptance_threshold=${config.acceptance_threshold})`
    );
  }

  /** Builds an engine whose agents talk to the configured chat-completion endpoint. */
  static fromSettings(settings: Pick<RuntimeSettings, 'workflow' | 'llm'>, llm?: LLMClient): WorkflowEngine {
    const client = llm ?? new ChatCompletionClient(settings);
    const agents = createWorkflowAgents(client, {
      temperature: settings.workflow.temperature,
      maxTokens: settings.workflow.max_tokens,
    });
    return new WorkflowEngine(settings.workflow, agents);
  }

  /** Never rejects; failures come back as a zero-confidence response carrying `metadata.error`. */
  async run(query: string, deps: WorkflowDependencies, options: RunOptions = {}): Promise<FinalResponse> {
    const startTotalTime = process.hrtime.bigint();
    const state = createWorkflowState(query, {
      maxRetries: this.config.max_retries,
      acceptanceThreshold: this.config.acceptance_threshold,
      runId: options.runId,
    });

    logger.info(`Starting workflow ${state.run_id} for: ${query.substring(0, 100)}`);

    try {
      while (state.retry_count <= state.max_retries) {
        const step = state.current_step;
        const stepStartTime = process.hrtime.bigint();

        const outcome = await this.executeStep(step, state, deps);

        const stepDurationMs = Number(process.hrtime.bigint() - stepStartTime) / 1_000_000;
        this.recordStepExecution(state, step, stepDurationMs, outcome.summary);

        const target = nextStep(step, outcome.signal);
        if (target === TERMINAL) {
          break;
        }
        state.current_step = target;
      }

      return this.finalizeRun(state, startTotalTime);
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`Workflow ${state.run_id} failed: ${message}`);

      const metadata: Record<string, unknown> = { error: message, run_id: state.run_id };
      if (error instanceof StepExecutionError) {
        metadata.failed_step = error.stepName;
      }

      return createFinalResponse({
        answer: `Error in RAG workflow: ${message}`,
        confidence: 0,
        sources: [],
        metadata,
        retry_count: state.retry_count,
      });
    }
  }

  private async executeStep(
    step: WorkflowStep,
    state: WorkflowState,
    deps: WorkflowDependencies
  ): Promise<StepOutcome> {
    logger.debug(`Executing step ${step}: ${stepName(step)} (pass ${state.retry_count + 1})`);
    try {
      return await this.handlers[step](state, deps);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new StepExecutionError(stepName(step), cause, { run_id: state.run_id, retry_count: state.retry_count });
    }
  }

  private recordStepExecution(state: WorkflowState, step: WorkflowStep, durationMs: number, summary: string): void {
    state.trace.push({
      step,
      step_name: stepName(step),
      pass: state.retry_count + 1,
      duration_ms: Math.round(durationMs * 100) / 100,
      summary,
      timestamp: new Date().toISOString(),
    });
    logger.debug(`Completed step ${step}: ${stepName(step)} in ${durationMs.toFixed(2)}ms`);
  }

  private finalizeRun(state: WorkflowState, startTime: bigint): FinalResponse {
    const totalDurationMs = Number(process.hrtime.bigint() - startTime) / 1_000_000;
    logger.info(
      `Workflow ${state.run_id} finished in ${totalDurationMs.toFixed(2)}ms after ${state.trace.length} steps`
    );

    const response = state.final_response;
    if (!response) {
      return createFinalResponse({
        answer: 'Unable to generate satisfactory response',
        confidence: 0,
        sources: [],
        metadata: { error: 'workflow_incomplete', run_id: state.run_id },
        retry_count: state.retry_count,
      });
    }

    return createFinalResponse({
      ...response,
      metadata: {
        ...response.metadata,
        run_id: state.run_id,
        steps_executed: state.trace.length,
      },
    });
  }

  private async rewriteQuery(state: WorkflowState): Promise<StepOutcome> {
    state.rewrite_result = await this.agents.rewriteQuery(state.original_query);
    return { signal: 'next', summary: `Rewritten: ${state.rewrite_result.rewritten_query}` };
  }

  private async checkDetails(state: WorkflowState): Promise<StepOutcome> {
    const rewrite = requireResult(state.rewrite_result, 'Rewrite result', WorkflowStep.CHECK_DETAILS);
    const verdict = await this.agents.checkDetails(rewrite.rewritten_query);

    if (verdict.toLowerCase().includes('yes')) {
      return { signal: 'needs_details', summary: 'More details needed; proceeding to source selection' };
    }
    return { signal: 'clear', summary: 'Query judged clear enough; going to the retry gate' };
  }

  private async selectSource(state: WorkflowState): Promise<StepOutcome> {
    const rewrite = requireResult(state.rewrite_result, 'Rewrite result', WorkflowStep.SELECT_SOURCE);
    state.source_selection_result = await this.agents.selectSource(rewrite.rewritten_query);
    return { signal: 'next', summary: `Selected source: ${state.source_selection_result.primary_source}` };
  }

  private async retrieve(state: WorkflowState, deps: WorkflowDependencies): Promise<StepOutcome> {
    const rewrite = requireResult(state.rewrite_result, 'Rewrite result', WorkflowStep.RETRIEVE);
    const selection = requireResult(state.source_selection_result, 'Source selection', WorkflowStep.RETRIEVE);

    state.retrieval_result = await routeRetrieval(selection, rewrite.rewritten_query, deps);
    return {
      signal: 'next',
      summary: `Retrieved ${state.retrieval_result.num_results} results from ${state.retrieval_result.source}`,
    };
  }

  private async compileContext(state: WorkflowState): Promise<StepOutcome> {
    const rewrite = requireResult(state.rewrite_result, 'Rewrite result', WorkflowStep.COMPILE_CONTEXT);
    const retrieval = requireResult(state.retrieval_result, 'Retrieval result', WorkflowStep.COMPILE_CONTEXT);

    state.context_result = await this.agents.compileContext({
      query: rewrite.rewritten_query,
      retrievedContext: retrieval.documents.join('\n'),
      externalContext: formatExternalContext(retrieval),
    });
    return { signal: 'next', summary: `Context compiled from ${state.context_result.sources_used.length} sources` };
  }

  private enhancePrompt(state: WorkflowState): StepOutcome {
    const rewrite = requireResult(state.rewrite_result, 'Rewrite result', WorkflowStep.ENHANCE_PROMPT);
    const context = requireResult(state.context_result, 'Context compilation', WorkflowStep.ENHANCE_PROMPT);

    state.enhanced_query = `Query: ${rewrite.rewritten_query}\n\nAvailable Context: ${context.compiled_context}`;
    return { signal: 'next', summary: 'Enhanced query prepared for response generation' };
  }

  private async generateResponse(state: WorkflowState): Promise<StepOutcome> {
    const rewrite = requireResult(state.rewrite_result, 'Rewrite result', WorkflowStep.GENERATE_RESPONSE);
    const context = requireResult(state.context_result, 'Context compilation', WorkflowStep.GENERATE_RESPONSE);

    state.response = await this.agents.generateResponse({
      query: rewrite.rewritten_query,
      context: context.compiled_context,
    });
    return { signal: 'next', summary: `Response generated (${state.response.length} chars)` };
  }

  private async gradeResponse(state: WorkflowState): Promise<StepOutcome> {
    const rewrite = requireResult(state.rewrite_result, 'Rewrite result', WorkflowStep.GRADE_RESPONSE);
    const context = requireResult(state.context_result, 'Context compilation', WorkflowStep.GRADE_RESPONSE);
    const response = requireResult(state.response, 'Response', WorkflowStep.GRADE_RESPONSE);

    const grading = normalizeGrading(
      await this.agents.gradeResponse({ query: rewrite.rewritten_query, context: context.compiled_context, response })
    );
    state.grading_result = grading;

    const decision = decide(grading, state.acceptance_threshold);
    const score = grading.overall_score.toFixed(2);
    if (decision === 'accept') {
      return { signal: 'accept', summary: `Answer accepted (score: ${score})` };
    }
    return { signal: 'retry', summary: `Answer needs improvement (score: ${score})` };
  }

  private finalResponse(state: WorkflowState): StepOutcome {
    const grading = requireResult(state.grading_result, 'Grading result', WorkflowStep.FINAL_RESPONSE);
    const response = requireResult(state.response, 'Response', WorkflowStep.FINAL_RESPONSE);

    state.final_response = createFinalResponse({
      answer: response,
      confidence: grading.overall_score,
      sources: state.context_result ? state.context_result.sources_used : [],
      metadata: {
        retrieval_method: state.retrieval_result ? state.retrieval_result.source : 'unknown',
        query_rewrites: state.retry_count + 1,
        grading_scores: grading,
        workflow_completed: true,
      },
      retry_count: state.retry_count,
      grading_scores: grading,
    });
    return { signal: 'done', summary: 'Workflow completed successfully' };
  }

  private retryGate(state: WorkflowState): StepOutcome {
    if (state.retry_count < state.max_retries) {
      state.retry_count += 1;

      const reason = state.grading_result ? state.grading_result.improvement_reason : '';
      if (reason) {
        state.original_query = enhanceQuery(state.original_query, reason);
      }
      return {
        signal: 'loop',
        summary: `Retry ${state.retry_count}/${state.max_retries}${reason ? ' with enhanced query' : ''}`,
      };
    }

    const grading = state.grading_result;
    state.final_response = createFinalResponse({
      answer: (state.response ?? NO_ANSWER_TEXT) + MAX_RETRIES_NOTE,
      confidence: grading ? grading.overall_score : 0.5,
      sources: state.context_result ? state.context_result.sources_used : [],
      metadata: {
        retrieval_method: state.retrieval_result ? state.retrieval_result.source : 'unknown',
        query_rewrites: state.retry_count,
        grading_scores: grading,
        note: 'max_retries_reached',
        workflow_completed: false,
      },
      retry_count: state.retry_count,
      grading_scores: grading,
    });
    logger.warn(`Workflow ${state.run_id} reached max retries; returning best available response`);
    return { signal: 'exhausted', summary: 'Max retries reached; using best available response' };
  }
}
