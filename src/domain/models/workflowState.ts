import { v4 as uuidv4 } from 'uuid';
import {
  ContextCompilation,
  FinalResponse,
  GradingScores,
  RetrievalRecord,
  RewriteResult,
  SourceSelection,
} from './stepResults';

export enum WorkflowStep {
  START = 1,
  REWRITE_QUERY = 2,
  UPDATED_QUERY = 3,
  CHECK_DETAILS = 4,
  SELECT_SOURCE = 5,
  RETRIEVE = 6,
  COMPILE_CONTEXT = 7,
  ENHANCE_PROMPT = 8,
  GENERATE_RESPONSE = 9,
  GRADE_RESPONSE = 10,
  FINAL_RESPONSE = 11,
  RETRY_GATE = 12,
}

export interface StepTraceEntry {
  step: WorkflowStep;
  step_name: string;
  pass: number;
  duration_ms: number;
  summary: string;
  timestamp: string;
}

export interface WorkflowState {
  readonly run_id: string;
  original_query: string;
  current_step: WorkflowStep;
  retry_count: number;
  readonly max_retries: number;
  readonly acceptance_threshold: number;

  rewrite_result?: RewriteResult;
  source_selection_result?: SourceSelection;
  retrieval_result?: RetrievalRecord;
  context_result?: ContextCompilation;
  enhanced_query?: string;
  response?: string;
  grading_result?: GradingScores;
  final_response?: FinalResponse;

  trace: StepTraceEntry[];
}

export interface WorkflowStateOptions {
  maxRetries: number;
  acceptanceThreshold: number;
  runId?: string;
}

export const createWorkflowState = (query: string, options: WorkflowStateOptions): WorkflowState => ({
  run_id: options.runId || `run-${uuidv4()}`,
  original_query: query,
  current_step: WorkflowStep.START,
  retry_count: 0,
  max_retries: options.maxRetries,
  acceptance_threshold: options.acceptanceThreshold,
  trace: [],
});

export const stepName = (step: WorkflowStep): string => WorkflowStep[step];
