import { z } from 'zod';

const unitInterval = z.number().min(0).max(1);

export const RewriteResultSchema = z.object({
  original_query: z.string(),
  rewritten_query: z.string().trim().min(1, 'Rewritten query cannot be empty'),
  reasoning: z.string().default(''),
});

export type RewriteResult = z.infer<typeof RewriteResultSchema>;

export const SOURCE_TYPES = ['vector_database', 'tools_apis', 'internet'] as const;

export const SourceTypeSchema = z.enum(SOURCE_TYPES);

export type SourceType = z.infer<typeof SourceTypeSchema>;

export const SourceSelectionSchema = z.object({
  primary_source: SourceTypeSchema,
  secondary_sources: z.array(z.string()).default([]),
  reasoning: z.string().default(''),
  confidence: unitInterval,
});

export type SourceSelection = z.infer<typeof SourceSelectionSchema>;

export const RetrievalRecordSchema = z.object({
  documents: z.array(z.string()).default([]),
  metadata: z.array(z.record(z.unknown())).default([]),
  web_answer: z.string().optional(),
  api_data: z.record(z.unknown()).optional(),
  source: z.string(),
  num_results: z.number().int().min(0).default(0),
  timestamp: z.string().default(() => new Date().toISOString()),
});

export type RetrievalRecord = z.infer<typeof RetrievalRecordSchema>;

export const createRetrievalRecord = (data: z.input<typeof RetrievalRecordSchema>): RetrievalRecord =>
  RetrievalRecordSchema.parse(data);

export const ContextCompilationSchema = z.object({
  compiled_context: z.string(),
  sources_used: z.array(z.string()).default([]),
  conflicts: z.array(z.string()).default([]),
  confidence: unitInterval,
});

export type ContextCompilation = z.infer<typeof ContextCompilationSchema>;

export const RECOMMENDATIONS = ['retry_retrieval', 'web_search', 'accept', 'clarify_query'] as const;

export const GradingScoresSchema = z.object({
  relevancy_score: unitInterval,
  faithfulness_score: unitInterval,
  context_quality_score: unitInterval,
  coherence_score: unitInterval,
  overall_score: unitInterval,
  needs_improvement: z.boolean(),
  improvement_reason: z.string().default(''),
  recommendation: z.enum(RECOMMENDATIONS).default('accept'),
});

export type GradingScores = z.infer<typeof GradingScoresSchema>;

// What the grading collaborator returns; the aggregate may be missing or wrong
// and is recomputed by the grading gate.
export const GradingResponseSchema = GradingScoresSchema.extend({
  overall_score: unitInterval.optional(),
});

export type GradingResponse = z.infer<typeof GradingResponseSchema>;

export const FinalResponseSchema = z.object({
  answer: z.string(),
  confidence: unitInterval,
  sources: z.array(z.string()).default([]),
  metadata: z.record(z.unknown()).default({}),
  retry_count: z.number().int().min(0).default(0),
  grading_scores: GradingScoresSchema.optional(),
});

export type FinalResponse = Readonly<z.infer<typeof FinalResponseSchema>>;

export const createFinalResponse = (data: z.input<typeof FinalResponseSchema>): FinalResponse =>
  Object.freeze(FinalResponseSchema.parse(data));
