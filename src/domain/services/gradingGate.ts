import { GradingResponse, GradingScores } from '../models/stepResults';

export type GateDecision = 'accept' | 'retry';

// Rounding error of the four-way sum, e.g. (0.7 + 0.7 + 0.7 + 0.7) / 4 landing one ulp under 0.7.
const SCORE_TOLERANCE = Number.EPSILON * 4;

type SubScores = Pick<
  GradingResponse,
  'relevancy_score' | 'faithfulness_score' | 'context_quality_score' | 'coherence_score'
>;

export const computeOverallScore = (scores: SubScores): number =>
  (scores.relevancy_score +
    scores.faithfulness_score +
    scores.context_quality_score +
    scores.coherence_score) / 4;

/** Returns a copy whose overall score is the mean of the sub-scores, whatever the grader claimed. */
export const normalizeGrading = (scores: GradingResponse): GradingScores => ({
  ...scores,
  overall_score: computeOverallScore(scores),
});

export function decide(scores: SubScores, threshold: number): GateDecision {
  return computeOverallScore(scores) + SCORE_TOLERANCE >= threshold ? 'accept' : 'retry';
}
