import { computeOverallScore, decide, normalizeGrading } from '../src/domain/services/gradingGate';
import { GradingResponse } from '../src/domain/models/stepResults';

const grading = (score: number, overall?: number): GradingResponse => ({
  relevancy_score: score,
  faithfulness_score: score,
  context_quality_score: score,
  coherence_score: score,
  overall_score: overall,
  needs_improvement: false,
  improvement_reason: '',
  recommendation: 'accept',
});

describe('computeOverallScore', () => {
  test('is the mean of the four sub-scores', () => {
    expect(computeOverallScore({
      relevancy_score: 1,
      faithfulness_score: 0.5,
      context_quality_score: 0.25,
      coherence_score: 0.25,
    })).toBe(0.5);
  });
});

describe('decide', () => {
  test('accepts a score equal to the threshold', () => {
    expect(decide(grading(0.75), 0.75)).toBe('accept');
  });

  test('accepts a mean equal to the threshold up to float rounding', () => {
    expect(decide(grading(0.7), 0.7)).toBe('accept');
    expect(decide(grading(0.1), 0.1)).toBe('accept');
  });

  test('retries below the threshold', () => {
    expect(decide(grading(0.5), 0.7)).toBe('retry');
    expect(decide(grading(0.6875), 0.6880)).toBe('retry');
  });

  test('retries a mean just under the threshold', () => {
    expect(decide(grading(0.7 - 5e-10), 0.7)).toBe('retry');
    expect(decide(grading(0.7 - 1e-12), 0.7)).toBe('retry');
  });

  test('ignores the claimed overall score', () => {
    expect(decide(grading(0.5, 1), 0.7)).toBe('retry');
  });
});

describe('normalizeGrading', () => {
  test('replaces a wrong aggregate with the mean', () => {
    const normalized = normalizeGrading(grading(0.5, 0.9));
    expect(normalized.overall_score).toBe(0.5);
    expect(normalized.relevancy_score).toBe(0.5);
  });

  test('fills in a missing aggregate', () => {
    expect(normalizeGrading(grading(0.25)).overall_score).toBe(0.25);
  });

  test('leaves the input untouched', () => {
    const input = grading(0.5, 0.9);
    normalizeGrading(input);
    expect(input.overall_score).toBe(0.9);
  });
});
