import { createLogger } from '../../utils/logger';
import { ApiType, ToolApiClient } from '../../domain/interfaces/collaborators';
import { evaluateArithmetic, isAllowedExpression } from '../../domain/utils/arithmetic';
import { errorMessage } from '../../domain/services/exceptions';

const logger = createLogger('ToolApiClient');

/**
 * Evaluates the arithmetic in a "calculate ..." query. Only the word
 * "calculate" is stripped; anything left outside digits, operators, dots,
 * parentheses and spaces is refused without evaluation.
 */
export function runCalculation(query: string): Record<string, unknown> {
  const expression = query.replace(/calculate/gi, '').trim();

  if (!isAllowedExpression(expression)) {
    return { error: 'Invalid calculation - only basic math operations allowed' };
  }

  try {
    return { calculation: query, expression, result: evaluateArithmetic(expression) };
  } catch (error) {
    return { error: 'Invalid calculation', detail: errorMessage(error) };
  }
}

/** Placeholder weather and stock feeds plus the local calculator. */
export class StubToolApiClient implements ToolApiClient {
  async call(query: string, apiType: ApiType): Promise<Record<string, unknown>> {
    logger.debug(`Dispatching '${apiType}' API call`);

    switch (apiType) {
      case 'weather':
        return { weather: 'sunny', temperature: '72°F', note: 'Mock weather data - replace with real API' };
      case 'stock':
        return { price: '$150.25', change: '+2.5%', note: 'Mock stock data - replace with real API' };
      case 'calculation':
        return runCalculation(query);
      case 'general':
        return { error: `API type '${apiType}' not supported` };
    }
  }
}
