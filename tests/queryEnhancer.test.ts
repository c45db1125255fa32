import { enhanceQuery } from '../src/domain/services/queryEnhancer';

describe('enhanceQuery', () => {
  const query = 'How do vector indexes work?';

  test.each([
    ['Answer should be more specific', 'Detailed information about: How do vector indexes work?'],
    ['Missing context from the sources', 'Comprehensive explanation of: How do vector indexes work?'],
    ['Response was not relevant', 'Comprehensive explanation of: How do vector indexes work?'],
    ['Needs recent developments', 'Current and up-to-date information about: How do vector indexes work?'],
    ['Information is not current', 'Current and up-to-date information about: How do vector indexes work?'],
    ['Low faithfulness to sources', 'Factual and verified information about: How do vector indexes work?'],
    ['Possible hallucination detected', 'Factual and verified information about: How do vector indexes work?'],
    ['Too short', 'Complete guide to: How do vector indexes work?'],
  ])('feedback %p', (reason, expected) => {
    expect(enhanceQuery(query, reason)).toBe(expected);
  });

  test('matches feedback case-insensitively', () => {
    expect(enhanceQuery(query, 'NOT SPECIFIC ENOUGH')).toBe('Detailed information about: How do vector indexes work?');
  });

  test('first matching rule wins', () => {
    expect(enhanceQuery(query, 'needs recent and specific context')).toBe(
      'Detailed information about: How do vector indexes work?'
    );
    expect(enhanceQuery(query, 'hallucination and irrelevant context')).toBe(
      'Comprehensive explanation of: How do vector indexes work?'
    );
  });

  test('is deterministic', () => {
    expect(enhanceQuery(query, 'more current data')).toBe(enhanceQuery(query, 'more current data'));
  });
});
