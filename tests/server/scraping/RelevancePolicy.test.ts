import { RelevancePolicy } from '../../../src/server/services/scraping/RelevancePolicy.js';

const filler = ' General information about travel and residence rules.';

describe('RelevancePolicy', () => {
  const policy = new RelevancePolicy({
    requiredKeywords: ['visa', 'Permit'],
    optionalKeywords: ['fees', 'processing', 'eligibility', 'documents'],
    minContentLength: 40,
  });

  it('rejects a page that only has optional keywords', () => {
    expect(policy.evaluate(`Our fees and processing times.${filler}`)).toEqual({
      accepted: false,
      reason: 'no-required-keyword',
    });
  });

  it('rejects text below the minimum length', () => {
    expect(policy.evaluate('  visa  ')).toEqual({ accepted: false, reason: 'too-short' });
  });

  it('accepts on any required keyword and scores optional matches', () => {
    expect(policy.evaluate(`The WORK PERMIT fees and eligibility rules.${filler}`)).toEqual({
      accepted: true,
      score: 0.5,
      matchedRequired: ['permit'],
    });
  });

  it('scores zero when no optional keywords are configured', () => {
    const strict = new RelevancePolicy({ requiredKeywords: ['visa'], optionalKeywords: [], minContentLength: 0 });
    expect(strict.evaluate('visa')).toEqual({ accepted: true, score: 0, matchedRequired: ['visa'] });
  });
});
