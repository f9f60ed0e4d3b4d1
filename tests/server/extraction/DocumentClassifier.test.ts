import type { ClassificationConfig } from '../../../src/server/config/extraction/extractionConfig.js';
import { DocumentClassifier } from '../../../src/server/services/extraction/DocumentClassifier.js';

const CONFIG: ClassificationConfig = {
  categories: [
    { name: 'work', keywords: ['work permit', 'employer', 'skilled'] },
    { name: 'study', keywords: ['study permit', 'university', 'tuition'] },
  ],
  generalKeywords: ['immigration', 'residence', 'citizenship'],
  minCategoryMatches: 2,
  minGeneralMatches: 2,
};

describe('DocumentClassifier', () => {
  const classifier = new DocumentClassifier(CONFIG);

  it('picks the category with the most distinct keyword matches', () => {
    const result = classifier.classify('Study in Canada', 'A study permit lets you attend a university. An employer may hire you.');

    expect(result).toEqual({
      kind: 'categorized',
      category: 'study',
      matchedKeywords: ['study permit', 'university'],
      scores: { work: 1, study: 2 },
    });
  });

  it('breaks ties in favour of the category declared first', () => {
    const result = classifier.classify(
      'Options',
      'A work permit needs an employer. A study permit needs a university.'
    );

    expect(result).toMatchObject({ kind: 'categorized', category: 'work', scores: { work: 2, study: 2 } });
  });

  it('matches whole words only', () => {
    const result = classifier.classify('Employers', 'Universities and employers hire unskilled staff.');

    expect(result.kind).toBe('none');
    expect(result.scores).toEqual({ work: 0, study: 0, general: 0 });
  });

  it('falls back to general content below the category threshold', () => {
    const result = classifier.classify('Permanent residence', 'Immigration rules for residence and citizenship.');

    expect(result).toEqual({
      kind: 'general',
      matchedKeywords: ['immigration', 'residence', 'citizenship'],
      scores: { work: 0, study: 0, general: 3 },
    });
  });

  it('reports low confidence when nothing reaches a threshold', () => {
    const result = classifier.classify('News', 'Our employer branding team wrote about immigration.');

    expect(result).toEqual({ kind: 'none', scores: { work: 1, study: 0, general: 1 } });
  });
});
