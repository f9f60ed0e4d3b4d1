import { buildSummary, extractKeyPoints, splitSentences } from '../../../src/server/services/extraction/generalContent.js';

describe('splitSentences', () => {
  it('splits on sentence ends and line breaks', () => {
    expect(splitSentences('First one. Second one!\nThird   line')).toEqual(['First one.', 'Second one!', 'Third line']);
  });
});

describe('buildSummary', () => {
  it('keeps whole leading sentences within the limit', () => {
    expect(buildSummary('Alpha beta. Gamma delta. Epsilon zeta.', 25)).toBe('Alpha beta. Gamma delta.');
  });

  it('cuts a first sentence longer than the limit', () => {
    expect(buildSummary('Permanent residence lets you live anywhere.', 20)).toBe('Permanent residen...');
  });

  it('returns an empty summary for empty text', () => {
    expect(buildSummary('   ', 100)).toBe('');
  });
});

describe('extractKeyPoints', () => {
  it('prefers list items from the markup', () => {
    const raw = `<html><body>
      <nav><ul><li>Navigation link that should be ignored</li></ul></nav>
      <main><ul>
        <li>Hold a valid passport for the whole stay</li>
        <li>Short</li>
        <li>Provide proof of sufficient funds</li>
      </ul></main>
    </body></html>`;

    expect(extractKeyPoints(raw, '', 5)).toEqual([
      'Hold a valid passport for the whole stay',
      'Provide proof of sufficient funds',
    ]);
  });

  it('falls back to sentences with numbers or colons that are not in the summary', () => {
    const text = 'Residence rules changed in 2025. Applicants wait about 6 months. Nothing else to add here.';

    expect(extractKeyPoints('', text, 5, 'Residence rules changed in 2025.')).toEqual(['Applicants wait about 6 months.']);
  });

  it('stops at the maximum', () => {
    const raw = '<ul><li>First requirement in the list</li><li>Second requirement in the list</li></ul>';

    expect(extractKeyPoints(raw, '', 1)).toEqual(['First requirement in the list']);
  });
});
