import { buildEntityKey, entityName, normalizeEntityName } from '../../../src/server/services/extraction/entityKey.js';

describe('entityName', () => {
  it.each([
    { title: 'Skilled Worker Visa - Eligibility', expected: 'Skilled Worker Visa' },
    { title: 'Skilled Worker Visa | GOV.UK', expected: 'Skilled Worker Visa' },
    { title: 'Express Entry: Fees', expected: 'Express Entry' },
    { title: 'Work-and-Holiday Visa', expected: 'Work-and-Holiday Visa' },
  ])('takes "$expected" from "$title"', ({ title, expected }) => {
    expect(entityName(title)).toBe(expected);
  });

  it('keeps the whole title when the head is empty', () => {
    expect(entityName(' | Overview')).toBe('| Overview');
  });
});

describe('buildEntityKey', () => {
  it('slugs the name and appends the lower-cased topic', () => {
    expect(buildEntityKey('Skilled Worker Visa', ' Canada ')).toBe('skilled-worker-visa::canada');
  });

  it('strips accents and punctuation', () => {
    expect(normalizeEntityName('Résidence permanente (PR)')).toBe('residence-permanente-pr');
  });

  it('uses a placeholder for names without letters or digits', () => {
    expect(buildEntityKey('---', 'uk')).toBe('untitled::uk');
  });
});
