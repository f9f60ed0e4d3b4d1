/**
 * Ordered extraction rules for categorized-record fields.
 *
 * For each field the rules are tried in order; the first one producing a
 * value that passes the field's range check wins.
 */

import type { EducationLevel, RecordFields } from '../../contracts/types.js';

export type RuleValue = string | number;

export interface FieldRule {
    pattern: RegExp;
    value: (match: RegExpMatchArray) => RuleValue | undefined;
}

export type ExtractableField = Exclude<keyof RecordFields, 'summary' | 'keyPoints'>;

export const AGE_RANGE = { min: 16, max: 100 } as const;
export const EXPERIENCE_RANGE = { min: 0, max: 50 } as const;

const int = (value: string | undefined): number | undefined => {
    if (value === undefined) return undefined;
    const parsed = parseInt(value, 10);
    return isNaN(parsed) ? undefined : parsed;
};

function timeUnit(unit: string, amount: string): string {
    const base = unit.toLowerCase().replace(/s$/, '');
    return amount === '1' ? base : `${base}s`;
}

const EDUCATION_KEYWORDS: Array<[EducationLevel, RegExp]> = [
    ['phd', /\b(?:ph\.?d|doctorate|doctoral degree)\b/i],
    ['masters', /\b(?:master'?s|master degree)\b/i],
    ['bachelors', /\b(?:bachelor'?s|bachelor degree|university degree|degree qualification)\b/i],
    ['diploma', /\bdiploma\b/i],
    ['secondary', /\b(?:secondary (?:education|school)|high school)\b/i],
];

export const FIELD_RULES: Record<ExtractableField, FieldRule[]> = {
    ageMin: [
        { pattern: /\b(?:aged?|between(?: the ages? of)?)\s+(\d{2})\s*(?:-|–|to|and)\s*(\d{2})\b/i, value: m => int(m[1]) },
        { pattern: /\b(?:at least|over|above|older than)\s+(\d{2})\s+years?\s+(?:old|of age)\b/i, value: m => int(m[1]) },
        { pattern: /\bminimum age\s+(?:of\s+|is\s+)?(\d{2})\b/i, value: m => int(m[1]) },
        { pattern: /\b(\d{2})\s+years?\s+(?:old\s+|of age\s+)?or\s+(?:older|over|above)\b/i, value: m => int(m[1]) },
    ],
    ageMax: [
        { pattern: /\b(?:aged?|between(?: the ages? of)?)\s+(\d{2})\s*(?:-|–|to|and)\s*(\d{2})\b/i, value: m => int(m[2]) },
        { pattern: /\b(?:under|below|younger than)\s+(?:the age of\s+)?(\d{2})\b/i, value: m => int(m[1]) },
        { pattern: /\bmaximum age\s+(?:of\s+|is\s+)?(\d{2})\b/i, value: m => int(m[1]) },
        { pattern: /\b(\d{2})\s+years?\s+(?:old\s+|of age\s+)?or\s+(?:younger|under|less)\b/i, value: m => int(m[1]) },
    ],
    education: EDUCATION_KEYWORDS.map(([level, pattern]) => ({ pattern, value: () => level })),
    experienceYears: [
        { pattern: /\b(\d{1,2})\+?\s+years?\s+(?:of\s+)?(?:relevant\s+|professional\s+|full-time\s+)?(?:work\s+)?experience\b/i, value: m => int(m[1]) },
        { pattern: /\bexperience\s+(?:of\s+)?(?:at least\s+)?(\d{1,2})\s+years?\b/i, value: m => int(m[1]) },
    ],
    fee: [
        {
            pattern: /\b(?:fee|fees|cost|costs|charge)\b[^.$€£\d]{0,40}?([$€£])\s?(\d{1,3}(?:,\d{3})+(?:\.\d{2})?|\d+(?:\.\d{2})?)/i,
            value: m => `${m[1]}${(m[2] ?? '').replace(/,/g, '')}`,
        },
        {
            pattern: /([$€£])\s?(\d{1,3}(?:,\d{3})+(?:\.\d{2})?|\d+(?:\.\d{2})?)\s+(?:application\s+|processing\s+)?fee\b/i,
            value: m => `${m[1]}${(m[2] ?? '').replace(/,/g, '')}`,
        },
        {
            pattern: /\b(?:fee|fees|cost|costs)\b[^.\d]{0,40}?(\d[\d,]*(?:\.\d{2})?)\s*(CAD|AUD|USD|EUR|GBP|NZD)\b/i,
            value: m => `${(m[1] ?? '').replace(/,/g, '')} ${(m[2] ?? '').toUpperCase()}`,
        },
    ],
    processingTime: [
        {
            pattern: /\b(?:processing times?|processed within|processing takes|takes)\b[^.\d]{0,30}?(\d{1,3})\s*(?:-|–|to)\s*(\d{1,3})\s*(days?|weeks?|months?)\b/i,
            value: m => `${m[1]}-${m[2]} ${timeUnit(m[3] ?? 'months', 'many')}`,
        },
        {
            pattern: /\b(?:processing times?|processed within|processing takes)\b[^.\d]{0,30}?(\d{1,3})\s*(days?|weeks?|months?)\b/i,
            value: m => `${m[1]} ${timeUnit(m[2] ?? 'months', m[1] ?? '')}`,
        },
    ],
    language: [
        {
            pattern: /\b(IELTS|TOEFL|PTE|CELPIP|TEF)\b[^\d.]{0,40}?(\d{1,3}(?:\.\d)?)/i,
            value: m => `${(m[1] ?? '').toUpperCase()} ${m[2]}`,
        },
        { pattern: /\benglish (?:language )?proficiency\b/i, value: () => 'English proficiency required' },
        { pattern: /\bfrench (?:language )?proficiency\b/i, value: () => 'French proficiency required' },
    ],
};
