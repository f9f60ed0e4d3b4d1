import type { EducationLevel, RecordFields } from '../../contracts/types.js';
import { AGE_RANGE, EXPERIENCE_RANGE, FIELD_RULES, type ExtractableField } from './fieldRules.js';

const EDUCATION_LEVELS: readonly EducationLevel[] = ['phd', 'masters', 'bachelors', 'diploma', 'secondary'];

const FIELD_ORDER: readonly ExtractableField[] = [
    'ageMin',
    'ageMax',
    'education',
    'experienceYears',
    'fee',
    'processingTime',
    'language',
];

function inRange(value: unknown, range: { min: number; max: number }): number | undefined {
    if (typeof value !== 'number' || !Number.isInteger(value)) return undefined;
    return value >= range.min && value <= range.max ? value : undefined;
}

function nonEmpty(value: unknown): string | undefined {
    if (typeof value !== 'string') return undefined;
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Validate one candidate value for a field; undefined when it is out of range or mistyped
 */
export function validateField<F extends ExtractableField>(field: F, value: unknown): RecordFields[F] | undefined;
export function validateField(field: ExtractableField, value: unknown): RecordFields[ExtractableField] | undefined {
    switch (field) {
        case 'ageMin':
        case 'ageMax':
            return inRange(value, AGE_RANGE);
        case 'experienceYears':
            return inRange(value, EXPERIENCE_RANGE);
        case 'education':
            return EDUCATION_LEVELS.find(level => level === value);
        case 'fee':
        case 'processingTime':
        case 'language':
            return nonEmpty(value);
    }
}

/**
 * Keep only valid values from a loosely typed field map (e.g. model output)
 */
export function sanitizeFields(candidate: Partial<Record<ExtractableField, unknown>>): RecordFields {
    const fields: RecordFields = {};
    for (const field of FIELD_ORDER) {
        assignField(fields, field, candidate[field]);
    }
    if (fields.ageMin !== undefined && fields.ageMax !== undefined && fields.ageMin > fields.ageMax) {
        delete fields.ageMax;
    }
    return fields;
}

function assignField(fields: RecordFields, field: ExtractableField, value: unknown): boolean {
    switch (field) {
        case 'ageMin':
        case 'ageMax':
        case 'experienceYears': {
            const valid = validateField(field, value);
            if (valid === undefined) return false;
            fields[field] = valid;
            return true;
        }
        case 'education': {
            const valid = validateField(field, value);
            if (valid === undefined) return false;
            fields.education = valid;
            return true;
        }
        case 'fee':
        case 'processingTime':
        case 'language': {
            const valid = validateField(field, value);
            if (valid === undefined) return false;
            fields[field] = valid;
            return true;
        }
    }
}

/**
 * Rule-based field extraction: per field, the first rule yielding a valid value wins
 */
export function extractFields(text: string): RecordFields {
    const candidate: Partial<Record<ExtractableField, unknown>> = {};
    for (const field of FIELD_ORDER) {
        const probe: RecordFields = {};
        for (const rule of FIELD_RULES[field]) {
            const match = text.match(rule.pattern);
            if (!match) continue;
            if (assignField(probe, field, rule.value(match))) {
                candidate[field] = probe[field];
                break;
            }
        }
    }
    return sanitizeFields(candidate);
}
