import type { RecordFieldName, RecordFields, RecordInput, StoredRecord } from '../../contracts/types.js';

export interface MergeResult {
    record: RecordInput;
    changed: boolean;
}

const FIELD_NAMES: readonly RecordFieldName[] = [
    'ageMin',
    'ageMax',
    'education',
    'experienceYears',
    'fee',
    'processingTime',
    'language',
    'summary',
    'keyPoints',
];

function unionUrls(existing: string[], incoming: string[]): string[] {
    const merged = [...existing];
    for (const url of incoming) {
        if (!merged.includes(url)) merged.push(url);
    }
    return merged;
}

function copyField<K extends RecordFieldName>(target: RecordFields, source: RecordFields, field: K): void {
    target[field] = source[field];
}

// An incoming age bound that would invert the stored range is dropped
function contradictsAgeRange(fields: RecordFields, incoming: RecordFields, field: RecordFieldName): boolean {
    if (field === 'ageMin' && incoming.ageMin !== undefined && fields.ageMax !== undefined) {
        return incoming.ageMin > fields.ageMax;
    }
    if (field === 'ageMax' && incoming.ageMax !== undefined && fields.ageMin !== undefined) {
        return incoming.ageMax < fields.ageMin;
    }
    return false;
}

/**
 * Fold a freshly extracted entity into the current record for its key.
 *
 * Fields already set on the current record are kept (first write wins);
 * missing ones are filled from the incoming entity, unless an age bound
 * would contradict the stored one. Source URLs are unioned
 * in order. Name, kind and category stay as first recorded.
 */
export function mergeRecord(current: StoredRecord | null, incoming: RecordInput): MergeResult {
    if (!current) {
        return { record: { ...incoming, sourceUrls: unionUrls([], incoming.sourceUrls) }, changed: true };
    }

    const fields: RecordFields = { ...current.fields };
    let changed = false;
    for (const field of FIELD_NAMES) {
        if (
            fields[field] === undefined &&
            incoming.fields[field] !== undefined &&
            !contradictsAgeRange(fields, incoming.fields, field)
        ) {
            copyField(fields, incoming.fields, field);
            changed = true;
        }
    }

    const sourceUrls = unionUrls(current.sourceUrls, incoming.sourceUrls);
    if (sourceUrls.length !== current.sourceUrls.length) {
        changed = true;
    }

    return {
        record: {
            key: current.key,
            kind: current.kind,
            name: current.name,
            topic: current.topic,
            category: current.category,
            fields,
            sourceUrls,
        },
        changed,
    };
}
