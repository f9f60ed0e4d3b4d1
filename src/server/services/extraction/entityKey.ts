/**
 * Stable identity for extracted entities across documents and versions
 */

// `|` and `:` split anywhere; dashes only when spaced, so "Work-and-Holiday" stays whole
const TITLE_SEPARATOR = /\s+[-–—]\s+|[|:–]/;

/**
 * Entity name from a page title: the text before the first separator
 */
export function entityName(title: string): string {
    const [head] = title.split(TITLE_SEPARATOR);
    return (head ?? '').trim() || title.trim();
}

/**
 * Lower-case slug; runs of non-alphanumerics collapse to a single '-'
 */
export function normalizeEntityName(name: string): string {
    return name
        .toLowerCase()
        .normalize('NFKD')
        .replace(/[\u0300-\u036f]/g, '')
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '');
}

export function buildEntityKey(name: string, topic: string): string {
    const slug = normalizeEntityName(name) || 'untitled';
    return `${slug}::${topic.trim().toLowerCase()}`;
}
