import type { Citation, ContextItem, RecordFields } from '../../contracts/types.js';

export const PROGRAMMES_HEADER = '=== PROGRAMMES ===';
export const GENERAL_HEADER = '=== GENERAL INFORMATION ===';

export interface RenderedContext {
  items: ContextItem[];
  text: string;
  citations: Citation[];
}

/**
 * Rough token count used for the context budget (about four characters per token)
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

function formatAge(fields: RecordFields): string | null {
  const { ageMin, ageMax } = fields;
  if (ageMin !== undefined && ageMax !== undefined) return `${ageMin}-${ageMax}`;
  if (ageMin !== undefined) return `${ageMin}+`;
  if (ageMax !== undefined) return `up to ${ageMax}`;
  return null;
}

function fieldLines(fields: RecordFields): string[] {
  const lines: string[] = [];
  const age = formatAge(fields);
  if (age) lines.push(`Age: ${age}`);
  if (fields.education) lines.push(`Education: ${fields.education}`);
  if (fields.experienceYears !== undefined) {
    lines.push(`Experience: ${fields.experienceYears} ${fields.experienceYears === 1 ? 'year' : 'years'}`);
  }
  if (fields.fee) lines.push(`Fee: ${fields.fee}`);
  if (fields.processingTime) lines.push(`Processing time: ${fields.processingTime}`);
  if (fields.language) lines.push(`Language: ${fields.language}`);
  if (fields.summary) lines.push(fields.summary);
  for (const point of fields.keyPoints ?? []) {
    lines.push(`- ${point}`);
  }
  return lines;
}

function renderItem(item: ContextItem, position: number): string {
  const labels = item.category ? `${item.topic}, ${item.category}` : item.topic;
  const lines = [`[${position}] ${item.title} (${labels})`];
  if (item.record) {
    lines.push(...fieldLines(item.record.fields));
  } else if (item.excerpt) {
    lines.push(item.excerpt);
  }
  lines.push(`Sources (${item.provenance}): ${item.sourceUrls.join(', ')}`);
  return lines.join('\n');
}

/**
 * Render ranked items into the labelled context text.
 *
 * Items are admitted in rank order until the next one would push the running
 * token estimate past the budget. The first item is always admitted.
 * Categorized records go under PROGRAMMES; general records and document
 * excerpts under GENERAL INFORMATION. Entry numbers follow rank order.
 */
export function renderContext(ranked: ContextItem[], tokenBudget: number): RenderedContext {
  const kept: Array<{ item: ContextItem; block: string }> = [];
  let usedTokens = 0;

  for (const item of ranked) {
    const block = renderItem(item, kept.length + 1);
    const cost = estimateTokens(block);
    if (kept.length > 0 && usedTokens + cost > tokenBudget) {
      break;
    }
    kept.push({ item, block });
    usedTokens += cost;
  }

  if (kept.length === 0) {
    return { items: [], text: '', citations: [] };
  }

  const programmes = kept.filter(entry => entry.item.provenance === 'categorized-record').map(entry => entry.block);
  const general = kept.filter(entry => entry.item.provenance !== 'categorized-record').map(entry => entry.block);

  const sections: string[] = [];
  if (programmes.length > 0) sections.push([PROGRAMMES_HEADER, ...programmes].join('\n\n'));
  if (general.length > 0) sections.push([GENERAL_HEADER, ...general].join('\n\n'));

  const citations: Citation[] = [];
  const cited = new Set<string>();
  for (const { item } of kept) {
    for (const sourceUrl of item.sourceUrls) {
      if (!cited.has(sourceUrl)) {
        cited.add(sourceUrl);
        citations.push({ sourceUrl, provenanceType: item.provenance });
      }
    }
  }

  return {
    items: kept.map(entry => entry.item),
    text: sections.join('\n\n'),
    citations,
  };
}
