import * as cheerio from 'cheerio';

const SENTENCE_SPLIT = /(?<=[.!?])\s+/;
const KEY_POINT_MIN = 20;
const KEY_POINT_MAX = 200;

export function splitSentences(text: string): string[] {
    return text
        .split(/\n+/)
        .flatMap(line => line.split(SENTENCE_SPLIT))
        .map(sentence => sentence.replace(/\s+/g, ' ').trim())
        .filter(sentence => sentence.length > 0);
}

/**
 * Leading sentences of the text, whole sentences only, up to maxLength characters.
 * A first sentence longer than maxLength is cut with an ellipsis.
 */
export function buildSummary(text: string, maxLength: number): string {
    const sentences = splitSentences(text);
    const first = sentences[0];
    if (first === undefined) {
        return '';
    }
    if (first.length > maxLength) {
        return `${first.slice(0, maxLength - 3).trimEnd()}...`;
    }

    let summary = first;
    for (const sentence of sentences.slice(1)) {
        const next = `${summary} ${sentence}`;
        if (next.length > maxLength) break;
        summary = next;
    }
    return summary;
}

/**
 * Up to `max` key points: list items from the markup when the page has them,
 * otherwise sentences after the summary that carry a number or a colon.
 */
export function extractKeyPoints(raw: string, text: string, max: number, summary = ''): string[] {
    const points: string[] = [];
    const seen = new Set<string>();
    const add = (candidate: string): void => {
        const point = candidate.replace(/\s+/g, ' ').trim();
        if (point.length < KEY_POINT_MIN || point.length > KEY_POINT_MAX || seen.has(point)) return;
        seen.add(point);
        points.push(point);
    };

    if (raw) {
        const $ = cheerio.load(raw);
        $('nav, header, footer, script, style').remove();
        $('main li, article li, body li').each((_, element) => {
            if (points.length < max) add($(element).text());
        });
    }

    if (points.length === 0) {
        for (const sentence of splitSentences(text)) {
            if (points.length >= max) break;
            if (summary.includes(sentence)) continue;
            if (/\d|:/.test(sentence)) add(sentence);
        }
    }

    return points.slice(0, max);
}
