/**
 * Shared HTML parsing for both fetch strategies
 */

import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import type { Attachment } from '../../../contracts/types.js';
import { scraperConfig } from '../../../config/scraperConfig.js';
import { normalizeUrl, isSameOrigin } from '../../../utils/urlNormalizer.js';

// Type alias for CheerioAPI (return type of cheerio.load)
type CheerioAPI = ReturnType<typeof cheerio.load>;

export interface ParsedPage {
    title: string;
    text: string;
    raw: string;
    links: string[];
    breadcrumbs: string[];
    attachments: Attachment[];
}

const BLOCK_SELECTOR = 'p, div, li, h1, h2, h3, h4, h5, h6, tr, td, th, section, article, main, dd, dt, blockquote, pre';
const SKIPPED_SCHEMES = /^(mailto|javascript|tel):/i;

function attachmentType(url: string): string | null {
    let pathname: string;
    try {
        pathname = new URL(url).pathname.toLowerCase();
    } catch {
        return null;
    }
    const match = scraperConfig.downloadExtensions.find(ext => pathname.endsWith(ext));
    return match ? match.slice(1) : null;
}

function extractBreadcrumbs($: CheerioAPI): string[] {
    for (const selector of scraperConfig.breadcrumbSelectors) {
        const items = $(selector)
            .map((_, element) => $(element).text().trim())
            .get()
            .filter(text => text.length > 0);
        if (items.length > 0) {
            return items;
        }
    }
    return [];
}

function extractLinksAndAttachments($: CheerioAPI, pageUrl: string): { links: string[]; attachments: Attachment[] } {
    const links: string[] = [];
    const attachments: Attachment[] = [];
    const seenLinks = new Set<string>();
    const seenAttachments = new Set<string>();

    $('a[href]').each((_: number, element: Element) => {
        const href = ($(element).attr('href') || '').trim();
        if (!href || href.startsWith('#') || SKIPPED_SCHEMES.test(href)) {
            return;
        }

        const absolute = normalizeUrl(href, pageUrl);
        if (!absolute) {
            return;
        }

        const type = attachmentType(absolute);
        if (type) {
            if (!seenAttachments.has(absolute) && attachments.length < scraperConfig.maxAttachmentsPerPage) {
                seenAttachments.add(absolute);
                attachments.push({ type, url: absolute, title: $(element).text().trim() || 'Document' });
            }
            return;
        }

        if (!isSameOrigin(absolute, pageUrl) || seenLinks.has(absolute)) {
            return;
        }
        if (links.length < scraperConfig.maxLinksPerPage) {
            seenLinks.add(absolute);
            links.push(absolute);
        }
    });

    return { links, attachments };
}

function extractText($: CheerioAPI): string {
    $('br').replaceWith('\n');
    $(BLOCK_SELECTOR).each((_, element) => {
        $(element).append('\n');
    });

    return $('body')
        .text()
        .split('\n')
        .map(line => line.replace(/\s+/g, ' ').trim())
        .filter(line => line.length > 0)
        .join('\n');
}

/**
 * Parse a page into title, plain text, same-origin links, breadcrumbs and attachments.
 *
 * Links and breadcrumbs are read before navigation chrome is stripped, so
 * menu links still feed the frontier while the text stays free of them.
 */
export function parseHtml(html: string, pageUrl: string): ParsedPage {
    const $ = cheerio.load(html);

    const title = $('title').first().text().trim() || $('h1').first().text().trim() || 'No Title';
    const breadcrumbs = extractBreadcrumbs($);
    const { links, attachments } = extractLinksAndAttachments($, pageUrl);

    $(scraperConfig.noiseSelectors.join(', ')).remove();
    const text = extractText($).slice(0, scraperConfig.maxTextLength);

    return {
        title,
        text,
        raw: html.slice(0, scraperConfig.maxRawLength),
        links,
        breadcrumbs,
        attachments,
    };
}
