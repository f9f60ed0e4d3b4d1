import type { DocumentInput } from '../../src/server/contracts/types.js';
import type {
  FetchFailureKind,
  FetchOutcome,
  FetchStrategy,
} from '../../src/server/services/scraping/fetch/FetchStrategy.js';

export interface FakePage {
  title: string;
  text: string;
  links?: string[];
}

export type FakeRoute = FakePage | { failure: FetchFailureKind; status?: number };

/**
 * In-process site: URL -> page or failure. Records every fetched URL.
 */
export class FakeSiteStrategy implements FetchStrategy {
  readonly name = 'lightweight' as const;
  readonly fetched: string[] = [];
  closed = 0;

  constructor(private readonly routes: Record<string, FakeRoute>) {}

  async fetch(url: string): Promise<FetchOutcome> {
    this.fetched.push(url);
    const route = this.routes[url];
    if (!route) {
      return { ok: false, kind: 'notFound', status: 404, message: 'HTTP 404' };
    }
    if ('failure' in route) {
      return { ok: false, kind: route.failure, status: route.status, message: `fake ${route.failure}` };
    }
    return {
      ok: true,
      status: 200,
      url,
      title: route.title,
      contentText: route.text,
      contentRaw: `<html><body>${route.text}</body></html>`,
      links: route.links ?? [],
      breadcrumbs: [],
      attachments: [],
    };
  }

  async close(): Promise<void> {
    this.closed++;
  }
}

/**
 * Padding that keeps page text above the minimum content length without
 * adding any crawl or classification keywords
 */
export const PADDING = ' This page is maintained by the national migration office and updated regularly.';

export function documentInput(overrides: Partial<DocumentInput> & Pick<DocumentInput, 'url'>): DocumentInput {
  return {
    topic: 'canada',
    title: 'Untitled',
    text: '',
    raw: '',
    links: [],
    breadcrumbs: [],
    attachments: [],
    depth: 0,
    fetchedAt: new Date('2026-01-01T00:00:00Z'),
    contentHash: `hash-${overrides.url}`,
    fetchStrategy: 'lightweight',
    relevanceScore: 0,
    ...overrides,
  };
}
