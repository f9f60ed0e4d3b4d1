/**
 * Scraper Configuration
 *
 * Static defaults for all crawling operations. Values that operators tune per
 * deployment come from the environment (see env.ts); per-topic policies come
 * from the seed file.
 */

export const scraperConfig = {
    // Crawl depth and size limits when a seed entry leaves them out
    maxDepth: 2,
    maxDocsPerTopic: 50,

    // Stored content caps (characters)
    maxTextLength: 10000,
    maxRawLength: 50000,
    maxLinksPerPage: 100,
    maxAttachmentsPerPage: 20,

    // Elements stripped before text extraction
    noiseSelectors: ['script', 'style', 'nav', 'header', 'footer', 'noscript'],

    breadcrumbSelectors: ['nav[aria-label*="breadcrumb"] a', '.breadcrumb a'],

    // Links with these extensions are recorded as attachments, not crawled
    downloadExtensions: ['.pdf', '.doc', '.docx'],

    // Applied to every topic in addition to its own excludePatterns
    defaultExcludePatterns: [
        '*.pdf',
        '*.doc',
        '*.docx',
        '*.jpg',
        '*.png',
        '*.zip',
        '/news/',
        '/media/',
        '/contact',
        '/cookie',
        '/privacy',
        'facebook.com',
        'twitter.com',
        'linkedin.com',
        'instagram.com',
        'youtube.com'
    ],

    // Rendering strategy
    browser: {
        headless: true,
        args: [
            '--no-sandbox',
            '--disable-setuid-sandbox',
            '--disable-dev-shm-usage',
            '--disable-blink-features=AutomationControlled'
        ],
        waitUntil: 'networkidle2' as const
    }
};

export type ScraperConfig = typeof scraperConfig;
