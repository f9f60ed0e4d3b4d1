import puppeteer, { TimeoutError } from 'puppeteer-core';
import { scraperConfig } from '../../../config/scraperConfig.js';
import { createChildLogger } from '../../../utils/logger.js';
import { errorMessage } from '../../../utils/errorHandling.js';
import { ServiceConfigurationError } from '../../../types/errors.js';
import { parseHtml } from './htmlParser.js';
import { classifyStatus, type FetchOutcome, type FetchStrategy } from './FetchStrategy.js';

const logger = createChildLogger({ component: 'RenderingFetchStrategy' });

/**
 * The slice of the puppeteer Page API the strategy uses
 */
export interface RenderedPage {
    setUserAgent(userAgent: string): Promise<void>;
    goto(url: string, options: { waitUntil: 'networkidle2'; timeout: number }): Promise<{ status(): number } | null>;
    content(): Promise<string>;
    url(): string;
    close(): Promise<void>;
}

export interface RenderingBrowser {
    newPage(): Promise<RenderedPage>;
    close(): Promise<void>;
}

export interface BrowserLaunchOptions {
    executablePath?: string;
    headless: boolean;
    args: string[];
}

export type BrowserLauncher = (options: BrowserLaunchOptions) => Promise<RenderingBrowser>;

export interface RenderingFetchOptions {
    userAgent: string;
    executablePath?: string;
    /** Injected for tests; defaults to puppeteer-core's launch */
    launcher?: BrowserLauncher;
}

const defaultLauncher: BrowserLauncher = (options) =>
    puppeteer.launch({
        executablePath: options.executablePath,
        headless: options.headless,
        args: options.args,
    });

/**
 * Headless Chromium fetch for pages that build their content with scripts.
 * The browser starts on the first fetch and is shared by later fetches.
 */
export class RenderingFetchStrategy implements FetchStrategy {
    readonly name = 'rendering' as const;
    private readonly userAgent: string;
    private readonly executablePath?: string;
    private readonly launcher: BrowserLauncher;
    private browserPromise: Promise<RenderingBrowser> | null = null;

    constructor(options: RenderingFetchOptions) {
        if (!options.launcher && !options.executablePath) {
            throw new ServiceConfigurationError('RenderingFetchStrategy', ['BROWSER_EXECUTABLE_PATH']);
        }
        this.userAgent = options.userAgent;
        this.executablePath = options.executablePath;
        this.launcher = options.launcher ?? defaultLauncher;
    }

    private getBrowser(): Promise<RenderingBrowser> {
        if (!this.browserPromise) {
            logger.info({ executablePath: this.executablePath }, 'Launching headless browser');
            const launch = this.launcher({
                executablePath: this.executablePath,
                headless: scraperConfig.browser.headless,
                args: scraperConfig.browser.args,
            });
            this.browserPromise = launch;
            // A failed launch may be retried on the next fetch
            launch.catch(() => {
                if (this.browserPromise === launch) {
                    this.browserPromise = null;
                }
            });
        }
        return this.browserPromise;
    }

    async fetch(url: string, timeoutMs: number): Promise<FetchOutcome> {
        let page: RenderedPage | null = null;
        try {
            const browser = await this.getBrowser();
            page = await browser.newPage();
            await page.setUserAgent(this.userAgent);

            const response = await page.goto(url, { waitUntil: scraperConfig.browser.waitUntil, timeout: timeoutMs });
            const status = response ? response.status() : 200;
            const failure = classifyStatus(status);
            if (failure) {
                return { ok: false, kind: failure, status, message: `HTTP ${status}` };
            }

            const html = await page.content();
            const finalUrl = page.url() || url;
            const parsed = parseHtml(html, finalUrl);
            return {
                ok: true,
                status,
                url: finalUrl,
                title: parsed.title,
                contentText: parsed.text,
                contentRaw: parsed.raw,
                links: parsed.links,
                breadcrumbs: parsed.breadcrumbs,
                attachments: parsed.attachments,
            };
        } catch (error) {
            if (error instanceof TimeoutError) {
                return { ok: false, kind: 'timeout', message: `Navigation timed out after ${timeoutMs}ms` };
            }
            return { ok: false, kind: 'other', message: errorMessage(error) };
        } finally {
            if (page) {
                await page.close().catch((closeError: unknown) => {
                    logger.warn({ url, error: errorMessage(closeError) }, 'Failed to close page');
                });
            }
        }
    }

    async close(): Promise<void> {
        const pending = this.browserPromise;
        this.browserPromise = null;
        if (!pending) {
            return;
        }
        try {
            const browser = await pending;
            await browser.close();
            logger.info('Headless browser closed');
        } catch (error) {
            logger.warn({ error: errorMessage(error) }, 'Browser did not close cleanly');
        }
    }
}
