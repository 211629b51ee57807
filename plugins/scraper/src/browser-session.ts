/**
 * Long-lived Playwright browser for the MCP server.
 *
 * The browser is opened lazily on the first navigation and kept for the
 * lifetime of the process, so captured network traffic and the current page
 * survive across tool calls. Either a local Chrome is launched or, when
 * SCRAPER_CDP_URL is set, an already running browser is attached over CDP.
 */

import { chromium, errors, type Browser, type BrowserContext, type Page } from 'playwright-core';
import { CHROME_ARGS, findLocalChrome, validatePageUrl } from './browser-utils.js';
import type { ScraperConfig } from './config.js';
import {
  BrowserUnavailableError,
  NavigationError,
  NavigationTimeoutError,
  SessionNotReadyError,
  errorMessage,
} from './errors.js';
import { NetworkLog, type RequestFilter } from './network-log.js';
import type {
  NavigateResult,
  NetworkRequestsResult,
  PageHtmlResult,
  ScraperSession,
} from './types.js';

export const STATIC_HTML_NOTE = 'HTML extracted with JavaScript disabled for clean content';
export const RENDERED_HTML_NOTE = 'HTML extracted from the live page after scripts ran';

export interface BrowserSessionOptions {
  network?: NetworkLog;
  /** Locates a Chrome executable when SCRAPER_CHROME_PATH is not set. */
  findChrome?: () => string | undefined;
}

export class BrowserSession implements ScraperSession {
  readonly network: NetworkLog;

  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private page: Page | null = null;
  /** Set once a navigation has completed on the current page. */
  private navigated = false;
  /** In-flight launch shared by every caller that arrives while it runs. */
  private opening: Promise<Page> | null = null;
  /** Bumped by close() so a launch that finishes afterwards is discarded. */
  private generation = 0;

  private readonly findChrome: () => string | undefined;

  constructor(
    private readonly config: ScraperConfig,
    options: BrowserSessionOptions = {},
  ) {
    this.network = options.network ?? new NetworkLog();
    this.findChrome = options.findChrome ?? (() => findLocalChrome());
  }

  async navigate(url: string, waitSeconds: number): Promise<NavigateResult> {
    const target = validatePageUrl(url);
    const page = await this.getPage();

    console.error('[browser] Navigating to', target);
    this.network.clear();
    this.navigated = false;

    await this.goto(page, target);
    if (waitSeconds > 0) {
      await page.waitForTimeout(waitSeconds * 1000);
    }

    const title = await page.title();
    const captured = this.network.size;
    this.navigated = true;

    return {
      success: true,
      url: page.url(),
      title,
      network_requests_captured: captured,
      message: `Successfully navigated to ${target}. Captured ${captured} network requests.`,
    };
  }

  async getPageHtml(): Promise<PageHtmlResult> {
    const page = this.page;
    const browser = this.browser;
    if (!page || !browser || page.isClosed() || !this.navigated) {
      throw new SessionNotReadyError();
    }

    const url = page.url();

    if (this.config.htmlMode === 'rendered') {
      const html = await page.content();
      return htmlResult(url, html, RENDERED_HTML_NOTE);
    }

    // Reload the address in a throwaway context without JavaScript so the
    // markup is what the server sent, not what scripts turned it into.
    const context = await browser.newContext({ javaScriptEnabled: false });
    try {
      const staticPage = await context.newPage();
      await this.goto(staticPage, url);
      const html = await staticPage.content();
      return htmlResult(url, html, STATIC_HTML_NOTE);
    } finally {
      await context.close();
    }
  }

  getNetworkRequests(filter: RequestFilter): NetworkRequestsResult {
    const requests = this.network.list(filter);
    return {
      success: true,
      total_requests: this.network.size,
      filtered_requests: requests.length,
      filter_applied: filter,
      requests,
    };
  }

  async close(): Promise<string> {
    this.generation++;
    this.opening = null;
    await this.release();
    console.error('[browser] Browser closed');
    return 'Browser closed successfully';
  }

  // ---------- Browser lifecycle ----------

  /**
   * Returns the current page, lazily opening the browser on first call.
   * A page or browser that died since the last call is replaced.
   */
  private getPage(): Promise<Page> {
    if (this.page && !this.page.isClosed() && this.browser?.isConnected()) {
      return Promise.resolve(this.page);
    }
    if (this.opening) return this.opening;

    const opening = this.openPage().finally(() => {
      if (this.opening === opening) this.opening = null;
    });
    this.opening = opening;
    return opening;
  }

  private async openPage(): Promise<Page> {
    if (this.browser) {
      await this.release().catch((err) =>
        console.error('[browser] Failed to release stale browser:', errorMessage(err)),
      );
    }

    const generation = this.generation;
    const browser = await this.openBrowser();
    browser.on('disconnected', () => {
      if (this.browser !== browser) return;
      console.error('[browser] Browser disconnected');
      this.browser = null;
      this.context = null;
      this.page = null;
      this.navigated = false;
    });

    let context: BrowserContext;
    let page: Page;
    try {
      context = await browser.newContext({ javaScriptEnabled: true });
      page = await context.newPage();
    } catch (err) {
      await browser.close().catch((closeErr) =>
        console.error('[browser] Failed to close browser:', errorMessage(closeErr)),
      );
      throw err;
    }

    if (generation !== this.generation) {
      await browser.close();
      throw new BrowserUnavailableError('Browser was closed while it was starting');
    }

    this.monitorNetwork(page);
    this.browser = browser;
    this.context = context;
    this.page = page;
    return page;
  }

  /** Drops the session state, then closes the context and the browser. */
  private async release(): Promise<void> {
    const { browser, context } = this;
    this.browser = null;
    this.context = null;
    this.page = null;
    this.navigated = false;
    this.network.clear();

    try {
      if (context) await context.close();
    } finally {
      if (browser) await browser.close();
    }
  }

  private async openBrowser(): Promise<Browser> {
    const { cdpUrl, chromePath, headless } = this.config;

    if (cdpUrl) {
      console.error('[browser] Connecting over CDP to', cdpUrl);
      try {
        return await chromium.connectOverCDP(cdpUrl);
      } catch (err) {
        throw new BrowserUnavailableError(
          `Could not connect to browser at ${cdpUrl}: ${errorMessage(err)}`,
          err,
        );
      }
    }

    const executablePath = chromePath ?? this.findChrome();
    if (!executablePath) {
      throw new BrowserUnavailableError(
        'Chrome not found. Install Google Chrome, set SCRAPER_CHROME_PATH, or set SCRAPER_CDP_URL to attach to a running browser.',
      );
    }

    try {
      const browser = await chromium.launch({ executablePath, headless, args: CHROME_ARGS });
      console.error('[browser] Launched', executablePath);
      return browser;
    } catch (err) {
      throw new BrowserUnavailableError(
        `Failed to launch ${executablePath}: ${errorMessage(err)}`,
        err,
      );
    }
  }

  private monitorNetwork(page: Page): void {
    page.on('request', (request) => {
      const record = this.network.recordRequest(request);
      if (this.config.logRequests) {
        console.error(`[browser] Captured request: ${record.method} ${record.url}`);
      }
    });
    page.on('response', (response) => {
      this.network
        .recordResponse(response)
        .catch((err) =>
          console.error('[browser] Failed to capture response:', errorMessage(err)),
        );
    });
  }

  private async goto(page: Page, url: string): Promise<void> {
    const timeout = this.config.navigationTimeoutMs;
    try {
      await page.goto(url, { waitUntil: 'domcontentloaded', timeout });
    } catch (err) {
      if (err instanceof errors.TimeoutError) {
        throw new NavigationTimeoutError(
          `Navigation to ${url} timed out after ${timeout} ms`,
          err,
        );
      }
      throw new NavigationError(errorMessage(err), err);
    }
  }
}

function htmlResult(url: string, html: string, note: string): PageHtmlResult {
  // Counted in code points, so characters outside the BMP count once.
  return { success: true, url, html_length: [...html].length, html_content: html, note };
}
