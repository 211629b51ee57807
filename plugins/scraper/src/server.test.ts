/**
 * Tool surface tests: a real MCP client talks to the server over an
 * in-memory transport, with the browser session faked.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import {
  InvalidInputError,
  NavigationError,
  NavigationTimeoutError,
  SessionNotReadyError,
  createScraperServer,
  type NavigateResult,
  type NetworkRequestsResult,
  type PageHtmlResult,
  type RequestFilter,
  type ScraperSession,
} from './index.js';
import { formatToolError, parseRequestFilter } from './server.js';

function createFakeSession() {
  return {
    navigate: vi.fn<(url: string, waitSeconds: number) => Promise<NavigateResult>>(),
    getPageHtml: vi.fn<() => Promise<PageHtmlResult>>(),
    getNetworkRequests: vi.fn<(filter: RequestFilter) => NetworkRequestsResult>(),
    close: vi.fn<() => Promise<string>>(),
  } satisfies ScraperSession;
}

describe('scraper MCP server', () => {
  let session: ReturnType<typeof createFakeSession>;
  let client: Client;

  beforeEach(async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    session = createFakeSession();
    const server = createScraperServer(session);
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    client = new Client({ name: 'test-client', version: '1.0.0' });
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  });

  afterEach(async () => {
    await client.close();
    vi.restoreAllMocks();
  });

  async function call(name: string, args: Record<string, unknown> = {}) {
    const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
    const [block] = result.content;
    if (block?.type !== 'text') throw new Error(`expected a text block from ${name}`);
    return { text: block.text, isError: result.isError === true };
  }

  it('lists the four tools', async () => {
    const { tools } = await client.listTools();

    expect(tools.map((t) => t.name)).toEqual([
      'navigate_to_url',
      'get_page_html',
      'get_network_requests',
      'close_browser',
    ]);
    const navigate = tools.find((t) => t.name === 'navigate_to_url');
    expect(navigate?.inputSchema.required).toEqual(['url']);
  });

  describe('navigate_to_url', () => {
    const navigated: NavigateResult = {
      success: true,
      url: 'https://example.com/',
      title: 'Example Domain',
      network_requests_captured: 3,
      message: 'Successfully navigated to https://example.com. Captured 3 network requests.',
    };

    it('waits three seconds by default and returns indented JSON', async () => {
      session.navigate.mockResolvedValue(navigated);

      const result = await call('navigate_to_url', { url: 'https://example.com' });

      expect(session.navigate).toHaveBeenCalledWith('https://example.com', 3);
      expect(result).toEqual({ text: JSON.stringify(navigated, null, 2), isError: false });
    });

    it('passes an explicit wait time through', async () => {
      session.navigate.mockResolvedValue(navigated);

      await call('navigate_to_url', { url: 'https://example.com', wait_time: 0.5 });

      expect(session.navigate).toHaveBeenCalledWith('https://example.com', 0.5);
    });

    it('reports invalid input without an action prefix', async () => {
      session.navigate.mockRejectedValue(new InvalidInputError('Invalid URL format'));

      await expect(call('navigate_to_url', { url: 'example' })).resolves.toEqual({
        text: 'Error: Invalid URL format',
        isError: true,
      });
    });

    it('names the action when navigation fails upstream', async () => {
      session.navigate.mockRejectedValue(new NavigationError('net::ERR_NAME_NOT_RESOLVED'));

      await expect(call('navigate_to_url', { url: 'https://missing.invalid' })).resolves.toEqual({
        text: 'Error navigating to URL: net::ERR_NAME_NOT_RESOLVED',
        isError: true,
      });
    });
  });

  describe('get_page_html', () => {
    it('returns the HTML payload', async () => {
      const html: PageHtmlResult = {
        success: true,
        url: 'https://example.com/',
        html_length: 13,
        html_content: '<html></html>',
        note: 'HTML extracted with JavaScript disabled for clean content',
      };
      session.getPageHtml.mockResolvedValue(html);

      const result = await call('get_page_html');

      expect(JSON.parse(result.text)).toEqual(html);
      expect(result.isError).toBe(false);
    });

    it('reports the not-ready error before any navigation', async () => {
      session.getPageHtml.mockRejectedValue(new SessionNotReadyError());

      await expect(call('get_page_html')).resolves.toEqual({
        text: 'Error: No page loaded. Use navigate_to_url first.',
        isError: true,
      });
    });
  });

  describe('get_network_requests', () => {
    const empty = (filter: RequestFilter): NetworkRequestsResult => ({
      success: true,
      total_requests: 0,
      filtered_requests: 0,
      filter_applied: filter,
      requests: [],
    });

    it('defaults the filter to "all"', async () => {
      session.getNetworkRequests.mockImplementation(empty);

      const result = await call('get_network_requests');

      expect(session.getNetworkRequests).toHaveBeenCalledWith('all');
      expect(JSON.parse(result.text)).toEqual(empty('all'));
    });

    it('accepts the filter in any case', async () => {
      session.getNetworkRequests.mockImplementation(empty);

      await call('get_network_requests', { filter_type: 'XHR' });

      expect(session.getNetworkRequests).toHaveBeenCalledWith('xhr');
    });

    it('rejects unknown filters', async () => {
      await expect(call('get_network_requests', { filter_type: 'image' })).resolves.toEqual({
        text: 'Error: Unknown filter_type "image". Use one of: all, xhr, fetch',
        isError: true,
      });
      expect(session.getNetworkRequests).not.toHaveBeenCalled();
    });
  });

  describe('close_browser', () => {
    it('returns the confirmation as plain text', async () => {
      session.close.mockResolvedValue('Browser closed successfully');

      await expect(call('close_browser')).resolves.toEqual({
        text: 'Browser closed successfully',
        isError: false,
      });
    });

    it('reports close failures', async () => {
      session.close.mockRejectedValue(new Error('Target page, context or browser has been closed'));

      await expect(call('close_browser')).resolves.toEqual({
        text: 'Error closing browser: Target page, context or browser has been closed',
        isError: true,
      });
    });
  });
});

describe('formatToolError', () => {
  it('prefixes upstream failures with the action', () => {
    expect(
      formatToolError(new NavigationTimeoutError('Navigation to https://a.test timed out after 10 ms'), 'getting page HTML'),
    ).toBe('Error getting page HTML: Navigation to https://a.test timed out after 10 ms');
  });

  it('stringifies non-Error values', () => {
    expect(formatToolError('boom', 'closing browser')).toBe('Error closing browser: boom');
  });
});

describe('parseRequestFilter', () => {
  it('trims and lower-cases', () => {
    expect(parseRequestFilter(' Fetch ')).toBe('fetch');
  });

  it('throws InvalidInputError for unknown values', () => {
    expect(() => parseRequestFilter('websocket')).toThrow(InvalidInputError);
  });
});
