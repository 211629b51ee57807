import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { InvalidInputError, ScraperError, errorMessage } from './errors.js';
import { REQUEST_FILTERS, type RequestFilter } from './network-log.js';
import type { ScraperSession } from './types.js';

export const SERVER_NAME = 'page-scraper';
export const SERVER_VERSION = '0.1.0';

// ---------- Helpers ----------

function text(value: string, isError = false) {
  return {
    content: [{ type: 'text' as const, text: value }],
    ...(isError ? { isError: true } : {}),
  };
}

function json(obj: object) {
  return text(JSON.stringify(obj, null, 2));
}

/**
 * Input and readiness problems read as `Error: <message>`; failures of the
 * browser itself name the action that was under way.
 */
export function formatToolError(err: unknown, action: string): string {
  if (
    err instanceof ScraperError &&
    (err.code === 'INVALID_INPUT' || err.code === 'SESSION_NOT_READY')
  ) {
    return `Error: ${err.message}`;
  }
  return `Error ${action}: ${errorMessage(err)}`;
}

async function safeTool(
  action: string,
  fn: () => Promise<object | string> | object | string,
) {
  try {
    const result = await fn();
    return typeof result === 'string' ? text(result) : json(result);
  } catch (err) {
    console.error(`[scraper] Error ${action}:`, errorMessage(err));
    return text(formatToolError(err, action), true);
  }
}

export function parseRequestFilter(value: string): RequestFilter {
  const normalized = value.trim().toLowerCase();
  const match = REQUEST_FILTERS.find((f) => f === normalized);
  if (!match) {
    throw new InvalidInputError(
      `Unknown filter_type "${value}". Use one of: ${REQUEST_FILTERS.join(', ')}`,
    );
  }
  return match;
}

// ---------- MCP Server ----------

export function createScraperServer(session: ScraperSession): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  server.registerTool(
    'navigate_to_url',
    {
      description:
        'Navigate to a URL and capture the network requests the page makes. Launches the browser on first call. Returns the page title and how many requests were captured.',
      inputSchema: {
        url: z.string().describe('The URL to navigate to (include https://)'),
        wait_time: z
          .number()
          .min(0)
          .max(60)
          .default(3)
          .describe('Time to wait after page load for late requests (seconds)'),
      },
    },
    async ({ url, wait_time }) =>
      safeTool('navigating to URL', () => session.navigate(url, wait_time)),
  );

  server.registerTool(
    'get_page_html',
    {
      description:
        "Get the current page's HTML. By default the page is reloaded with JavaScript disabled so the markup is what the server sent. Call navigate_to_url first.",
      inputSchema: {},
    },
    async () => safeTool('getting page HTML', () => session.getPageHtml()),
  );

  server.registerTool(
    'get_network_requests',
    {
      description:
        'Get the network requests captured since the last navigation (XHR, API calls, documents, assets), with response bodies for text content.',
      inputSchema: {
        filter_type: z
          .string()
          .default('all')
          .describe('Filter by request type: all, xhr or fetch'),
      },
    },
    async ({ filter_type }) =>
      safeTool('getting network requests', () =>
        session.getNetworkRequests(parseRequestFilter(filter_type)),
      ),
  );

  server.registerTool(
    'close_browser',
    {
      description: 'Close the browser and free resources. Call this when done scraping.',
      inputSchema: {},
    },
    async () => safeTool('closing browser', () => session.close()),
  );

  return server;
}
