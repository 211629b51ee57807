#!/usr/bin/env node

/**
 * MCP server for page scraping with network capture.
 *
 * Holds the Playwright browser **in-process** so the page and the captured
 * traffic survive across tool calls. Talks MCP over stdio; all logging goes
 * to stderr.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { basename, dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import dotenv from 'dotenv';
import { BrowserSession } from './browser-session.js';
import { loadConfig } from './config.js';
import { errorMessage } from './errors.js';
import { createScraperServer } from './server.js';

// ---------- Resolve paths & load env ----------

const __dirname = dirname(fileURLToPath(import.meta.url));
// src/mcp-server.ts -> plugin root, dist/src/mcp-server.js -> plugin root
const PLUGIN_ROOT =
  basename(dirname(__dirname)) === 'dist'
    ? resolve(__dirname, '..', '..')
    : resolve(__dirname, '..');

dotenv.config({ path: join(PLUGIN_ROOT, '.env') });

// ---------- Start ----------

async function main() {
  const config = loadConfig();
  const session = new BrowserSession(config);
  const server = createScraperServer(session);

  const shutdown = async (signal: string) => {
    console.error(`[scraper] ${signal} received, closing browser`);
    try {
      await session.close();
    } catch (err) {
      console.error('[scraper] Error closing browser:', errorMessage(err));
    }
    process.exit(0);
  };
  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('[scraper] Page scraper MCP server running on stdio');
}

main().catch((err) => {
  console.error('MCP server failed to start:', err);
  process.exit(1);
});
