import type { NetworkRequestRecord, RequestFilter } from './network-log.js';

export interface NavigateResult {
  success: true;
  url: string;
  title: string;
  network_requests_captured: number;
  message: string;
}

export interface PageHtmlResult {
  success: true;
  url: string;
  html_length: number;
  html_content: string;
  note: string;
}

export interface NetworkRequestsResult {
  success: true;
  total_requests: number;
  filtered_requests: number;
  filter_applied: RequestFilter;
  requests: NetworkRequestRecord[];
}

/**
 * What the MCP tools need from a browser. {@link BrowserSession} is the
 * Playwright-backed implementation.
 */
export interface ScraperSession {
  navigate(url: string, waitSeconds: number): Promise<NavigateResult>;
  getPageHtml(): Promise<PageHtmlResult>;
  getNetworkRequests(filter: RequestFilter): NetworkRequestsResult;
  /** Resolves with a confirmation message. Safe to call repeatedly. */
  close(): Promise<string>;
}
