/**
 * In-memory capture of the page's network traffic.
 *
 * The browser session subscribes {@link NetworkLog.recordRequest} and
 * {@link NetworkLog.recordResponse} to the page's `request` and `response`
 * events. Records are kept in the order the browser emitted the requests.
 */

import type { Request, Response } from 'playwright-core';
import { errorMessage } from './errors.js';

export type CapturedRequest = Pick<
  Request,
  'url' | 'method' | 'headers' | 'resourceType' | 'postData'
>;

export type CapturedResponse = Pick<Response, 'url' | 'status' | 'headers' | 'text'> & {
  request(): CapturedRequest;
};

export interface NetworkResponseRecord {
  status: number;
  headers: Record<string, string>;
  content_type?: string;
  content?: string;
  error?: string;
}

export interface NetworkRequestRecord {
  url: string;
  method: string;
  headers: Record<string, string>;
  resource_type: string;
  timestamp: number;
  body?: string | null;
  response?: NetworkResponseRecord;
}

export const REQUEST_FILTERS = ['all', 'xhr', 'fetch'] as const;
export type RequestFilter = (typeof REQUEST_FILTERS)[number];

export const BINARY_PLACEHOLDER = '[Binary or large content]';

const BODY_METHODS = new Set(['POST', 'PUT', 'PATCH']);
const TEXTUAL_CONTENT_TYPES = ['application/json', 'application/xml', 'text/'];

export function isTextualContentType(contentType: string): boolean {
  return TEXTUAL_CONTENT_TYPES.some((prefix) => contentType.startsWith(prefix));
}

export class NetworkLog {
  private records: NetworkRequestRecord[] = [];
  /** Record created for each Playwright request object, for exact matching. */
  private byRequest = new WeakMap<object, NetworkRequestRecord>();
  /** Records a response has been matched to while its body is still being read. */
  private claimed = new WeakSet<NetworkRequestRecord>();

  constructor(private readonly now: () => number = Date.now) {}

  get size(): number {
    return this.records.length;
  }

  recordRequest(request: CapturedRequest): NetworkRequestRecord {
    const method = request.method();
    const record: NetworkRequestRecord = {
      url: request.url(),
      method,
      headers: { ...request.headers() },
      resource_type: request.resourceType(),
      timestamp: this.now(),
    };

    if (BODY_METHODS.has(method.toUpperCase())) {
      record.body = request.postData();
    }

    this.records.push(record);
    this.byRequest.set(request, record);
    return record;
  }

  /**
   * Attaches the response to its request record. Returns the record, or
   * undefined when no unanswered record matches.
   */
  async recordResponse(response: CapturedResponse): Promise<NetworkRequestRecord | undefined> {
    const record = this.claim(response);
    if (!record) return undefined;

    const headers = { ...response.headers() };
    const status = response.status();
    const contentType = headers['content-type'] ?? '';

    try {
      const content = isTextualContentType(contentType)
        ? await response.text()
        : BINARY_PLACEHOLDER;
      record.response = { status, headers, content, content_type: contentType };
    } catch (err) {
      record.response = {
        status,
        headers,
        error: errorMessage(err),
      };
    }
    return record;
  }

  list(filter: RequestFilter = 'all'): NetworkRequestRecord[] {
    if (filter === 'all') return [...this.records];
    return this.records.filter((r) => r.resource_type === filter);
  }

  clear(): void {
    this.records = [];
    this.byRequest = new WeakMap();
    this.claimed = new WeakSet();
  }

  private claim(response: CapturedResponse): NetworkRequestRecord | undefined {
    const isOpen = (r: NetworkRequestRecord) => !r.response && !this.claimed.has(r);

    const exact = this.byRequest.get(response.request());
    const url = response.url();
    // A response whose request object was never recorded matches the oldest
    // open record with the same URL.
    const record =
      exact !== undefined
        ? isOpen(exact)
          ? exact
          : undefined
        : this.records.find((r) => r.url === url && isOpen(r));

    if (record) this.claimed.add(record);
    return record;
  }
}
