import type { FetchLike } from '../services/http-client.js';

export interface RecordedRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

export interface FakeReply {
  status?: number;
  /** An async iterable is streamed chunk by chunk. */
  body?: string | Buffer | AsyncIterable<Uint8Array>;
}

export type FakeRoute = (request: RecordedRequest) => FakeReply | Promise<FakeReply>;

/**
 * In-process stand-in for `fetch`. Routes are matched on `METHOD url`
 * without the query string; unmatched requests get a 404.
 */
export class FakeFetch {
  readonly requests: RecordedRequest[] = [];
  private readonly routes = new Map<string, FakeRoute>();

  on(method: string, url: string, route: FakeRoute): this {
    this.routes.set(`${method} ${url}`, route);
    return this;
  }

  callsTo(method: string, url: string): RecordedRequest[] {
    return this.requests.filter((request) => request.method === method && stripQuery(request.url) === url);
  }

  readonly fetch: FetchLike = async (input, init) => {
    const headers: Record<string, string> = {};
    new Headers(init.headers).forEach((value, key) => {
      headers[key] = value;
    });
    const request: RecordedRequest = {
      method: init.method ?? 'GET',
      url: input,
      headers,
      body: typeof init.body === 'string' ? init.body : undefined
    };
    this.requests.push(request);
    if (init.signal?.aborted) {
      throw new Error('The operation was aborted');
    }

    const route = this.routes.get(`${request.method} ${stripQuery(input)}`);
    if (!route) {
      return new Response('not found', { status: 404 });
    }
    const reply = await route(request);
    const body = reply.body === undefined ? null : reply.body;
    return new Response(body, { status: reply.status ?? 200 });
  };
}

const stripQuery = (url: string): string => {
  const cut = url.indexOf('?');
  return cut === -1 ? url : url.slice(0, cut);
};

export const memoryRow = (timestamp: string, mediaKind: string, locator: string, direct: boolean): string =>
  `<tr><td>${timestamp}</td><td>${mediaKind}</td><td>Latitude, Longitude: 0.0, 0.0</td>` +
  `<td><a href="#" onclick="downloadMemories('${locator}', this, ${direct})">Download</a></td></tr>`;

export const exportHtml = (rows: string[]): string =>
  `<html><body><table><tr><th>Date</th><th>Media Type</th><th>Location</th><th></th></tr>${rows.join('')}</table></body></html>`;
