/**
 * In-process stand-in for the outbound HTTP client
 */

import type { HttpClient, HttpRequestOptions, HttpResponse } from '@/lib/http-client.js';

export interface RecordedRequest {
  url: string;
  options: HttpRequestOptions;
}

export type FakeReply =
  | { status?: number; json?: unknown; text?: string }
  | Error;

export function jsonResponse(body: unknown, status = 200): HttpResponse {
  const text = JSON.stringify(body);
  return textResponse(text, status);
}

export function textResponse(text: string, status = 200): HttpResponse {
  return {
    status,
    statusText: status < 400 ? 'OK' : 'Error',
    ok: status >= 200 && status < 300,
    json: async () => JSON.parse(text),
    text: async () => text,
    discard: async () => undefined,
  };
}

/**
 * Fake client answering by URL. A route is matched when the request URL
 * starts with its key (longest key wins); a function route sees the request.
 * Unmatched URLs reject with ECONNREFUSED.
 */
export class FakeHttp {
  readonly requests: RecordedRequest[] = [];
  private readonly routes = new Map<
    string,
    (request: RecordedRequest) => FakeReply | Promise<FakeReply>
  >();

  on(
    urlPrefix: string,
    reply: FakeReply | ((request: RecordedRequest) => FakeReply | Promise<FakeReply>)
  ): this {
    this.routes.set(urlPrefix, typeof reply === 'function' ? reply : () => reply);
    return this;
  }

  get client(): HttpClient {
    return (url, options = {}) => this.handle({ url, options });
  }

  urls(): string[] {
    return this.requests.map((request) => request.url);
  }

  private async handle(request: RecordedRequest): Promise<HttpResponse> {
    this.requests.push(request);

    let match: string | undefined;
    for (const key of this.routes.keys()) {
      if (request.url.startsWith(key) && (!match || key.length > match.length)) match = key;
    }
    const route = match === undefined ? undefined : this.routes.get(match);
    if (!route) {
      throw Object.assign(new Error(`connect ECONNREFUSED ${request.url}`), {
        code: 'ECONNREFUSED',
      });
    }

    const reply = await route(request);
    if (reply instanceof Error) throw reply;
    const status = reply.status ?? 200;
    return reply.text !== undefined
      ? textResponse(reply.text, status)
      : jsonResponse(reply.json ?? {}, status);
  }
}
