/**
 * Outbound HTTP for widgets, integrations and the liveness prober
 *
 * Wraps undici's fetch behind a small injectable interface so services can
 * be tested with an in-process fake. TLS verification is switched off per
 * request through a dedicated undici Agent.
 */

import { Agent, fetch, type Dispatcher } from 'undici';
import { HttpError } from '@homelab/utils';

export interface HttpRequestOptions {
  method?: 'GET' | 'HEAD' | 'POST' | 'DELETE';
  headers?: Record<string, string>;
  /** JSON-serialized when not a string */
  body?: unknown;
  /** Abort after this many ms (default: 10000) */
  timeoutMs?: number;
  /** Accept any TLS certificate */
  insecure?: boolean;
}

/** The subset of a fetch Response the services use */
export interface HttpResponse {
  status: number;
  statusText: string;
  ok: boolean;
  json(): Promise<unknown>;
  text(): Promise<string>;
  /** Discard the body without reading it */
  discard(): Promise<void>;
}

export type HttpClient = (url: string, options?: HttpRequestOptions) => Promise<HttpResponse>;

export const DEFAULT_HTTP_TIMEOUT_MS = 10_000;

const USER_AGENT = 'HomelabDashboard/1.0';

let insecureAgent: Agent | undefined;

function getInsecureAgent(): Dispatcher {
  insecureAgent ??= new Agent({ connect: { rejectUnauthorized: false } });
  return insecureAgent;
}

/**
 * Build a client that sends every request through `dispatcher`, or through
 * the insecure agent when a request asks for it
 */
function createClient(dispatcher?: Dispatcher): HttpClient {
  return (url, options = {}) => send(url, options, dispatcher);
}

/**
 * Default client backed by undici
 */
export const undiciClient: HttpClient = createClient();

/**
 * Client for an HTTP API served on a unix socket (the Docker Engine API).
 * The host part of request URLs is ignored.
 */
export function createSocketClient(socketPath: string): HttpClient {
  return createClient(new Agent({ connect: { socketPath } }));
}

async function send(
  url: string,
  options: HttpRequestOptions,
  dispatcher: Dispatcher | undefined
): Promise<HttpResponse> {
  const { method = 'GET', headers = {}, body, timeoutMs = DEFAULT_HTTP_TIMEOUT_MS } = options;

  const requestHeaders: Record<string, string> = { 'User-Agent': USER_AGENT, ...headers };
  let payload: string | undefined;
  if (body !== undefined) {
    payload = typeof body === 'string' ? body : JSON.stringify(body);
    requestHeaders['Content-Type'] ??= 'application/json';
  }

  const response = await fetch(url, {
    method,
    headers: requestHeaders,
    body: payload,
    redirect: 'follow',
    signal: AbortSignal.timeout(timeoutMs),
    dispatcher: dispatcher ?? (options.insecure ? getInsecureAgent() : undefined),
  });

  return {
    status: response.status,
    statusText: response.statusText,
    ok: response.ok,
    json: () => response.json(),
    text: () => response.text(),
    discard: async () => {
      await response.body?.cancel();
    },
  };
}

/**
 * Request a URL and parse a JSON body, throwing HttpError for non-2xx statuses
 */
export async function requestJson(
  http: HttpClient,
  url: string,
  options: HttpRequestOptions = {}
): Promise<unknown> {
  const response = await http(url, options);
  if (!response.ok) {
    await response.discard();
    throw new HttpError(response.status, url, response.statusText);
  }
  return response.json();
}

/**
 * Request a URL and return the body as text, throwing HttpError for non-2xx statuses
 */
export async function requestText(
  http: HttpClient,
  url: string,
  options: HttpRequestOptions = {}
): Promise<string> {
  const response = await http(url, options);
  if (!response.ok) {
    await response.discard();
    throw new HttpError(response.status, url, response.statusText);
  }
  return response.text();
}

/**
 * Strip trailing slashes so paths can be appended with a leading `/`
 */
export function trimBaseUrl(url: string): string {
  return url.trim().replace(/\/+$/, '');
}
