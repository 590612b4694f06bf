import { Blob } from 'node:buffer';
import { fetch, FormData } from 'undici';
import type { BodyInit, Dispatcher, Response } from 'undici';
import type { CookieJar } from 'tough-cookie';
import { StepError, TimeoutError, TransportError, describeError } from '../errors';
import { findHeaderName, hasHeader, setHeader } from '../headers';
import type { MultipartForm } from '../request';
import type { HttpHeaders, HttpMethod, Logger, RequestBody, SendOptions } from '../types';

export const DEFAULT_MAX_REDIRECTS = 10;

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
const METHOD_REWRITE_STATUSES = new Set([301, 302, 303]);
const CROSS_ORIGIN_STRIPPED_HEADERS = ['authorization', 'cookie', 'proxy-authorization'];

/**
 * Everything one send needs from the requester: the shared cookie jar plus the
 * client-level options captured at build time.
 */
export interface StepClient {
  readonly cookieJar: CookieJar;
  readonly compression: boolean;
  readonly userAgent?: string;
  readonly proxy?: string;
  readonly dispatcher?: Dispatcher;
  readonly maxRedirects: number;
  readonly logger?: Logger;
}

export type TransportBody = string | Uint8Array | FormData;

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  body?: TransportBody;
  timeoutMs: number;
}

export interface TransportResponse {
  readonly status: number;
  /** Final URL after redirects. */
  readonly url: string;
  readonly headers: HttpHeaders;
  readonly redirected: boolean;
  /** Reads the whole body. Covered by the same timeout as the send. */
  bytes(): Promise<Uint8Array>;
  /** Releases the body without reading it. */
  discard(): Promise<void>;
}

export function toTransportBody(body: RequestBody): TransportBody {
  return body.data;
}

export function toFormData(form: MultipartForm): FormData {
  const data = new FormData();
  for (const [name, value] of form.texts) {
    data.append(name, value);
  }
  for (const part of form.parts) {
    data.append(part.name, new Blob([part.data]), part.filename ?? part.name);
  }
  return data;
}

const isTimeoutReason = (reason: unknown): boolean =>
  typeof reason === 'object' && reason !== null && 'name' in reason && reason.name === 'TimeoutError';

/**
 * One abort controller and one timer per send; both the request and the body
 * read run under it.
 */
class AttemptTimer {
  readonly controller = new AbortController();
  private didTimeout = false;
  private readonly handle: NodeJS.Timeout;
  private readonly onExternalAbort?: () => void;

  constructor(
    readonly timeoutMs: number,
    private readonly external?: AbortSignal,
  ) {
    this.handle = setTimeout(() => {
      this.didTimeout = true;
      this.controller.abort();
    }, timeoutMs);

    if (external) {
      if (external.aborted) {
        this.controller.abort(external.reason);
      } else {
        this.onExternalAbort = () => this.controller.abort(external.reason);
        external.addEventListener('abort', this.onExternalAbort, { once: true });
      }
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  clear(): void {
    clearTimeout(this.handle);
    if (this.external && this.onExternalAbort) {
      this.external.removeEventListener('abort', this.onExternalAbort);
    }
  }

  toStepError(error: unknown): StepError {
    if (this.didTimeout) {
      return new TimeoutError(`Request timed out after ${this.timeoutMs}ms`, this.timeoutMs);
    }
    if (this.external?.aborted) {
      if (isTimeoutReason(this.external.reason)) {
        return new TimeoutError('Request cancelled by a timeout signal');
      }
      return new TransportError(`request aborted: ${describeError(this.external.reason ?? error)}`, { cause: error });
    }
    if (error instanceof StepError) {
      return error;
    }
    return new TransportError(describeError(error), { cause: error });
  }
}

function headersToPlainObject(response: Response): HttpHeaders {
  const result: HttpHeaders = {};
  response.headers.forEach((value, key) => {
    result[key] = result[key] === undefined ? value : `${result[key]}, ${value}`;
  });
  return result;
}

async function attachCookies(client: StepClient, url: string, headers: HttpHeaders): Promise<HttpHeaders> {
  if (hasHeader(headers, 'cookie')) {
    return headers;
  }
  const cookie = await client.cookieJar.getCookieString(url);
  if (!cookie) {
    return headers;
  }
  return { ...headers, Cookie: cookie };
}

async function storeCookies(client: StepClient, url: string, response: Response): Promise<void> {
  for (const cookie of response.headers.getSetCookie()) {
    await client.cookieJar.setCookie(cookie, url, { ignoreError: true });
  }
}

function applyClientHeaders(client: StepClient, headers: HttpHeaders): HttpHeaders {
  const result: HttpHeaders = { ...headers };
  if (client.userAgent && !hasHeader(result, 'user-agent')) {
    setHeader(result, 'User-Agent', client.userAgent);
  }
  if (!client.compression && !hasHeader(result, 'accept-encoding')) {
    setHeader(result, 'Accept-Encoding', 'identity');
  }
  return result;
}

function withoutHeaders(headers: HttpHeaders, names: string[]): HttpHeaders {
  const result: HttpHeaders = { ...headers };
  for (const name of names) {
    const key = findHeaderName(result, name);
    if (key !== undefined) {
      delete result[key];
    }
  }
  return result;
}

/**
 * Sends `request` with undici's fetch. Redirects are followed here rather than
 * by fetch so that every hop reads and writes the cookie jar.
 */
export async function sendRequest(
  client: StepClient,
  request: TransportRequest,
  options: SendOptions = {},
): Promise<TransportResponse> {
  const timer = new AttemptTimer(request.timeoutMs, options.signal);

  let method = request.method;
  let url = request.url;
  let body: BodyInit | undefined = request.body;
  let headers = applyClientHeaders(client, request.headers);

  try {
    for (let hop = 0; ; hop += 1) {
      const response = await fetch(url, {
        method,
        headers: await attachCookies(client, url, headers),
        body,
        redirect: 'manual',
        signal: timer.signal,
        dispatcher: client.dispatcher,
      });
      await storeCookies(client, url, response);

      const location = response.headers.get('location');
      if (!REDIRECT_STATUSES.has(response.status) || !location) {
        return wrapResponse(response, url, hop > 0, timer, client.logger);
      }

      await response.arrayBuffer();
      if (hop >= client.maxRedirects) {
        throw new TransportError(`too many redirects (limit ${client.maxRedirects})`);
      }

      const next = new URL(location, url);
      client.logger?.debug('http.redirect', { from: url, to: next.toString(), status: response.status });

      if (METHOD_REWRITE_STATUSES.has(response.status) && method !== 'GET' && method !== 'HEAD') {
        method = 'GET';
        body = undefined;
        headers = withoutHeaders(headers, ['content-type', 'content-length']);
      }
      if (next.origin !== new URL(url).origin) {
        headers = withoutHeaders(headers, CROSS_ORIGIN_STRIPPED_HEADERS);
      }
      url = next.toString();
    }
  } catch (error) {
    timer.clear();
    throw timer.toStepError(error);
  }
}

function wrapResponse(
  response: Response,
  url: string,
  redirected: boolean,
  timer: AttemptTimer,
  logger?: Logger,
): TransportResponse {
  return {
    status: response.status,
    url,
    headers: headersToPlainObject(response),
    redirected,
    async bytes() {
      try {
        return new Uint8Array(await response.arrayBuffer());
      } catch (error) {
        throw timer.toStepError(error);
      } finally {
        timer.clear();
      }
    },
    async discard() {
      timer.clear();
      if (!response.body || response.bodyUsed) {
        return;
      }
      await response.body.cancel().catch((error: unknown) =>
        logger?.debug('http.body.discard.failed', { url, error: describeError(error) }),
      );
    },
  };
}
