import { Headers, ProxyAgent } from 'undici';
import type { Dispatcher } from 'undici';
import { Cookie, CookieJar } from 'tough-cookie';
import { ClientSettings } from './clientSettings';
import { ClientBuildError, DecodeError, RequestBuildError, describeError } from './errors';
import type { RequestDescriptor } from './request';
import {
  DEFAULT_MAX_REDIRECTS,
  sendRequest,
  toFormData,
  toTransportBody,
} from './transport/undiciTransport';
import type { StepClient, TransportRequest, TransportResponse } from './transport/undiciTransport';
import type { HttpHeaders, HttpRequesterConfig, Logger, SendOptions } from './types';

const PROXY_PROTOCOLS = new Set(['http:', 'https:']);

/**
 * A request bound to the client it was built with. Sending it is the only
 * thing left to do.
 */
export class PreparedRequest {
  constructor(
    readonly client: StepClient,
    readonly request: Readonly<TransportRequest>,
  ) {}

  get method(): string {
    return this.request.method;
  }

  get url(): string {
    return this.request.url;
  }

  get timeoutMs(): number {
    return this.request.timeoutMs;
  }

  get headers(): Readonly<HttpHeaders> {
    return this.request.headers;
  }

  send(options?: SendOptions): Promise<TransportResponse> {
    return sendRequest(this.client, this.request, options);
  }
}

/**
 * Owns the cookie jar and the client settings of one session.
 *
 * A fresh client value is built for every request because proxy, user agent and
 * compression are fixed per client. The cookie jar is the same object across
 * builds, which is what carries cookies from one step to the next.
 */
export class HttpRequester {
  readonly settings = new ClientSettings();
  private readonly cookieJar = new CookieJar();
  private readonly proxyAgents = new Map<string, ProxyAgent>();
  private readonly dispatcher?: Dispatcher;
  private readonly maxRedirects: number;
  private readonly logger?: Logger;

  constructor(private readonly config: HttpRequesterConfig = {}) {
    this.dispatcher = config.dispatcher;
    this.maxRedirects = config.maxRedirects ?? DEFAULT_MAX_REDIRECTS;
    this.logger = config.logger;
    this.settings
      .setProxy(config.defaultProxy)
      .setUserAgent(config.defaultUserAgent)
      .setCompression(this.defaultCompression);
  }

  get defaultProxy(): string | undefined {
    return this.config.defaultProxy;
  }

  get defaultUserAgent(): string | undefined {
    return this.config.defaultUserAgent;
  }

  get defaultCompression(): boolean {
    return this.config.defaultCompression ?? true;
  }

  /** Builds a client from the current settings. */
  buildClient(): StepClient {
    const proxy = this.settings.proxy;
    return {
      cookieJar: this.cookieJar,
      compression: this.settings.isCompressed(),
      userAgent: this.settings.userAgent,
      proxy,
      dispatcher: proxy ? this.proxyAgentFor(proxy) : this.dispatcher,
      maxRedirects: this.maxRedirects,
      logger: this.logger,
    };
  }

  /** Builds a client, then binds the descriptor's call to it. */
  buildRequest(descriptor: RequestDescriptor): PreparedRequest {
    const client = this.buildClient();

    let url: URL;
    try {
      url = new URL(descriptor.url);
    } catch (error) {
      throw new RequestBuildError(`Invalid request URL "${descriptor.url}"`, { cause: error });
    }

    const headers = this.validateHeaders(descriptor.headers ?? {});

    const hasPayload = descriptor.body !== undefined || descriptor.multipart !== undefined;
    if (hasPayload && (descriptor.method === 'GET' || descriptor.method === 'HEAD')) {
      throw new RequestBuildError(`A ${descriptor.method} request cannot carry a body`);
    }

    const request: TransportRequest = {
      method: descriptor.method,
      url: url.toString(),
      headers,
      timeoutMs: descriptor.timeoutMs,
    };
    if (descriptor.multipart) {
      request.body = toFormData(descriptor.multipart);
    } else if (descriptor.body) {
      request.body = toTransportBody(descriptor.body);
    }

    return new PreparedRequest(client, Object.freeze(request));
  }

  /** Serializes the cookie jar to JSON bytes. The jar itself is left untouched. */
  async exportCookies(): Promise<Uint8Array> {
    const serialized = await this.cookieJar.serialize();
    return new TextEncoder().encode(JSON.stringify(serialized));
  }

  /** Replaces the jar's cookies with the ones in an {@link exportCookies} payload. */
  async importCookies(data: Uint8Array): Promise<void> {
    let imported: CookieJar;
    try {
      imported = await CookieJar.deserialize(new TextDecoder().decode(data));
    } catch (error) {
      throw new DecodeError(`Invalid cookie export: ${describeError(error)}`, { cause: error });
    }

    const { cookies } = await imported.serialize();
    await this.cookieJar.removeAllCookies();
    for (const serialized of cookies) {
      const cookie = Cookie.fromJSON(serialized);
      if (cookie) {
        await this.cookieJar.store.putCookie(cookie);
      }
    }
  }

  /** The `Cookie` header value the jar would send to `url`. */
  getCookieString(url: string): Promise<string> {
    return this.cookieJar.getCookieString(url);
  }

  async close(): Promise<void> {
    const agents = [...this.proxyAgents.values()];
    this.proxyAgents.clear();
    await Promise.all(agents.map((agent) => agent.close()));
  }

  private proxyAgentFor(proxy: string): ProxyAgent {
    const cached = this.proxyAgents.get(proxy);
    if (cached) {
      return cached;
    }

    let parsed: URL;
    try {
      parsed = new URL(proxy);
    } catch (error) {
      throw new ClientBuildError(`Invalid proxy URL "${proxy}"`, { cause: error });
    }
    if (!PROXY_PROTOCOLS.has(parsed.protocol)) {
      throw new ClientBuildError(`Unsupported proxy protocol "${parsed.protocol}"`);
    }

    let agent: ProxyAgent;
    try {
      agent = new ProxyAgent(parsed.toString());
    } catch (error) {
      throw new ClientBuildError(`Unable to create proxy dispatcher: ${describeError(error)}`, { cause: error });
    }
    this.proxyAgents.set(proxy, agent);
    this.logger?.debug('http.proxy.created', { proxy: parsed.origin });
    return agent;
  }

  private validateHeaders(headers: Readonly<HttpHeaders>): HttpHeaders {
    const validator = new Headers();
    for (const [name, value] of Object.entries(headers)) {
      try {
        validator.append(name, value);
      } catch (error) {
        throw new RequestBuildError(`Invalid header "${name}": ${describeError(error)}`, { cause: error });
      }
    }
    return { ...headers };
  }
}
