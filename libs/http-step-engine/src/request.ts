import { RequestBuildError } from './errors';
import { hasHeader, setHeader } from './headers';
import type { HttpHeaders, HttpMethod, RequestBody, StatusCodes } from './types';

export const DEFAULT_TIMEOUT_MS = 30_000;

export interface MultipartPart {
  name: string;
  data: Uint8Array;
  filename?: string;
}

const freezePart = (part: MultipartPart): MultipartPart => Object.freeze({ ...part, data: part.data.slice() });

const freezeBody = (body: RequestBody): RequestBody =>
  Object.freeze(body.kind === 'bytes' ? { kind: body.kind, data: body.data.slice() } : { ...body });

/**
 * Multipart form body: text fields followed by byte parts, in insertion order.
 * Immutable; `text` and `bytes` return a new form. Byte parts are copied on
 * insertion.
 */
export class MultipartForm {
  private constructor(
    readonly texts: ReadonlyArray<readonly [name: string, value: string]>,
    readonly parts: ReadonlyArray<MultipartPart>,
  ) {}

  static empty(): MultipartForm {
    return new MultipartForm([], []);
  }

  static of(texts: Array<[string, string]>, bytes: Array<[string, Uint8Array]> = []): MultipartForm {
    return new MultipartForm(
      texts.map(([name, value]) => [name, value] as const),
      bytes.map(([name, data]) => freezePart({ name, data })),
    );
  }

  text(name: string, value: string): MultipartForm {
    return new MultipartForm([...this.texts, [name, value] as const], this.parts);
  }

  bytes(name: string, data: Uint8Array, filename?: string): MultipartForm {
    return new MultipartForm(this.texts, [...this.parts, freezePart({ name, data, filename })]);
  }

  get size(): number {
    return this.texts.length + this.parts.length;
  }
}

export const textBody = (data: string): RequestBody => ({ kind: 'text', data });

export const bytesBody = (data: Uint8Array): RequestBody => ({ kind: 'bytes', data });

export interface DescriptorFields {
  method: HttpMethod;
  url: string;
  headers?: Readonly<HttpHeaders>;
  timeoutMs: number;
  body?: RequestBody;
  multipart?: MultipartForm;
  statusCodes?: StatusCodes;
  proxy?: string;
  userAgent?: string;
  compression?: boolean;
  skipTo?: string;
}

/**
 * One HTTP call plus the control metadata a step attaches to it. Built through
 * {@link RequestBuilder}; frozen once built.
 *
 * A descriptor with `skipTo` set is a routing directive only: the worker moves
 * to that step without sending anything.
 */
export class RequestDescriptor {
  private constructor(private readonly fields: Readonly<DescriptorFields>) {
    Object.freeze(this);
  }

  static builder(method: HttpMethod, url: string): RequestBuilder {
    return RequestBuilder.create(method, url);
  }

  /** Routing-only descriptor that sends the worker to `step`. */
  static skip(step: string): RequestDescriptor {
    return RequestBuilder.create('GET', '/').skipTo(step).build();
  }

  /** @internal Used by {@link RequestBuilder.build}. */
  static fromFields(fields: DescriptorFields): RequestDescriptor {
    return new RequestDescriptor(
      Object.freeze({
        ...fields,
        headers: fields.headers ? Object.freeze({ ...fields.headers }) : undefined,
        statusCodes: fields.statusCodes ? Object.freeze([...fields.statusCodes]) : undefined,
        body: fields.body ? freezeBody(fields.body) : undefined,
      }),
    );
  }

  get method(): HttpMethod {
    return this.fields.method;
  }

  get url(): string {
    return this.fields.url;
  }

  get headers(): Readonly<HttpHeaders> | undefined {
    return this.fields.headers;
  }

  get timeoutMs(): number {
    return this.fields.timeoutMs;
  }

  get body(): RequestBody | undefined {
    return this.fields.body;
  }

  get multipart(): MultipartForm | undefined {
    return this.fields.multipart;
  }

  get statusCodes(): StatusCodes | undefined {
    return this.fields.statusCodes;
  }

  get proxy(): string | undefined {
    return this.fields.proxy;
  }

  get userAgent(): string | undefined {
    return this.fields.userAgent;
  }

  get compression(): boolean {
    return this.fields.compression ?? true;
  }

  /** The compression choice made on the builder, if any. */
  get compressionOverride(): boolean | undefined {
    return this.fields.compression;
  }

  get skipTo(): string | undefined {
    return this.fields.skipTo;
  }

  isSkipped(): boolean {
    return this.fields.skipTo !== undefined;
  }

  isCompressed(): boolean {
    return this.compression;
  }

  /** Returns a builder seeded with this descriptor's values. */
  toBuilder(): RequestBuilder {
    return RequestBuilder.fromFields(this.fields);
  }
}

/**
 * Immutable fluent builder. Every `with*` call returns a new builder, so a
 * partially configured builder can be shared and extended safely.
 *
 * @example
 * const request = RequestDescriptor.builder('GET', 'https://example.test/robots.txt')
 *   .withHeaders(parseHeaders('Accept: text/plain'))
 *   .withStatusCodes([200])
 *   .build();
 */
export class RequestBuilder {
  private constructor(private readonly fields: Readonly<DescriptorFields>) {}

  static create(method: HttpMethod, url: string): RequestBuilder {
    return new RequestBuilder({ method, url, timeoutMs: DEFAULT_TIMEOUT_MS });
  }

  /** @internal */
  static fromFields(fields: Readonly<DescriptorFields>): RequestBuilder {
    return new RequestBuilder(fields);
  }

  private patch(patch: Partial<DescriptorFields>): RequestBuilder {
    return new RequestBuilder({ ...this.fields, ...patch });
  }

  withHeaders(headers: HttpHeaders): RequestBuilder {
    const merged: HttpHeaders = {};
    for (const [name, value] of Object.entries(headers)) {
      setHeader(merged, name, value);
    }
    return this.patch({ headers: merged });
  }

  withHeader(name: string, value: string): RequestBuilder {
    const headers: HttpHeaders = { ...this.fields.headers };
    setHeader(headers, name, value);
    return this.patch({ headers });
  }

  withTimeout(timeoutMs: number): RequestBuilder {
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new RequestBuildError(`Timeout must be a positive number of milliseconds, got ${timeoutMs}`);
    }
    return this.patch({ timeoutMs });
  }

  withBody(body: RequestBody): RequestBuilder {
    if (this.fields.multipart) {
      throw new RequestBuildError('A request cannot carry both a body and a multipart form');
    }
    return this.patch({ body });
  }

  withTextBody(text: string): RequestBuilder {
    return this.withBody(textBody(text));
  }

  withBytesBody(data: Uint8Array): RequestBuilder {
    return this.withBody(bytesBody(data));
  }

  withJsonBody(value: unknown): RequestBuilder {
    const builder = this.withBody(textBody(JSON.stringify(value)));
    if (this.fields.headers && hasHeader(this.fields.headers, 'content-type')) {
      return builder;
    }
    return builder.withHeader('Content-Type', 'application/json');
  }

  withMultipart(form: MultipartForm): RequestBuilder {
    if (this.fields.body) {
      throw new RequestBuildError('A request cannot carry both a body and a multipart form');
    }
    return this.patch({ multipart: form });
  }

  withStatusCodes(statusCodes: StatusCodes): RequestBuilder {
    return this.patch({ statusCodes: [...statusCodes] });
  }

  withProxy(proxy: string): RequestBuilder {
    return this.patch({ proxy });
  }

  withUserAgent(userAgent: string): RequestBuilder {
    return this.patch({ userAgent });
  }

  compressed(): RequestBuilder {
    return this.patch({ compression: true });
  }

  noCompression(): RequestBuilder {
    return this.patch({ compression: false });
  }

  skipTo(step: string | undefined): RequestBuilder {
    return this.patch({ skipTo: step });
  }

  build(): RequestDescriptor {
    return RequestDescriptor.fromFields(this.fields);
  }
}

export const requestBuilder = (method: HttpMethod, url: string): RequestBuilder => RequestBuilder.create(method, url);
