import type { z } from 'zod';
import { DecodeError, NoBodyError, describeError } from './errors';
import { HttpRequester } from './httpRequester';
import type { PreparedRequest } from './httpRequester';
import type { RequestDescriptor } from './request';
import type { HttpHeaders, StatusCodes } from './types';

/**
 * Mutable state of one worker, carried across its sequential step runs and
 * handed to every step callback.
 *
 * Steps route the workflow by calling {@link setNextStep} from `onSuccess`.
 * The worker clears `nextStep` before every `onSuccess` of a real request, so a
 * step that sets nothing ends the chain instead of repeating the previous hop.
 */
export class ExecutionContext {
  readonly httpRequester: HttpRequester;
  private currentRequest?: RequestDescriptor;
  private prepared?: PreparedRequest;
  private current?: string;
  private next?: string;
  private codes?: StatusCodes;
  private body?: Uint8Array;
  private status?: number;
  private headers?: HttpHeaders;
  private elapsedMs = 0;

  constructor(httpRequester: HttpRequester = new HttpRequester()) {
    this.httpRequester = httpRequester;
  }

  get request(): RequestDescriptor | undefined {
    return this.currentRequest;
  }

  get preparedRequest(): PreparedRequest | undefined {
    return this.prepared;
  }

  get url(): string | undefined {
    return this.currentRequest?.url;
  }

  get currentStep(): string | undefined {
    return this.current;
  }

  setCurrentStep(step: string): void {
    this.current = step;
  }

  get nextStep(): string | undefined {
    return this.next;
  }

  setNextStep(step: string): void {
    this.next = step;
  }

  clearNextStep(): void {
    this.next = undefined;
  }

  get timeElapsedMs(): number {
    return this.elapsedMs;
  }

  setTimeElapsed(ms: number): void {
    this.elapsedMs = ms;
  }

  /** Elapsed time formatted for log lines, e.g. `"42 ms"`. */
  get timeElapsedLabel(): string {
    return `${this.elapsedMs} ms`;
  }

  get statusCodes(): StatusCodes | undefined {
    return this.codes;
  }

  setStatusCodes(codes: StatusCodes | undefined): void {
    this.codes = codes;
  }

  get responseBody(): Uint8Array | undefined {
    return this.body;
  }

  setResponseBody(body: Uint8Array): void {
    this.body = body;
  }

  get responseStatus(): number | undefined {
    return this.status;
  }

  get responseHeaders(): Readonly<HttpHeaders> | undefined {
    return this.headers;
  }

  setResponseMeta(status: number, headers: HttpHeaders): void {
    this.status = status;
    this.headers = headers;
  }

  bodyBytes(): Uint8Array {
    if (!this.body) {
      throw new NoBodyError();
    }
    return this.body;
  }

  bodyText(): string {
    return new TextDecoder('utf-8').decode(this.bodyBytes());
  }

  /**
   * Parses the captured body as JSON. With a zod schema the result is
   * validated and typed; a mismatch raises {@link DecodeError}.
   */
  bodyJson(): unknown;
  bodyJson<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): T;
  bodyJson<T>(schema?: z.ZodType<T, z.ZodTypeDef, unknown>): unknown {
    const text = this.bodyText();

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new DecodeError(`Response body is not valid JSON: ${describeError(error)}`, { cause: error });
    }

    if (!schema) {
      return parsed;
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ');
      throw new DecodeError(`Response body does not match the expected shape: ${issues}`, { cause: result.error });
    }
    return result.data;
  }

  /**
   * Applies a descriptor's client options and acceptance policy, then builds
   * the send-ready request. Response status and headers of the previous
   * dispatch are dropped here; the body is not, it always belongs to the last
   * successful step. When building fails the previous request handle stays
   * cleared.
   */
  updateFromRequest(descriptor: RequestDescriptor): PreparedRequest {
    this.prepared = undefined;
    this.status = undefined;
    this.headers = undefined;

    this.httpRequester.settings
      .setProxy(descriptor.proxy ?? this.httpRequester.defaultProxy)
      .setUserAgent(descriptor.userAgent ?? this.httpRequester.defaultUserAgent)
      .setCompression(descriptor.compressionOverride ?? this.httpRequester.defaultCompression);

    this.codes = descriptor.statusCodes;

    const prepared = this.httpRequester.buildRequest(descriptor);
    this.prepared = prepared;
    this.currentRequest = descriptor;
    return prepared;
  }
}
