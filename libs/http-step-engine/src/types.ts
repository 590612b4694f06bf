import type { Dispatcher } from 'undici';

export type HttpMethod = 'GET' | 'HEAD' | 'OPTIONS' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type HttpHeaders = Record<string, string>;

/**
 * Accepted status codes for one call. A non-empty list is an exact allow-list;
 * an empty list or no list at all means the 2xx range.
 */
export type StatusCodes = readonly number[];

export type RequestBody =
  | { kind: 'bytes'; data: Uint8Array }
  | { kind: 'text'; data: string };

export type LoggerMeta = Record<string, unknown> & {
  step?: string;
  url?: string;
  method?: HttpMethod;
};

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}

export interface HttpRequesterConfig {
  /** Dispatcher used when no proxy is configured. Defaults to undici's global dispatcher. */
  dispatcher?: Dispatcher;
  /** Applied when a descriptor sets no user agent of its own. */
  defaultUserAgent?: string;
  /** Applied when a descriptor sets no proxy of its own. */
  defaultProxy?: string;
  /** Applied when a descriptor makes no compression choice. Defaults to `true`. */
  defaultCompression?: boolean;
  maxRedirects?: number;
  logger?: Logger;
}

export interface SendOptions {
  /** External cancellation. An abort reason named `TimeoutError` is reported as a timeout. */
  signal?: AbortSignal;
}
