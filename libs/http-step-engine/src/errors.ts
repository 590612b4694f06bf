import type { StatusCodes } from './types';

export type StepErrorCode =
  | 'STEP_NOT_FOUND'
  | 'REQUEST_BUILD'
  | 'CLIENT_BUILD'
  | 'TRANSPORT'
  | 'TIMEOUT'
  | 'STATUS_CODE_NOT_FOUND'
  | 'NO_BODY'
  | 'DECODE'
  | 'STEP_CALLBACK';

/**
 * Base class of every error the engine raises. Callers branch on `code`
 * (or `instanceof`) to decide whether to run another step or stop.
 */
export class StepError extends Error {
  readonly code: StepErrorCode;

  constructor(code: StepErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StepError';
    this.code = code;
  }
}

export class StepNotFoundError extends StepError {
  readonly stepName: string;

  constructor(stepName: string) {
    super('STEP_NOT_FOUND', `Step not found: ${stepName}`);
    this.name = 'StepNotFoundError';
    this.stepName = stepName;
  }
}

export class RequestBuildError extends StepError {
  constructor(message: string, options?: { cause?: unknown; code?: 'REQUEST_BUILD' | 'CLIENT_BUILD' }) {
    super(options?.code ?? 'REQUEST_BUILD', message, { cause: options?.cause });
    this.name = 'RequestBuildError';
  }
}

export class ClientBuildError extends RequestBuildError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, code: 'CLIENT_BUILD' });
    this.name = 'ClientBuildError';
  }
}

export class TransportError extends StepError {
  readonly detail: string;

  constructor(detail: string, options?: { cause?: unknown }) {
    super('TRANSPORT', `Transport error: ${detail}`, options);
    this.name = 'TransportError';
    this.detail = detail;
  }
}

export class TimeoutError extends StepError {
  readonly timeoutMs?: number;

  constructor(message: string, timeoutMs?: number) {
    super('TIMEOUT', message);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class StatusCodeNotFoundError extends StepError {
  readonly status: number;
  readonly expected: StatusCodes;

  constructor(status: number, expected: StatusCodes) {
    super('STATUS_CODE_NOT_FOUND', `Unexpected status code ${status}. Expected one of: [${expected.join(', ')}]`);
    this.name = 'StatusCodeNotFoundError';
    this.status = status;
    this.expected = expected;
  }
}

export class NoBodyError extends StepError {
  constructor(message = 'No body has been set from the request.') {
    super('NO_BODY', message);
    this.name = 'NoBodyError';
  }
}

export class DecodeError extends StepError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DECODE', message, options);
    this.name = 'DecodeError';
  }
}

export class StepCallbackError extends StepError {
  readonly stepName: string;

  constructor(stepName: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('STEP_CALLBACK', `Step "${stepName}" failed in onSuccess: ${reason}`, { cause });
    this.name = 'StepCallbackError';
    this.stepName = stepName;
  }
}

export const isStepError = (value: unknown): value is StepError => value instanceof StepError;

export const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));
