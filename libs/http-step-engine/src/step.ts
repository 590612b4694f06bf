import type { ExecutionContext } from './context';
import type { StepError } from './errors';
import type { RequestDescriptor } from './request';

/**
 * One named action of a workflow. The worker calls `onRequest`, performs the
 * call, then exactly one of `onSuccess`, `onError` or `onTimeout`.
 *
 * Steps without meaningful error or timeout handling still implement those
 * hooks, as no-ops.
 */
export interface Step {
  readonly name: string;
  onRequest(): RequestDescriptor;
  onSuccess(ctx: ExecutionContext): void | Promise<void>;
  onError(ctx: ExecutionContext, error: StepError): void | Promise<void>;
  onTimeout(ctx: ExecutionContext): void | Promise<void>;
}
