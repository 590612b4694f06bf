import { ExecutionContext } from './context';
import {
  StatusCodeNotFoundError,
  StepCallbackError,
  StepError,
  StepNotFoundError,
  TimeoutError,
  TransportError,
  describeError,
} from './errors';
import { HttpRequester } from './httpRequester';
import { noopLogger } from './logger';
import { isAcceptedStatus } from './statusPolicy';
import type { Step } from './step';
import { StepRegistry } from './stepRegistry';
import type { ReadonlyStepRegistry } from './stepRegistry';
import type { TransportResponse } from './transport/undiciTransport';
import type { Logger, LoggerMeta } from './types';

export const DEFAULT_MAX_STEPS = 100;

export interface WorkerOptions {
  registry?: StepRegistry;
  /** Context to run in. Takes precedence over `requester`. */
  context?: ExecutionContext;
  requester?: HttpRequester;
  logger?: Logger;
  /** Default step limit for {@link Worker.run}. */
  maxSteps?: number;
}

export interface TryStepOptions {
  signal?: AbortSignal;
}

export interface RunOptions {
  maxSteps?: number;
  signal?: AbortSignal;
}

export interface RunResult {
  /** Names passed to `tryStep`, in order. */
  steps: string[];
  /** `false` when the step limit stopped the run while a next step was still set. */
  completed: boolean;
}

type StepHook = 'onError' | 'onTimeout';

/**
 * Runs named steps against one execution context.
 *
 * A single `tryStep` call moves through lookup, skip or dispatch, status
 * validation, body capture and finally one outcome callback. Calls on the same
 * worker must not overlap; separate workers may share a registry.
 */
export class Worker {
  private readonly steps: StepRegistry;
  private readonly ctx: ExecutionContext;
  private readonly logger: Logger;
  private readonly maxSteps: number;

  constructor(options: WorkerOptions = {}) {
    this.logger = options.logger ?? noopLogger;
    this.steps = options.registry ?? new StepRegistry();
    this.ctx = options.context ?? new ExecutionContext(options.requester ?? new HttpRequester({ logger: this.logger }));
    this.maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
  }

  get context(): ExecutionContext {
    return this.ctx;
  }

  get registry(): ReadonlyStepRegistry {
    return this.steps;
  }

  addStep(step: Step): this {
    this.steps.insert(step);
    return this;
  }

  addSteps(steps: Iterable<Step>): this {
    this.steps.insertMany(steps);
    return this;
  }

  /**
   * Executes one step. Resolves once `onSuccess` has run, or right away for a
   * skip directive. Every failure is thrown as a {@link StepError}; `onError`
   * or `onTimeout` has already run by then, except for lookup and build
   * failures, which happen before any callback is due.
   */
  async tryStep(name: string, options: TryStepOptions = {}): Promise<void> {
    const step = this.steps.lookup(name);
    if (!step) {
      this.logger.warn('step.lookup.miss', { step: name });
      throw new StepNotFoundError(name);
    }

    const descriptor = step.onRequest();
    if (descriptor.skipTo !== undefined) {
      this.logger.debug('step.skip', { step: name, skipTo: descriptor.skipTo });
      this.ctx.setNextStep(descriptor.skipTo);
      return;
    }

    const prepared = this.ctx.updateFromRequest(descriptor);
    this.ctx.setCurrentStep(name);

    const meta: LoggerMeta = { step: name, method: descriptor.method, url: prepared.url };
    this.logger.debug('step.request.attempt', meta);

    const startedAt = Date.now();
    let response: TransportResponse;
    try {
      response = await prepared.send({ signal: options.signal });
    } catch (error) {
      this.ctx.setTimeElapsed(Date.now() - startedAt);
      throw await this.fail(step, error, meta);
    }
    this.ctx.setTimeElapsed(Date.now() - startedAt);
    this.ctx.setResponseMeta(response.status, response.headers);

    const expected = this.ctx.statusCodes;
    if (!isAcceptedStatus(response.status, expected)) {
      await response.discard();
      throw await this.fail(step, new StatusCodeNotFoundError(response.status, expected ?? []), {
        ...meta,
        status: response.status,
      });
    }

    let body: Uint8Array;
    try {
      body = await response.bytes();
    } catch (error) {
      throw await this.fail(step, error, { ...meta, status: response.status });
    }

    this.ctx.setResponseBody(body);
    this.ctx.clearNextStep();
    this.logger.info('step.request.success', {
      ...meta,
      status: response.status,
      durationMs: this.ctx.timeElapsedMs,
      bytes: body.byteLength,
    });

    try {
      await step.onSuccess(this.ctx);
    } catch (error) {
      this.logger.warn('step.callback.failed', { step: name, hook: 'onSuccess', error: describeError(error) });
      throw new StepCallbackError(name, error);
    }
  }

  /**
   * Runs `startStep`, then whatever each step routes to via `nextStep`, until
   * a step sets none or `maxSteps` calls have been made. Errors propagate as
   * thrown by {@link tryStep}.
   */
  async run(startStep: string, options: RunOptions = {}): Promise<RunResult> {
    const maxSteps = options.maxSteps ?? this.maxSteps;
    const steps: string[] = [];

    let next: string | undefined = startStep;
    while (next !== undefined) {
      if (steps.length >= maxSteps) {
        this.logger.warn('step.run.limit', { step: next, maxSteps });
        return { steps, completed: false };
      }
      steps.push(next);
      await this.tryStep(next, { signal: options.signal });
      next = this.ctx.nextStep;
    }

    return { steps, completed: true };
  }

  close(): Promise<void> {
    return this.ctx.httpRequester.close();
  }

  private async fail(step: Step, error: unknown, meta: LoggerMeta): Promise<StepError> {
    const failure = error instanceof StepError ? error : new TransportError(describeError(error), { cause: error });

    if (failure instanceof TimeoutError) {
      this.logger.warn('step.request.timeout', { ...meta, durationMs: this.ctx.timeElapsedMs });
      await this.callStepHook(step, 'onTimeout', () => step.onTimeout(this.ctx));
    } else {
      this.logger.warn('step.request.failed', { ...meta, code: failure.code, error: failure.message });
      await this.callStepHook(step, 'onError', () => step.onError(this.ctx, failure));
    }

    return failure;
  }

  private async callStepHook(step: Step, hook: StepHook, fn: () => void | Promise<void>): Promise<void> {
    try {
      await fn();
    } catch (error) {
      this.logger.warn('step.callback.failed', { step: step.name, hook, error: describeError(error) });
    }
  }
}
