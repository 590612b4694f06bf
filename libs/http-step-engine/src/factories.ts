import type { Dispatcher } from 'undici';
import { loadStepwiseConfig } from './config';
import type { StepwiseConfig } from './config';
import { ExecutionContext } from './context';
import { HttpRequester } from './httpRequester';
import { createLogger } from './logger';
import type { Step } from './step';
import { StepRegistry } from './stepRegistry';
import type { Logger } from './types';
import { Worker } from './worker';

export interface CreateWorkerOptions {
  /** Resolved configuration. Read from `env` when omitted. */
  config?: StepwiseConfig;
  env?: Record<string, string | undefined>;
  /** Registry to share with other workers. A new one is created otherwise. */
  registry?: StepRegistry;
  steps?: Iterable<Step>;
  logger?: Logger;
  dispatcher?: Dispatcher;
}

/**
 * Wires registry, requester, context and worker from configuration.
 *
 * @example
 * const worker = createWorker({ steps: [new RobotsTxtStep()] });
 * await worker.run('robots');
 */
export function createWorker(options: CreateWorkerOptions = {}): Worker {
  const config = options.config ?? loadStepwiseConfig(options.env);
  const logger = options.logger ?? createLogger({ level: config.logLevel });

  const requester = new HttpRequester({
    dispatcher: options.dispatcher,
    defaultUserAgent: config.userAgent,
    defaultProxy: config.proxy,
    defaultCompression: config.compression,
    maxRedirects: config.maxRedirects,
    logger,
  });

  const registry = options.registry ?? new StepRegistry();
  if (options.steps) {
    registry.insertMany(options.steps);
  }

  return new Worker({
    registry,
    context: new ExecutionContext(requester),
    logger,
    maxSteps: config.maxSteps,
  });
}
