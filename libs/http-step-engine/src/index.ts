export * from './types';
export * from './errors';
export * from './headers';
export * from './request';
export * from './statusPolicy';
export * from './clientSettings';
export { DEFAULT_MAX_REDIRECTS } from './transport/undiciTransport';
export type { StepClient, TransportBody, TransportRequest, TransportResponse } from './transport/undiciTransport';
export * from './httpRequester';
export * from './context';
export type { Step } from './step';
export * from './stepRegistry';
export * from './worker';
export * from './logger';
export * from './config';
export * from './factories';
