export * from './types';
export * as Aggregate from './aggregate';
export * as BackendClient from './backend-client';
export * as Dispatcher from './dispatcher';
