export * from './types';
export { create } from './client';
