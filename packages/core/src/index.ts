export * from './router/index.js';
export * from './similarity/index.js';
export * from './verification/index.js';
export * from './output/index.js';
export { Semaphore } from './concurrency/semaphore.js';
