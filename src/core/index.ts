export * from './logger/index.js';
export * from './env.js';
export * from './document_store/index.js';
