export * from './pool.schema.js';
