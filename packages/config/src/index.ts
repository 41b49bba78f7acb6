export * from './schema.js';
export { loadConfig } from './load.js';
