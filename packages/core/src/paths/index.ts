export { sanitizeName } from './sanitize.js';
export * from './artifactPaths.js';
