export * from './opts.js';
export { BrowseService } from './service.js';
export * from './types.js';
