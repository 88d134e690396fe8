export * from './errors.js';
export * from './lines.js';
export * from './logger.js';
