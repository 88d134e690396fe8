export * from './serialization.js';
export * from './config-store.js';
export * from './json-codec.js';
