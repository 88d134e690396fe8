export * from './actions.js';
export * from './topology-commands.js';
