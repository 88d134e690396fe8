export * from './types/index.js';
export * from './config/index.js';
export * from './utils/index.js';
export * from './infra/index.js';
export * from './core/index.js';
export * from './commands/index.js';

import { TopologyCommands } from './commands/topology-commands.js';

export default TopologyCommands;
