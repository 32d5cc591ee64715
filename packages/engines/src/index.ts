import { mongodbEngine } from './mongodb/index.js';
import { mysqlEngine } from './mysql/index.js';
import { postgresEngine } from './postgres/index.js';
import { createEngineRegistry } from './registry.js';

export type { EngineAdapter, SupportedEngineAdapter, UnsupportedEngineAdapter } from './types.js';
export type { EngineRegistry } from './registry.js';
export { createEngineRegistry, EngineRegistryError } from './registry.js';
export { postgresEngine } from './postgres/index.js';
export { mysqlEngine } from './mysql/index.js';
export { mongodbEngine } from './mongodb/index.js';

/** Registry of all built-in engines */
export const engineRegistry = createEngineRegistry([postgresEngine, mysqlEngine, mongodbEngine], {
  postgresql: 'pg',
});
