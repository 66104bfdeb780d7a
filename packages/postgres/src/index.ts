// Schema
export { schema, SCHEMA_VERSION, applySchema, type Queryable } from './schema';

// Stores
export { PgRunLog } from './run-log';

// Factory
export { createPgRunLog, type PgRunLogHandle } from './factory';
