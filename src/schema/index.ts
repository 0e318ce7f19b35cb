/**
 * Lexical entry schema and validation
 *
 * @module schema
 */

export { validate, formatPath } from './validate.js';
export { LexicalEntrySchemaV1, SCHEMA_VERSIONS, schemaFor } from './registry.js';
export type * from './types.js';
