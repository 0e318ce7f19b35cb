export { MemoryPageStore } from './memory-store.js';
export type { PageInput, MemoryPageStoreOptions, StoreRecords } from './memory-store.js';
export { Resolver } from './resolver.js';
export type { ResolverOptions } from './resolver.js';
export { normalizeTitle, normalizeDefinitionName, definitionTitle, splitTitle, cleanName } from './names.js';
export type { NameOptions, TitleParts } from './names.js';
export { discoverExports, templateDataDefaults, redirectTarget } from './definitions.js';
export type * from './types.js';
