export { CATALOG_NAMES, builtinCatalogUrl, loadBuiltinPatterns } from './builtin.js';
export type { CatalogName } from './builtin.js';
export { loadCatalog, mergePatterns, findPatternFiles, readPatternFile } from './loader.js';
export type { CatalogOptions } from './loader.js';
