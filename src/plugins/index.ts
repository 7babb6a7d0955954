export { BasePlugin, CatalogPlugin } from './base.js';
export type { PluginOptions, CatalogPluginOptions } from './base.js';
export { LLMPlugin } from './llm.js';
export { AgenticPlugin } from './agentic.js';
export { MultiAgentPlugin } from './multi-agent.js';
export { Plot4AIPlugin } from './plot4ai.js';
export type { Plot4AIPluginOptions } from './plot4ai.js';
export { PluginRegistry, loadPlugins, createPluginRegistry } from './registry.js';
export type { AnyPlugin, LoadPluginsOptions } from './registry.js';
export { PatternRegistry, PatternMetadataSchema, DEFAULT_PATTERN_VERSION } from './pattern-registry.js';
export type {
  PatternMetadata, PatternMetadataInput, PatternConflict, PatternConflictType, DirectoryLoadResult,
} from './pattern-registry.js';
export { threatFromPattern, structuralThreat, severityFor, DEFAULT_SEVERITY } from './threat-factory.js';
export type { SeverityMap, StructuralThreatInput } from './threat-factory.js';
export type { ThreatModelPlugin, PluginKind, DetectOptions, TypeTrigger } from './types.js';
