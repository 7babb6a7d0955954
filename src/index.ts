/**
 * AI Threat Model
 *
 * Library entry point. Re-exports types, the model layer, plugins,
 * analysis, document IO, configuration and logging.
 *
 * Usage:
 *   import { createPluginRegistry, loadThreatModel, runAnalysis } from 'ai-threat-model';
 *   import type { ThreatModel, Threat } from 'ai-threat-model';
 */

export * from './types/index.js';
export * from './model/index.js';
export * from './matcher/index.js';
export * from './catalogs/index.js';
export * from './plot4ai/index.js';
export * from './plugins/index.js';
export { runAnalysis, checkComponents } from './analysis/index.js';
export type { AnalysisResult, AnalysisIssues, RunAnalysisOptions } from './analysis/index.js';
export { parseThreatModel, loadThreatModel, serializeThreatModel, saveThreatModel } from './io/index.js';
export {
  resolveConfig, describeConfigSource, loadProjectConfig, loadGlobalConfig,
  saveProjectConfig, saveGlobalConfig, projectConfigPath, globalConfigPath,
  defaultDeckPath, ConfigFileSchema,
} from './config/index.js';
export type {
  ResolvedConfig, ConfigFlags, ConfigEnvironment, ConfigSource, SavedConfig,
} from './config/index.js';
export {
  createLogger, parseLogLevel, LOG_LEVELS,
  logPatternLoadError, logThreatDetection, logPatternRegistry,
} from './utils/logger.js';
export type { Logger, LoggerOptions, LogLevel } from './utils/logger.js';
export { errorMessage } from './utils/errors.js';
