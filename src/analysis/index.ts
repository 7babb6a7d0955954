/**
 * AI Threat Model — Analysis runner.
 *
 * Resolves the plugin for a threat model, checks its components, runs
 * detection and returns a copy of the model whose threat list is the
 * detection result. Threats already on the model are replaced, not merged.
 */

import { validateThreatModel } from '../model/validate.js';
import { createLogger } from '../utils/logger.js';
import type { AnyPlugin, PluginRegistry } from '../plugins/registry.js';
import type { DetectOptions } from '../plugins/types.js';
import type { Logger } from '../utils/logger.js';
import type { SystemAnalysis, ThreatModel } from '../types/index.js';

export interface AnalysisIssues {
  errors: string[];
  warnings: string[];
}

export interface AnalysisResult {
  /** Updated model; the input model unchanged when no plugin applies */
  model: ThreatModel;
  plugin: AnyPlugin | null;
  analysis: SystemAnalysis;
  issues: AnalysisIssues;
}

export interface RunAnalysisOptions {
  detect?: DetectOptions;
  logger?: Logger;
}

/**
 * Referential errors plus the plugin's per-component checks, prefixed with
 * the component id. Threat references are only checked with `includeThreats`,
 * since analysis replaces the threat list anyway.
 */
export function checkComponents(
  model: ThreatModel,
  plugin: AnyPlugin | null,
  includeThreats = false,
): AnalysisIssues {
  const issues: AnalysisIssues = {
    errors: validateThreatModel(includeThreats ? model : { ...model, threats: [] }),
    warnings: [],
  };
  if (!plugin) return issues;

  for (const component of model.system.components) {
    const result = plugin.validateComponent(component);
    issues.errors.push(...result.errors.map(e => `${component.id}: ${e}`));
    issues.warnings.push(...result.warnings.map(w => `${component.id}: ${w}`));
  }
  return issues;
}

export function runAnalysis(
  model: ThreatModel,
  registry: PluginRegistry,
  options: RunAnalysisOptions = {},
): AnalysisResult {
  const logger = options.logger ?? createLogger();
  const { system } = model;
  const plugin = registry.resolve(system);

  if (!plugin) {
    logger.warn(`No plugin registered for system type ${system.type} (framework ${system.threat_modeling_framework})`);
    return {
      model,
      plugin: null,
      analysis: { threats: [], threat_count: 0, components_analyzed: 0, data_flows_analyzed: 0 },
      issues: checkComponents(model, null),
    };
  }

  logger.debug(`Analyzing ${system.name} with the ${plugin.kind} plugin`);
  const issues = checkComponents(model, plugin);
  const analysis = plugin.analyzeSystem(system, options.detect);

  return {
    model: {
      ...model,
      metadata: { ...model.metadata, updated: new Date().toISOString() },
      threats: analysis.threats,
    },
    plugin,
    analysis,
    issues,
  };
}
