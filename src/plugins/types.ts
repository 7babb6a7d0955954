/**
 * AI Threat Model — Plugin contract.
 */

import type { CardFilters } from '../plot4ai/deck.js';
import type {
  Component, ComponentType, SystemAnalysis, SystemModel, SystemType,
  Threat, ThreatModelingFramework, ThreatPattern, ValidationResult,
} from '../types/index.js';

export type PluginKind = 'llm' | 'agentic' | 'multi-agent' | 'plot4ai';

/**
 * Card filters and elicitation answers. Only the PLOT4AI plugin reads
 * them; the catalog plugins accept and ignore them.
 */
export interface DetectOptions extends CardFilters {
  /** card id → Yes / No / Maybe (case-insensitive) */
  answers?: Readonly<Record<string, string>>;
}

export interface ThreatModelPlugin {
  readonly kind: PluginKind;
  readonly systemType: SystemType;
  readonly supportedFrameworks: readonly ThreatModelingFramework[];

  detectThreats(system: SystemModel, options?: DetectOptions): Threat[];
  getComponentTypes(): ComponentType[];
  validateComponent(component: Component): ValidationResult;
  /** All patterns, or those of one framework */
  getThreatPatterns(framework?: ThreatModelingFramework): ThreatPattern[];
  analyzeSystem(system: SystemModel, options?: DetectOptions): SystemAnalysis;
}

/** Component types that trigger a pattern outright, per plugin */
export interface TypeTrigger {
  type: ComponentType;
  patterns: readonly string[];
}
