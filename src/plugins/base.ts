/**
 * AI Threat Model — Plugin base classes.
 *
 * BasePlugin carries what every plugin shares (logger, component
 * validation, analyzeSystem). CatalogPlugin adds a pattern catalog built
 * once at construction and the matcher pass over every component.
 */

import { explainMatch } from '../matcher/match.js';
import { loadCatalog } from '../catalogs/loader.js';
import { createLogger, logThreatDetection } from '../utils/logger.js';
import { severityFor, threatFromPattern } from './threat-factory.js';
import type { CatalogName } from '../catalogs/builtin.js';
import type { Logger } from '../utils/logger.js';
import type { SeverityMap } from './threat-factory.js';
import type { DetectOptions, PluginKind, ThreatModelPlugin, TypeTrigger } from './types.js';
import type {
  Component, ComponentType, SystemAnalysis, SystemModel, SystemType,
  Threat, ThreatModelingFramework, ThreatPattern, ValidationResult,
} from '../types/index.js';

export interface PluginOptions {
  logger?: Logger;
}

export interface CatalogPluginOptions extends PluginOptions {
  /** Override tree; see loadCatalog */
  patternsDir?: string;
}

// ─── BasePlugin ──────────────────────────────────────────────────────

export abstract class BasePlugin implements ThreatModelPlugin {
  abstract readonly kind: PluginKind;
  abstract readonly systemType: SystemType;
  abstract readonly supportedFrameworks: readonly ThreatModelingFramework[];

  /** Used in "may not be typical for …" warnings */
  protected abstract readonly systemLabel: string;

  protected readonly logger: Logger;

  constructor(options: PluginOptions = {}) {
    this.logger = options.logger ?? createLogger();
  }

  abstract detectThreats(system: SystemModel, options?: DetectOptions): Threat[];
  abstract getComponentTypes(): ComponentType[];
  abstract getThreatPatterns(framework?: ThreatModelingFramework): ThreatPattern[];

  validateComponent(component: Component): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!this.getComponentTypes().includes(component.type)) {
      warnings.push(`Component type ${component.type} may not be typical for ${this.systemLabel}`);
    }
    if (!component.name.trim()) {
      errors.push('Component name is required');
    }
    warnings.push(...this.componentWarnings(component));

    return { valid: errors.length === 0, errors, warnings };
  }

  /** Plugin-specific warnings appended by validateComponent */
  protected componentWarnings(_component: Component): string[] {
    return [];
  }

  analyzeSystem(system: SystemModel, options?: DetectOptions): SystemAnalysis {
    const threats = this.detectThreats(system, options);
    return {
      threats,
      threat_count: threats.length,
      components_analyzed: system.components.length,
      data_flows_analyzed: system.data_flows.length,
    };
  }
}

// ─── CatalogPlugin ───────────────────────────────────────────────────

export abstract class CatalogPlugin extends BasePlugin {
  protected readonly patterns: readonly ThreatPattern[];

  /** Component types that match a pattern without looking at its text */
  protected readonly triggers: readonly TypeTrigger[] = [];
  protected abstract readonly severities: SeverityMap;

  constructor(catalog: CatalogName, options: CatalogPluginOptions = {}) {
    super(options);
    this.patterns = loadCatalog(catalog, { patternsDir: options.patternsDir, logger: this.logger });
  }

  getThreatPatterns(framework?: ThreatModelingFramework): ThreatPattern[] {
    if (framework === undefined) return [...this.patterns];
    return this.patterns.filter(p => p.framework === framework);
  }

  /** Catalog entry by id, regardless of framework */
  protected catalogPattern(id: string): ThreatPattern | undefined {
    return this.patterns.find(p => p.id === id);
  }

  protected triggerTypesFor(patternId: string): ComponentType[] {
    return this.triggers.filter(t => t.patterns.includes(patternId)).map(t => t.type);
  }

  /** Every component against every pattern of the system's framework */
  protected matchComponents(system: SystemModel): Threat[] {
    const patterns = this.getThreatPatterns(system.threat_modeling_framework);
    const threats: Threat[] = [];

    for (const component of system.components) {
      for (const pattern of patterns) {
        const layer = explainMatch(pattern, component, this.triggerTypesFor(pattern.id), system);
        logThreatDetection(this.logger, component.id, pattern.id, layer !== null, layer ?? undefined);
        if (layer !== null) {
          threats.push(threatFromPattern(pattern, component.id, severityFor(this.severities, pattern.id)));
        }
      }
    }

    return threats;
  }
}
