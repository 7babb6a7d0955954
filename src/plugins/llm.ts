/**
 * AI Threat Model — LLM application plugin (OWASP LLM Top 10 2025).
 */

import { CatalogPlugin } from './base.js';
import { flowEndpoints, structuralThreat } from './threat-factory.js';
import { isSensitiveClassification } from '../model/system.js';
import type { CatalogPluginOptions } from './base.js';
import type { SeverityMap } from './threat-factory.js';
import type { TypeTrigger } from './types.js';
import type { Component, ComponentType, DataFlow, SystemModel, Threat } from '../types/index.js';

const SEVERITIES: SeverityMap = {
  LLM01: 'critical',
  LLM02: 'high',
  LLM03: 'medium',
  LLM04: 'high',
  LLM05: 'medium',
  LLM06: 'critical',
  LLM07: 'high',
  LLM08: 'high',
  LLM09: 'medium',
  LLM10: 'high',
};

const TRIGGERS: readonly TypeTrigger[] = [
  { type: 'llm', patterns: ['LLM01', 'LLM02', 'LLM06', 'LLM09'] },
];

export class LLMPlugin extends CatalogPlugin {
  readonly kind = 'llm';
  readonly systemType = 'llm-app';
  readonly supportedFrameworks = ['owasp-llm-top10-2025'] as const;
  protected readonly systemLabel = 'LLM applications';
  protected readonly severities = SEVERITIES;
  protected readonly triggers = TRIGGERS;

  constructor(options: CatalogPluginOptions = {}) {
    super('llm-top10', options);
  }

  detectThreats(system: SystemModel): Threat[] {
    const threats = this.matchComponents(system);
    for (const flow of system.data_flows) {
      const threat = this.checkDataFlow(system, flow);
      if (threat) threats.push(threat);
    }
    return threats;
  }

  /** Confidential or restricted data moving without encryption */
  private checkDataFlow(system: SystemModel, flow: DataFlow): Threat | null {
    if (flow.encrypted || !isSensitiveClassification(flow.classification)) return null;
    const { from, to, key } = flowEndpoints(system, flow);
    return structuralThreat({
      category: 'LLM06',
      framework: 'owasp-llm-top10-2025',
      title: 'Sensitive Information Disclosure',
      description: `Sensitive data (${flow.classification}) is transmitted unencrypted between ${from} and ${to}`,
      severity: 'high',
      affectedDataFlows: [key],
      pattern: this.catalogPattern('LLM06'),
    });
  }

  getComponentTypes(): ComponentType[] {
    return ['llm', 'agent', 'tool', 'memory', 'database', 'api-endpoint', 'authentication-service'];
  }

  protected componentWarnings(component: Component): string[] {
    return component.type === 'llm' && component.capabilities.length === 0
      ? ['LLM component should specify capabilities']
      : [];
  }
}
