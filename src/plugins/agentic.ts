/**
 * AI Threat Model — Agentic system plugin (OWASP Agentic Top 10 2026).
 */

import { CatalogPlugin } from './base.js';
import { flowEndpoints, structuralThreat } from './threat-factory.js';
import { getComponent, getComponentsByType } from '../model/system.js';
import type { CatalogPluginOptions } from './base.js';
import type { SeverityMap } from './threat-factory.js';
import type { TypeTrigger } from './types.js';
import type { Component, ComponentType, DataFlow, SystemModel, Threat } from '../types/index.js';

const SEVERITIES: SeverityMap = {
  AGENTIC01: 'critical',
  AGENTIC02: 'high',
  AGENTIC03: 'high',
  AGENTIC04: 'high',
  AGENTIC05: 'high',
  AGENTIC06: 'medium',
  AGENTIC07: 'high',
  AGENTIC08: 'medium',
  AGENTIC09: 'high',
  AGENTIC10: 'medium',
};

// Every tool gets Tool Misuse (AGENTIC02)
const TRIGGERS: readonly TypeTrigger[] = [
  { type: 'agent', patterns: ['AGENTIC01', 'AGENTIC02', 'AGENTIC05', 'AGENTIC06'] },
  { type: 'tool', patterns: ['AGENTIC02'] },
];

export class AgenticPlugin extends CatalogPlugin {
  readonly kind = 'agentic';
  readonly systemType = 'agentic-system';
  readonly supportedFrameworks = ['owasp-agentic-top10-2026'] as const;
  protected readonly systemLabel = 'agentic systems';
  protected readonly severities = SEVERITIES;
  protected readonly triggers = TRIGGERS;

  constructor(options: CatalogPluginOptions = {}) {
    super('agentic-top10', options);
  }

  detectThreats(system: SystemModel): Threat[] {
    const threats = this.matchComponents(system);
    for (const flow of system.data_flows) {
      const threat = this.checkDataFlow(system, flow);
      if (threat) threats.push(threat);
    }
    threats.push(...this.checkAgentInteractions(system));
    return threats;
  }

  /** Unencrypted agent-to-agent traffic, whatever its classification */
  private checkDataFlow(system: SystemModel, flow: DataFlow): Threat | null {
    if (flow.encrypted) return null;
    const source = getComponent(system, flow.from_component);
    const target = getComponent(system, flow.to_component);
    if (source?.type !== 'agent' || target?.type !== 'agent') return null;

    const { from, to, key } = flowEndpoints(system, flow);
    return structuralThreat({
      category: 'AGENTIC07',
      framework: 'owasp-agentic-top10-2026',
      title: 'Insecure Communication',
      description: `Agent communication between ${from} and ${to} is not encrypted`,
      severity: 'high',
      affectedDataFlows: [key],
      pattern: this.catalogPattern('AGENTIC07'),
    });
  }

  private checkAgentInteractions(system: SystemModel): Threat[] {
    const agents = getComponentsByType(system, 'agent');
    if (agents.length < 2) return [];
    return [structuralThreat({
      category: 'AGENTIC06',
      framework: 'owasp-agentic-top10-2026',
      title: 'Insufficient Agent Isolation',
      description: `Multiple agents (${agents.length}) detected. Ensure proper isolation between agents.`,
      severity: 'medium',
      affectedComponents: agents.map(a => a.id),
      pattern: this.catalogPattern('AGENTIC06'),
    })];
  }

  getComponentTypes(): ComponentType[] {
    return ['agent', 'llm', 'tool', 'memory', 'mcp-server', 'database', 'api-endpoint', 'authentication-service'];
  }

  protected componentWarnings(component: Component): string[] {
    return component.type === 'agent' && component.capabilities.length === 0
      ? ['Agent component should specify capabilities']
      : [];
  }
}
