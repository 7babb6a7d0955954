/**
 * AI Threat Model — Multi-agent plugin.
 *
 * Purely structural: threats come from the shape of the system (how many
 * agents, who coordinates them, how they talk, what they share), not from
 * matching pattern text against components. Systems with fewer than two
 * agents yield nothing.
 */

import { CatalogPlugin } from './base.js';
import { flowEndpoints, severityFor, structuralThreat } from './threat-factory.js';
import { getComponent, getComponentsByType } from '../model/system.js';
import type { CatalogPluginOptions } from './base.js';
import type { SeverityMap } from './threat-factory.js';
import type { Component, ComponentType, SystemModel, Threat } from '../types/index.js';

const SEVERITIES: SeverityMap = {
  'MULTI-AGENT-01': 'high',
  'MULTI-AGENT-02': 'high',
  'MULTI-AGENT-03': 'medium',
  'MULTI-AGENT-04': 'medium',
  'MULTI-AGENT-05': 'medium',
};

const ORCHESTRATOR_MARKERS = ['orchestrat', 'coordinator'];
const SHARED_MARKERS = ['shared', 'state'];

export class MultiAgentPlugin extends CatalogPlugin {
  readonly kind = 'multi-agent';
  readonly systemType = 'multi-agent';
  readonly supportedFrameworks = ['owasp-agentic-top10-2026', 'custom'] as const;
  protected readonly systemLabel = 'multi-agent systems';
  protected readonly severities = SEVERITIES;

  constructor(options: CatalogPluginOptions = {}) {
    super('multi-agent', options);
  }

  detectThreats(system: SystemModel): Threat[] {
    const agents = getComponentsByType(system, 'agent');
    if (agents.length < 2) return [];

    return [
      this.isolationThreat(agents),
      ...this.orchestrationThreats(system),
      ...this.communicationThreats(system),
      ...this.sharedStateThreats(system, agents),
    ];
  }

  private threat(
    category: string,
    title: string,
    description: string,
    affected: { components?: string[]; flows?: string[] },
  ): Threat {
    return structuralThreat({
      category,
      framework: 'custom',
      title,
      description,
      severity: severityFor(this.severities, category),
      affectedComponents: affected.components,
      affectedDataFlows: affected.flows,
      pattern: this.catalogPattern(category),
    });
  }

  private isolationThreat(agents: Component[]): Threat {
    return this.threat(
      'MULTI-AGENT-04',
      'Agent Isolation Failures',
      `Multiple agents (${agents.length}) detected. Ensure proper isolation between agents.`,
      { components: agents.map(a => a.id) },
    );
  }

  private orchestrationThreats(system: SystemModel): Threat[] {
    const orchestrators = system.components.filter(c => {
      const name = c.name.toLowerCase();
      return ORCHESTRATOR_MARKERS.some(m => name.includes(m));
    });
    if (orchestrators.length === 0) return [];
    return [this.threat(
      'MULTI-AGENT-02',
      'Orchestration Layer Vulnerabilities',
      'Orchestration layer detected. Ensure proper access controls and validation.',
      { components: orchestrators.map(o => o.id) },
    )];
  }

  /** One threat per unencrypted agent → agent flow */
  private communicationThreats(system: SystemModel): Threat[] {
    return system.data_flows
      .filter(df => !df.encrypted
        && getComponent(system, df.from_component)?.type === 'agent'
        && getComponent(system, df.to_component)?.type === 'agent')
      .map(df => {
        const { from, to, key } = flowEndpoints(system, df);
        return this.threat(
          'MULTI-AGENT-01',
          'Agent-to-Agent Communication Vulnerabilities',
          `Agent communication between ${from} and ${to} is not encrypted`,
          { flows: [key] },
        );
      });
  }

  /** Memory or shared-state components written to by two or more distinct agents */
  private sharedStateThreats(system: SystemModel, agents: Component[]): Threat[] {
    const agentIds = new Set(agents.map(a => a.id));
    const isShared = (c: Component) => {
      const name = c.name.toLowerCase();
      return c.type === 'memory' || SHARED_MARKERS.some(m => name.includes(m));
    };

    // resource id → distinct agent ids, in first-flow order
    const writers = new Map<string, string[]>();
    for (const resource of system.components.filter(isShared)) {
      writers.set(resource.id, []);
    }
    for (const df of system.data_flows) {
      const list = writers.get(df.to_component);
      if (list && agentIds.has(df.from_component) && !list.includes(df.from_component)) {
        list.push(df.from_component);
      }
    }

    const threats: Threat[] = [];
    for (const [resourceId, accessing] of writers) {
      if (accessing.length < 2) continue;
      threats.push(this.threat(
        'MULTI-AGENT-03',
        'Shared State Vulnerabilities',
        `Multiple agents (${accessing.length}) access shared resource ${resourceId}. Ensure proper synchronization.`,
        { components: [resourceId, ...accessing] },
      ));
    }
    return threats;
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
