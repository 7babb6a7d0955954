/**
 * AI Threat Model — Threat construction shared by the plugins.
 */

import { randomUUID } from 'node:crypto';
import { createMitigation } from '../model/factory.js';
import { endpointName, flowKey } from '../model/system.js';
import type {
  DataFlow, Mitigation, Severity, SystemModel, Threat,
  ThreatModelingFramework, ThreatPattern,
} from '../types/index.js';

export type SeverityMap = Readonly<Record<string, Severity>>;

export const DEFAULT_SEVERITY: Severity = 'medium';

export function severityFor(map: SeverityMap, patternId: string): Severity {
  return map[patternId] ?? DEFAULT_SEVERITY;
}

function proposedMitigations(pattern: ThreatPattern): Mitigation[] {
  return pattern.mitigations.map(m => createMitigation({ ...m, status: 'proposed' }));
}

/** Threat raised by the matcher: one pattern against one component */
export function threatFromPattern(
  pattern: ThreatPattern,
  componentId: string,
  severity: Severity,
): Threat {
  return {
    id: randomUUID(),
    category: pattern.category,
    framework: pattern.framework,
    title: pattern.title,
    description: pattern.description,
    severity,
    affected_components: [componentId],
    affected_data_flows: [],
    attack_vectors: [...pattern.attack_vectors],
    detection_patterns: [...pattern.detection_patterns],
    mitigations: proposedMitigations(pattern),
    references: pattern.references.map(r => ({ ...r })),
  };
}

export interface StructuralThreatInput {
  category: string;
  framework: ThreatModelingFramework;
  title: string;
  description: string;
  severity: Severity;
  affectedComponents?: string[];
  affectedDataFlows?: string[];
  /** Catalog entry to borrow attack vectors, detection patterns and mitigations from */
  pattern?: ThreatPattern;
}

/** Threat raised by a flow or relationship rule rather than the matcher */
export function structuralThreat(input: StructuralThreatInput): Threat {
  const { pattern } = input;
  return {
    id: randomUUID(),
    category: input.category,
    framework: input.framework,
    title: input.title,
    description: input.description,
    severity: input.severity,
    affected_components: input.affectedComponents ?? [],
    affected_data_flows: input.affectedDataFlows ?? [],
    attack_vectors: pattern ? [...pattern.attack_vectors] : [],
    detection_patterns: pattern ? [...pattern.detection_patterns] : [],
    mitigations: pattern ? proposedMitigations(pattern) : [],
    references: pattern ? pattern.references.map(r => ({ ...r })) : [],
  };
}

/** Both endpoint names of a flow, for threat descriptions */
export function flowEndpoints(system: SystemModel, flow: DataFlow): { from: string; to: string; key: string } {
  return {
    from: endpointName(system, flow.from_component),
    to: endpointName(system, flow.to_component),
    key: flowKey(flow),
  };
}
