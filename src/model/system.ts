/**
 * AI Threat Model — System model lookups.
 * Linear scans; systems are small enough that no index is kept.
 */

import { DATA_CLASSIFICATIONS, SEVERITIES, TRUST_LEVELS } from '../types/index.js';
import type {
  Component, ComponentType, DataClassification, DataFlow, Severity,
  SystemModel, Threat, TrustLevel,
} from '../types/index.js';

export function getComponent(system: SystemModel, id: string): Component | undefined {
  return system.components.find(c => c.id === id);
}

export function getComponentsByType(system: SystemModel, type: ComponentType): Component[] {
  return system.components.filter(c => c.type === type);
}

export function getDataFlowsFrom(system: SystemModel, componentId: string): DataFlow[] {
  return system.data_flows.filter(df => df.from_component === componentId);
}

export function getDataFlowsTo(system: SystemModel, componentId: string): DataFlow[] {
  return system.data_flows.filter(df => df.to_component === componentId);
}

/** Flows where the component is either endpoint */
export function getDataFlowsFor(system: SystemModel, componentId: string): DataFlow[] {
  return system.data_flows.filter(
    df => df.from_component === componentId || df.to_component === componentId,
  );
}

/** "from->to" key used in `Threat.affected_data_flows` */
export function flowKey(flow: DataFlow): string {
  return `${flow.from_component}->${flow.to_component}`;
}

export function findDataFlowById(system: SystemModel, key: string): DataFlow | undefined {
  return system.data_flows.find(df => flowKey(df) === key);
}

/** Display name of a flow endpoint, falling back to the raw id */
export function endpointName(system: SystemModel, componentId: string): string {
  return getComponent(system, componentId)?.name ?? componentId;
}

// ─── Ordinals ────────────────────────────────────────────────────────

export function compareTrustLevels(a: TrustLevel, b: TrustLevel): number {
  return TRUST_LEVELS.indexOf(a) - TRUST_LEVELS.indexOf(b);
}

export function compareClassifications(a: DataClassification, b: DataClassification): number {
  return DATA_CLASSIFICATIONS.indexOf(a) - DATA_CLASSIFICATIONS.indexOf(b);
}

export function isSensitiveClassification(c: DataClassification): boolean {
  return compareClassifications(c, 'confidential') >= 0;
}

/** Negative when `a` is more severe. Unset severity sorts last. */
export function compareSeverity(a: Severity | undefined, b: Severity | undefined): number {
  const rank = (s: Severity | undefined) => s === undefined ? SEVERITIES.length : SEVERITIES.indexOf(s);
  return rank(a) - rank(b);
}

export function sortBySeverity(threats: readonly Threat[]): Threat[] {
  return [...threats].sort((a, b) => compareSeverity(a.severity, b.severity));
}

export function countBySeverity(threats: readonly Threat[]): Record<Severity | 'unset', number> {
  const counts: Record<Severity | 'unset', number> = { critical: 0, high: 0, medium: 0, low: 0, unset: 0 };
  for (const t of threats) counts[t.severity ?? 'unset']++;
  return counts;
}
