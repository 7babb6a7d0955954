/**
 * AI Threat Model — Referential validation.
 *
 * Construction-time checks live in the schemas; this pass only looks for
 * ids that do not resolve. It never throws: every dangling reference is
 * reported as a message.
 */

import type { ThreatModel } from '../types/index.js';

export function validateThreatModel(model: ThreatModel): string[] {
  const errors: string[] = [];
  const ids = new Set(model.system.components.map(c => c.id));

  for (const df of model.system.data_flows) {
    if (!ids.has(df.from_component)) {
      errors.push(`Data flow references unknown component: ${df.from_component}`);
    }
    if (!ids.has(df.to_component)) {
      errors.push(`Data flow references unknown component: ${df.to_component}`);
    }
  }

  for (const threat of model.threats) {
    for (const compId of threat.affected_components) {
      if (!ids.has(compId)) {
        errors.push(`Threat ${threat.id} references unknown component: ${compId}`);
      }
    }
  }

  return errors;
}
