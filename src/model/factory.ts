/**
 * AI Threat Model — Entity factories.
 *
 * Each factory validates its input through the matching zod schema and
 * throws a ZodError on bad input (empty component id, unknown enum value,
 * DREAD factor outside 0–10, duplicate component id).
 */

import {
  ComponentSchema, DataFlowSchema, MitigationSchema, SystemModelSchema,
  ThreatPatternSchema, ThreatSchema,
} from './schema.js';
import type {
  ComponentInput, DataFlowInput, MitigationInput, SystemModelInput,
  ThreatInput, ThreatPatternInput,
} from './schema.js';
import type {
  Component, DataFlow, Mitigation, SystemModel, SystemType, Threat,
  ThreatModel, ThreatModelingFramework, ThreatPattern,
} from '../types/index.js';

export const SCHEMA_VERSION = '1.0.0';

export function createComponent(input: ComponentInput): Component {
  return ComponentSchema.parse(input);
}

export function createDataFlow(input: DataFlowInput): DataFlow {
  return DataFlowSchema.parse(input);
}

export function createSystemModel(input: SystemModelInput): SystemModel {
  return SystemModelSchema.parse(input);
}

export function createMitigation(input: MitigationInput): Mitigation {
  return MitigationSchema.parse(input);
}

export function createThreat(input: ThreatInput): Threat {
  return ThreatSchema.parse(input);
}

export function createThreatPattern(input: ThreatPatternInput): ThreatPattern {
  return ThreatPatternSchema.parse(input);
}

export interface NewThreatModelOptions {
  name: string;
  type: SystemType;
  framework: ThreatModelingFramework;
  author?: string;
  description?: string;
}

/** Empty threat model: no components, no flows, no threats. */
export function createThreatModel(opts: NewThreatModelOptions): ThreatModel {
  const now = new Date().toISOString();
  return {
    metadata: {
      version: SCHEMA_VERSION,
      created: now,
      updated: now,
      author: opts.author,
      description: opts.description,
    },
    system: createSystemModel({
      name: opts.name,
      type: opts.type,
      threat_modeling_framework: opts.framework,
    }),
    threats: [],
  };
}
