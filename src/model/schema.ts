/**
 * AI Threat Model — zod schemas for the threat model document.
 *
 * Everything that enters the engine from outside (factories, threat model
 * files, pattern files) passes through these schemas. Optional fields accept
 * `null` as well as a missing key, since documents written by other tools
 * serialize absent values that way.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import {
  COMPONENT_TYPES, DATA_CLASSIFICATIONS, FRAMEWORKS, MITIGATION_STATUSES,
  SEVERITIES, SYSTEM_TYPES, TRUST_LEVELS,
} from '../types/index.js';
import type { DataFlow } from '../types/index.js';

const optionalText = z.string().nullish().transform((v) => v ?? undefined);
const dreadFactor = z.number().min(0).max(10).nullish().transform((v) => v ?? undefined);

// ─── System ──────────────────────────────────────────────────────────

export const ComponentSchema = z.object({
  id: z.string().trim().min(1, 'Component ID cannot be empty'),
  name: z.string(),
  type: z.enum(COMPONENT_TYPES),
  capabilities: z.array(z.string()).default([]),
  trust_level: z.enum(TRUST_LEVELS).default('untrusted'),
  description: optionalText,
});

/** Accepts both the document spelling (`from`/`to`) and the field names. */
export const DataFlowSchema = z.object({
  from: z.string().optional(),
  to: z.string().optional(),
  from_component: z.string().optional(),
  to_component: z.string().optional(),
  data_type: optionalText,
  classification: z.enum(DATA_CLASSIFICATIONS).default('internal'),
  protocol: optionalText,
  encrypted: z.boolean().default(false),
}).transform((raw, ctx): DataFlow => {
  const from = raw.from_component ?? raw.from;
  const to = raw.to_component ?? raw.to;
  if (from === undefined || to === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Data flow requires both "from" and "to"' });
    return z.NEVER;
  }
  return {
    from_component: from,
    to_component: to,
    data_type: raw.data_type,
    classification: raw.classification,
    protocol: raw.protocol,
    encrypted: raw.encrypted,
  };
});

export const SystemModelSchema = z.object({
  name: z.string(),
  type: z.enum(SYSTEM_TYPES),
  threat_modeling_framework: z.enum(FRAMEWORKS),
  components: z.array(ComponentSchema).default([]),
  data_flows: z.array(DataFlowSchema).default([]),
}).superRefine((system, ctx) => {
  const seen = new Set<string>();
  system.components.forEach((c, i) => {
    if (seen.has(c.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['components', i, 'id'],
        message: `Duplicate component id: ${c.id}`,
      });
    }
    seen.add(c.id);
  });
});

// ─── Threats ─────────────────────────────────────────────────────────

export const MitigationSchema = z.object({
  id: z.string().default(() => randomUUID()),
  description: z.string(),
  implementation: optionalText,
  status: z.enum(MITIGATION_STATUSES).default('proposed'),
  priority: optionalText,
});

export const RiskScoreSchema = z.object({
  damage: dreadFactor,
  reproducibility: dreadFactor,
  exploitability: dreadFactor,
  affected_users: dreadFactor,
  discoverability: dreadFactor,
  calculated: dreadFactor,
});

export const ThreatReferenceSchema = z.object({
  title: z.string(),
  url: z.string().default(''),
});

export const ThreatSchema = z.object({
  id: z.string().default(() => randomUUID()),
  category: z.string(),
  framework: z.enum(FRAMEWORKS),
  title: z.string(),
  description: optionalText,
  severity: z.enum(SEVERITIES).nullish().transform((v) => v ?? undefined),
  affected_components: z.array(z.string()).default([]),
  affected_data_flows: z.array(z.string()).default([]),
  attack_vectors: z.array(z.string()).default([]),
  detection_patterns: z.array(z.string()).default([]),
  mitigations: z.array(MitigationSchema).default([]),
  risk_score: RiskScoreSchema.nullish().transform((v) => v ?? undefined),
  references: z.array(ThreatReferenceSchema).default([]),
  lifecycle_phase: optionalText,
  elicitation_question: optionalText,
  plot4ai_card_id: optionalText,
});

// ─── Patterns ────────────────────────────────────────────────────────

export const PatternMitigationSchema = z.object({
  id: z.string(),
  description: z.string(),
  implementation: optionalText,
  priority: optionalText,
});

export const ThreatPatternSchema = z.object({
  id: z.string().min(1),
  category: z.string(),
  framework: z.enum(FRAMEWORKS),
  title: z.string(),
  description: z.string(),
  detection_patterns: z.array(z.string().trim().min(1, { message: 'Detection phrase cannot be empty' })),
  attack_vectors: z.array(z.string()),
  mitigations: z.array(PatternMitigationSchema).default([]),
  references: z.array(ThreatReferenceSchema).default([]),
});

// ─── Document ────────────────────────────────────────────────────────

export const MetadataSchema = z.object({
  version: z.string(),
  created: optionalText,
  updated: optionalText,
  author: optionalText,
  description: optionalText,
});

const VisualizationNodeSchema = z.object({
  id: z.string(),
  x: z.number().nullish().transform((v) => v ?? undefined),
  y: z.number().nullish().transform((v) => v ?? undefined),
  type: optionalText,
  label: optionalText,
  threats: z.array(z.string()).default([]),
  risk_level: optionalText,
});

const VisualizationEdgeSchema = z.object({
  from: z.string(),
  to: z.string(),
  label: optionalText,
  threats: z.array(z.string()).default([]),
  data_classification: z.enum(DATA_CLASSIFICATIONS).nullish().transform((v) => v ?? undefined),
});

export const VisualizationSchema = z.object({
  layout: z.string().default('hierarchical'),
  nodes: z.array(VisualizationNodeSchema).default([]),
  edges: z.array(VisualizationEdgeSchema).default([]),
});

export const ThreatModelSchema = z.object({
  metadata: MetadataSchema,
  system: SystemModelSchema,
  threats: z.array(ThreatSchema).default([]),
  visualization: VisualizationSchema.nullish().transform((v) => v ?? undefined),
});

// ─── Inputs ──────────────────────────────────────────────────────────

export type ComponentInput = z.input<typeof ComponentSchema>;
export type DataFlowInput = z.input<typeof DataFlowSchema>;
export type SystemModelInput = z.input<typeof SystemModelSchema>;
export type MitigationInput = z.input<typeof MitigationSchema>;
export type RiskScoreInput = z.input<typeof RiskScoreSchema>;
export type ThreatInput = z.input<typeof ThreatSchema>;
export type ThreatPatternInput = z.input<typeof ThreatPatternSchema>;
export type ThreatModelInput = z.input<typeof ThreatModelSchema>;

