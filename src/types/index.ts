/**
 * AI Threat Model — Core type definitions
 * Field names are snake_case: they are the on-disk threat model contract.
 */

// ─── Enums ───────────────────────────────────────────────────────────

export const SYSTEM_TYPES = [
  'llm-app', 'agentic-system', 'multi-agent', 'mcp-server',
  'web-app', 'mobile-app', 'api', 'microservices', 'cloud-infrastructure',
] as const;
export type SystemType = typeof SYSTEM_TYPES[number];

export const FRAMEWORKS = [
  'owasp-llm-top10-2025', 'owasp-agentic-top10-2026', 'owasp-top10-2021',
  'owasp-mobile-top10', 'owasp-api-top10',
  'stride', 'dread', 'pasta', 'trike', 'plot4ai', 'custom',
] as const;
export type ThreatModelingFramework = typeof FRAMEWORKS[number];

export const COMPONENT_TYPES = [
  // AI
  'llm', 'agent', 'tool', 'memory', 'mcp-server',
  // Application
  'web-server', 'api-endpoint', 'mobile-app', 'browser',
  'authentication-service', 'authorization-service',
  // Infrastructure
  'database', 'cache', 'message-queue', 'load-balancer', 'cdn', 'firewall',
] as const;
export type ComponentType = typeof COMPONENT_TYPES[number];

/** Ordered lowest → highest */
export const TRUST_LEVELS = ['untrusted', 'internal', 'privileged', 'system'] as const;
export type TrustLevel = typeof TRUST_LEVELS[number];

/** Ordered lowest → highest */
export const DATA_CLASSIFICATIONS = ['public', 'internal', 'confidential', 'restricted'] as const;
export type DataClassification = typeof DATA_CLASSIFICATIONS[number];

/** Ordered highest → lowest */
export const SEVERITIES = ['critical', 'high', 'medium', 'low'] as const;
export type Severity = typeof SEVERITIES[number];

export const MITIGATION_STATUSES = ['proposed', 'implemented', 'verified'] as const;
export type MitigationStatus = typeof MITIGATION_STATUSES[number];

// ─── System ──────────────────────────────────────────────────────────

export interface Component {
  id: string;
  name: string;
  type: ComponentType;
  capabilities: string[];
  trust_level: TrustLevel;
  description?: string;
}

export interface DataFlow {
  from_component: string;
  to_component: string;
  data_type?: string;
  classification: DataClassification;
  protocol?: string;
  encrypted: boolean;
}

export interface SystemModel {
  name: string;
  type: SystemType;
  threat_modeling_framework: ThreatModelingFramework;
  components: Component[];
  data_flows: DataFlow[];
}

// ─── Threats ─────────────────────────────────────────────────────────

export interface Mitigation {
  id: string;
  description: string;
  implementation?: string;
  status: MitigationStatus;
  priority?: string;
}

/** DREAD factors, each in [0, 10] */
export interface RiskScore {
  damage?: number;
  reproducibility?: number;
  exploitability?: number;
  affected_users?: number;
  discoverability?: number;
  calculated?: number;
}

export interface ThreatReference {
  title: string;
  url: string;
}

export interface Threat {
  id: string;
  category: string;
  framework: ThreatModelingFramework;
  title: string;
  description?: string;
  severity?: Severity;
  affected_components: string[];
  /** "from->to" keys */
  affected_data_flows: string[];
  attack_vectors: string[];
  detection_patterns: string[];
  mitigations: Mitigation[];
  risk_score?: RiskScore;
  references: ThreatReference[];
  // PLOT4AI
  lifecycle_phase?: string;
  elicitation_question?: string;
  plot4ai_card_id?: string;
}

// ─── Patterns ────────────────────────────────────────────────────────

export interface PatternMitigation {
  id: string;
  description: string;
  implementation?: string;
  priority?: string;
}

export interface ThreatPattern {
  id: string;
  category: string;
  framework: ThreatModelingFramework;
  title: string;
  description: string;
  detection_patterns: string[];
  attack_vectors: string[];
  mitigations: PatternMitigation[];
  references: ThreatReference[];
}

// ─── Threat Model Document ───────────────────────────────────────────

export interface ThreatModelMetadata {
  version: string;
  created?: string;   // ISO-8601
  updated?: string;   // ISO-8601
  author?: string;
  description?: string;
}

export interface VisualizationNode {
  id: string;
  x?: number;
  y?: number;
  type?: string;
  label?: string;
  threats: string[];
  risk_level?: string;
}

export interface VisualizationEdge {
  from: string;
  to: string;
  label?: string;
  threats: string[];
  data_classification?: DataClassification;
}

export interface Visualization {
  layout: string;
  nodes: VisualizationNode[];
  edges: VisualizationEdge[];
}

export interface ThreatModel {
  metadata: ThreatModelMetadata;
  system: SystemModel;
  threats: Threat[];
  visualization?: Visualization;
}

// ─── Plugin results ──────────────────────────────────────────────────

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export interface SystemAnalysis {
  threats: Threat[];
  threat_count: number;
  components_analyzed: number;
  data_flows_analyzed: number;
}
