export {
  createComponent, createDataFlow, createSystemModel, createMitigation,
  createThreat, createThreatPattern, createThreatModel, SCHEMA_VERSION,
} from './factory.js';
export type { NewThreatModelOptions } from './factory.js';
export {
  getComponent, getComponentsByType, getDataFlowsFrom, getDataFlowsTo, getDataFlowsFor,
  flowKey, findDataFlowById, endpointName,
  compareTrustLevels, compareClassifications, isSensitiveClassification,
  compareSeverity, sortBySeverity, countBySeverity,
} from './system.js';
export { calculateDreadScore, scoreRisk } from './risk.js';
export { validateThreatModel } from './validate.js';
export {
  ComponentSchema, DataFlowSchema, SystemModelSchema, MitigationSchema,
  RiskScoreSchema, ThreatSchema, ThreatPatternSchema, ThreatModelSchema,
} from './schema.js';
export type {
  ComponentInput, DataFlowInput, SystemModelInput, MitigationInput,
  RiskScoreInput, ThreatInput, ThreatPatternInput, ThreatModelInput,
} from './schema.js';
