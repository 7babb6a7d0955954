/**
 * AI Threat Model — DREAD risk scoring.
 */

import { RiskScoreSchema } from './schema.js';
import type { RiskScoreInput } from './schema.js';
import type { RiskScore } from '../types/index.js';

const DREAD_FACTORS = [
  'damage', 'reproducibility', 'exploitability', 'affected_users', 'discoverability',
] as const;

/** Mean of the factors that are set; 0 when none are. */
export function calculateDreadScore(score: RiskScore): number {
  const values = DREAD_FACTORS
    .map(f => score[f])
    .filter((v): v is number => v !== undefined);
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Validate DREAD factors and fill in `calculated`. */
export function scoreRisk(input: RiskScoreInput): RiskScore {
  const score = RiskScoreSchema.parse(input);
  return { ...score, calculated: calculateDreadScore(score) };
}
