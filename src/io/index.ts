/**
 * AI Threat Model — Threat model document IO.
 *
 * Documents are plain JSON (`*.tm.json`). Data flow and visualization edge
 * endpoints are written as `from` / `to`.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { ThreatModelSchema } from '../model/schema.js';
import { errorMessage } from '../utils/errors.js';
import type { DataFlow, ThreatModel } from '../types/index.js';

// ─── Parse ───────────────────────────────────────────────────────────

/** Validate an already-decoded document. Throws ZodError. */
export function parseThreatModel(data: unknown): ThreatModel {
  return ThreatModelSchema.parse(data);
}

export function loadThreatModel(file: string): ThreatModel {
  if (!existsSync(file)) {
    throw new Error(`Threat model not found: ${file}`);
  }
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (err) {
    throw new Error(`Invalid JSON in ${file}: ${errorMessage(err)}`);
  }
  try {
    return parseThreatModel(data);
  } catch (err) {
    throw new Error(`Invalid threat model ${file}: ${errorMessage(err)}`);
  }
}

// ─── Serialize ───────────────────────────────────────────────────────

interface SerializedDataFlow extends Omit<DataFlow, 'from_component' | 'to_component'> {
  from: string;
  to: string;
}

function serializeFlow(df: DataFlow): SerializedDataFlow {
  const { from_component, to_component, ...rest } = df;
  return { from: from_component, to: to_component, ...rest };
}

/** Document shape of a threat model, ready for JSON.stringify */
export function serializeThreatModel(model: ThreatModel) {
  return {
    metadata: model.metadata,
    system: {
      ...model.system,
      data_flows: model.system.data_flows.map(serializeFlow),
    },
    threats: model.threats,
    ...(model.visualization ? { visualization: model.visualization } : {}),
  };
}

/**
 * Write a threat model, stamping `metadata.updated`.
 * Returns the model as written.
 */
export function saveThreatModel(file: string, model: ThreatModel): ThreatModel {
  const saved: ThreatModel = {
    ...model,
    metadata: { ...model.metadata, updated: new Date().toISOString() },
  };
  const dir = dirname(file);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
  writeFileSync(file, JSON.stringify(serializeThreatModel(saved), null, 2) + '\n');
  return saved;
}
