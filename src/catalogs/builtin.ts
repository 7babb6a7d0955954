/**
 * AI Threat Model — Built-in pattern catalogs.
 *
 * The default catalogs ship as JSON under patterns/ at the package root
 * and are read relative to this module, so they resolve the same from
 * src/ and from dist/.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ThreatPatternSchema } from '../model/schema.js';
import { errorMessage } from '../utils/errors.js';
import type { ThreatPattern } from '../types/index.js';

export const CATALOG_NAMES = ['llm-top10', 'agentic-top10', 'multi-agent'] as const;
export type CatalogName = typeof CATALOG_NAMES[number];

const CatalogFileSchema = z.array(ThreatPatternSchema);

export function builtinCatalogUrl(name: CatalogName): URL {
  return new URL(`../../patterns/${name}.json`, import.meta.url);
}

/**
 * Read a built-in catalog. A missing or corrupt built-in file is a
 * packaging error and throws.
 */
export function loadBuiltinPatterns(name: CatalogName): ThreatPattern[] {
  const url = builtinCatalogUrl(name);
  try {
    return CatalogFileSchema.parse(JSON.parse(readFileSync(url, 'utf-8')));
  } catch (err) {
    throw new Error(`Built-in catalog ${name} could not be loaded: ${errorMessage(err)}`);
  }
}
