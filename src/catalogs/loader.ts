/**
 * AI Threat Model — Catalog assembly with override files.
 *
 * A catalog starts from its built-in defaults. Every `*.json` file in the
 * override directory holds one ThreatPattern; files are applied in sorted
 * order and replace the default with the same id, or add a new one.
 * A file that cannot be read, parsed or validated is logged and skipped.
 */

import fg from 'fast-glob';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { ThreatPatternSchema } from '../model/schema.js';
import { loadBuiltinPatterns } from './builtin.js';
import { logPatternLoadError } from '../utils/logger.js';
import type { CatalogName } from './builtin.js';
import type { Logger } from '../utils/logger.js';
import type { ThreatPattern } from '../types/index.js';

export interface CatalogOptions {
  /** Root of the override tree; each catalog reads `<patternsDir>/<catalog>/` */
  patternsDir?: string;
  logger: Logger;
}

/** Sorted JSON files directly inside `dir`; empty when it does not exist. */
export function findPatternFiles(dir: string): string[] {
  if (!existsSync(dir)) return [];
  return fg.sync('*.json', { cwd: dir, absolute: true, onlyFiles: true }).sort();
}

export function readPatternFile(file: string): ThreatPattern {
  return ThreatPatternSchema.parse(JSON.parse(readFileSync(file, 'utf-8')));
}

/** Defaults first, then overrides keyed by id (later wins). */
export function mergePatterns(
  defaults: readonly ThreatPattern[],
  overrideFiles: readonly string[],
  logger: Logger,
): ThreatPattern[] {
  const byId = new Map<string, ThreatPattern>();
  for (const p of defaults) byId.set(p.id, p);

  for (const file of overrideFiles) {
    try {
      const pattern = readPatternFile(file);
      logger.debug(`${byId.has(pattern.id) ? 'Overriding' : 'Adding'} pattern ${pattern.id} from ${file}`);
      byId.set(pattern.id, pattern);
    } catch (err) {
      logPatternLoadError(logger, file, err);
    }
  }

  return [...byId.values()];
}

export function loadCatalog(name: CatalogName, opts: CatalogOptions): ThreatPattern[] {
  const files = opts.patternsDir ? findPatternFiles(join(opts.patternsDir, name)) : [];
  return mergePatterns(loadBuiltinPatterns(name), files, opts.logger);
}
