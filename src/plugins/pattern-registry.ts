/**
 * AI Threat Model — Versioned pattern registry.
 *
 * Holds ThreatPatterns with metadata (version, dependencies, deprecation)
 * and reports what is inconsistent about the set: missing dependencies,
 * ids claimed by two frameworks, deprecated patterns still registered.
 */

import fg from 'fast-glob';
import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ThreatPatternSchema } from '../model/schema.js';
import { FRAMEWORKS } from '../types/index.js';
import { createLogger, logPatternLoadError, logPatternRegistry } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import type { ThreatModelingFramework, ThreatPattern } from '../types/index.js';

// ─── Types ───────────────────────────────────────────────────────────

export const PatternMetadataSchema = z.object({
  version: z.string(),
  created: z.string().optional(),
  updated: z.string().optional(),
  author: z.string().optional(),
  /** Pattern ids this one depends on */
  dependencies: z.array(z.string()).default([]),
  deprecated: z.boolean().default(false),
  deprecated_reason: z.string().optional(),
  replaced_by: z.string().optional(),
});

export type PatternMetadata = z.output<typeof PatternMetadataSchema>;
export type PatternMetadataInput = z.input<typeof PatternMetadataSchema>;

/** A pattern file may carry its metadata inline */
const PatternFileSchema = ThreatPatternSchema.extend({
  metadata: PatternMetadataSchema.optional(),
});

export type PatternConflictType = 'duplicate_id' | 'deprecated';

export interface PatternConflict {
  type: PatternConflictType;
  pattern_id: string;
  message: string;
  replaced_by?: string;
}

export interface DirectoryLoadResult {
  loaded: number;
  errors: { file: string; message: string }[];
}

interface RejectedRegistration {
  pattern_id: string;
  existing: ThreatModelingFramework;
  attempted: ThreatModelingFramework;
}

export const DEFAULT_PATTERN_VERSION = '1.0.0';

// ─── Registry ────────────────────────────────────────────────────────

export class PatternRegistry {
  private readonly patterns = new Map<string, ThreatPattern>();
  private readonly metadata = new Map<string, PatternMetadata>();
  private readonly rejected: RejectedRegistration[] = [];
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? createLogger();
  }

  /**
   * Add or replace a pattern. Throws when the pattern is incomplete or
   * its id is already registered under a different framework.
   */
  registerPattern(pattern: ThreatPattern, metadata?: PatternMetadataInput): void {
    validatePattern(pattern);

    const existing = this.patterns.get(pattern.id);
    if (existing && existing.framework !== pattern.framework) {
      this.rejected.push({ pattern_id: pattern.id, existing: existing.framework, attempted: pattern.framework });
      logPatternRegistry(this.logger, 'reject', pattern.id, `framework ${pattern.framework} conflicts with ${existing.framework}`);
      throw new Error(
        `Pattern ${pattern.id} already exists with different framework: ${existing.framework} vs ${pattern.framework}`,
      );
    }

    this.patterns.set(pattern.id, pattern);
    this.metadata.set(
      pattern.id,
      PatternMetadataSchema.parse(metadata ?? { version: DEFAULT_PATTERN_VERSION, created: new Date().toISOString() }),
    );
    logPatternRegistry(this.logger, existing ? 'replace' : 'register', pattern.id, pattern.framework);
  }

  getPattern(id: string): ThreatPattern | undefined {
    return this.patterns.get(id);
  }

  getPatternsByFramework(framework: ThreatModelingFramework): ThreatPattern[] {
    return [...this.patterns.values()].filter(p => p.framework === framework);
  }

  getAllPatterns(): ThreatPattern[] {
    return [...this.patterns.values()];
  }

  getPatternMetadata(id: string): PatternMetadata | undefined {
    return this.metadata.get(id);
  }

  isDeprecated(id: string): boolean {
    return this.metadata.get(id)?.deprecated ?? false;
  }

  /** Dependency ids of `id` that are not registered */
  validateDependencies(id: string): string[] {
    const meta = this.metadata.get(id);
    if (!meta) return [];
    return meta.dependencies.filter(dep => !this.patterns.has(dep));
  }

  checkConflicts(): PatternConflict[] {
    const conflicts: PatternConflict[] = this.rejected.map((r): PatternConflict => ({
      type: 'duplicate_id',
      pattern_id: r.pattern_id,
      message: `Pattern ${r.pattern_id} exists with frameworks ${r.existing} and ${r.attempted}`,
    }));

    for (const [id, meta] of this.metadata) {
      if (!meta.deprecated || !this.patterns.has(id)) continue;
      conflicts.push({
        type: 'deprecated',
        pattern_id: id,
        message: `Pattern ${id} is deprecated: ${meta.deprecated_reason ?? 'No reason provided'}`,
        replaced_by: meta.replaced_by,
      });
    }

    return conflicts;
  }

  /**
   * Register every `*.json` pattern file in `dir`. Files that fail to
   * parse, validate or register are logged, collected and skipped.
   */
  async loadPatternsFromDirectory(dir: string): Promise<DirectoryLoadResult> {
    const result: DirectoryLoadResult = { loaded: 0, errors: [] };
    if (!existsSync(dir)) return result;

    const files = (await fg('*.json', { cwd: dir, absolute: true, onlyFiles: true })).sort();
    for (const file of files) {
      try {
        const { metadata, ...pattern } = PatternFileSchema.parse(JSON.parse(await readFile(file, 'utf-8')));
        this.registerPattern(pattern, metadata);
        logPatternRegistry(this.logger, 'load', pattern.id, file);
        result.loaded++;
      } catch (err) {
        logPatternLoadError(this.logger, file, err);
        result.errors.push({ file, message: errorMessage(err) });
      }
    }
    return result;
  }
}

// ─── Validation ──────────────────────────────────────────────────────

function validatePattern(pattern: ThreatPattern): void {
  if (!pattern.id) throw new Error('Pattern ID is required');
  if (!pattern.title) throw new Error('Pattern title is required');
  if (!pattern.description) throw new Error('Pattern description is required');
  if (pattern.detection_patterns.length === 0) {
    throw new Error('Pattern must have at least one detection pattern');
  }
  if (pattern.attack_vectors.length === 0) {
    throw new Error('Pattern must have at least one attack vector');
  }
  if (!FRAMEWORKS.some(f => f === pattern.framework)) {
    throw new Error(`Invalid framework: ${pattern.framework}`);
  }
}
