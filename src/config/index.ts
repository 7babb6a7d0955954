/**
 * AI Threat Model — Configuration resolution.
 *
 * Resolution order (highest to lowest priority), per field:
 *   1. Explicit flags (--patterns-dir, --deck, --log-level, --debug)
 *   2. AITM_PATTERNS_DIR, AITM_PLOT4AI_DECK, AITM_LOG_LEVEL, AITM_DEBUG
 *   3. Project config: .threat-model/config.json
 *   4. Global config: ~/.config/ai-threat-model/config.json
 *
 * Relative paths resolve against the directory the value applies to: the
 * project root for flags, env vars and the project file, the home directory
 * for the global file.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import { z } from 'zod';
import { LOG_LEVELS, parseLogLevel } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { LogLevel } from '../utils/logger.js';

// ─── Types ───────────────────────────────────────────────────────────

export const ConfigFileSchema = z.object({
  /** Override tree for the pattern catalogs */
  patternsDir: z.string().min(1).optional(),
  /** Local PLOT4AI deck.json */
  plot4aiDeck: z.string().min(1).optional(),
  logLevel: z.enum(LOG_LEVELS).optional(),
});

export type SavedConfig = z.infer<typeof ConfigFileSchema>;

export interface ConfigFlags {
  patternsDir?: string;
  deckPath?: string;
  logLevel?: string;
  /** Shorthand for logLevel debug */
  debug?: boolean;
}

export interface ConfigEnvironment {
  env?: Readonly<Record<string, string | undefined>>;
  /** Home directory for the global config file */
  home?: string;
}

export type ConfigSource = 'flags' | 'env' | 'project' | 'global' | 'default';

export interface ResolvedConfig {
  patternsDir?: string;
  deckPath: string;
  logLevel: LogLevel;
  sources: {
    patternsDir: ConfigSource;
    deckPath: ConfigSource;
    logLevel: ConfigSource;
  };
  /** Config files or values that were ignored, and why */
  warnings: string[];
}

const CONFIG_DIR = '.threat-model';
const CONFIG_FILE = 'config.json';

// ─── Config file paths ───────────────────────────────────────────────

/** Project-level config: <root>/.threat-model/config.json */
export function projectConfigPath(root: string): string {
  return join(root, CONFIG_DIR, CONFIG_FILE);
}

/** Global config: ~/.config/ai-threat-model/config.json */
export function globalConfigPath(home: string = homedir()): string {
  return join(home, '.config', 'ai-threat-model', CONFIG_FILE);
}

/** Default deck location: <root>/.threat-model/plot4ai/deck.json */
export function defaultDeckPath(root: string): string {
  return join(root, CONFIG_DIR, 'plot4ai', 'deck.json');
}

// ─── Read/write helpers ──────────────────────────────────────────────

function readConfigFile(path: string, warnings?: string[]): SavedConfig | null {
  if (!existsSync(path)) return null;
  try {
    return ConfigFileSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
  } catch (err) {
    warnings?.push(`Ignoring config ${path}: ${errorMessage(err)}`);
    return null;
  }
}

function writeConfigFile(path: string, data: SavedConfig): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(ConfigFileSchema.parse(data), null, 2) + '\n');
}

// ─── Unified resolution ──────────────────────────────────────────────

interface Candidate<T> {
  value: T | undefined;
  source: ConfigSource;
}

function firstDefined<T>(candidates: Candidate<T>[]): Candidate<T> | undefined {
  return candidates.find(c => c.value !== undefined);
}

function isTruthyEnv(raw: string | undefined): boolean {
  return raw === '1' || raw?.toLowerCase() === 'true';
}

/**
 * Resolve configuration for a project.
 *
 * @param root  - Project root (for the project config and relative paths)
 * @param flags - Explicit CLI flags (highest priority, never persisted)
 */
export function resolveConfig(
  root: string,
  flags: ConfigFlags = {},
  environment: ConfigEnvironment = {},
): ResolvedConfig {
  const env = environment.env ?? process.env;
  const home = environment.home ?? homedir();
  const warnings: string[] = [];

  const project = readConfigFile(projectConfigPath(root), warnings);
  const global = readConfigFile(globalConfigPath(home), warnings);

  const inRoot = (p: string | undefined) => (p === undefined ? undefined : resolve(root, p));
  const inHome = (p: string | undefined) => (p === undefined ? undefined : resolve(home, p));

  const patternsDir = firstDefined<string>([
    { value: inRoot(flags.patternsDir), source: 'flags' },
    { value: inRoot(env.AITM_PATTERNS_DIR || undefined), source: 'env' },
    { value: inRoot(project?.patternsDir), source: 'project' },
    { value: inHome(global?.patternsDir), source: 'global' },
  ]);

  const deckPath = firstDefined<string>([
    { value: inRoot(flags.deckPath), source: 'flags' },
    { value: inRoot(env.AITM_PLOT4AI_DECK || undefined), source: 'env' },
    { value: inRoot(project?.plot4aiDeck), source: 'project' },
    { value: inHome(global?.plot4aiDeck), source: 'global' },
  ]);

  const level = (raw: string | undefined, where: string): LogLevel | undefined => {
    const parsed = parseLogLevel(raw);
    if (raw && !parsed) warnings.push(`Ignoring unknown log level "${raw}" from ${where}`);
    return parsed;
  };

  const logLevel = firstDefined<LogLevel>([
    { value: flags.debug ? 'debug' : level(flags.logLevel, 'flags'), source: 'flags' },
    { value: isTruthyEnv(env.AITM_DEBUG) ? 'debug' : level(env.AITM_LOG_LEVEL, 'AITM_LOG_LEVEL'), source: 'env' },
    { value: project?.logLevel, source: 'project' },
    { value: global?.logLevel, source: 'global' },
  ]);

  return {
    patternsDir: patternsDir?.value,
    deckPath: deckPath?.value ?? defaultDeckPath(root),
    logLevel: logLevel?.value ?? 'info',
    sources: {
      patternsDir: patternsDir?.source ?? 'default',
      deckPath: deckPath?.source ?? 'default',
      logLevel: logLevel?.source ?? 'default',
    },
    warnings,
  };
}

// ─── Save/load for `ai-threat-model config` ──────────────────────────

export function saveProjectConfig(root: string, cfg: SavedConfig): void {
  writeConfigFile(projectConfigPath(root), cfg);
}

export function saveGlobalConfig(cfg: SavedConfig, home?: string): void {
  writeConfigFile(globalConfigPath(home), cfg);
}

/** null when the file is missing or invalid */
export function loadProjectConfig(root: string): SavedConfig | null {
  return readConfigFile(projectConfigPath(root));
}

export function loadGlobalConfig(home?: string): SavedConfig | null {
  return readConfigFile(globalConfigPath(home));
}

// ─── Display helpers ─────────────────────────────────────────────────

const ENV_VARS: Record<keyof ResolvedConfig['sources'], string> = {
  patternsDir: 'AITM_PATTERNS_DIR',
  deckPath: 'AITM_PLOT4AI_DECK',
  logLevel: 'AITM_LOG_LEVEL / AITM_DEBUG',
};

/** Where a resolved field came from, for `config show` */
export function describeConfigSource(
  config: ResolvedConfig,
  field: keyof ResolvedConfig['sources'],
): string {
  switch (config.sources[field]) {
    case 'flags':   return 'CLI flags';
    case 'env':     return `${ENV_VARS[field]} env var`;
    case 'project': return `${CONFIG_DIR}/${CONFIG_FILE}`;
    case 'global':  return `~/.config/ai-threat-model/${CONFIG_FILE}`;
    case 'default': return 'default';
  }
}
