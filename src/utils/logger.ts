/**
 * AI Threat Model — Leveled logging to stderr.
 *
 * Lines look like `WARN: message`, or `WARN [scope]: message` for a scoped
 * logger. At debug level every line is prefixed with an ISO timestamp.
 * Loggers are plain objects passed down explicitly; there is no global one.
 */

import chalk from 'chalk';
import { errorMessage } from './errors.js';

// ─── Types ───────────────────────────────────────────────────────────

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

type Emitting = Exclude<LogLevel, 'silent'>;

export interface Logger {
  readonly level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  isDebug(): boolean;
  /** Same level and sink, with a scope tag */
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  scope?: string;
  /** Defaults to console.error */
  sink?: (line: string) => void;
}

const TAG: Record<Emitting, (s: string) => string> = {
  debug: chalk.gray,
  info:  chalk.blue,
  warn:  chalk.yellow,
  error: chalk.red,
};

// ─── Factory ─────────────────────────────────────────────────────────

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const sink = options.sink ?? ((line: string) => console.error(line));
  const threshold = LOG_LEVELS.indexOf(level);

  const emit = (at: Emitting, message: string) => {
    if (LOG_LEVELS.indexOf(at) < threshold) return;
    const scope = options.scope ? ` [${options.scope}]` : '';
    const stamp = level === 'debug' ? `${chalk.dim(new Date().toISOString())} ` : '';
    sink(`${stamp}${TAG[at](at.toUpperCase())}${scope}: ${message}`);
  };

  return {
    level,
    debug: (m) => emit('debug', m),
    info: (m) => emit('info', m),
    warn: (m) => emit('warn', m),
    error: (m) => emit('error', m),
    isDebug: () => level === 'debug',
    child: (scope) => createLogger({
      level,
      sink,
      scope: options.scope ? `${options.scope}:${scope}` : scope,
    }),
  };
}

/** Map user input (flag, env var, config file) to a level. */
export function parseLogLevel(raw: string | undefined): LogLevel | undefined {
  if (!raw) return undefined;
  const normalized = raw.trim().toLowerCase();
  if (normalized === 'warning') return 'warn';
  return LOG_LEVELS.find(l => l === normalized);
}

// ─── Domain helpers ──────────────────────────────────────────────────

export function logPatternLoadError(logger: Logger, file: string, err: unknown): void {
  logger.warn(`Failed to load pattern ${file}: ${errorMessage(err)}`);
}

export function logThreatDetection(
  logger: Logger,
  componentId: string,
  patternId: string,
  matched: boolean,
  reason?: string,
): void {
  if (!logger.isDebug()) return;
  const status = matched ? 'MATCHED' : 'no match';
  logger.debug(`Threat detection: ${patternId} vs ${componentId} - ${status}${reason ? ` (${reason})` : ''}`);
}

export function logPatternRegistry(
  logger: Logger,
  action: string,
  patternId: string,
  details?: string,
): void {
  if (!logger.isDebug()) return;
  logger.debug(`Pattern registry: ${action} - ${patternId}${details ? ` - ${details}` : ''}`);
}
