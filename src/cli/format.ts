/**
 * AI Threat Model — Terminal formatting.
 * Severity badges, tables and per-threat summary lines.
 */

import chalk from 'chalk';
import { countBySeverity } from '../model/system.js';
import type { Severity, SystemModel, Threat, ThreatPattern } from '../types/index.js';

// ─── Color tokens ────────────────────────────────────────────────────

export const C = {
  // Severity
  critical: chalk.bgRed.white.bold,
  high:     chalk.bgYellow.black.bold,
  medium:   chalk.yellow,
  low:      chalk.blue,
  unset:    chalk.gray,

  // UI
  dim:      chalk.dim,
  bold:     chalk.bold,
  green:    chalk.green,
  red:      chalk.red,
  yellow:   chalk.yellow,
  gray:     chalk.gray,
  cyan:     chalk.cyan,
};

// ─── String cleaning ─────────────────────────────────────────────────

/** Strip ANSI escape codes from a string */
export function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/[\u001b\u009b][[()#;?]*(?:[0-9]{1,4}(?:;[0-9]{0,4})*)?[0-9A-ORZcf-nqry=><]/g, '');
}

/** Truncate string to max width with ellipsis */
export function trunc(s: string, max: number): string {
  if (s.length <= max) return s;
  return s.slice(0, max - 1) + '…';
}

// ─── Severity ────────────────────────────────────────────────────────

export function severityBadge(sev?: Severity): string {
  switch (sev) {
    case 'critical': return C.critical(' CRIT ');
    case 'high':     return C.high(' HIGH ');
    case 'medium':   return C.medium('  MED ');
    case 'low':      return C.low('  LOW ');
    default:         return C.unset(' ---- ');
  }
}

// ─── Tables ──────────────────────────────────────────────────────────

export interface Column {
  header: string;
  width: number;
  align?: 'left' | 'right';
}

export function formatTable(columns: Column[], rows: string[][]): string[] {
  const lines: string[] = [];

  const headerLine = columns.map(c =>
    c.align === 'right' ? c.header.padStart(c.width) : c.header.padEnd(c.width),
  ).join('  ');
  lines.push(C.dim(headerLine));
  lines.push(C.dim(columns.map(c => '─'.repeat(c.width)).join('  ')));

  for (const row of rows) {
    const cells = columns.map((c, i) => {
      const val = (row[i] ?? '').slice(0, c.width);
      return c.align === 'right' ? val.padStart(c.width) : val.padEnd(c.width);
    });
    lines.push(cells.join('  ').trimEnd());
  }

  return lines;
}

export function formatPatternTable(patterns: readonly ThreatPattern[]): string[] {
  return formatTable(
    [
      { header: 'ID', width: 16 },
      { header: 'FRAMEWORK', width: 24 },
      { header: 'TITLE', width: 48 },
    ],
    patterns.map(p => [p.id, p.framework, trunc(p.title, 48)]),
  );
}

// ─── Threats ─────────────────────────────────────────────────────────

/**
 * One line per threat:
 * `<badge> <category> <title> → <components or flows>`
 */
export function formatThreatLine(threat: Threat): string {
  const targets = [...threat.affected_components, ...threat.affected_data_flows];
  const where = targets.length > 0 ? ` ${C.dim('→')} ${targets.join(', ')}` : '';
  return `${severityBadge(threat.severity)} ${C.bold(threat.category)} ${threat.title}${where}`;
}

/** "N threat(s): 1 critical, 2 high, …" with zero counts left out */
export function formatSeveritySummary(threats: readonly Threat[]): string {
  const counts = countBySeverity(threats);
  const parts = Object.entries(counts)
    .filter(([, n]) => n > 0)
    .map(([sev, n]) => `${n} ${sev}`);
  const head = `${threats.length} threat(s)`;
  return parts.length > 0 ? `${head}: ${parts.join(', ')}` : head;
}

export function formatSystemHeader(system: SystemModel): string {
  return `${C.bold(system.name)} ${C.dim(`(${system.type}, ${system.threat_modeling_framework})`)}`
    + ` ${C.dim('─')} ${system.components.length} component(s), ${system.data_flows.length} data flow(s)`;
}
