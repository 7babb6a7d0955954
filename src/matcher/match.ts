/**
 * AI Threat Model — Pattern → component matcher.
 *
 * Layers run in order and stop at the first hit:
 *   1. type         component type is one the plugin says triggers the pattern
 *   2. substring    a detection phrase occurs verbatim in the component text
 *   3. keywords     all significant words of a multi-word phrase occur
 *   4. regex        a phrase quoting a REGEX_HEURISTICS key verbatim, whose
 *                   regex then matches the component text
 *   5. capabilities a capability keyword appears in a phrase and the capabilities
 *   6. context      trust level and data flow classification (needs the system)
 *
 * Pure: the same inputs always give the same answer.
 */

import {
  CAPABILITY_KEYWORDS, INSECURE_TRANSPORT_KEYWORDS, MIN_SIGNIFICANT_WORD_LENGTH,
  REGEX_HEURISTICS, SENSITIVE_DATA_KEYWORDS, UNTRUSTED_KEYWORDS,
} from './tables.js';
import { getDataFlowsFor, isSensitiveClassification } from '../model/system.js';
import type { Component, ComponentType, SystemModel, ThreatPattern } from '../types/index.js';

export type MatchLayer = 'type' | 'substring' | 'keywords' | 'regex' | 'capabilities' | 'context';

// ─── Text ────────────────────────────────────────────────────────────

/** Lower-cased name, type, description and capabilities */
export function searchableText(component: Component): string {
  return [
    component.name,
    component.type,
    component.description ?? '',
    component.capabilities.join(' '),
  ].join(' ').toLowerCase();
}

function significantWords(phrase: string): string[] {
  return phrase
    .toLowerCase()
    .split(/\s+/)
    .map(w => w.replace(/^[^\w]+|[^\w]+$/g, ''))
    .filter(w => w.length >= MIN_SIGNIFICANT_WORD_LENGTH);
}

function mentionsAny(phrase: string, keywords: readonly string[]): boolean {
  const lower = phrase.toLowerCase();
  return keywords.some(k => lower.includes(k));
}

// ─── Layers ──────────────────────────────────────────────────────────

export function matchesSubstring(phrase: string, text: string): boolean {
  return text.includes(phrase.toLowerCase());
}

/** Multi-word phrases only; a single word is the substring layer's job. */
export function matchesSignificantWords(phrase: string, text: string): boolean {
  if (phrase.trim().split(/\s+/).length < 2) return false;
  const words = significantWords(phrase);
  return words.length > 0 && words.every(w => text.includes(w));
}

const COMPILED_HEURISTICS = REGEX_HEURISTICS.map(key => ({ key, regex: new RegExp(key) }));

// The gate is the literal key text, not the compiled regex.
export function matchesRegexHeuristic(phrase: string, text: string): boolean {
  const lower = phrase.toLowerCase();
  return COMPILED_HEURISTICS.some(h => lower.includes(h.key) && h.regex.test(text));
}

export function matchesCapabilityKeyword(phrase: string, capabilities: readonly string[]): boolean {
  if (capabilities.length === 0) return false;
  const caps = capabilities.join(' ').toLowerCase();
  const lower = phrase.toLowerCase();
  return CAPABILITY_KEYWORDS.some(k => lower.includes(k) && caps.includes(k));
}

export function matchesContext(phrase: string, component: Component, system: SystemModel): boolean {
  if (component.trust_level === 'untrusted' && mentionsAny(phrase, UNTRUSTED_KEYWORDS)) {
    return true;
  }

  const sensitiveFlows = getDataFlowsFor(system, component.id)
    .filter(df => isSensitiveClassification(df.classification));
  if (sensitiveFlows.length === 0) return false;

  if (mentionsAny(phrase, SENSITIVE_DATA_KEYWORDS)) return true;
  return sensitiveFlows.some(df => !df.encrypted) && mentionsAny(phrase, INSECURE_TRANSPORT_KEYWORDS);
}

// ─── Entry points ────────────────────────────────────────────────────

/**
 * Which layer matched `pattern` against `component`, or null.
 *
 * @param triggerTypes - component types the calling plugin declares as
 *   triggering this pattern outright
 * @param system - enables the context layer
 */
export function explainMatch(
  pattern: ThreatPattern,
  component: Component,
  triggerTypes: readonly ComponentType[],
  system?: SystemModel,
): MatchLayer | null {
  if (triggerTypes.includes(component.type)) return 'type';

  const text = searchableText(component);
  const phrases = pattern.detection_patterns;

  if (phrases.some(p => matchesSubstring(p, text))) return 'substring';
  if (phrases.some(p => matchesSignificantWords(p, text))) return 'keywords';
  if (phrases.some(p => matchesRegexHeuristic(p, text))) return 'regex';
  if (phrases.some(p => matchesCapabilityKeyword(p, component.capabilities))) return 'capabilities';
  if (system && phrases.some(p => matchesContext(p, component, system))) return 'context';

  return null;
}

export function patternMatchesComponent(
  pattern: ThreatPattern,
  component: Component,
  triggerTypes: readonly ComponentType[],
  system?: SystemModel,
): boolean {
  return explainMatch(pattern, component, triggerTypes, system) !== null;
}
