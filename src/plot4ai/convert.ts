/**
 * AI Threat Model — PLOT4AI card conversion.
 * Cards become ThreatPatterns (catalog view) or Threats (detection result).
 */

import { createMitigation } from '../model/factory.js';
import type { DeckCard } from './deck.js';
import type { PatternMitigation, Threat, ThreatPattern, ThreatReference } from '../types/index.js';

export interface ElicitationQuestion {
  id: string;
  question: string;
  label: string;
  threatif: string;
  categories: string[];
  phases: string[];
  explanation: string;
}

export function cardThreatId(entry: DeckCard): string {
  return `PLOT4AI-${entry.cardId}`;
}

/**
 * Bulleted (`*`) lines of a recommendation, or the whole text when it has
 * no bullets.
 */
export function parseRecommendations(text: string): string[] {
  const bullets = text
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.startsWith('*'))
    .map(line => line.replace(/^\*+/, '').trim());
  const items = bullets.length > 0 ? bullets : [text.trim()];
  return items.filter(item => item.length > 0);
}

/**
 * One reference per non-empty line. Text before the first URL is the
 * title; a line without a URL is a title with an empty url.
 */
export function parseSources(text: string): ThreatReference[] {
  return text
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0)
    .map(line => {
      const at = line.indexOf('http');
      if (at < 0) return { title: line, url: '' };
      const url = line.slice(at).split(/\s+/)[0];
      return { title: line.slice(0, at).trim() || 'Reference', url };
    });
}

function cardMitigations(entry: DeckCard): PatternMitigation[] {
  const id = cardThreatId(entry);
  return parseRecommendations(entry.card.recommendation).map((description, i) => ({
    id: `${id}-mit-${i}`,
    description,
    priority: 'medium',
  }));
}

export function cardToPattern(entry: DeckCard): ThreatPattern {
  const { card } = entry;
  return {
    id: cardThreatId(entry),
    category: card.label,
    framework: 'plot4ai',
    title: card.label,
    description: card.explanation,
    detection_patterns: [card.explanation, `Elicitation question: ${card.question}`],
    attack_vectors: [
      ...card.categories.map(c => `Category: ${c}`),
      ...card.phases.map(p => `Lifecycle phase: ${p}`),
    ],
    mitigations: cardMitigations(entry),
    references: parseSources(card.sources),
  };
}

/** Threat for a card; PLOT4AI assigns no severity. */
export function cardToThreat(entry: DeckCard): Threat {
  const { card } = entry;
  const mitigations = cardMitigations(entry).map(m => createMitigation({ ...m, status: 'proposed' }));
  return {
    id: cardThreatId(entry),
    category: card.label,
    framework: 'plot4ai',
    title: card.label,
    description: card.explanation,
    affected_components: [],
    affected_data_flows: [],
    attack_vectors: card.categories.map(c => `Category: ${c}`),
    detection_patterns: [card.explanation, `Elicitation: ${card.question}`],
    mitigations,
    references: parseSources(card.sources),
    lifecycle_phase: card.phases[0],
    elicitation_question: card.question,
    plot4ai_card_id: entry.cardId,
  };
}

export function cardToQuestion(entry: DeckCard): ElicitationQuestion {
  const { card } = entry;
  return {
    id: entry.cardId,
    question: card.question,
    label: card.label,
    threatif: card.threatif,
    categories: [...card.categories],
    phases: [...card.phases],
    explanation: card.explanation,
  };
}

/**
 * Whether an answer makes the card a threat. No answer counts as one;
 * "maybe" always does; "yes"/"no" must equal the card's threatif.
 */
export function answerIndicatesThreat(entry: DeckCard, answer: string | undefined): boolean {
  if (answer === undefined) return true;
  const a = answer.trim().toLowerCase();
  if (a === 'maybe') return true;
  return (a === 'yes' || a === 'no') && a === entry.card.threatif.trim().toLowerCase();
}
