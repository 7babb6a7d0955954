/**
 * AI Threat Model — PLOT4AI deck loading and card selection.
 *
 * The deck is the `deck.json` published by the PLOT4AI library
 * (https://plot4.ai/, CC-BY-SA-4.0): an array of category groups, each
 * holding threat cards. A `{ "categories": [...] }` wrapper is accepted
 * too. The deck is read from a local file; nothing is downloaded.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { errorMessage } from '../utils/errors.js';

// ─── Schema ──────────────────────────────────────────────────────────

export const Plot4AICardSchema = z.object({
  question: z.string(),
  /** Answer that makes the card a threat: "Yes" or "No" */
  threatif: z.string(),
  label: z.string(),
  explanation: z.string(),
  recommendation: z.string().default(''),
  categories: z.array(z.string()).default([]),
  phases: z.array(z.string()).default([]),
  aitypes: z.array(z.string()).default([]),
  roles: z.array(z.string()).default([]),
  sources: z.string().default(''),
  qr: z.string().default(''),
});

export const Plot4AICategoryGroupSchema = z.object({
  category: z.string(),
  id: z.number().int(),
  colour: z.string().default(''),
  cards: z.array(Plot4AICardSchema).default([]),
});

export const Plot4AIDeckSchema = z.union([
  z.array(Plot4AICategoryGroupSchema).transform(categories => ({ categories })),
  z.object({ categories: z.array(Plot4AICategoryGroupSchema).default([]) }),
]);

export type Plot4AICard = z.output<typeof Plot4AICardSchema>;
export type Plot4AICategoryGroup = z.output<typeof Plot4AICategoryGroupSchema>;
export type Plot4AIDeck = z.output<typeof Plot4AIDeckSchema>;

export const PLOT4AI_PHASES = ['Design', 'Input', 'Model', 'Output', 'Deploy', 'Monitor'] as const;

export const EMPTY_DECK: Plot4AIDeck = { categories: [] };

/** A card with its position in the deck */
export interface DeckCard {
  card: Plot4AICard;
  categoryId: number;
  index: number;
  /** "{categoryId}-{index}", the key answers are given under */
  cardId: string;
}

export interface CardFilters {
  lifecyclePhase?: string;
  category?: string;
  aiType?: string;
}

// ─── Loading ─────────────────────────────────────────────────────────

export function parseDeck(data: unknown): Plot4AIDeck {
  return Plot4AIDeckSchema.parse(data);
}

export function loadDeckFromFile(file: string): Plot4AIDeck {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (err) {
    throw new Error(`Cannot read PLOT4AI deck ${file}: ${errorMessage(err)}`);
  }
  try {
    return parseDeck(data);
  } catch (err) {
    throw new Error(`Invalid PLOT4AI deck ${file}: ${errorMessage(err)}`);
  }
}

// ─── Selection ───────────────────────────────────────────────────────

export function deckCards(deck: Plot4AIDeck): DeckCard[] {
  return deck.categories.flatMap(group =>
    group.cards.map((card, index) => ({
      card,
      categoryId: group.id,
      index,
      cardId: `${group.id}-${index}`,
    })),
  );
}

/** Filters combine with AND; exact, case-sensitive membership like the deck's own values. */
export function filterCards(cards: readonly DeckCard[], filters: CardFilters = {}): DeckCard[] {
  const { lifecyclePhase, category, aiType } = filters;
  return cards.filter(({ card }) =>
    (!lifecyclePhase || card.phases.includes(lifecyclePhase))
    && (!category || card.categories.includes(category))
    && (!aiType || card.aitypes.includes(aiType)),
  );
}
