/**
 * AI Threat Model — PLOT4AI plugin.
 *
 * Card-driven rather than pattern-matched: every card that survives the
 * lifecycle phase / category / AI type filters and the elicitation answers
 * becomes a threat. The deck is loaded on first use and cached; when it
 * cannot be loaded the plugin works from an empty deck.
 */

import { existsSync } from 'node:fs';
import { BasePlugin } from './base.js';
import { EMPTY_DECK, deckCards, filterCards, loadDeckFromFile } from '../plot4ai/deck.js';
import { answerIndicatesThreat, cardToPattern, cardToQuestion, cardToThreat } from '../plot4ai/convert.js';
import { errorMessage } from '../utils/errors.js';
import type { PluginOptions } from './base.js';
import type { DetectOptions } from './types.js';
import type { CardFilters, DeckCard, Plot4AIDeck } from '../plot4ai/deck.js';
import type { ElicitationQuestion } from '../plot4ai/convert.js';
import type {
  Component, ComponentType, SystemModel, Threat, ThreatModelingFramework,
  ThreatPattern, ValidationResult,
} from '../types/index.js';

export interface Plot4AIPluginOptions extends PluginOptions {
  /** Use this deck instead of reading one */
  deck?: Plot4AIDeck;
  /** Local deck.json */
  deckPath?: string;
}

export class Plot4AIPlugin extends BasePlugin {
  readonly kind = 'plot4ai';
  // Applies to any AI system; registered by framework, not by this type
  readonly systemType = 'llm-app';
  readonly supportedFrameworks = ['plot4ai'] as const;
  protected readonly systemLabel = 'AI systems';

  private deck: Plot4AIDeck | null;
  private patterns: ThreatPattern[] | null = null;
  private readonly deckPath?: string;

  constructor(options: Plot4AIPluginOptions = {}) {
    super(options);
    this.deck = options.deck ?? null;
    this.deckPath = options.deckPath;
  }

  private loadDeck(): Plot4AIDeck {
    if (this.deck) return this.deck;

    if (!this.deckPath) {
      this.logger.warn('No PLOT4AI deck configured; no cards loaded');
      this.deck = EMPTY_DECK;
    } else if (!existsSync(this.deckPath)) {
      this.logger.warn(`PLOT4AI deck not found at ${this.deckPath}; no cards loaded`);
      this.deck = EMPTY_DECK;
    } else {
      try {
        this.deck = loadDeckFromFile(this.deckPath);
        this.logger.debug(`Loaded PLOT4AI deck from ${this.deckPath}`);
      } catch (err) {
        this.logger.warn(`${errorMessage(err)}; no cards loaded`);
        this.deck = EMPTY_DECK;
      }
    }
    return this.deck;
  }

  private cards(filters: CardFilters = {}): DeckCard[] {
    return filterCards(deckCards(this.loadDeck()), filters);
  }

  detectThreats(system: SystemModel, options: DetectOptions = {}): Threat[] {
    const candidates = this.cards(options);
    const threats = candidates
      .filter(entry => answerIndicatesThreat(entry, options.answers?.[entry.cardId]))
      .map(cardToThreat);
    this.logger.debug(`PLOT4AI: ${threats.length} of ${candidates.length} cards apply to ${system.name}`);
    return threats;
  }

  getElicitationQuestions(filters: CardFilters = {}): ElicitationQuestion[] {
    return this.cards(filters).map(cardToQuestion);
  }

  getThreatPatterns(framework?: ThreatModelingFramework): ThreatPattern[] {
    if (framework !== undefined && framework !== 'plot4ai') return [];
    if (!this.patterns) {
      this.patterns = deckCards(this.loadDeck()).map(cardToPattern);
    }
    return [...this.patterns];
  }

  getComponentTypes(): ComponentType[] {
    return ['llm', 'agent', 'tool', 'memory', 'database', 'api-endpoint'];
  }

  /** Only required fields are checked; any component type is acceptable. */
  validateComponent(component: Component): ValidationResult {
    const errors: string[] = [];
    if (!component.id.trim()) errors.push('Component ID is required');
    if (!component.name.trim()) errors.push('Component name is required');
    return { valid: errors.length === 0, errors, warnings: [] };
  }
}
