export {
  Plot4AICardSchema, Plot4AICategoryGroupSchema, Plot4AIDeckSchema, PLOT4AI_PHASES, EMPTY_DECK,
  parseDeck, loadDeckFromFile, deckCards, filterCards,
} from './deck.js';
export type { Plot4AICard, Plot4AICategoryGroup, Plot4AIDeck, DeckCard, CardFilters } from './deck.js';
export {
  cardThreatId, parseRecommendations, parseSources, cardToPattern, cardToThreat,
  cardToQuestion, answerIndicatesThreat,
} from './convert.js';
export type { ElicitationQuestion } from './convert.js';
