export {
  explainMatch, patternMatchesComponent, searchableText,
  matchesSubstring, matchesSignificantWords, matchesRegexHeuristic,
  matchesCapabilityKeyword, matchesContext,
} from './match.js';
export type { MatchLayer } from './match.js';
export {
  REGEX_HEURISTICS, CAPABILITY_KEYWORDS, UNTRUSTED_KEYWORDS,
  SENSITIVE_DATA_KEYWORDS, INSECURE_TRANSPORT_KEYWORDS, MIN_SIGNIFICANT_WORD_LENGTH,
} from './tables.js';
