/**
 * AI Threat Model — Matcher heuristic tables.
 * Plain data; the layers in match.ts read these and nothing else.
 */

/**
 * Canonical risk phrasings, keyed by regex source. A detection phrase turns
 * a check on only when it contains the key text itself (backslashes
 * included); the compiled key is then run against the component text.
 */
export const REGEX_HEURISTICS: readonly string[] = [
  'no\\s+\\w+\\s+(validation|sanitization|filtering|protection)',
  'untrusted\\s+\\w+',
  'excessive\\s+\\w+',
  'arbitrary\\s+\\w+',
];

/** Keywords that tie a detection phrase to declared capabilities */
export const CAPABILITY_KEYWORDS: readonly string[] = [
  'execute', 'access', 'modify', 'delete', 'create',
  'authentication', 'authorization', 'permission',
  'plugin', 'tool', 'api', 'database', 'file',
];

/** Phrase keywords relevant to an untrusted component */
export const UNTRUSTED_KEYWORDS: readonly string[] = [
  'untrusted', 'external', 'third-party', 'public', 'user input',
];

/** Phrase keywords relevant to a component handling confidential or restricted flows */
export const SENSITIVE_DATA_KEYWORDS: readonly string[] = [
  'sensitive', 'confidential', 'restricted', 'pii', 'personal data',
];

/** Phrase keywords relevant to sensitive data moving unencrypted */
export const INSECURE_TRANSPORT_KEYWORDS: readonly string[] = [
  'unencrypted', 'no encryption', 'plaintext', 'insecure',
];

/** Shorter words are ignored by the keyword layer */
export const MIN_SIGNIFICANT_WORD_LENGTH = 4;
