import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { PLOT4AI_PHASES, deckCards, filterCards, loadDeckFromFile, parseDeck } from '../src/plot4ai/deck.js';
import { answerIndicatesThreat, parseRecommendations, parseSources } from '../src/plot4ai/convert.js';
import { Plot4AIPlugin } from '../src/plugins/plot4ai.js';
import { createComponent, createSystemModel } from '../src/model/factory.js';
import { stripAnsi } from '../src/cli/format.js';
import { createLogger } from '../src/utils/logger.js';

const DECK_PATH = fileURLToPath(new URL('./fixtures/plot4ai-deck.json', import.meta.url));
const silent = createLogger({ level: 'silent' });

const system = createSystemModel({
  name: 'Assistant',
  type: 'llm-app',
  threat_modeling_framework: 'plot4ai',
  components: [{ id: 'llm', name: 'Model', type: 'llm' }],
});

// ─── Deck ────────────────────────────────────────────────────────────

describe('PLOT4AI deck', () => {
  const deck = loadDeckFromFile(DECK_PATH);

  it('numbers cards by category id and position', () => {
    expect(deckCards(deck).map(c => c.cardId)).toEqual(['1-0', '1-1', '2-0']);
  });

  it('uses only the known lifecycle phases', () => {
    const phases: readonly string[] = PLOT4AI_PHASES;
    expect(deckCards(deck).every(({ card }) => card.phases.every(p => phases.includes(p)))).toBe(true);
  });

  it('accepts the wrapped form', () => {
    expect(deckCards(parseDeck({ categories: deck.categories })).map(c => c.cardId)).toEqual(['1-0', '1-1', '2-0']);
  });

  it('filters by phase, category and AI type together', () => {
    const cards = deckCards(deck);
    const ids = (filters: Parameters<typeof filterCards>[1]) => filterCards(cards, filters).map(c => c.cardId);
    expect(ids({ lifecyclePhase: 'Input' })).toEqual(['1-0', '2-0']);
    expect(ids({ category: 'Security' })).toEqual(['2-0']);
    expect(ids({ aiType: 'Generative AI' })).toEqual(['1-0', '1-1']);
    expect(ids({ lifecyclePhase: 'Input', aiType: 'Generative AI' })).toEqual(['1-0']);
    expect(ids({ lifecyclePhase: 'Deploy' })).toEqual([]);
  });
});

describe('card text parsing', () => {
  it('splits bulleted recommendations', () => {
    expect(parseRecommendations('* Hash datasets\n* Restrict write access')).toEqual([
      'Hash datasets', 'Restrict write access',
    ]);
    expect(parseRecommendations('  Review outputs.  ')).toEqual(['Review outputs.']);
    expect(parseRecommendations('')).toEqual([]);
  });

  it('splits sources into titled references', () => {
    expect(parseSources('Consent guide https://example.org/consent\nInternal policy')).toEqual([
      { title: 'Consent guide', url: 'https://example.org/consent' },
      { title: 'Internal policy', url: '' },
    ]);
    expect(parseSources('https://example.org/a (see section 2)')).toEqual([
      { title: 'Reference', url: 'https://example.org/a' },
    ]);
  });
});

describe('answerIndicatesThreat', () => {
  const [yesCard, noCard] = deckCards(loadDeckFromFile(DECK_PATH));

  it('counts a missing answer and maybe as threats', () => {
    expect(answerIndicatesThreat(yesCard, undefined)).toBe(true);
    expect(answerIndicatesThreat(noCard, 'MAYBE')).toBe(true);
  });

  it('needs the answer to match threatif', () => {
    expect(answerIndicatesThreat(yesCard, 'yes')).toBe(true);
    expect(answerIndicatesThreat(yesCard, 'No')).toBe(false);
    expect(answerIndicatesThreat(noCard, ' no ')).toBe(true);
    expect(answerIndicatesThreat(noCard, 'Yes')).toBe(false);
    expect(answerIndicatesThreat(noCard, 'unsure')).toBe(false);
  });
});

// ─── Plugin ──────────────────────────────────────────────────────────

describe('Plot4AIPlugin', () => {
  const plugin = new Plot4AIPlugin({ deckPath: DECK_PATH, logger: silent });

  it('turns every card into a threat when nothing is answered', () => {
    const threats = plugin.detectThreats(system);
    expect(threats.map(t => t.id)).toEqual(['PLOT4AI-1-0', 'PLOT4AI-1-1', 'PLOT4AI-2-0']);
    expect(threats.every(t => t.severity === undefined && t.framework === 'plot4ai')).toBe(true);
  });

  it('builds threats from card content', () => {
    const [threat] = plugin.detectThreats(system);
    expect(threat).toMatchObject({
      category: 'Hidden Data Collection',
      title: 'Hidden Data Collection',
      description: 'Data gathered without notice can breach consent requirements.',
      attack_vectors: ['Category: Technique & Processes', 'Category: Ethics & Human Rights'],
      lifecycle_phase: 'Design',
      elicitation_question: 'Is the data collected from people without their knowledge?',
      plot4ai_card_id: '1-0',
    });
    expect(threat.mitigations).toEqual([
      { id: 'PLOT4AI-1-0-mit-0', description: 'Tell people what is collected', priority: 'medium', status: 'proposed' },
      { id: 'PLOT4AI-1-0-mit-1', description: 'Record the legal basis', priority: 'medium', status: 'proposed' },
    ]);
    expect(threat.references).toEqual([
      { title: 'Consent guide', url: 'https://example.org/consent' },
      { title: 'Internal policy', url: '' },
    ]);
  });

  it('applies elicitation answers', () => {
    const threats = plugin.detectThreats(system, { answers: { '1-0': 'No', '1-1': 'no', '2-0': 'Maybe' } });
    expect(threats.map(t => t.plot4ai_card_id)).toEqual(['1-1', '2-0']);
  });

  it('applies filters before answers', () => {
    const threats = plugin.detectThreats(system, { lifecyclePhase: 'Input', answers: { '2-0': 'No' } });
    expect(threats.map(t => t.plot4ai_card_id)).toEqual(['1-0']);
  });

  it('lists elicitation questions', () => {
    expect(plugin.getElicitationQuestions({ category: 'Security' })).toEqual([{
      id: '2-0',
      question: 'Could someone alter the training data?',
      label: 'Training Data Tampering',
      threatif: 'Yes',
      categories: ['Security'],
      phases: ['Input', 'Model'],
      explanation: 'Tampered training data changes model behaviour.',
    }]);
  });

  it('exposes cards as patterns only for the plot4ai framework', () => {
    const patterns = plugin.getThreatPatterns();
    expect(patterns.map(p => p.id)).toEqual(['PLOT4AI-1-0', 'PLOT4AI-1-1', 'PLOT4AI-2-0']);
    expect(patterns[2].attack_vectors).toEqual(['Category: Security', 'Lifecycle phase: Input', 'Lifecycle phase: Model']);
    expect(patterns[2].references).toEqual([{ title: 'Reference', url: 'https://example.org/data-integrity' }]);
    expect(plugin.getThreatPatterns('plot4ai')).toHaveLength(3);
    expect(plugin.getThreatPatterns('owasp-llm-top10-2025')).toEqual([]);
  });

  it('accepts any component type with a name', () => {
    expect(plugin.validateComponent(createComponent({ id: 'x', name: 'Edge', type: 'cdn' }))).toEqual({
      valid: true, errors: [], warnings: [],
    });
  });
});

describe('Plot4AIPlugin without a usable deck', () => {
  let dir: string;
  let lines: string[];
  const logger = () => createLogger({ level: 'warn', sink: line => lines.push(stripAnsi(line)) });

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'aitm-deck-'));
    lines = [];
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('warns once when no deck is configured', () => {
    const plugin = new Plot4AIPlugin({ logger: logger() });
    expect(plugin.detectThreats(system)).toEqual([]);
    expect(plugin.getElicitationQuestions()).toEqual([]);
    expect(lines).toEqual(['WARN: No PLOT4AI deck configured; no cards loaded']);
  });

  it('warns when the deck file is missing', () => {
    const path = join(dir, 'deck.json');
    const plugin = new Plot4AIPlugin({ deckPath: path, logger: logger() });
    expect(plugin.detectThreats(system)).toEqual([]);
    expect(lines).toEqual([`WARN: PLOT4AI deck not found at ${path}; no cards loaded`]);
  });

  it('warns when the deck is invalid', () => {
    const path = join(dir, 'deck.json');
    writeFileSync(path, JSON.stringify({ categories: 5 }));
    const plugin = new Plot4AIPlugin({ deckPath: path, logger: logger() });
    expect(plugin.getThreatPatterns()).toEqual([]);
    expect(lines).toHaveLength(1);
    expect(lines[0].startsWith(`WARN: Invalid PLOT4AI deck ${path}: `)).toBe(true);
    expect(lines[0].endsWith('; no cards loaded')).toBe(true);
  });
});
