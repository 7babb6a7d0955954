import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { PluginRegistry, createPluginRegistry } from '../src/plugins/registry.js';
import { PatternRegistry } from '../src/plugins/pattern-registry.js';
import { LLMPlugin } from '../src/plugins/llm.js';
import { AgenticPlugin } from '../src/plugins/agentic.js';
import { MultiAgentPlugin } from '../src/plugins/multi-agent.js';
import { Plot4AIPlugin } from '../src/plugins/plot4ai.js';
import { createSystemModel, createThreatPattern } from '../src/model/factory.js';
import { stripAnsi } from '../src/cli/format.js';
import { createLogger } from '../src/utils/logger.js';
import type { ThreatPatternInput } from '../src/model/schema.js';

const silent = createLogger({ level: 'silent' });
const DECK_PATH = fileURLToPath(new URL('./fixtures/plot4ai-deck.json', import.meta.url));

// ─── Plugin registry ─────────────────────────────────────────────────

describe('PluginRegistry', () => {
  let registry: PluginRegistry;

  beforeEach(() => {
    registry = createPluginRegistry({ deckPath: DECK_PATH, logger: silent });
  });

  it('registers the built-in plugins by system type', () => {
    expect(registry.getPlugin('llm-app')).toBeInstanceOf(LLMPlugin);
    expect(registry.getPlugin('agentic-system')).toBeInstanceOf(AgenticPlugin);
    expect(registry.getPlugin('multi-agent')).toBeInstanceOf(MultiAgentPlugin);
    expect([...registry.listPlugins().keys()]).toEqual(['llm-app', 'agentic-system', 'multi-agent']);
  });

  it('returns null for an unregistered system type', () => {
    expect(registry.getPlugin('web-app')).toBeNull();
    expect(registry.isRegistered('web-app')).toBe(false);
  });

  it('registers PLOT4AI by framework', () => {
    expect(registry.getFrameworkPlugin('plot4ai')).toBeInstanceOf(Plot4AIPlugin);
    expect(registry.getFrameworkPlugin('stride')).toBeNull();
  });

  it('resolves by framework first, then by system type', () => {
    const system = (framework: 'plot4ai' | 'owasp-llm-top10-2025') => createSystemModel({
      name: 'S', type: 'llm-app', threat_modeling_framework: framework,
    });
    expect(registry.resolve(system('plot4ai'))?.kind).toBe('plot4ai');
    expect(registry.resolve(system('owasp-llm-top10-2025'))?.kind).toBe('llm');
  });

  it('lets a later registration win', () => {
    const replacement = new LLMPlugin({ logger: silent });
    registry.register(replacement);
    expect(registry.getPlugin('llm-app')).toBe(replacement);
    expect(registry.listPlugins().size).toBe(3);
  });

  it('hands out copies of its maps', () => {
    registry.listPlugins().clear();
    expect(registry.isRegistered('llm-app')).toBe(true);
  });

  it('clears both slots', () => {
    registry.clear();
    expect(registry.getPlugin('llm-app')).toBeNull();
    expect(registry.getFrameworkPlugin('plot4ai')).toBeNull();
    expect(registry.listPlugins().size).toBe(0);
    expect(registry.listFrameworkPlugins().size).toBe(0);
  });

  it('starts empty when constructed directly', () => {
    expect(new PluginRegistry().listPlugins().size).toBe(0);
  });
});

// ─── Pattern registry ────────────────────────────────────────────────

function pattern(overrides: Partial<ThreatPatternInput> = {}) {
  return createThreatPattern({
    id: 'P1',
    category: 'P1',
    framework: 'custom',
    title: 'Pattern one',
    description: 'First pattern',
    detection_patterns: ['phrase'],
    attack_vectors: ['vector'],
    ...overrides,
  });
}

describe('PatternRegistry', () => {
  let registry: PatternRegistry;

  beforeEach(() => {
    registry = new PatternRegistry({ logger: silent });
  });

  it('stores patterns with default metadata', () => {
    registry.registerPattern(pattern());
    expect(registry.getPattern('P1')?.title).toBe('Pattern one');
    expect(registry.getPatternMetadata('P1')).toMatchObject({ version: '1.0.0', dependencies: [], deprecated: false });
    expect(registry.getPatternsByFramework('custom')).toHaveLength(1);
    expect(registry.getPatternsByFramework('stride')).toEqual([]);
  });

  it('rejects incomplete patterns', () => {
    expect(() => registry.registerPattern(pattern({ detection_patterns: [] })))
      .toThrow('Pattern must have at least one detection pattern');
    expect(() => registry.registerPattern(pattern({ attack_vectors: [] })))
      .toThrow('Pattern must have at least one attack vector');
    expect(() => registry.registerPattern(pattern({ title: '' }))).toThrow('Pattern title is required');
    expect(registry.getAllPatterns()).toEqual([]);
  });

  it('rejects an id reused under another framework and reports it', () => {
    registry.registerPattern(pattern());
    expect(() => registry.registerPattern(pattern({ framework: 'stride' })))
      .toThrow('Pattern P1 already exists with different framework: custom vs stride');
    expect(registry.getPattern('P1')?.framework).toBe('custom');
    expect(registry.checkConflicts()).toEqual([{
      type: 'duplicate_id',
      pattern_id: 'P1',
      message: 'Pattern P1 exists with frameworks custom and stride',
    }]);
  });

  it('replaces a pattern registered again under the same framework', () => {
    registry.registerPattern(pattern());
    registry.registerPattern(pattern({ title: 'Pattern one v2' }), { version: '2.0.0' });
    expect(registry.getAllPatterns()).toHaveLength(1);
    expect(registry.getPattern('P1')?.title).toBe('Pattern one v2');
    expect(registry.getPatternMetadata('P1')?.version).toBe('2.0.0');
  });

  it('reports deprecated patterns', () => {
    registry.registerPattern(pattern({ id: 'P3' }), {
      version: '1.1.0', deprecated: true, deprecated_reason: 'Merged into P2', replaced_by: 'P2',
    });
    expect(registry.isDeprecated('P3')).toBe(true);
    expect(registry.checkConflicts()).toEqual([{
      type: 'deprecated',
      pattern_id: 'P3',
      message: 'Pattern P3 is deprecated: Merged into P2',
      replaced_by: 'P2',
    }]);
  });

  it('lists missing dependencies', () => {
    registry.registerPattern(pattern());
    registry.registerPattern(pattern({ id: 'P2' }), { version: '1.0.0', dependencies: ['P1', 'P9'] });
    expect(registry.validateDependencies('P2')).toEqual(['P9']);
    expect(registry.validateDependencies('P1')).toEqual([]);
    expect(registry.validateDependencies('unknown')).toEqual([]);
  });

  it('logs registrations at debug level', () => {
    const lines: string[] = [];
    const debug = new PatternRegistry({ logger: createLogger({ level: 'debug', sink: l => lines.push(stripAnsi(l)) }) });
    debug.registerPattern(pattern());
    expect(lines).toHaveLength(1);
    expect(lines[0].endsWith('DEBUG: Pattern registry: register - P1 - custom')).toBe(true);
  });

  describe('loadPatternsFromDirectory', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'aitm-patterns-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('loads valid files and collects failures per file', async () => {
      writeFileSync(join(dir, 'good.json'), JSON.stringify({
        ...pattern({ id: 'G1' }),
        metadata: { version: '3.0.0', author: 'test' },
      }));
      writeFileSync(join(dir, 'bad.json'), '{ broken');
      writeFileSync(join(dir, 'incomplete.json'), JSON.stringify({ id: 'X1', title: 'No vectors' }));
      writeFileSync(join(dir, 'notes.txt'), 'ignored');

      const result = await registry.loadPatternsFromDirectory(dir);
      expect(result.loaded).toBe(1);
      expect(result.errors.map(e => basename(e.file))).toEqual(['bad.json', 'incomplete.json']);
      expect(registry.getPatternMetadata('G1')?.version).toBe('3.0.0');
    });

    it('treats a missing directory as empty', async () => {
      expect(await registry.loadPatternsFromDirectory(join(dir, 'missing'))).toEqual({ loaded: 0, errors: [] });
    });
  });
});
