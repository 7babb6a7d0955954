import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { checkComponents, runAnalysis } from '../src/analysis/index.js';
import { loadThreatModel, parseThreatModel, saveThreatModel, serializeThreatModel } from '../src/io/index.js';
import { validateThreatModel } from '../src/model/validate.js';
import { createPluginRegistry } from '../src/plugins/registry.js';
import { stripAnsi } from '../src/cli/format.js';
import { createLogger } from '../src/utils/logger.js';
import type { PluginRegistry } from '../src/plugins/registry.js';
import type { Threat, ThreatModel } from '../src/types/index.js';

const silent = createLogger({ level: 'silent' });
const fixture = (path: string) => fileURLToPath(new URL(path, import.meta.url));
const DECK_PATH = fixture('./fixtures/plot4ai-deck.json');

function llmModel(): ThreatModel {
  return parseThreatModel({
    metadata: { version: '1.0.0' },
    system: {
      name: 'Chat',
      type: 'llm-app',
      threat_modeling_framework: 'owasp-llm-top10-2025',
      components: [
        { id: 'llm-1', name: 'LLM Service', type: 'llm', trust_level: 'internal' },
        { id: 'db', name: 'Customer DB', type: 'database', trust_level: 'internal' },
      ],
      data_flows: [{ from: 'llm-1', to: 'db', classification: 'restricted', encrypted: false }],
    },
    threats: [
      { id: 'old', category: 'X', framework: 'custom', title: 'Stale finding', affected_components: ['ghost'] },
    ],
  });
}

// ─── runAnalysis ─────────────────────────────────────────────────────

describe('runAnalysis', () => {
  let registry: PluginRegistry;

  beforeEach(() => {
    registry = createPluginRegistry({ deckPath: DECK_PATH, logger: silent });
  });

  it('replaces the threat list and stamps the update time', () => {
    const model = llmModel();
    const result = runAnalysis(model, registry, { logger: silent });

    expect(result.plugin?.kind).toBe('llm');
    expect(result.model.threats.some(t => t.id === 'old')).toBe(false);
    expect(result.model.threats).toBe(result.analysis.threats);
    expect(result.model.metadata.updated).toBeDefined();
    expect(model.threats).toHaveLength(1);
    expect(model.metadata.updated).toBeUndefined();
  });

  it('flags the restricted unencrypted flow', () => {
    const { model } = runAnalysis(llmModel(), registry, { logger: silent });
    const flow = model.threats.filter(t => t.affected_data_flows.length > 0);
    expect(flow.map(t => `${t.category}:${t.affected_data_flows[0]}`)).toEqual(['LLM06:llm-1->db']);
  });

  it('prefixes component issues with the component id', () => {
    const result = runAnalysis(llmModel(), registry, { logger: silent });
    expect(result.issues).toEqual({
      errors: [],
      warnings: ['llm-1: LLM component should specify capabilities'],
    });
  });

  it('checks stale threat references only on request', () => {
    const model = llmModel();
    expect(checkComponents(model, null).errors).toEqual([]);
    expect(checkComponents(model, null, true).errors).toEqual(['Threat old references unknown component: ghost']);
  });

  it('warns and leaves the model alone when no plugin applies', () => {
    const lines: string[] = [];
    const logger = createLogger({ level: 'warn', sink: l => lines.push(stripAnsi(l)) });
    const model = parseThreatModel({
      metadata: { version: '1.0.0' },
      system: { name: 'Shop', type: 'web-app', threat_modeling_framework: 'owasp-top10-2021' },
    });

    const result = runAnalysis(model, registry, { logger });
    expect(result.plugin).toBeNull();
    expect(result.model).toBe(model);
    expect(result.analysis.threat_count).toBe(0);
    expect(lines).toEqual(['WARN: No plugin registered for system type web-app (framework owasp-top10-2021)']);
  });

  it('routes PLOT4AI models to the card deck and applies answers', () => {
    const model = parseThreatModel({
      metadata: { version: '1.0.0' },
      system: {
        name: 'Assistant',
        type: 'llm-app',
        threat_modeling_framework: 'plot4ai',
        components: [{ id: 'llm', name: 'Model', type: 'llm' }],
      },
    });
    const result = runAnalysis(model, registry, { logger: silent, detect: { answers: { '1-0': 'No' } } });
    expect(result.plugin?.kind).toBe('plot4ai');
    expect(result.model.threats.map(t => t.id)).toEqual(['PLOT4AI-1-1', 'PLOT4AI-2-0']);
    expect(result.issues).toEqual({ errors: [], warnings: [] });
  });

  it('finds the same threats on repeated runs', () => {
    const shape = (threats: Threat[]) => threats.map(t => `${t.category}:${t.affected_components.join(',')}`);
    const first = runAnalysis(llmModel(), registry, { logger: silent });
    const second = runAnalysis(first.model, registry, { logger: silent });
    expect(shape(second.model.threats)).toEqual(shape(first.model.threats));
  });
});

// ─── Document IO ─────────────────────────────────────────────────────

describe('threat model files', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'aitm-io-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes flows as from/to and reads them back', () => {
    const file = join(dir, 'nested', 'chat.tm.json');
    const saved = saveThreatModel(file, llmModel());

    const raw: unknown = JSON.parse(readFileSync(file, 'utf-8'));
    expect(raw).toMatchObject({
      system: { data_flows: [{ from: 'llm-1', to: 'db', classification: 'restricted', encrypted: false }] },
    });
    expect(readFileSync(file, 'utf-8').includes('from_component')).toBe(false);

    const loaded = loadThreatModel(file);
    expect(loaded.system.data_flows[0].from_component).toBe('llm-1');
    expect(loaded.metadata.updated).toBe(saved.metadata.updated);
    expect(loaded.threats.map(t => t.id)).toEqual(['old']);
  });

  it('leaves out an absent visualization', () => {
    expect('visualization' in serializeThreatModel(llmModel())).toBe(false);
  });

  it('reports a missing file', () => {
    const file = join(dir, 'missing.tm.json');
    expect(() => loadThreatModel(file)).toThrow(`Threat model not found: ${file}`);
  });

  it('reports malformed JSON', () => {
    const file = join(dir, 'bad.tm.json');
    writeFileSync(file, '{ "metadata": ');
    expect(() => loadThreatModel(file)).toThrow(`Invalid JSON in ${file}: `);
  });

  it('reports an invalid document', () => {
    const file = join(dir, 'invalid.tm.json');
    writeFileSync(file, JSON.stringify({ metadata: { version: '1.0.0' }, system: { name: 'x', type: 'toaster' } }));
    expect(() => loadThreatModel(file)).toThrow(`Invalid threat model ${file}: `);
  });
});

// ─── Examples ────────────────────────────────────────────────────────

describe('example threat models', () => {
  const registry = createPluginRegistry({ logger: silent });

  it('analyzes the LLM chatbot', () => {
    const model = loadThreatModel(fixture('../examples/simple-llm-app.tm.json'));
    expect(validateThreatModel(model)).toEqual([]);

    const result = runAnalysis(model, registry, { logger: silent });
    expect(result.issues).toEqual({ errors: [], warnings: [] });
    expect(result.model.threats.every(t => /^LLM(0[1-9]|10)$/.test(t.category))).toBe(true);

    const flow = result.model.threats.filter(t => t.affected_data_flows.length > 0);
    expect(flow).toHaveLength(1);
    expect(flow[0].description).toBe(
      'Sensitive data (confidential) is transmitted unencrypted between LLM Service and Knowledge Base',
    );
  });

  it('analyzes the agentic research assistant', () => {
    const model = loadThreatModel(fixture('../examples/agentic-system.tm.json'));
    expect(validateThreatModel(model)).toEqual([]);

    const { model: analyzed, issues } = runAnalysis(model, registry, { logger: silent });
    expect(issues).toEqual({ errors: [], warnings: [] });
    expect(analyzed.threats.filter(t => t.affected_data_flows.length > 0).map(t => t.affected_data_flows[0]))
      .toEqual(['planner->executor']);
    expect(analyzed.threats.filter(t => t.title === 'Insufficient Agent Isolation').map(t => t.affected_components))
      .toEqual([['planner', 'executor']]);
    expect(analyzed.threats.some(t => t.category === 'AGENTIC02' && t.affected_components[0] === 'search')).toBe(true);
  });
});
