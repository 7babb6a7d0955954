/**
 * AI Threat Model — Plugin registry.
 *
 * Two slots: plugins keyed by system type, and plugins keyed by threat
 * modeling framework. `resolve` prefers the framework slot, so a system
 * modeled with PLOT4AI gets the PLOT4AI plugin whatever its type, while
 * every other llm-app still gets the LLM plugin.
 *
 * The registry is an ordinary object; callers own its lifetime. Mutating
 * it while another caller reads is not synchronized.
 */

import { LLMPlugin } from './llm.js';
import { AgenticPlugin } from './agentic.js';
import { MultiAgentPlugin } from './multi-agent.js';
import { Plot4AIPlugin } from './plot4ai.js';
import { createLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import type { Plot4AIDeck } from '../plot4ai/deck.js';
import type { SystemModel, SystemType, ThreatModelingFramework } from '../types/index.js';

export type AnyPlugin = LLMPlugin | AgenticPlugin | MultiAgentPlugin | Plot4AIPlugin;

export class PluginRegistry {
  private readonly bySystemType = new Map<SystemType, AnyPlugin>();
  private readonly byFramework = new Map<ThreatModelingFramework, AnyPlugin>();

  /** Register under the plugin's system type. A later registration wins. */
  register(plugin: AnyPlugin): void {
    this.bySystemType.set(plugin.systemType, plugin);
  }

  /** Register under each framework the plugin supports. A later registration wins. */
  registerForFramework(plugin: AnyPlugin): void {
    for (const framework of plugin.supportedFrameworks) {
      this.byFramework.set(framework, plugin);
    }
  }

  getPlugin(systemType: SystemType): AnyPlugin | null {
    return this.bySystemType.get(systemType) ?? null;
  }

  getFrameworkPlugin(framework: ThreatModelingFramework): AnyPlugin | null {
    return this.byFramework.get(framework) ?? null;
  }

  /** Plugin for a system: framework slot first, then system type */
  resolve(system: SystemModel): AnyPlugin | null {
    return this.getFrameworkPlugin(system.threat_modeling_framework) ?? this.getPlugin(system.type);
  }

  /** Snapshot of the system-type slot */
  listPlugins(): Map<SystemType, AnyPlugin> {
    return new Map(this.bySystemType);
  }

  listFrameworkPlugins(): Map<ThreatModelingFramework, AnyPlugin> {
    return new Map(this.byFramework);
  }

  isRegistered(systemType: SystemType): boolean {
    return this.bySystemType.has(systemType);
  }

  clear(): void {
    this.bySystemType.clear();
    this.byFramework.clear();
  }
}

// ─── Loading ─────────────────────────────────────────────────────────

export interface LoadPluginsOptions {
  /** Override tree for the catalog plugins */
  patternsDir?: string;
  /** PLOT4AI deck.json */
  deckPath?: string;
  /** Preloaded PLOT4AI deck; takes precedence over deckPath */
  deck?: Plot4AIDeck;
  logger?: Logger;
}

interface PluginEntry {
  name: string;
  slot: 'system' | 'framework';
  create: (opts: LoadPluginsOptions, logger: Logger) => AnyPlugin;
}

const BUILTIN_PLUGINS: readonly PluginEntry[] = [
  { name: 'llm', slot: 'system', create: (o, logger) => new LLMPlugin({ patternsDir: o.patternsDir, logger }) },
  { name: 'agentic', slot: 'system', create: (o, logger) => new AgenticPlugin({ patternsDir: o.patternsDir, logger }) },
  { name: 'multi-agent', slot: 'system', create: (o, logger) => new MultiAgentPlugin({ patternsDir: o.patternsDir, logger }) },
  { name: 'plot4ai', slot: 'framework', create: (o, logger) => new Plot4AIPlugin({ deck: o.deck, deckPath: o.deckPath, logger }) },
];

/**
 * Instantiate and register the built-in plugins. A plugin that fails to
 * construct is logged and left out; the rest still register.
 */
export function loadPlugins(registry: PluginRegistry, options: LoadPluginsOptions = {}): PluginRegistry {
  const logger = options.logger ?? createLogger();
  for (const entry of BUILTIN_PLUGINS) {
    try {
      const plugin = entry.create(options, logger);
      if (entry.slot === 'framework') registry.registerForFramework(plugin);
      else registry.register(plugin);
    } catch (err) {
      logger.warn(`Failed to load plugin ${entry.name}: ${errorMessage(err)}`);
    }
  }
  return registry;
}

export function createPluginRegistry(options: LoadPluginsOptions = {}): PluginRegistry {
  return loadPlugins(new PluginRegistry(), options);
}
