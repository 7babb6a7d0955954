#!/usr/bin/env node

/**
 * AI Threat Model CLI
 *
 * Usage:
 *   ai-threat-model init <file>              Write an empty threat model
 *   ai-threat-model analyze <file>           Detect threats and update the model
 *   ai-threat-model validate <file>          Check references and components
 *   ai-threat-model patterns [system-type]   List a plugin's threat patterns
 *   ai-threat-model questions                List PLOT4AI elicitation questions
 *   ai-threat-model config <action>          Show or edit configuration
 */

import { Command, Option } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { basename, resolve } from 'node:path';
import { z } from 'zod';
import { checkComponents, runAnalysis } from '../analysis/index.js';
import { CATALOG_NAMES } from '../catalogs/builtin.js';
import {
  describeConfigSource, loadGlobalConfig, loadProjectConfig, resolveConfig,
  saveGlobalConfig, saveProjectConfig,
} from '../config/index.js';
import { loadThreatModel, saveThreatModel } from '../io/index.js';
import { createThreatModel } from '../model/factory.js';
import { sortBySeverity } from '../model/system.js';
import { PLOT4AI_PHASES } from '../plot4ai/deck.js';
import { Plot4AIPlugin } from '../plugins/plot4ai.js';
import { PatternRegistry } from '../plugins/pattern-registry.js';
import { createPluginRegistry } from '../plugins/registry.js';
import { FRAMEWORKS, SYSTEM_TYPES } from '../types/index.js';
import { LOG_LEVELS, createLogger, parseLogLevel } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import {
  C, formatPatternTable, formatSeveritySummary, formatSystemHeader, formatThreatLine,
} from './format.js';
import type { AnalysisIssues } from '../analysis/index.js';
import type { ResolvedConfig, SavedConfig } from '../config/index.js';
import type { AnyPlugin, PluginRegistry } from '../plugins/registry.js';
import type { Logger } from '../utils/logger.js';
import type { SystemType, ThreatModelingFramework, ThreatPattern } from '../types/index.js';

const program = new Command();

const PackageJsonSchema = z.object({ version: z.string() });
const AnswersSchema = z.record(z.string());

/** Framework a new model of each system type starts with */
const DEFAULT_FRAMEWORKS: Partial<Record<SystemType, ThreatModelingFramework>> = {
  'llm-app': 'owasp-llm-top10-2025',
  'agentic-system': 'owasp-agentic-top10-2026',
  'multi-agent': 'owasp-agentic-top10-2026',
};

function packageVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
  return PackageJsonSchema.parse(raw).version;
}

program
  .name('ai-threat-model')
  .description('Threat modeling for LLM applications, agentic and multi-agent systems')
  .version(packageVersion());

// ─── Shared setup ────────────────────────────────────────────────────

interface CommonOpts {
  patternsDir?: string;
  deck?: string;
  logLevel?: string;
  debug?: boolean;
}

function withCommonOptions(cmd: Command): Command {
  return cmd
    .option('--patterns-dir <dir>', `Pattern override directory (subdirectories: ${CATALOG_NAMES.join(', ')})`)
    .option('--deck <file>', 'PLOT4AI deck.json')
    .addOption(new Option('--log-level <level>', 'Log level').choices([...LOG_LEVELS, 'warning']))
    .option('--debug', 'Shorthand for --log-level debug');
}

interface Context {
  root: string;
  config: ResolvedConfig;
  logger: Logger;
}

function setup(opts: CommonOpts): Context {
  const root = resolve('.');
  const config = resolveConfig(root, {
    patternsDir: opts.patternsDir,
    deckPath: opts.deck,
    logLevel: opts.logLevel,
    debug: opts.debug,
  });
  const logger = createLogger({ level: config.logLevel });
  for (const w of config.warnings) logger.warn(w);
  return { root, config, logger };
}

function pluginRegistry({ config, logger }: Context): PluginRegistry {
  return createPluginRegistry({ patternsDir: config.patternsDir, deckPath: config.deckPath, logger });
}

function loadAnswers(file: string): Record<string, string> {
  if (!existsSync(file)) throw new Error(`Answers file not found: ${file}`);
  return AnswersSchema.parse(JSON.parse(readFileSync(file, 'utf-8')));
}

// ─── init ────────────────────────────────────────────────────────────

program
  .command('init')
  .description('Write an empty threat model document')
  .argument('<file>', 'Threat model file to create (e.g. system.tm.json)')
  .option('-n, --name <name>', 'System name (default: file name)')
  .addOption(new Option('-t, --type <type>', 'System type').choices(SYSTEM_TYPES).default('llm-app'))
  .addOption(new Option('-f, --framework <framework>', 'Threat modeling framework (default: by system type)').choices(FRAMEWORKS))
  .option('-a, --author <author>', 'Author recorded in metadata')
  .option('--force', 'Overwrite an existing file')
  .action(async (file: string, opts: { name?: string; type: string; framework?: string; author?: string; force?: boolean }) => {
    const target = resolve(file);
    if (existsSync(target) && !opts.force) {
      console.error(`${file} already exists. Use --force to overwrite.`);
      process.exit(1);
    }

    const type = z.enum(SYSTEM_TYPES).parse(opts.type);
    const framework = opts.framework
      ? z.enum(FRAMEWORKS).parse(opts.framework)
      : DEFAULT_FRAMEWORKS[type] ?? 'custom';
    const name = opts.name ?? basename(file).replace(/\.tm\.json$|\.json$/, '');

    saveThreatModel(target, createThreatModel({ name, type, framework, author: opts.author }));
    console.log(`✓ Created ${file} (${type}, ${framework})`);
  });

// ─── analyze ─────────────────────────────────────────────────────────

withCommonOptions(
  program
    .command('analyze')
    .description('Detect threats and replace the threat list of a threat model')
    .argument('<file>', 'Threat model file')
    .option('-o, --output <file>', 'Write the updated model here instead of overwriting the input')
    .option('--dry-run', 'Print threats without writing the model')
    .option('--json', 'Print threats as JSON')
    .addOption(new Option('--phase <phase>', 'PLOT4AI: only cards of this lifecycle phase').choices(PLOT4AI_PHASES))
    .option('--category <category>', 'PLOT4AI: only cards of this category')
    .option('--ai-type <type>', 'PLOT4AI: only cards for this AI type')
    .option('--answers <file>', 'PLOT4AI: JSON object of card id → Yes/No/Maybe'),
).action(async (file: string, opts: CommonOpts & {
    output?: string; dryRun?: boolean; json?: boolean;
    phase?: string; category?: string; aiType?: string; answers?: string;
  }) => {
  const ctx = setup(opts);
  const model = loadThreatModel(resolve(file));
  const answers = opts.answers ? loadAnswers(resolve(opts.answers)) : undefined;

  const result = runAnalysis(model, pluginRegistry(ctx), {
    detect: { lifecyclePhase: opts.phase, category: opts.category, aiType: opts.aiType, answers },
    logger: ctx.logger,
  });
  printIssues(result.issues);

  const threats = sortBySeverity(result.model.threats);
  if (opts.json) {
    console.log(JSON.stringify(threats, null, 2));
  } else {
    console.log(formatSystemHeader(model.system));
    for (const t of threats) console.log(`  ${formatThreatLine(t)}`);
    console.log(formatSeveritySummary(threats));
  }

  if (!result.plugin) return;
  if (opts.dryRun) {
    console.error(C.dim('Dry run: threat model not written.'));
    return;
  }
  const out = resolve(opts.output ?? file);
  saveThreatModel(out, result.model);
  console.error(`✓ Wrote ${threats.length} threat(s) to ${opts.output ?? file}`);
});

// ─── validate ────────────────────────────────────────────────────────

withCommonOptions(
  program
    .command('validate')
    .description('Check data flow and threat references, and component fit for the system type')
    .argument('<file>', 'Threat model file'),
).action(async (file: string, opts: CommonOpts) => {
  const ctx = setup(opts);
  const model = loadThreatModel(resolve(file));
  const plugin = pluginRegistry(ctx).resolve(model.system);
  if (!plugin) {
    ctx.logger.warn(`No plugin registered for system type ${model.system.type}; checking references only`);
  }

  const issues = checkComponents(model, plugin, true);
  printIssues(issues);

  if (issues.errors.length === 0) {
    console.error('✓ Threat model valid.');
  }
  process.exit(issues.errors.length > 0 ? 1 : 0);
});

// ─── patterns ────────────────────────────────────────────────────────

withCommonOptions(
  program
    .command('patterns')
    .description('List threat patterns (all plugins, or one system type)')
    .argument('[system-type]', `One of: ${SYSTEM_TYPES.join(', ')}`)
    .addOption(new Option('--framework <framework>', 'Only patterns of this framework').choices(FRAMEWORKS))
    .option('--check', 'Report duplicate ids across frameworks and deprecated patterns')
    .option('--registry <dir>', 'With --check: also load versioned pattern files from this directory'),
).action(async (systemType: string | undefined, opts: CommonOpts & { framework?: string; check?: boolean; registry?: string }) => {
  const ctx = setup(opts);
  const registry = pluginRegistry(ctx);
  const framework = opts.framework ? z.enum(FRAMEWORKS).parse(opts.framework) : undefined;

  let plugins: AnyPlugin[];
  if (systemType) {
    const plugin = registry.getPlugin(z.enum(SYSTEM_TYPES).parse(systemType));
    if (!plugin) {
      ctx.logger.warn(`No plugin registered for system type ${systemType}`);
      return;
    }
    plugins = [plugin];
  } else {
    plugins = [...registry.listPlugins().values(), ...registry.listFrameworkPlugins().values()];
  }

  const patterns: ThreatPattern[] = plugins.flatMap(p => p.getThreatPatterns(framework));
  if (!opts.check) {
    for (const line of formatPatternTable(patterns)) console.log(line);
    console.log(C.dim(`\n${patterns.length} pattern(s)`));
    return;
  }

  const patternRegistry = new PatternRegistry({ logger: ctx.logger });
  for (const pattern of patterns) {
    try {
      patternRegistry.registerPattern(pattern);
    } catch (err) {
      ctx.logger.debug(errorMessage(err));
    }
  }
  if (opts.registry) {
    const { loaded, errors } = await patternRegistry.loadPatternsFromDirectory(resolve(opts.registry));
    console.error(`Loaded ${loaded} pattern file(s), ${errors.length} rejected`);
  }

  const conflicts = patternRegistry.checkConflicts();
  for (const c of conflicts) {
    const replaced = c.replaced_by ? ` (replaced by ${c.replaced_by})` : '';
    console.log(`${c.type === 'duplicate_id' ? C.red('✗') : C.yellow('⚠')} ${c.message}${replaced}`);
  }
  for (const p of patternRegistry.getAllPatterns()) {
    const missing = patternRegistry.validateDependencies(p.id);
    if (missing.length > 0) console.log(`${C.yellow('⚠')} Pattern ${p.id} depends on unknown pattern(s): ${missing.join(', ')}`);
  }
  if (conflicts.length === 0) console.log('✓ No pattern conflicts.');
});

// ─── questions ───────────────────────────────────────────────────────

withCommonOptions(
  program
    .command('questions')
    .description('List PLOT4AI elicitation questions')
    .addOption(new Option('--phase <phase>', 'Only cards of this lifecycle phase').choices(PLOT4AI_PHASES))
    .option('--category <category>', 'Only cards of this category')
    .option('--ai-type <type>', 'Only cards for this AI type')
    .option('--json', 'Print questions as JSON'),
).action(async (opts: CommonOpts & { phase?: string; category?: string; aiType?: string; json?: boolean }) => {
  const { config, logger } = setup(opts);
  const plugin = new Plot4AIPlugin({ deckPath: config.deckPath, logger });
  const questions = plugin.getElicitationQuestions({
    lifecyclePhase: opts.phase,
    category: opts.category,
    aiType: opts.aiType,
  });

  if (opts.json) {
    console.log(JSON.stringify(questions, null, 2));
    return;
  }
  for (const q of questions) {
    console.log(`${C.bold(q.id)}  ${q.question}`);
    console.log(C.dim(`  threat if: ${q.threatif} · ${q.phases.join(', ')} · ${q.categories.join(', ')}`));
  }
  console.log(C.dim(`\n${questions.length} question(s). Answer them in a JSON file and pass it to analyze --answers.`));
});

// ─── config ──────────────────────────────────────────────────────────

const CONFIG_KEYS = ['patterns-dir', 'plot4ai-deck', 'log-level'] as const;

program
  .command('config')
  .description('Show or edit configuration')
  .argument('<action>', 'Action: show, set, clear')
  .argument('[key]', `Config key: ${CONFIG_KEYS.join(', ')}`)
  .argument('[value]', 'Value to set')
  .option('--global', 'Use global config (~/.config/ai-threat-model/) instead of project')
  .action(async (action: string, key: string | undefined, value: string | undefined, opts: { global?: boolean }) => {
    const root = resolve('.');
    const isGlobal = opts.global ?? false;

    switch (action) {
      case 'show': {
        const config = resolveConfig(root);
        for (const w of config.warnings) console.error(`⚠ ${w}`);
        console.log(`Patterns dir:  ${config.patternsDir ?? C.dim('(built-in only)')}  ${C.dim(describeConfigSource(config, 'patternsDir'))}`);
        console.log(`PLOT4AI deck:  ${config.deckPath}  ${C.dim(describeConfigSource(config, 'deckPath'))}`);
        console.log(`Log level:     ${config.logLevel}  ${C.dim(describeConfigSource(config, 'logLevel'))}`);
        break;
      }

      case 'set': {
        if (!key || !value) {
          console.error('Usage: ai-threat-model config set <key> <value>');
          console.error(`Keys: ${CONFIG_KEYS.join(', ')}`);
          process.exit(1);
        }

        const existing: SavedConfig = (isGlobal ? loadGlobalConfig() : loadProjectConfig(root)) ?? {};
        switch (key) {
          case 'patterns-dir':
            existing.patternsDir = value;
            break;
          case 'plot4ai-deck':
            existing.plot4aiDeck = value;
            break;
          case 'log-level': {
            const level = parseLogLevel(value);
            if (!level) {
              console.error(`Unknown log level: ${value}`);
              console.error(`Available: ${LOG_LEVELS.join(', ')}`);
              process.exit(1);
            }
            existing.logLevel = level;
            break;
          }
          default:
            console.error(`Unknown config key: ${key}. Use: ${CONFIG_KEYS.join(', ')}`);
            process.exit(1);
        }

        if (isGlobal) {
          saveGlobalConfig(existing);
          console.log('✓ Saved to ~/.config/ai-threat-model/config.json');
        } else {
          saveProjectConfig(root, existing);
          console.log('✓ Saved to .threat-model/config.json');
        }
        break;
      }

      case 'clear': {
        if (isGlobal) {
          saveGlobalConfig({});
          console.log('✓ Global config cleared.');
        } else {
          saveProjectConfig(root, {});
          console.log('✓ Project config cleared.');
        }
        break;
      }

      default:
        console.error(`Unknown action: ${action}. Use: show, set, clear`);
        process.exit(1);
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
});

// ─── Helpers ─────────────────────────────────────────────────────────

function printIssues(issues: AnalysisIssues) {
  for (const e of issues.errors) console.error(`${C.red('✗')} ${e}`);
  for (const w of issues.warnings) console.error(`${C.yellow('⚠')} ${w}`);
  if (issues.errors.length + issues.warnings.length > 0) {
    console.error(`\n${issues.errors.length} error(s), ${issues.warnings.length} warning(s)\n`);
  }
}
