import { describe, it, expect } from 'vitest';
import {
  createLogger, logPatternLoadError, logPatternRegistry, logThreatDetection, parseLogLevel,
} from '../src/utils/logger.js';
import { stripAnsi } from '../src/cli/format.js';
import type { LogLevel } from '../src/utils/logger.js';

function capture(level: LogLevel, scope?: string) {
  const lines: string[] = [];
  const logger = createLogger({ level, scope, sink: line => lines.push(stripAnsi(line)) });
  return { logger, lines };
}

describe('createLogger', () => {
  it('formats lines as LEVEL: message', () => {
    const { logger, lines } = capture('info');
    logger.info('analysis started');
    logger.error('analysis failed');
    expect(lines).toEqual(['INFO: analysis started', 'ERROR: analysis failed']);
  });

  it('drops messages below its level', () => {
    const { logger, lines } = capture('warn');
    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    expect(lines).toEqual(['WARN: w']);
  });

  it('emits nothing when silent', () => {
    const { logger, lines } = capture('silent');
    logger.error('e');
    expect(lines).toEqual([]);
  });

  it('tags scoped and child loggers', () => {
    const { logger, lines } = capture('info', 'catalog');
    logger.info('loaded');
    logger.child('llm-top10').warn('override skipped');
    expect(lines).toEqual(['INFO [catalog]: loaded', 'WARN [catalog:llm-top10]: override skipped']);
  });

  it('timestamps lines at debug level', () => {
    const { logger, lines } = capture('debug');
    logger.debug('x');
    expect(logger.isDebug()).toBe(true);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z DEBUG: x$/);
  });
});

describe('parseLogLevel', () => {
  it('maps user input to levels', () => {
    expect(parseLogLevel('WARNING')).toBe('warn');
    expect(parseLogLevel(' Error ')).toBe('error');
    expect(parseLogLevel('silent')).toBe('silent');
    expect(parseLogLevel('loud')).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});

describe('domain helpers', () => {
  it('logs pattern load failures as warnings', () => {
    const { logger, lines } = capture('info');
    logPatternLoadError(logger, '/p/LLM01.json', new Error('Unexpected token'));
    expect(lines).toEqual(['WARN: Failed to load pattern /p/LLM01.json: Unexpected token']);
  });

  it('logs detection decisions only at debug level', () => {
    const quiet = capture('info');
    logThreatDetection(quiet.logger, 'c1', 'LLM01', true, 'type');
    expect(quiet.lines).toEqual([]);

    const loud = capture('debug');
    logThreatDetection(loud.logger, 'c1', 'LLM01', true, 'type');
    logThreatDetection(loud.logger, 'c1', 'LLM02', false);
    expect(loud.lines[0].endsWith('DEBUG: Threat detection: LLM01 vs c1 - MATCHED (type)')).toBe(true);
    expect(loud.lines[1].endsWith('DEBUG: Threat detection: LLM02 vs c1 - no match')).toBe(true);
  });

  it('logs registry actions only at debug level', () => {
    const { logger, lines } = capture('debug');
    logPatternRegistry(logger, 'load', 'P1');
    expect(lines[0].endsWith('DEBUG: Pattern registry: load - P1')).toBe(true);
  });
});
