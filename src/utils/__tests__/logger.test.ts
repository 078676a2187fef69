import { describe, it, expect, jest, beforeEach, afterAll } from '@jest/globals';
import { configureLogger, debugLog, logger, trackOperation } from '../logger.js';
import { DebugConfig, LogLevel } from '../../config/debug.js';

const baseConfig: DebugConfig = {
  enabled: false,
  logTokenizer: false,
  logParser: false,
  logValidation: false,
  logDerivation: false,
  logExecutor: false,
  logLevel: LogLevel.INFO,
  logFormat: 'pretty',
};

describe('logger', () => {
  const errorSpy = jest.spyOn(console, 'error');

  const lines = () => errorSpy.mock.calls.map(([line]) => String(line));

  beforeEach(() => {
    errorSpy.mockReset();
    errorSpy.mockImplementation(() => undefined);
    configureLogger(baseConfig);
  });

  afterAll(() => {
    errorSpy.mockRestore();
  });

  it('should write pretty lines with level and prefix', () => {
    logger.info('compiled');

    expect(lines()).toHaveLength(1);
    expect(lines()[0]).toMatch(/^\d{4}-\d{2}-\d{2}T\S+ \[INFO\] \[criteria\] compiled$/);
  });

  it('should append payload fields as indented JSON in pretty mode', () => {
    logger.warn('slow step', { index: 2 });

    expect(lines()[0].split('\n').slice(1).join('\n')).toBe('{\n  "index": 2\n}');
  });

  it('should filter messages below the configured level', () => {
    configureLogger({ ...baseConfig, logLevel: LogLevel.ERROR });

    logger.info('hidden');
    logger.warn('hidden');
    logger.error('shown');

    expect(lines()).toHaveLength(1);
    expect(lines()[0]).toContain('[ERROR] [criteria] shown');
  });

  it('should write one JSON object per line in json mode', () => {
    configureLogger({ ...baseConfig, logFormat: 'json' });

    logger.error('query failed', { step: 1, cause: new Error('boom') });

    expect(JSON.parse(lines()[0])).toMatchObject({
      level: 'error',
      message: 'query failed',
      step: 1,
      cause: { name: 'Error', message: 'boom' },
    });
  });

  it('should store non-object payloads under data', () => {
    configureLogger({ ...baseConfig, logFormat: 'json' });

    logger.info('keys', [1, 2]);

    expect(JSON.parse(lines()[0])).toMatchObject({ message: 'keys', data: [1, 2] });
  });

  describe('debug categories', () => {
    it('should drop debug output while debugging is disabled', () => {
      configureLogger({ ...baseConfig, logLevel: LogLevel.DEBUG });

      debugLog('parser', 'parsed expression');

      expect(lines()).toHaveLength(0);
    });

    it('should emit enabled categories only', () => {
      configureLogger({
        ...baseConfig,
        enabled: true,
        logParser: true,
        logLevel: LogLevel.DEBUG,
      });

      debugLog('parser', 'parsed expression');
      debugLog('tokenizer', 'tokenized segment');

      expect(lines()).toHaveLength(1);
      expect(lines()[0]).toContain('[DEBUG] [criteria:parser] parsed expression');
    });

    it('should require the debug level as well', () => {
      configureLogger({ ...baseConfig, enabled: true, logParser: true });

      debugLog('parser', 'parsed expression');

      expect(lines()).toHaveLength(0);
    });
  });

  it('should log start and end of a tracked operation', () => {
    configureLogger({
      ...baseConfig,
      enabled: true,
      logExecutor: true,
      logLevel: LogLevel.DEBUG,
      logFormat: 'json',
    });

    const finish = trackOperation<number>('executor', 'derivation chain', { steps: 2 });
    finish(5);

    const [start, end] = lines().map((line) => JSON.parse(line));
    expect(start).toMatchObject({
      category: 'executor',
      message: 'derivation chain START',
      steps: 2,
    });
    expect(end).toMatchObject({ message: 'derivation chain END', result: 5 });
    expect(typeof end.durationMs).toBe('number');
  });
});
