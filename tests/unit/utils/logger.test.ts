/**
 * Tests for the logger.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Logger } from '../../../src/utils/logger.js';

describe('Logger', () => {
  let errorSpy: ReturnType<typeof vi.spyOn>;
  let warnSpy: ReturnType<typeof vi.spyOn>;
  let logSpy: ReturnType<typeof vi.spyOn>;
  let logger: Logger;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    logger = new Logger();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should default to info level', () => {
    expect(logger.getLevel()).toBe('info');
    logger.debug('hidden');
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('should write info to stderr and never to stdout', () => {
    logger.info('hello');
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('[INFO] hello'));
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('should write warnings through console.warn', () => {
    logger.warn('careful');
    expect(warnSpy).toHaveBeenCalledWith(expect.stringContaining('[WARN] careful'));
  });

  it('should show debug output at debug level', () => {
    logger.setLevel('debug');
    logger.debug('details');
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('[DEBUG] details'));
  });

  it('should log nothing when silent', () => {
    logger.setLevel('silent');
    logger.error('bad');
    logger.warn('careful');
    logger.success('done');
    expect(errorSpy).not.toHaveBeenCalled();
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it('should hide success above info', () => {
    logger.setLevel('warn');
    logger.success('done');
    logger.info('note');
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('should write success to stderr with a check mark', () => {
    logger.success('Created .cskit/config.yaml');
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('✓ Created .cskit/config.yaml'));
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('should write errors at the warn level', () => {
    logger.setLevel('warn');
    logger.error('bad');
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('[ERROR] bad'));
  });
});
