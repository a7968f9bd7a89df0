import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { mkdtempSync, rmSync, existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { logger } from '../logger.js';

describe('logger', () => {
  let logSpy: MockInstance<typeof console.log>;
  let warnSpy: MockInstance<typeof console.warn>;
  let errorSpy: MockInstance<typeof console.error>;
  const originalDebug = process.env.OKTETO_DEBUG;

  beforeEach(() => {
    delete process.env.OKTETO_DEBUG;
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (originalDebug === undefined) {
      delete process.env.OKTETO_DEBUG;
    } else {
      process.env.OKTETO_DEBUG = originalDebug;
    }
  });

  it('should hide debug and info output unless OKTETO_DEBUG is set', () => {
    logger.debug('resolving paths');
    logger.info('timeout applied');

    expect(logSpy).not.toHaveBeenCalled();
  });

  it('should show debug output when OKTETO_DEBUG is 1', () => {
    process.env.OKTETO_DEBUG = '1';

    expect(logger.isDebugMode()).toBe(true);
    logger.debug('resolving paths');

    expect(logSpy).toHaveBeenCalledWith(expect.stringContaining('[DEBUG] resolving paths'));
  });

  it('should always print warnings', () => {
    logger.warn("'x' is not a valid duration, ignoring");

    expect(warnSpy).toHaveBeenCalledWith(expect.stringContaining("⚠ 'x' is not a valid duration, ignoring"));
  });

  it('should print errors without the stack outside debug mode', () => {
    logger.error('failed to create /tmp/x', new Error('EACCES'));

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('✗ failed to create /tmp/x'));
  });

  it('should print success messages', () => {
    logger.success('done');

    expect(logSpy).toHaveBeenCalledWith(expect.stringContaining('✓ done'));
  });

  describe('log file', () => {
    let root: string;

    beforeEach(() => {
      root = mkdtempSync(join(tmpdir(), 'okteto-logger-test-'));
    });

    afterEach(() => {
      logger.close();
      rmSync(root, { recursive: true, force: true });
    });

    it('should place the daily log file in the configured directory', () => {
      const logsDir = join(root, 'logs');
      logger.setLogDirectory(logsDir);

      const today = new Date().toISOString().split('T')[0];
      expect(logger.getLogFilePath()).toBe(join(logsDir, `debug-${today}.log`));
      expect(existsSync(logsDir)).toBe(true);
    });
  });

  it('should keep a stable session id', () => {
    expect(logger.getSessionId()).toBe(logger.getSessionId());
    expect(logger.getSessionId()).toMatch(/^[0-9a-f-]{36}$/);
  });
});
