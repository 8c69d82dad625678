/**
 * Logger Tests
 * Level resolution and service loggers
 */

import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger, DEFAULT_LOG_LEVEL, resolveLogLevel } from '../src/index.js';

describe('Logging', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe('resolveLogLevel', () => {
    it('defaults to warn', () => {
      vi.stubEnv('MANIFOLD_LOG_LEVEL', '');
      vi.stubEnv('MANIFOLD_DEBUG', '');
      expect(resolveLogLevel()).toBe(DEFAULT_LOG_LEVEL);
      expect(DEFAULT_LOG_LEVEL).toBe('warn');
    });

    it('uses the configured level', () => {
      vi.stubEnv('MANIFOLD_LOG_LEVEL', '');
      vi.stubEnv('MANIFOLD_DEBUG', '');
      expect(resolveLogLevel('info')).toBe('info');
    });

    it('lets MANIFOLD_DEBUG raise the level to debug', () => {
      vi.stubEnv('MANIFOLD_LOG_LEVEL', '');
      vi.stubEnv('MANIFOLD_DEBUG', 'true');
      expect(resolveLogLevel('error')).toBe('debug');
    });

    it('prefers MANIFOLD_LOG_LEVEL over everything else', () => {
      vi.stubEnv('MANIFOLD_LOG_LEVEL', 'error');
      vi.stubEnv('MANIFOLD_DEBUG', 'true');
      expect(resolveLogLevel('info')).toBe('error');
    });

    it('ignores an unknown MANIFOLD_LOG_LEVEL', () => {
      vi.stubEnv('MANIFOLD_LOG_LEVEL', 'verbose');
      vi.stubEnv('MANIFOLD_DEBUG', '');
      expect(resolveLogLevel('info')).toBe('info');
    });
  });

  describe('createLogger', () => {
    it('tags entries with the service name', () => {
      const logger = createLogger('include', 'debug');
      expect(logger.defaultMeta).toEqual({ service: 'include' });
    });

    it('uses an explicit level as given', () => {
      vi.stubEnv('MANIFOLD_LOG_LEVEL', 'warn');
      expect(createLogger('include', 'debug').level).toBe('debug');
    });

    it('resolves the level from the environment when none is given', () => {
      vi.stubEnv('MANIFOLD_LOG_LEVEL', 'error');
      expect(createLogger('cli').level).toBe('error');
    });

    it('applies the resolved level', () => {
      vi.stubEnv('MANIFOLD_LOG_LEVEL', '');
      vi.stubEnv('MANIFOLD_DEBUG', '');
      const logger = createLogger('compiler', 'info');
      expect(logger.level).toBe('info');
      expect(logger.isDebugEnabled()).toBe(false);
      expect(logger.isInfoEnabled()).toBe(true);
    });
  });
});
