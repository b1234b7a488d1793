/**
 * Unit tests for logger construction
 */

import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../config';
import { createLogger, logger } from '../../logger';

describe('createLogger', () => {
  it('should log at the configured level', () => {
    const log = createLogger({ logLevel: 'warn', env: 'production' });

    expect(log.level).toBe('warn');
    expect(log.isLevelEnabled('info')).toBe(false);
    expect(log.isLevelEnabled('error')).toBe(true);
  });

  it('should build the shared logger from the loaded configuration', () => {
    expect(logger.level).toBe(loadConfig().logLevel);
  });
});
