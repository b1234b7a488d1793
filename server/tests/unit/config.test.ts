/**
 * Unit tests for environment configuration
 */

import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../config';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      port: 3001,
      env: 'development',
      logLevel: 'debug',
      tickRate: 20,
      broadcastEvery: 2,
      gameMode: 'standard',
      mapId: 'crossroads',
      strictInvariants: true,
      maxConcurrentGames: 50,
      commandRateLimit: 30,
      commandRateWindowMs: 1000,
      intentRateLimit: 5,
      translatorUrl: null,
      translatorTimeoutMs: 5000,
      allowedOrigin: '*',
    });
  });

  it('should relax invariants and quiet logging in production', () => {
    const config = loadConfig({ NODE_ENV: 'production' });
    expect(config.strictInvariants).toBe(false);
    expect(config.logLevel).toBe('info');
  });

  it('should let STRICT_INVARIANTS override the environment default', () => {
    expect(loadConfig({ NODE_ENV: 'production', STRICT_INVARIANTS: 'true' }).strictInvariants).toBe(true);
    expect(loadConfig({ STRICT_INVARIANTS: '0' }).strictInvariants).toBe(false);
  });

  it('should derive the broadcast divisor from tick and broadcast rates', () => {
    expect(loadConfig({ TICK_RATE: '30', BROADCAST_RATE: '20' }).broadcastEvery).toBe(2);
    expect(loadConfig({ TICK_RATE: '10', BROADCAST_RATE: '30' }).broadcastEvery).toBe(1);
    expect(loadConfig({ TICK_RATE: '60', BROADCAST_RATE: '10' }).broadcastEvery).toBe(6);
  });

  it('should coerce numeric variables', () => {
    const config = loadConfig({ PORT: '8080', MAX_CONCURRENT_GAMES: '3', TRANSLATOR_URL: 'http://localhost:9000/translate' });
    expect(config.port).toBe(8080);
    expect(config.maxConcurrentGames).toBe(3);
    expect(config.translatorUrl).toBe('http://localhost:9000/translate');
  });

  it('should reject invalid values', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow();
    expect(() => loadConfig({ TICK_RATE: '0' })).toThrow();
    expect(() => loadConfig({ STRICT_INVARIANTS: 'maybe' })).toThrow();
    expect(() => loadConfig({ TRANSLATOR_URL: 'not a url' })).toThrow();
  });
});
