import { describe, expect, it } from 'vitest';
import { assertCredentials, ConfigError, DEFAULT_ENGINE_CONFIG, loadEngineConfig } from '../config/engineConfig';

describe('loadEngineConfig', () => {
  it('uses the defaults without overrides', () => {
    const config = loadEngineConfig({});
    expect(config.transport.host).toBe('localhost:8080');
    expect(config.transport.scenario).toBe('normal_market');
    expect(config.risk).toEqual(DEFAULT_ENGINE_CONFIG.risk);
    expect(config.regime.crash.compound).not.toBeNull();
    expect(config.orders.maxOpenOrders).toBe(20);
  });

  it('switches the crash preset', () => {
    const config = loadEngineConfig({ BOT_REGIME_PRESET: 'simple' });
    expect(config.regime.preset).toBe('simple');
    expect(config.regime.crash).toEqual({ spreadRatio: 2.5, momentum: 0.15, imbalance: 0.6, compound: null });
  });

  it('keeps the safety buffer below the hard limit', () => {
    const config = loadEngineConfig({ BOT_HARD_LIMIT: '3000', BOT_SAFETY_BUFFER: '2900' });
    expect(config.risk.hardLimit).toBe(3000);
    expect(config.risk.safetyBuffer).toBe(2500);
  });

  it('ignores values it cannot parse', () => {
    const config = loadEngineConfig({ BOT_HARD_LIMIT: 'lots', BOT_NORMAL_STYLE: 'yolo', BOT_MAX_OPEN_ORDERS: '' });
    expect(config.risk.hardLimit).toBe(4500);
    expect(config.strategies.normalStyle).toBe('aggressive');
    expect(config.orders.maxOpenOrders).toBe(20);
  });

  it('reads transport and feature switches', () => {
    const config = loadEngineConfig({
      BOT_HOST: 'example.test:443',
      BOT_SECURE: 'true',
      BOT_NAME: 'team-a',
      BOT_PASSWORD: 'test-secret',
      BOT_NORMAL_STYLE: 'momentum',
      BOT_JOURNAL_ENABLED: 'false',
      BOT_HEALTH_ENABLED: '1',
      BOT_MODE: 'Passive',
    });
    expect(config.transport).toMatchObject({ host: 'example.test:443', secure: true, name: 'team-a', password: 'test-secret' });
    expect(config.strategies.normalStyle).toBe('momentum');
    expect(config.journal.enabled).toBe(false);
    expect(config.health.enabled).toBe(true);
    expect(config.engine.mode).toBe('passive');
    expect(loadEngineConfig({ BOT_MODE: 'spectator' }).engine.mode).toBe('active');
  });
});

describe('assertCredentials', () => {
  it('requires a name and a password', () => {
    const transport = DEFAULT_ENGINE_CONFIG.transport;
    expect(() => assertCredentials(transport)).toThrow(ConfigError);
    expect(() => assertCredentials({ ...transport, name: 'team-a' })).toThrow('BOT_PASSWORD is required');
    expect(() => assertCredentials({ ...transport, name: 'team-a', password: 'test-secret' })).not.toThrow();
  });
});
