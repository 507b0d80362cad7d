import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import { loadConfig } from './loader';

vi.mock('fs');

const VALID_YAML = `
telegram:
  token: test-token
`;

beforeEach(() => {
  vi.mocked(fs.existsSync).mockReturnValue(true);
  vi.mocked(fs.readFileSync).mockReturnValue(VALID_YAML);
  // Clear env vars
  for (const key of Object.keys(process.env)) {
    if (key.startsWith('SUIT_TALLY_') || key === 'TELEGRAM_BOT_TOKEN') {
      delete process.env[key];
    }
  }
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('loadConfig', () => {
  it('should load and validate a YAML config file', () => {
    const config = loadConfig('/test/config.yaml');
    expect(config.telegram.token).toBe('test-token');
    expect(fs.readFileSync).toHaveBeenCalledWith('/test/config.yaml', 'utf-8');
  });

  it('should apply default values', () => {
    const config = loadConfig('/test/config.yaml');
    expect(config.redis).toBeUndefined();
    expect(config.debounce.quietMs).toBe(3000);
    expect(config.processing.confirmationMarkers).toEqual(['✅', '🔰']);
    expect(config.processing.displayStyle).toBe(1);
    expect(config.autoReport.purgeLedger).toBe(false);
    expect(config.persistence.flushIntervalMs).toBe(1000);
    expect(config.logging.level).toBe('info');
    expect(config.health.enabled).toBe(true);
    expect(config.health.port).toBe(9090);
  });

  it('should fill redis defaults when a url is given', () => {
    vi.mocked(fs.readFileSync).mockReturnValue(`${VALID_YAML}redis:\n  url: redis://localhost:6379\n`);
    const config = loadConfig('/test/config.yaml');
    expect(config.redis).toEqual({ url: 'redis://localhost:6379', keyPrefix: 'suit-tally' });
  });

  it('should override values from environment variables', () => {
    process.env.SUIT_TALLY_TELEGRAM_TOKEN = 'override-token';
    process.env.SUIT_TALLY_DEBOUNCE_QUIET_MS = '5000';
    process.env.SUIT_TALLY_CONFIRMATION_MARKERS = 'OK, 👍';
    process.env.SUIT_TALLY_DISPLAY_STYLE = '3';
    process.env.SUIT_TALLY_LOG_LEVEL = 'debug';

    const config = loadConfig('/test/config.yaml');
    expect(config.telegram.token).toBe('override-token');
    expect(config.debounce.quietMs).toBe(5000);
    expect(config.processing.confirmationMarkers).toEqual(['OK', '👍']);
    expect(config.processing.displayStyle).toBe(3);
    expect(config.logging.level).toBe('debug');
  });

  it('should accept TELEGRAM_BOT_TOKEN below the prefixed variable', () => {
    vi.mocked(fs.existsSync).mockReturnValue(false);
    process.env.TELEGRAM_BOT_TOKEN = 'plain-token';
    expect(loadConfig('/nonexistent.yaml').telegram.token).toBe('plain-token');

    process.env.SUIT_TALLY_TELEGRAM_TOKEN = 'prefixed-token';
    expect(loadConfig('/nonexistent.yaml').telegram.token).toBe('prefixed-token');
  });

  it('should throw on invalid config (missing required fields)', () => {
    vi.mocked(fs.readFileSync).mockReturnValue('logging:\n  level: info\n');
    expect(() => loadConfig('/test/config.yaml')).toThrow();
  });

  it('should throw on an unsupported display style', () => {
    process.env.SUIT_TALLY_DISPLAY_STYLE = '7';
    expect(() => loadConfig('/test/config.yaml')).toThrow();
  });

  it('should work with env vars only (no config file)', () => {
    vi.mocked(fs.existsSync).mockReturnValue(false);
    process.env.SUIT_TALLY_TELEGRAM_TOKEN = 'env-token';
    process.env.SUIT_TALLY_REDIS_URL = 'redis://env:6379';

    const config = loadConfig('/nonexistent.yaml');
    expect(config.telegram.token).toBe('env-token');
    expect(config.redis?.url).toBe('redis://env:6379');
    expect(fs.readFileSync).not.toHaveBeenCalled();
  });
});
