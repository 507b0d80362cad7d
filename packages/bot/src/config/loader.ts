import fs from 'fs';
import { parse as parseYaml } from 'yaml';
import { configSchema, type ValidatedConfig } from './schema';

const ENV_PREFIX = 'SUIT_TALLY_';
const DEFAULT_CONFIG_PATH = '/etc/suit-tally/config.yaml';

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Nested section of the raw config, created when missing. */
function section(raw: RawConfig, key: string): RawConfig {
  const existing = raw[key];
  if (isRecord(existing)) return existing;
  const created: RawConfig = {};
  raw[key] = created;
  return created;
}

function list(value: string): string[] {
  return value.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
}

const ENV_MAP: Record<string, (config: RawConfig, value: string) => void> = {
  [`${ENV_PREFIX}TELEGRAM_TOKEN`]: (c, v) => { section(c, 'telegram').token = v; },
  [`${ENV_PREFIX}REDIS_URL`]: (c, v) => { section(c, 'redis').url = v; },
  [`${ENV_PREFIX}REDIS_KEY_PREFIX`]: (c, v) => { section(c, 'redis').keyPrefix = v; },
  [`${ENV_PREFIX}DEBOUNCE_QUIET_MS`]: (c, v) => { section(c, 'debounce').quietMs = parseInt(v, 10); },
  [`${ENV_PREFIX}CONFIRMATION_MARKERS`]: (c, v) => { section(c, 'processing').confirmationMarkers = list(v); },
  [`${ENV_PREFIX}DISPLAY_STYLE`]: (c, v) => { section(c, 'processing').displayStyle = parseInt(v, 10); },
  [`${ENV_PREFIX}AUTO_REPORT_PURGE_LEDGER`]: (c, v) => { section(c, 'autoReport').purgeLedger = v === 'true'; },
  [`${ENV_PREFIX}PERSISTENCE_FLUSH_INTERVAL_MS`]: (c, v) => { section(c, 'persistence').flushIntervalMs = parseInt(v, 10); },
  [`${ENV_PREFIX}LOG_LEVEL`]: (c, v) => { section(c, 'logging').level = v; },
  [`${ENV_PREFIX}HEALTH_ENABLED`]: (c, v) => { section(c, 'health').enabled = v === 'true'; },
  [`${ENV_PREFIX}HEALTH_PORT`]: (c, v) => { section(c, 'health').port = parseInt(v, 10); },
};

export function loadConfig(configPath?: string): ValidatedConfig {
  const filePath = configPath ?? process.env.CONFIG_PATH ?? DEFAULT_CONFIG_PATH;

  let raw: RawConfig = {};

  if (fs.existsSync(filePath)) {
    const content = fs.readFileSync(filePath, 'utf-8');
    const parsed: unknown = parseYaml(content);
    raw = isRecord(parsed) ? parsed : {};
  }

  // The conventional bot token variable, below the prefixed one
  const botToken = process.env.TELEGRAM_BOT_TOKEN;
  if (botToken !== undefined && process.env[`${ENV_PREFIX}TELEGRAM_TOKEN`] === undefined) {
    section(raw, 'telegram').token = botToken;
  }

  // Apply environment variable overrides
  for (const [envKey, setter] of Object.entries(ENV_MAP)) {
    const value = process.env[envKey];
    if (value !== undefined) {
      setter(raw, value);
    }
  }

  return configSchema.parse(raw);
}
