import fs from 'fs';
import { parse as parseYaml } from 'yaml';
import { configSchema, ValidatedConfig } from './schema';

const ENV_PREFIX = 'HITS_';
const DEFAULT_CONFIG_PATH = '/etc/hitboard/config.yaml';

type RawConfig = Record<string, unknown>;

const asString = (v: string) => v;
const asInt = (v: string) => parseInt(v, 10);
const asBool = (v: string) => v === 'true';

// env var -> [section, field, parser]
const ENV_MAP: Record<string, [string, string, (value: string) => unknown]> = {
  [`${ENV_PREFIX}REDIS_URL`]: ['redis', 'url', asString],
  [`${ENV_PREFIX}MONGODB_URI`]: ['mongodb', 'uri', asString],
  [`${ENV_PREFIX}MONGODB_COLLECTION`]: ['mongodb', 'collectionName', asString],
  [`${ENV_PREFIX}MONGODB_PARTITIONS`]: ['mongodb', 'partitions', asInt],
  [`${ENV_PREFIX}STREAM_KEY`]: ['stream', 'key', asString],
  [`${ENV_PREFIX}STREAM_CONSUMER_GROUP`]: ['stream', 'consumerGroup', asString],
  [`${ENV_PREFIX}STREAM_CONSUMER_ID`]: ['stream', 'consumerId', asString],
  [`${ENV_PREFIX}STREAM_CLAIM_IDLE_MS`]: ['stream', 'claimIdleMs', asInt],
  [`${ENV_PREFIX}BATCHING_MAX_WAIT_MS`]: ['batching', 'maxWaitMs', asInt],
  [`${ENV_PREFIX}BATCHING_MAX_MESSAGES`]: ['batching', 'maxMessages', asInt],
  [`${ENV_PREFIX}LOG_LEVEL`]: ['logging', 'level', asString],
  [`${ENV_PREFIX}HEALTH_ENABLED`]: ['health', 'enabled', asBool],
  [`${ENV_PREFIX}HEALTH_PORT`]: ['health', 'port', asInt],
};

function asRecord(value: unknown): RawConfig {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return {};
  return Object.fromEntries(Object.entries(value));
}

/**
 * Load configuration from a YAML file, apply HITS_* environment overrides,
 * and validate. Throws a ZodError when required settings are missing.
 */
export function loadConfig(configPath?: string): ValidatedConfig {
  const filePath = configPath ?? process.env.HITS_CONFIG_PATH ?? DEFAULT_CONFIG_PATH;

  let raw: RawConfig = {};

  if (fs.existsSync(filePath)) {
    const content = fs.readFileSync(filePath, 'utf-8');
    raw = asRecord(parseYaml(content));
  }

  for (const [envKey, [section, field, parse]] of Object.entries(ENV_MAP)) {
    const value = process.env[envKey];
    if (value !== undefined) {
      const target = asRecord(raw[section]);
      target[field] = parse(value);
      raw[section] = target;
    }
  }

  return configSchema.parse(raw);
}
