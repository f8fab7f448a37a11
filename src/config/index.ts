import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { readFileSync, existsSync } from 'node:fs';

const __dirname = dirname(fileURLToPath(import.meta.url));
const projectRoot = join(__dirname, '..', '..');

/**
 * Load environment variables from the project root .env file.
 * Variables already present in the environment win.
 */
function loadEnvFile(envPath: string = join(projectRoot, '.env')): void {
  if (!existsSync(envPath)) {
    return;
  }

  const content = readFileSync(envPath, 'utf-8');
  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (trimmed && !trimmed.startsWith('#') && trimmed.includes('=')) {
      const [key, ...valueParts] = trimmed.split('=');
      const value = valueParts.join('=');
      if (key && !process.env[key]) {
        process.env[key] = value;
      }
    }
  }
}

export interface AppConfig {
  region: string;
  patternsPath: string;
  defaultWindowMinutes: number;
  queryPollIntervalMs: number;
  queryBackoffRate: number;
  queryMaxWaitMs: number;
  runLogDir?: string;
}

type Env = Record<string, string | undefined>;

function numberFromEnv(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  return raw === undefined || raw.trim() === '' ? fallback : Number(raw);
}

export function buildConfig(env: Env): AppConfig {
  return {
    region: env['AWS_REGION'] ?? env['AWS_DEFAULT_REGION'] ?? 'us-east-1',
    patternsPath: env['ERROR_PATTERNS_PATH'] ?? join(projectRoot, 'patterns', 'api-gateway-errors.yaml'),
    defaultWindowMinutes: numberFromEnv(env, 'DEFAULT_WINDOW_MINUTES', 15),
    queryPollIntervalMs: numberFromEnv(env, 'QUERY_POLL_INTERVAL_MS', 1000),
    queryBackoffRate: numberFromEnv(env, 'QUERY_BACKOFF_RATE', 1.5),
    queryMaxWaitMs: numberFromEnv(env, 'QUERY_MAX_WAIT_MS', 300_000),
    runLogDir: env['RUN_LOG_DIR'] || undefined,
  };
}

export function loadConfig(): AppConfig {
  loadEnvFile();
  return buildConfig(process.env);
}

export function validateConfig(config: AppConfig): string[] {
  const errors: string[] = [];

  if (!/^[a-z]{2}(-gov|-iso[a-z]?)?-[a-z]+-\d$/.test(config.region)) {
    errors.push(`Invalid AWS region: ${config.region}`);
  }

  if (!config.patternsPath) {
    errors.push('ERROR_PATTERNS_PATH is required');
  }

  const positive: Array<[string, number]> = [
    ['DEFAULT_WINDOW_MINUTES', config.defaultWindowMinutes],
    ['QUERY_POLL_INTERVAL_MS', config.queryPollIntervalMs],
    ['QUERY_MAX_WAIT_MS', config.queryMaxWaitMs],
  ];
  for (const [key, value] of positive) {
    if (!Number.isFinite(value) || value <= 0) {
      errors.push(`${key} must be a positive number`);
    }
  }

  if (!Number.isFinite(config.queryBackoffRate) || config.queryBackoffRate < 1) {
    errors.push('QUERY_BACKOFF_RATE must be a number of at least 1');
  }

  return errors;
}
