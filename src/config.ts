import * as dotenv from 'dotenv';

export interface SnowflakeConfig {
  account: string;
  token: string;
  role?: string;
  warehouse: string;
  database: string;
  schema: string;
  table: string;
  searchService: string;
  // Upper bound for one SQL API statement, in seconds
  statementTimeout: number;
}

export interface AppConfig {
  // undefined when the account or token is missing
  snowflake?: SnowflakeConfig;
  openaiApiKey?: string;
  completionModel: string;
  csvPath: string;
  dataDir: string;
  port: number;
  sessionTtlMinutes: number;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_$]*$/;

export function isConfigured(value: string | undefined): value is string {
  return !!value && value.trim() !== '' && !/^your_.*_here$/.test(value.trim());
}

function identifier(env: NodeJS.ProcessEnv, key: string, fallback: string): string {
  const value = env[key]?.trim() || fallback;
  if (!IDENTIFIER.test(value)) {
    throw new Error(`${key} must be a plain Snowflake identifier, got "${value}"`);
  }
  return value.toUpperCase();
}

function positiveInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const account = env.SNOWFLAKE_ACCOUNT;
  const token = env.SNOWFLAKE_TOKEN;
  const role = env.SNOWFLAKE_ROLE?.trim();
  const openaiApiKey = env.OPENAI_API_KEY;

  const snowflake: SnowflakeConfig | undefined =
    isConfigured(account) && isConfigured(token)
      ? {
          account: account.trim(),
          token: token.trim(),
          role: role ? identifier(env, 'SNOWFLAKE_ROLE', role) : undefined,
          warehouse: identifier(env, 'SNOWFLAKE_WAREHOUSE', 'VIDEO_SEARCH_WH'),
          database: identifier(env, 'SNOWFLAKE_DATABASE', 'VIDEO_SEARCH_DB'),
          schema: identifier(env, 'SNOWFLAKE_SCHEMA', 'VIDEO_SEARCH_SCHEMA'),
          table: identifier(env, 'VIDEO_TABLE', 'VIDEOS'),
          searchService: identifier(env, 'SEARCH_SERVICE', 'VIDEO_SEARCH_SERVICE'),
          statementTimeout: positiveInt(env, 'SNOWFLAKE_STATEMENT_TIMEOUT', 60),
        }
      : undefined;

  return {
    snowflake,
    openaiApiKey: isConfigured(openaiApiKey) ? openaiApiKey.trim() : undefined,
    completionModel: env.COMPLETION_MODEL?.trim() || 'gpt-4o-mini',
    csvPath: env.CSV_PATH?.trim() || './data/videos.csv',
    dataDir: env.DATA_DIR?.trim() || '.',
    port: positiveInt(env, 'PORT', 3000),
    sessionTtlMinutes: positiveInt(env, 'SESSION_TTL_MINUTES', 60),
  };
}

// Reads .env once, then the process environment
export function loadEnvConfig(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
