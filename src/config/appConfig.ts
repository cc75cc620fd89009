import path from 'node:path';
import { ConfigError } from '../errors/index.js';
import { parseLogLevel, type LogLevel } from '../logging/logger.js';

export type Env = Record<string, string | undefined>;

export interface GraphConfig {
  tenantId: string;
  clientId: string;
  clientSecret: string;
  baseUrl: string;
  authorityHost: string;
}

export interface BotConfig {
  appId: string;
  appPassword: string;
  appType: string;
  appTenantId: string;
  botName: string;
  port: number;
  endpointPath: string;
}

export interface FollowUpChatConfig {
  endpoint: string;
  apiKey: string;
  deployment: string;
  apiVersion: string;
  maxTokens: number;
  temperature: number;
  systemPrompt?: string;
}

export interface AppConfig {
  bot: BotConfig;
  graph: GraphConfig;
  storageConnectionString?: string;
  appCatalogTeamsAppId?: string;
  followUpChat?: FollowUpChatConfig;
  queuePollIntervalMs: number;
  dailyJobCron: string;
  devMode: boolean;
  testUpn?: string;
  logLevel: LogLevel;
  logHashSalt: string;
  templatesDir: string;
}

export const requireEnv = (env: Env, key: string): string => {
  const value = env[key];
  if (!value) {
    throw new ConfigError(`Missing ${key} environment variable.`);
  }
  return value;
};

const optionalEnv = (env: Env, key: string): string | undefined => {
  const value = env[key]?.trim();
  return value ? value : undefined;
};

export const parseNumber = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return Math.floor(parsed);
};

export const parseBoolean = (value: string | undefined): boolean => {
  const normalized = value?.trim().toLowerCase();
  return normalized === 'true' || normalized === '1' || normalized === 'yes';
};

export const parseTemperature = (value: string | undefined): number => {
  if (value === undefined || value.trim() === '') {
    return 0.7;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    return 0.7;
  }
  return Math.min(Math.max(parsed, 0), 1);
};

const loadFollowUpChatConfig = (env: Env): FollowUpChatConfig | undefined => {
  const endpoint = optionalEnv(env, 'AI_ENDPOINT');
  const apiKey = optionalEnv(env, 'AI_API_KEY');
  const deployment = optionalEnv(env, 'AI_DEPLOYMENT');
  if (!endpoint || !apiKey || !deployment) {
    return undefined;
  }
  return {
    endpoint,
    apiKey,
    deployment,
    apiVersion: optionalEnv(env, 'AI_API_VERSION') ?? '2024-06-01',
    maxTokens: parseNumber(env.AI_MAX_TOKENS, 500),
    temperature: parseTemperature(env.AI_TEMPERATURE),
    systemPrompt: optionalEnv(env, 'FOLLOW_UP_SYSTEM_PROMPT')
  };
};

export const loadAppConfig = (env: Env = process.env): AppConfig => {
  const graph: GraphConfig = {
    tenantId: requireEnv(env, 'GRAPH_TENANT_ID'),
    clientId: requireEnv(env, 'GRAPH_CLIENT_ID'),
    clientSecret: requireEnv(env, 'GRAPH_CLIENT_SECRET'),
    baseUrl: optionalEnv(env, 'GRAPH_BASE_URL') ?? 'https://graph.microsoft.com/v1.0',
    authorityHost: optionalEnv(env, 'GRAPH_AUTHORITY_HOST') ?? 'https://login.microsoftonline.com'
  };

  const bot: BotConfig = {
    appId: requireEnv(env, 'MICROSOFT_APP_ID'),
    appPassword: requireEnv(env, 'MICROSOFT_APP_PASSWORD'),
    appType: optionalEnv(env, 'MICROSOFT_APP_TYPE') ?? 'SingleTenant',
    appTenantId: optionalEnv(env, 'MICROSOFT_APP_TENANT_ID') ?? graph.tenantId,
    botName: optionalEnv(env, 'BOT_NAME') ?? 'Nudge Bot',
    port: parseNumber(env.BOT_PORT ?? env.PORT, 3978),
    endpointPath: optionalEnv(env, 'BOT_ENDPOINT_PATH') ?? '/api/messages'
  };

  return {
    bot,
    graph,
    storageConnectionString: optionalEnv(env, 'STORAGE_CONNECTION_STRING'),
    appCatalogTeamsAppId: optionalEnv(env, 'APP_CATALOG_TEAMS_APP_ID'),
    followUpChat: loadFollowUpChatConfig(env),
    queuePollIntervalMs: parseNumber(env.QUEUE_POLL_INTERVAL_SECONDS, 5) * 1000,
    dailyJobCron: optionalEnv(env, 'DAILY_JOB_CRON') ?? '0 0 * * *',
    devMode: parseBoolean(env.DEV_MODE),
    testUpn: optionalEnv(env, 'TEST_UPN'),
    logLevel: parseLogLevel(env.LOG_LEVEL),
    logHashSalt: env.LOG_HASH_SALT ?? '',
    templatesDir: path.resolve(process.cwd(), optionalEnv(env, 'TEMPLATES_DIR') ?? 'templates')
  };
};
