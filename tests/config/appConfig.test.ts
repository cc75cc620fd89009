import path from 'node:path';
import { describe, expect, it } from 'vitest';
import {
  loadAppConfig,
  parseBoolean,
  parseNumber,
  parseTemperature,
  requireEnv,
  type Env
} from '../../src/config/appConfig.js';
import { ConfigError } from '../../src/errors/index.js';

const baseEnv: Env = {
  GRAPH_TENANT_ID: 'tenant',
  GRAPH_CLIENT_ID: 'client',
  GRAPH_CLIENT_SECRET: 'test-secret',
  MICROSOFT_APP_ID: 'bot-app',
  MICROSOFT_APP_PASSWORD: 'test-password'
};

describe('appConfig', () => {
  it('applies defaults for optional settings', () => {
    const config = loadAppConfig(baseEnv);

    expect(config.graph.baseUrl).toBe('https://graph.microsoft.com/v1.0');
    expect(config.graph.authorityHost).toBe('https://login.microsoftonline.com');
    expect(config.bot).toEqual({
      appId: 'bot-app',
      appPassword: 'test-password',
      appType: 'SingleTenant',
      appTenantId: 'tenant',
      botName: 'Nudge Bot',
      port: 3978,
      endpointPath: '/api/messages'
    });
    expect(config.storageConnectionString).toBeUndefined();
    expect(config.appCatalogTeamsAppId).toBeUndefined();
    expect(config.followUpChat).toBeUndefined();
    expect(config.queuePollIntervalMs).toBe(5000);
    expect(config.dailyJobCron).toBe('0 0 * * *');
    expect(config.devMode).toBe(false);
    expect(config.logLevel).toBe('info');
    expect(config.logHashSalt).toBe('');
    expect(config.templatesDir).toBe(path.resolve(process.cwd(), 'templates'));
  });

  it('reads overrides and follow-up chat settings', () => {
    const config = loadAppConfig({
      ...baseEnv,
      BOT_NAME: 'Tips Bot',
      PORT: '8080',
      STORAGE_CONNECTION_STRING: 'UseDevelopmentStorage=true',
      APP_CATALOG_TEAMS_APP_ID: 'catalog-app',
      QUEUE_POLL_INTERVAL_SECONDS: '2',
      DEV_MODE: 'true',
      TEST_UPN: 'tester@contoso.test',
      LOG_LEVEL: 'DEBUG',
      LOG_HASH_SALT: 'test-salt',
      AI_ENDPOINT: 'https://ai.test',
      AI_API_KEY: 'test-key',
      AI_DEPLOYMENT: 'chat',
      AI_TEMPERATURE: '1.5'
    });

    expect(config.bot.botName).toBe('Tips Bot');
    expect(config.bot.port).toBe(8080);
    expect(config.storageConnectionString).toBe('UseDevelopmentStorage=true');
    expect(config.appCatalogTeamsAppId).toBe('catalog-app');
    expect(config.queuePollIntervalMs).toBe(2000);
    expect(config.devMode).toBe(true);
    expect(config.testUpn).toBe('tester@contoso.test');
    expect(config.logLevel).toBe('debug');
    expect(config.logHashSalt).toBe('test-salt');
    expect(config.followUpChat).toEqual({
      endpoint: 'https://ai.test',
      apiKey: 'test-key',
      deployment: 'chat',
      apiVersion: '2024-06-01',
      maxTokens: 500,
      temperature: 1,
      systemPrompt: undefined
    });
  });

  it('requires AI endpoint, key and deployment together', () => {
    const config = loadAppConfig({ ...baseEnv, AI_ENDPOINT: 'https://ai.test', AI_API_KEY: 'test-key' });
    expect(config.followUpChat).toBeUndefined();
  });

  it('throws ConfigError for missing required settings', () => {
    expect(() => requireEnv({}, 'GRAPH_TENANT_ID')).toThrow(ConfigError);
    expect(() => loadAppConfig({ ...baseEnv, MICROSOFT_APP_ID: '' })).toThrow(
      'Missing MICROSOFT_APP_ID environment variable.'
    );
  });

  it('parses numbers, booleans and temperatures', () => {
    expect(parseNumber('12.7', 3)).toBe(12);
    expect(parseNumber('-1', 3)).toBe(3);
    expect(parseNumber('abc', 3)).toBe(3);
    expect(parseNumber(undefined, 3)).toBe(3);
    expect(parseBoolean(' Yes ')).toBe(true);
    expect(parseBoolean('1')).toBe(true);
    expect(parseBoolean('no')).toBe(false);
    expect(parseTemperature(undefined)).toBe(0.7);
    expect(parseTemperature('-0.5')).toBe(0);
    expect(parseTemperature('0.2')).toBe(0.2);
    expect(parseTemperature('warm')).toBe(0.7);
  });
});
