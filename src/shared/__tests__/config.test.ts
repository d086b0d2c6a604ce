import fs from 'fs';
import path from 'path';
import { breakoutDrawdownRule, loadConfig, loadSecrets, validateConfig } from '../config';
import { ConfigurationError } from '../errors';

const CONFIG_PATH = path.join(__dirname, '../../../config/screener.json');

function rawConfig(): Record<string, unknown> {
  const raw: unknown = JSON.parse(fs.readFileSync(CONFIG_PATH, 'utf-8'));
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) throw new Error('config is not an object');
  return { ...raw };
}

describe('loadConfig', () => {
  it('loads the shipped configuration', () => {
    const config = loadConfig(CONFIG_PATH);
    expect(config.app.benchmarkSymbol).toBe('QQQ');
    expect(config.data.providerPrimary).toBe('twelvedata');
    expect(config.data.retry.maxAttempts).toBe(3);
    expect(config.triggers.breakout20d.enabled).toBe(true);
  });

  it('fails on a missing file', () => {
    expect(() => loadConfig(path.join(__dirname, 'missing.json'))).toThrow(ConfigurationError);
  });
});

describe('validateConfig', () => {
  it('fills defaults for optional settings', () => {
    const raw = rawConfig();
    raw.database = {};
    expect(validateConfig(raw).database.path).toBe('screener.sqlite');
  });

  it('requires at least one symbol', () => {
    const raw = rawConfig();
    raw.symbols = [];
    try {
      validateConfig(raw);
      throw new Error('expected validation to fail');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error instanceof ConfigurationError && error.details).toEqual(['symbols must list at least one ticker']);
    }
  });

  it('names the nested property that failed', () => {
    const raw = rawConfig();
    raw.data = Object.assign({}, raw.data, { providerPrimary: 'carrier-pigeon' });
    expect(() => validateConfig(raw)).toThrow(/data\.providerPrimary: providerPrimary must be one of the following values/);
  });
});

describe('breakoutDrawdownRule', () => {
  it('reads the window and ceiling from the rule', () => {
    expect(breakoutDrawdownRule(loadConfig(CONFIG_PATH))).toEqual({ windowDays: 90, ddMax: 0.25 });
  });

  it('falls back to the defaults without the rule', () => {
    const raw = rawConfig();
    raw.rules = [];
    expect(breakoutDrawdownRule(validateConfig(raw))).toEqual({ windowDays: 90, ddMax: 0.25 });
  });

  it('rejects a non-numeric ceiling', () => {
    const raw = rawConfig();
    raw.rules = [{ ruleId: 'FILTER_DD_002', params: { windowDays: 60, ddMax: 'a lot' } }];
    expect(() => breakoutDrawdownRule(validateConfig(raw))).toThrow('FILTER_DD_002.params.ddMax must be a number');
  });
});

describe('loadSecrets', () => {
  it('reads trimmed credentials and treats blanks as unset', () => {
    const secrets = loadSecrets({ TWELVE_DATA_API_KEY: ' test-secret ', SLACK_WEBHOOK_URL: '   ' });
    expect(secrets.twelveDataApiKey).toBe('test-secret');
    expect(secrets.slackWebhookUrl).toBeUndefined();
    expect(secrets.telegramChatId).toBeUndefined();
  });

  it('reads the SMTP settings with the port and STARTTLS defaults', () => {
    expect(loadSecrets({ SMTP_HOST: 'smtp.test', SMTP_USER: 'alerts', SMTP_TLS: 'no' }).smtp).toEqual({
      host: 'smtp.test',
      port: undefined,
      user: 'alerts',
      password: undefined,
      from: undefined,
      to: undefined,
      tls: false,
    });
    expect(loadSecrets({ SMTP_PORT: '2525' }).smtp).toMatchObject({ port: 2525, tls: true });
  });

  it('rejects a malformed SMTP port', () => {
    expect(() => loadSecrets({ SMTP_PORT: 'smtp' })).toThrow(ConfigurationError);
  });
});
