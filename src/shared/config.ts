import fs from 'fs';
import { ValidationError, validateSync } from 'class-validator';
import {
  AlphaVantageConfigDto,
  AppSectionDto,
  CacheConfigDto,
  ConditionsIndexConfigDto,
  DataConfigDto,
  DatabaseConfigDto,
  FiltersConfigDto,
  NotificationsConfigDto,
  RateLimitConfigDto,
  RetryConfigDto,
  RuleDto,
  ScreenerConfigDto,
  TriggersConfigDto,
  TriggerToggleDto,
  TwelveDataConfigDto,
} from '../application/dto/screener-config.dto';
import { DEFAULT_DRAWDOWN_WINDOW, DRAWDOWN_RULE_ID } from '../modules/screening/triggers/breakout.trigger';
import { SmtpSettings } from '../domain/interfaces/services.interface';
import { ConfigurationError, errorMessage } from './errors';

export const DEFAULT_CONFIG_PATH = 'config/screener.json';

/** Credentials are read from the environment only, never from the config file. */
const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

export interface ScreenerSecrets {
  twelveDataApiKey?: string;
  alphaVantageApiKey?: string;
  slackWebhookUrl?: string;
  pushoverUserKey?: string;
  pushoverAppToken?: string;
  telegramBotToken?: string;
  telegramChatId?: string;
  smtp?: SmtpSettings;
}

export function loadSecrets(env: NodeJS.ProcessEnv = process.env): ScreenerSecrets {
  const read = (name: string): string | undefined => env[name]?.trim() || undefined;
  return {
    twelveDataApiKey: read('TWELVE_DATA_API_KEY'),
    alphaVantageApiKey: read('ALPHA_VANTAGE_API_KEY'),
    slackWebhookUrl: read('SLACK_WEBHOOK_URL'),
    pushoverUserKey: read('PUSHOVER_USER_KEY'),
    pushoverAppToken: read('PUSHOVER_APP_TOKEN'),
    telegramBotToken: read('TELEGRAM_BOT_TOKEN'),
    telegramChatId: read('TELEGRAM_CHAT_ID'),
    smtp: {
      host: read('SMTP_HOST'),
      port: readPort(read('SMTP_PORT')),
      user: read('SMTP_USER'),
      password: read('SMTP_PASSWORD'),
      from: read('SMTP_FROM'),
      to: read('MAIL_ADDRESS_NOTIFICATION_TO'),
      tls: TRUTHY.has((read('SMTP_TLS') ?? 'true').toLowerCase()),
    },
  };
}

function readPort(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const port = Number(value);
  if (!Number.isInteger(port) || port <= 0) {
    throw new ConfigurationError(`SMTP_PORT must be a positive integer, got "${value}"`);
  }
  return port;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section<T extends object>(ctor: new () => T, raw: unknown): T {
  return Object.assign(new ctor(), isRecord(raw) ? raw : {});
}

/** Build the DTO tree from parsed JSON so nested sections are class instances for validation. */
export function toConfigDto(raw: unknown): ScreenerConfigDto {
  const root = isRecord(raw) ? raw : {};
  const data = isRecord(root.data) ? root.data : {};
  const triggers = isRecord(root.triggers) ? root.triggers : {};

  const config = section(ScreenerConfigDto, root);
  config.app = section(AppSectionDto, root.app);
  config.data = Object.assign(section(DataConfigDto, data), {
    twelvedata: section(TwelveDataConfigDto, data.twelvedata),
    alphavantage: section(AlphaVantageConfigDto, data.alphavantage),
    cache: section(CacheConfigDto, data.cache),
    retry: section(RetryConfigDto, data.retry),
    rateLimit: section(RateLimitConfigDto, data.rateLimit),
  });
  config.filters = section(FiltersConfigDto, root.filters);
  config.triggers = Object.assign(section(TriggersConfigDto, triggers), {
    pullback25: section(TriggerToggleDto, triggers.pullback25),
    pullback50: section(TriggerToggleDto, triggers.pullback50),
    breakout20d: section(TriggerToggleDto, triggers.breakout20d),
  });
  config.rules = Array.isArray(root.rules) ? root.rules.map((rule: unknown) => section(RuleDto, rule)) : [];
  config.conditionsIndex = section(ConditionsIndexConfigDto, root.conditionsIndex);
  config.notifications = section(NotificationsConfigDto, root.notifications);
  config.database = section(DatabaseConfigDto, root.database);
  return config;
}

function flattenErrors(errors: ValidationError[], parent = ''): string[] {
  return errors.flatMap((error) => {
    const property = parent ? `${parent}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((message) =>
      message.startsWith(property) ? message : `${property}: ${message}`,
    );
    return [...own, ...flattenErrors(error.children ?? [], property)];
  });
}

export function validateConfig(raw: unknown): ScreenerConfigDto {
  const config = toConfigDto(raw);
  const errors = validateSync(config);
  if (errors.length > 0) {
    throw new ConfigurationError('Invalid screener configuration', flattenErrors(errors));
  }
  return config;
}

export function loadConfig(path: string = process.env.SCREENER_CONFIG || DEFAULT_CONFIG_PATH): ScreenerConfigDto {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read config ${path}: ${errorMessage(error)}`);
  }
  return validateConfig(raw);
}

export interface DrawdownRule {
  windowDays: number;
  ddMax: number;
}

const DEFAULT_DRAWDOWN_RULE: DrawdownRule = { windowDays: DEFAULT_DRAWDOWN_WINDOW, ddMax: 0.25 };

export function getRule(config: ScreenerConfigDto, ruleId: string): RuleDto | undefined {
  return config.rules.find((rule) => rule.ruleId === ruleId);
}

/** Window and ceiling of the breakout trigger's drawdown-from-peak exclusion. */
export function breakoutDrawdownRule(config: ScreenerConfigDto): DrawdownRule {
  const params = getRule(config, DRAWDOWN_RULE_ID)?.params ?? {};
  const windowDays = params.windowDays ?? DEFAULT_DRAWDOWN_RULE.windowDays;
  const ddMax = params.ddMax ?? DEFAULT_DRAWDOWN_RULE.ddMax;

  if (typeof windowDays !== 'number' || !Number.isInteger(windowDays) || windowDays < 1) {
    throw new ConfigurationError(`${DRAWDOWN_RULE_ID}.params.windowDays must be a positive integer`);
  }
  if (typeof ddMax !== 'number' || !Number.isFinite(ddMax)) {
    throw new ConfigurationError(`${DRAWDOWN_RULE_ID}.params.ddMax must be a number`);
  }
  return { windowDays, ddMax };
}
