import { DataSource } from 'typeorm';
import { DIContainer } from './shared/container';
import { Logger } from './shared/logger';
import { breakoutDrawdownRule, ScreenerSecrets } from './shared/config';
import { ScreenerConfigDto } from './application/dto/screener-config.dto';
import { EvaluateSymbolUseCase, SymbolEvaluationOptions } from './application/use-cases/evaluate-symbol.use-case';
import { ReportSettings } from './application/run-report';
import { RunSettings, TOKENS } from './app';

import { IDailyBarProvider, ProviderId } from './domain/interfaces/market-data-provider.interface';
import { Clock, IHttpClient, INotificationChannel } from './domain/interfaces/services.interface';

import { FetchHttpClient } from './infrastructure/http/fetch-http.client';
import { FileCacheStore } from './infrastructure/cache/file-cache.store';
import { CallThrottle } from './infrastructure/market-data/call-throttle';
import { ResilientFetcherService } from './infrastructure/market-data/resilient-fetcher.service';
import { ConditionsIndexSource } from './infrastructure/market-data/conditions-index.source';
import { TwelveDataProvider } from './infrastructure/market-data/providers/twelve-data.provider';
import { AlphaVantageProvider } from './infrastructure/market-data/providers/alpha-vantage.provider';
import { SlackWebhookChannel } from './infrastructure/notifications/slack.channel';
import { PushoverChannel } from './infrastructure/notifications/pushover.channel';
import { EmailChannel } from './infrastructure/notifications/email.channel';
import { TelegramChannel } from './infrastructure/telegram/telegram.bot';
import { NotificationService } from './infrastructure/services/notification.service';
import { RunLogRepository } from './infrastructure/repositories/run-log.repository';

const logger = new Logger('DependencyContainer');

export interface ContainerOptions {
  config: ScreenerConfigDto;
  secrets: ScreenerSecrets;
  /** `null` skips persisting run logs. */
  dataSource: DataSource | null;
  clock?: Clock;
}

export function registerDependencies(container: DIContainer, options: ContainerOptions): void {
  const { config, secrets, dataSource } = options;
  const clock = options.clock ?? Date.now;

  container.bind(TOKENS.clock, () => clock);
  container.bind<IHttpClient>('IHttpClient', () => new FetchHttpClient(config.data.requestTimeoutSeconds * 1000));

  // --- Market data ---
  container.bind(TOKENS.fetcher, () => {
    const { data } = config;
    const providers = uniqueProviderIds(data.providerPrimary, data.providerFallback).map((id) =>
      createProvider(id, config, secrets),
    );
    logger.info(`Market data providers: ${providers.map((p) => p.providerId).join(' -> ')}`);

    const minIntervalSeconds = data.rateLimit.minIntervalSeconds;
    return new ResilientFetcherService({
      providers,
      http: container.get<IHttpClient>('IHttpClient'),
      throttle: new CallThrottle(data.rateLimit.enabled, minIntervalSeconds * 1000, clock),
      retry: data.retry,
      rateLimit: data.rateLimit,
      cache: data.cache.enabled ? new FileCacheStore(data.cache.directory, data.cache.ttlSeconds, clock) : null,
    });
  });
  container.bind(
    TOKENS.conditions,
    () => new ConditionsIndexSource(container.get<IHttpClient>('IHttpClient'), config.conditionsIndex.csvUrl),
  );

  // --- Notifications ---
  container.bind(TOKENS.notifications, () => {
    const channels = createChannels(config, secrets, container.get<IHttpClient>('IHttpClient'));
    logger.info(`Notification channels: ${channels.map((c) => c.name).join(', ') || 'stdout only'}`);
    return new NotificationService(channels);
  });

  // --- Persistence ---
  container.bind(TOKENS.runLog, () => (dataSource ? new RunLogRepository(dataSource) : null));

  // --- Screening ---
  container.bind(TOKENS.evaluateSymbol, () => new EvaluateSymbolUseCase(toEvaluationOptions(config)));
  container.bind<RunSettings>(TOKENS.runSettings, () => toRunSettings(config));

  // ScreenerApp is @Injectable and registers itself on first `get`.
}

export function toEvaluationOptions(config: ScreenerConfigDto): SymbolEvaluationOptions {
  const { filters, triggers } = config;
  return {
    eligibility: {
      drawdownMax: filters.drawdown20dMax,
      high52wMaxMultiple: filters.high52wMaxMultiple,
      sma50Tolerance: filters.sma50Tolerance,
    },
    tolerance: filters.tolerance,
    enabled: {
      PULLBACK_25_BOUNCE: triggers.pullback25.enabled,
      PULLBACK_50_BOUNCE: triggers.pullback50.enabled,
      BREAKOUT_20D: triggers.breakout20d.enabled,
    },
    breakoutVolumeMult: triggers.breakoutVolumeMult,
    breakoutDrawdown: breakoutDrawdownRule(config),
  };
}

export function toRunSettings(config: ScreenerConfigDto): RunSettings {
  const evaluation = toEvaluationOptions(config);
  const report: ReportSettings = {
    sma50Tolerance: config.filters.sma50Tolerance,
    drawdown20dMax: config.filters.drawdown20dMax,
    breakoutVolumeMult: evaluation.breakoutVolumeMult,
    drawdownWindow: evaluation.breakoutDrawdown.windowDays,
    drawdownMax: evaluation.breakoutDrawdown.ddMax,
    enabled: evaluation.enabled,
  };
  return {
    symbols: config.symbols,
    benchmarkSymbol: config.app.benchmarkSymbol,
    timezone: config.app.timezone,
    report,
  };
}

function uniqueProviderIds(...ids: ProviderId[]): ProviderId[] {
  return [...new Set(ids)];
}

/**
 * Factory function to create provider instances based on configuration
 */
export function createProvider(id: ProviderId, config: ScreenerConfigDto, secrets: ScreenerSecrets): IDailyBarProvider {
  switch (id) {
    case 'twelvedata':
      return new TwelveDataProvider({ ...config.data.twelvedata, apiKey: secrets.twelveDataApiKey });
    case 'alphavantage':
      return new AlphaVantageProvider({ ...config.data.alphavantage, apiKey: secrets.alphaVantageApiKey });
  }
}

export function createChannels(
  config: ScreenerConfigDto,
  secrets: ScreenerSecrets,
  http: IHttpClient,
): INotificationChannel[] {
  const { notifications } = config;
  const channels: INotificationChannel[] = [];
  if (notifications.slackEnabled) {
    channels.push(new SlackWebhookChannel(http, secrets.slackWebhookUrl));
  }
  if (notifications.pushoverEnabled) {
    channels.push(
      new PushoverChannel(http, { userKey: secrets.pushoverUserKey, appToken: secrets.pushoverAppToken }),
    );
  }
  if (notifications.emailEnabled) {
    channels.push(new EmailChannel(secrets.smtp ?? {}));
  }
  if (notifications.telegramEnabled) {
    channels.push(new TelegramChannel({ token: secrets.telegramBotToken, chatId: secrets.telegramChatId }));
  }
  return channels;
}
