import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsObject,
  IsOptional,
  IsPositive,
  IsString,
  IsUrl,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import { PROVIDER_IDS, ProviderId } from '../../domain/interfaces/market-data-provider.interface';

export class AppSectionDto {
  @IsString()
  @IsNotEmpty()
  timezone: string = 'UTC';

  @IsString()
  @IsNotEmpty()
  benchmarkSymbol: string = 'QQQ';
}

export class TwelveDataConfigDto {
  @IsUrl({ require_tld: false })
  baseUrl: string = 'https://api.twelvedata.com/time_series';

  @IsString()
  interval: string = '1day';

  @IsInt()
  @IsPositive()
  outputsize: number = 300;
}

export class AlphaVantageConfigDto {
  @IsUrl({ require_tld: false })
  baseUrl: string = 'https://www.alphavantage.co/query';

  @IsString()
  function: string = 'TIME_SERIES_DAILY_ADJUSTED';

  @IsIn(['compact', 'full'])
  outputsize: string = 'full';
}

export class CacheConfigDto {
  @IsBoolean()
  enabled!: boolean;

  @IsInt({ message: 'data.cache.ttlSeconds must be a whole number of seconds' })
  @Min(0)
  ttlSeconds!: number;

  @IsString()
  @IsNotEmpty()
  directory: string = '.cache';
}

export class RetryConfigDto {
  @IsInt()
  @Min(1)
  maxAttempts!: number;

  @IsNumber()
  @Min(0)
  baseDelaySeconds!: number;

  @IsNumber()
  @Min(0)
  maxDelaySeconds!: number;
}

export class RateLimitConfigDto {
  @IsBoolean()
  enabled: boolean = true;

  @IsNumber()
  @Min(0)
  minIntervalSeconds: number = 8;
}

export class DataConfigDto {
  @IsIn(PROVIDER_IDS)
  providerPrimary!: ProviderId;

  @IsIn(PROVIDER_IDS)
  providerFallback!: ProviderId;

  @IsNumber()
  @IsPositive()
  requestTimeoutSeconds: number = 30;

  @ValidateNested()
  twelvedata!: TwelveDataConfigDto;

  @ValidateNested()
  alphavantage!: AlphaVantageConfigDto;

  @ValidateNested()
  cache!: CacheConfigDto;

  @ValidateNested()
  retry!: RetryConfigDto;

  @ValidateNested()
  rateLimit!: RateLimitConfigDto;
}

export class FiltersConfigDto {
  @IsNumber()
  @Min(0)
  @Max(1)
  drawdown20dMax!: number;

  @IsNumber()
  @IsPositive()
  high52wMaxMultiple!: number;

  @IsNumber()
  @Min(0)
  @Max(1)
  sma50Tolerance: number = 0;

  @IsNumber()
  @Min(0)
  @Max(1)
  tolerance!: number;
}

export class TriggerToggleDto {
  @IsBoolean()
  enabled!: boolean;
}

export class TriggersConfigDto {
  @IsNumber()
  @Min(0)
  breakoutVolumeMult!: number;

  @ValidateNested()
  pullback25!: TriggerToggleDto;

  @ValidateNested()
  pullback50!: TriggerToggleDto;

  @ValidateNested()
  breakout20d!: TriggerToggleDto;
}

export class RuleDto {
  @IsString()
  @IsNotEmpty()
  ruleId!: string;

  @IsOptional()
  @IsString()
  description?: string;

  @IsObject()
  params: Record<string, unknown> = {};
}

export class ConditionsIndexConfigDto {
  @IsUrl({ require_tld: false })
  csvUrl: string = 'https://fred.stlouisfed.org/graph/fredgraph.csv?id=NFCI';
}

export class NotificationsConfigDto {
  @IsBoolean()
  slackEnabled!: boolean;

  @IsBoolean()
  pushoverEnabled!: boolean;

  @IsBoolean()
  emailEnabled: boolean = true;

  @IsBoolean()
  telegramEnabled: boolean = false;
}

export class DatabaseConfigDto {
  @IsString()
  @IsNotEmpty()
  path: string = 'screener.sqlite';
}

export class ScreenerConfigDto {
  @ValidateNested()
  app!: AppSectionDto;

  @IsArray()
  @ArrayNotEmpty({ message: 'symbols must list at least one ticker' })
  @IsString({ each: true })
  @IsNotEmpty({ each: true })
  symbols!: string[];

  @ValidateNested()
  data!: DataConfigDto;

  @ValidateNested()
  filters!: FiltersConfigDto;

  @ValidateNested()
  triggers!: TriggersConfigDto;

  @IsArray()
  @ValidateNested({ each: true })
  rules!: RuleDto[];

  @ValidateNested()
  conditionsIndex!: ConditionsIndexConfigDto;

  @ValidateNested()
  notifications!: NotificationsConfigDto;

  @ValidateNested()
  database!: DatabaseConfigDto;
}
