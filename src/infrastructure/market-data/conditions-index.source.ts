import { parse } from 'csv-parse/sync';
import { Logger } from '../../shared/logger';
import { ProviderError, errorMessage } from '../../shared/errors';
import { IConditionsIndexSource, IHttpClient } from '../../domain/interfaces/services.interface';
import { ConditionsPoint } from '../../domain/types/ohlcv.type';
import { toIsoDate, toNumberOrNull } from './providers/payload.utils';

export const FRED_NFCI_CSV_URL = 'https://fred.stlouisfed.org/graph/fredgraph.csv?id=NFCI';

const SOURCE_ID = 'conditions-index';
const SERIES_NAME = 'NFCI';

/**
 * Weekly financial-conditions index published as a two-column `date,value` CSV.
 * Missing observations (FRED writes them as `.`) are dropped.
 */
export class ConditionsIndexSource implements IConditionsIndexSource {
  private readonly logger = new Logger('ConditionsIndexSource');

  constructor(
    private readonly http: IHttpClient,
    private readonly csvUrl: string = FRED_NFCI_CSV_URL,
  ) {}

  async fetchSeries(): Promise<ConditionsPoint[]> {
    let text: string;
    try {
      const response = await this.http.get(this.csvUrl);
      if (!response.ok) {
        throw new ProviderError(SOURCE_ID, SERIES_NAME, `HTTP ${response.status}: ${response.statusText}`);
      }
      text = await response.text();
    } catch (error) {
      if (error instanceof ProviderError) throw error;
      throw new ProviderError(SOURCE_ID, SERIES_NAME, errorMessage(error), error);
    }

    const series = parseConditionsCsv(text);
    this.logger.info(`Loaded ${series.length} conditions-index observations`, {
      first: series[0]?.date,
      last: series[series.length - 1]?.date,
    });
    return series;
  }
}

export function parseConditionsCsv(text: string): ConditionsPoint[] {
  const records: unknown = parse(text, {
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
  });
  if (!Array.isArray(records) || records.length < 2) {
    throw new ProviderError(SOURCE_ID, SERIES_NAME, 'CSV is empty');
  }

  const [header, ...rows] = records;
  if (!Array.isArray(header) || header.length < 2) {
    throw new ProviderError(SOURCE_ID, SERIES_NAME, 'CSV has fewer than two columns');
  }

  const points: ConditionsPoint[] = [];
  for (const row of rows) {
    if (!Array.isArray(row)) continue;
    const date = toIsoDate(row[0]);
    const value = toNumberOrNull(row[1]);
    if (date === null || value === null) continue;
    points.push({ date, value });
  }

  if (points.length === 0) {
    throw new ProviderError(SOURCE_ID, SERIES_NAME, 'CSV has no numeric observations');
  }
  return points.sort((a, b) => a.date.localeCompare(b.date));
}
