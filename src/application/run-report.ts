import { RegimeScoreResult } from '../domain/types/regime.type';
import { EligibilityReason, Hit, TriggerKind } from '../domain/types/trigger.type';

export interface RunOutcome {
  regime: RegimeScoreResult;
  /** Hits that passed the regime gate, in evaluation order. */
  hits: readonly Hit[];
  eligibleSymbols: readonly string[];
  rejectedReasons: ReadonlyMap<EligibilityReason, number>;
  skippedSymbols: readonly string[];
}

export interface RunReport {
  title: string;
  lines: string[];
  /** Hits that made it into the report; empty when new entries are stopped. */
  reportedHits: Hit[];
}

export interface ReportSettings {
  sma50Tolerance: number;
  drawdown20dMax: number;
  breakoutVolumeMult: number;
  drawdownWindow: number;
  drawdownMax: number;
  enabled: Record<TriggerKind, boolean>;
}

/** `YYYY-MM-DD` of an instant, in UTC. */
export function utcDate(now: Date): string {
  return now.toISOString().slice(0, 10);
}

/** `YYYY-MM-DD` of an instant in an IANA timezone. */
export function localDate(now: Date, timeZone: string): string {
  // en-CA formats as YYYY-MM-DD
  return new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).format(now);
}

export function reportTitle(now: Date, regimeLabel: string): string {
  return `Stock Alerts ${utcDate(now)} UTC | Regime ${regimeLabel}`;
}

/** Five most frequent reasons as `reason:count`; ties keep first-seen order. */
export function topRejectedReasons(counts: ReadonlyMap<string, number>, limit = 5): string {
  return [...counts.entries()]
    .map(([reason, count], order) => ({ reason, count, order }))
    .sort((a, b) => b.count - a.count || a.order - b.order)
    .slice(0, limit)
    .map(({ reason, count }) => `${reason}:${count}`)
    .join(', ');
}

export function configSummary(settings: ReportSettings): string[] {
  const { enabled } = settings;
  return [
    'Legend: eligible_symbols = symbols that passed the filters, triggered_symbols = symbols with a reported signal',
    `Filter: close>=SMA50*(1-${settings.sma50Tolerance.toFixed(2)})`,
    'Filter: SMA50>=SMA200*0.98',
    `Filter: dd_peak_N<=dd_max (N=${settings.drawdownWindow}, dd_max=${settings.drawdownMax})`,
    `Filter: drawdown_20d_max=${settings.drawdown20dMax.toFixed(2)}`,
    `Trigger: PULLBACK_25=${enabled.PULLBACK_25_BOUNCE} (low<=SMA25*(1+tol), close>=SMA25, volume<=vol_ma20)`,
    `Trigger: PULLBACK_50=${enabled.PULLBACK_50_BOUNCE} (low<=SMA50*(1+tol), close>=SMA50, volume<=vol_ma20, drawdown_20d<=max)`,
    `Trigger: BREAKOUT_20D=${enabled.BREAKOUT_20D} (close>high_20d, close<=high_20d*1.05, volume>=vol_ma20*${settings.breakoutVolumeMult.toFixed(2)})`,
  ];
}

export function buildRunReport(outcome: RunOutcome, settings: ReportSettings, now: Date): RunReport {
  const { regime, hits, eligibleSymbols, rejectedReasons, skippedSymbols } = outcome;
  const title = reportTitle(now, regime.state);
  const header = [...configSummary(settings), `RegimeScore: ${JSON.stringify(regime)}`];
  const topRejected = topRejectedReasons(rejectedReasons);

  const footer = (triggered: string): string[] => {
    const lines: string[] = [];
    if (eligibleSymbols.length) lines.push(`eligible_symbols: ${eligibleSymbols.join(', ')}`);
    lines.push(`triggered_symbols: ${triggered}`);
    if (topRejected) lines.push(`top_rejected_reasons: ${topRejected}`);
    if (skippedSymbols.length) lines.push(`Skipped symbols: ${skippedSymbols.join(', ')}`);
    return lines;
  };

  if (!regime.allowNewEntries) {
    return {
      title,
      lines: [...header, `New entries stopped. max_exposure=${regime.maxExposure.toFixed(2)}`, ...footer('')],
      reportedHits: [],
    };
  }

  if (hits.length === 0) {
    return { title, lines: [...header, 'No signals.', ...footer('[]')], reportedHits: [] };
  }

  const grouped = new Map<TriggerKind, Hit[]>();
  for (const hit of hits) {
    grouped.set(hit.trigger, [...(grouped.get(hit.trigger) ?? []), hit]);
  }

  const body: string[] = [];
  for (const [trigger, items] of grouped) {
    body.push(`[${trigger}]`);
    for (const item of items) {
      body.push(`- ${item.symbol} close=${item.close.toFixed(2)} date=${item.date}`);
    }
  }

  const triggered = [...new Set(hits.map((h) => h.symbol))].sort().join(', ');
  return { title, lines: [...header, ...body, ...footer(triggered)], reportedHits: [...hits] };
}
