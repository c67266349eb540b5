/**
 * @fileoverview Builds the per-bar indicator frame.
 *
 * Runs every enabled plugin, collects its columns and signals, and keeps
 * only the rows where all of them are defined. A plugin that throws is
 * recorded as a failure and skipped; the others still run.
 *
 * @module @tradeloop/indicators/frame
 */

import { errorMessage, type IndicatorName, type PriceBar, type Signal } from '@tradeloop/contracts';
import type {
  ColumnName,
  ColumnSet,
  FrameRow,
  IndicatorConfig,
  IndicatorFailure,
  IndicatorFrame,
  Series,
  SignalSeries,
} from './types.js';
import { createDefaultRegistry, type IndicatorRegistry } from './registry.js';

/**
 * Default indicator parameters.
 */
export const DEFAULT_INDICATOR_CONFIG: IndicatorConfig = {
  maCrossover: { enabled: true, shortPeriod: 9, longPeriod: 21, trendPeriod: 50 },
  rsi: { enabled: true, period: 14, useDivergence: true, divergenceWindow: 10 },
  bollinger: { enabled: true, period: 20, stdDev: 2.0 },
  volume: { enabled: true, period: 20, surgeThreshold: 2.0 },
};

const defaultRegistry = createDefaultRegistry();

/**
 * Run the enabled indicators over `bars`.
 *
 * @example
 * ```typescript
 * const frame = buildFrame(bars, DEFAULT_INDICATOR_CONFIG);
 * const latest = frame.rows.at(-1);
 * ```
 */
export function buildFrame(
  bars: readonly PriceBar[],
  config: IndicatorConfig = DEFAULT_INDICATOR_CONFIG,
  registry: IndicatorRegistry = defaultRegistry
): IndicatorFrame {
  const columns: ColumnSet = {};
  const signals = new Map<IndicatorName, SignalSeries>();
  const failures: IndicatorFailure[] = [];

  for (const plugin of registry.list()) {
    if (!plugin.isEnabled(config)) continue;

    const missing = (plugin.requires ?? []).filter((dependency) => !signals.has(dependency));
    if (missing.length > 0) {
      failures.push({
        indicator: plugin.name,
        reason: `requires ${missing.join(', ')}`,
      });
      continue;
    }

    try {
      const output = plugin.compute(bars, config, columns);
      Object.assign(columns, output.columns);
      signals.set(plugin.name, output.signals);
    } catch (error) {
      failures.push({ indicator: plugin.name, reason: errorMessage(error) });
    }
  }

  const columnEntries = collectColumns(columns);
  const rows: FrameRow[] = [];

  bars.forEach((bar, index) => {
    const row = toRow(bar, index, columnEntries, signals);
    if (row) rows.push(row);
  });

  return { rows, indicators: Array.from(signals.keys()), failures };
}

function collectColumns(columns: ColumnSet): Array<[ColumnName, Series]> {
  const entries: Array<[ColumnName, Series]> = [];
  const add = (name: ColumnName) => {
    const series = columns[name];
    if (series) entries.push([name, series]);
  };
  add('maShort');
  add('maLong');
  add('maTrend');
  add('trendDirection');
  add('rsi');
  add('bbMiddle');
  add('bbUpper');
  add('bbLower');
  add('bbBandwidth');
  add('volumeMa');
  add('volumeRatio');
  add('volumeSurge');
  return entries;
}

/**
 * Row for bar `index`, or null when any column or signal is undefined there.
 */
function toRow(
  bar: PriceBar,
  index: number,
  columns: Array<[ColumnName, Series]>,
  signals: Map<IndicatorName, SignalSeries>
): FrameRow | null {
  const row: FrameRow = { bar, index, signals: {} };

  for (const [name, series] of columns) {
    const value = series[index];
    if (value === undefined || Number.isNaN(value)) return null;

    switch (name) {
      case 'trendDirection':
        row.trendDirection = value > 0 ? 1 : -1;
        break;
      case 'volumeSurge':
        row.volumeSurge = value > 0;
        break;
      default:
        row[name] = value;
    }
  }

  for (const [name, series] of signals) {
    const signal: Signal | undefined = series[index];
    if (signal === undefined) return null;
    row.signals[name] = signal;
  }

  return row;
}
