/**
 * Statistical Normalizer — turns one cycle's cells into a Snapshot.
 *
 * For each kind (GEX, VEX) positive and negative values are scored against
 * their own subset: z = (value − mean) / stddev with the population standard
 * deviation. A subset with fewer than two members, or no spread, scores every
 * member 0. Classes:
 *
 *   empty          value is 0 for that kind
 *   outlier        |z| ≥ 2
 *   below-average  z < 0
 *   average        otherwise
 */

import { computeGammaLevels } from './exposureAggregator.js';
import {
  cellKey,
  instrumentKey,
  type AtmStrike,
  type CellScore,
  type ColorClass,
  type ExposureCell,
  type ExposureKind,
  type ExtremeMarkers,
  type FetchCycleResult,
  type KindStats,
  type Snapshot,
  type SubsetStats,
} from './exposureTypes.js';

export const OUTLIER_Z_THRESHOLD = 2;

const EXPOSURE_KINDS: readonly ExposureKind[] = ['gex', 'vex'];

export interface NormalizeContext {
  sequence: number;
  generatedAt: Date;
  cycle?: FetchCycleResult | null;
}

export function computeSubsetStats(values: readonly number[]): SubsetStats {
  const count = values.length;
  if (count === 0) return { count: 0, mean: 0, stddev: 0 };
  let sum = 0;
  for (const value of values) sum += value;
  const mean = sum / count;
  let squared = 0;
  for (const value of values) squared += (value - mean) ** 2;
  return { count, mean, stddev: Math.sqrt(squared / count) };
}

export function computeKindStats(cells: readonly ExposureCell[], kind: ExposureKind): KindStats {
  const positive: number[] = [];
  const negative: number[] = [];
  for (const cell of cells) {
    const value = cell[kind];
    if (value > 0) positive.push(value);
    else if (value < 0) negative.push(value);
  }
  return { positive: computeSubsetStats(positive), negative: computeSubsetStats(negative) };
}

/** Floating-point noise on identical values must not read as spread. */
function hasSpread(stats: SubsetStats): boolean {
  return stats.count >= 2 && stats.stddev > Math.abs(stats.mean) * 1e-12;
}

export function classifyZScore(zScore: number): ColorClass {
  if (Math.abs(zScore) >= OUTLIER_Z_THRESHOLD) return 'outlier';
  if (zScore < 0) return 'below-average';
  return 'average';
}

export function scoreValue(value: number, stats: KindStats): CellScore {
  if (value === 0) return { value, zScore: 0, colorClass: 'empty' };
  const subset = value > 0 ? stats.positive : stats.negative;
  if (!hasSpread(subset)) return { value, zScore: 0, colorClass: 'average' };
  const zScore = (value - subset.mean) / subset.stddev;
  return { value, zScore, colorClass: classifyZScore(zScore) };
}

/**
 * Per instrument, the present strike nearest the instrument's spot; a tie
 * goes to the lower strike.
 */
export function findAtmStrikes(cells: readonly ExposureCell[]): AtmStrike[] {
  const byInstrument = new Map<string, AtmStrike>();
  for (const cell of cells) {
    const key = instrumentKey(cell.instrument);
    const current = byInstrument.get(key);
    if (!current) {
      byInstrument.set(key, {
        instrumentKey: key,
        symbol: cell.instrument.symbol,
        expiry: cell.instrument.expiry,
        spot: cell.spot,
        strike: cell.strike,
      });
      continue;
    }
    const distance = Math.abs(cell.strike - current.spot);
    const bestDistance = Math.abs(current.strike - current.spot);
    if (distance < bestDistance || (distance === bestDistance && cell.strike < current.strike)) {
      current.strike = cell.strike;
    }
  }
  return [...byInstrument.values()];
}

export function findExtremes(cells: readonly ExposureCell[], kind: ExposureKind): ExtremeMarkers {
  let maxPositiveValue: number | null = null;
  let minNegativeValue: number | null = null;
  for (const cell of cells) {
    const value = cell[kind];
    if (value > 0 && (maxPositiveValue === null || value > maxPositiveValue)) maxPositiveValue = value;
    if (value < 0 && (minNegativeValue === null || value < minNegativeValue)) minNegativeValue = value;
  }
  const maxPositive: string[] = [];
  const minNegative: string[] = [];
  for (const cell of cells) {
    const value = cell[kind];
    if (maxPositiveValue !== null && value === maxPositiveValue) maxPositive.push(cellKey(cell.instrument, cell.strike));
    if (minNegativeValue !== null && value === minNegativeValue) minNegative.push(cellKey(cell.instrument, cell.strike));
  }
  return { maxPositive, maxPositiveValue, minNegative, minNegativeValue };
}

export function normalizeExposure(cells: readonly ExposureCell[], context: NormalizeContext): Snapshot {
  const stats: Record<ExposureKind, KindStats> = {
    gex: computeKindStats(cells, 'gex'),
    vex: computeKindStats(cells, 'vex'),
  };
  const extremes: Record<ExposureKind, ExtremeMarkers> = {
    gex: findExtremes(cells, 'gex'),
    vex: findExtremes(cells, 'vex'),
  };
  const scored = cells.map((cell) => {
    const scores: Record<ExposureKind, CellScore> = {
      gex: scoreValue(cell.gex, stats.gex),
      vex: scoreValue(cell.vex, stats.vex),
    };
    for (const kind of EXPOSURE_KINDS) {
      if (!Number.isFinite(scores[kind].zScore)) {
        throw new Error(`Non-finite ${kind} z-score for ${cellKey(cell.instrument, cell.strike)}`);
      }
    }
    return {
      key: cellKey(cell.instrument, cell.strike),
      symbol: cell.instrument.symbol,
      expiry: cell.instrument.expiry,
      strike: cell.strike,
      spot: cell.spot,
      gex: scores.gex,
      vex: scores.vex,
    };
  });

  return {
    kind: 'snapshot',
    sequence: context.sequence,
    generatedAt: context.generatedAt.toISOString(),
    cells: scored,
    stats,
    atm: findAtmStrikes(cells),
    extremes,
    levels: computeGammaLevels(cells),
    alerts: [],
    cycle: context.cycle ?? null,
  };
}
