import type { FailureKind } from '../lib/errors.js';

export type OptionSide = 'CALL' | 'PUT';

export interface Instrument {
  symbol: string;
  /** YYYY-MM-DD */
  expiry: string;
}

/** One upstream request; `expiries` narrows which of the returned expiries are kept. */
export interface UniverseEntry {
  symbol: string;
  expiries?: string[];
}

export interface ContractRecord {
  symbol: string;
  expiry: string;
  side: OptionSide;
  strike: number;
  openInterest: number;
  gamma: number;
  vega: number;
  multiplier: number;
  underlyingSpot: number;
  quoteTimeMs: number;
}

export interface InstrumentRecords {
  instrument: Instrument;
  records: ContractRecord[];
}

/** Keyed by `instrumentKey(instrument)`. */
export type RecordsByInstrument = Map<string, InstrumentRecords>;

export interface ExposureCell {
  instrument: Instrument;
  strike: number;
  gex: number;
  vex: number;
  /** Most recent underlying spot seen for the instrument in this cycle. */
  spot: number;
}

export type ExposureKind = 'gex' | 'vex';

export type ColorClass = 'empty' | 'below-average' | 'average' | 'outlier';

export interface SubsetStats {
  count: number;
  mean: number;
  stddev: number;
}

export interface KindStats {
  positive: SubsetStats;
  negative: SubsetStats;
}

export interface CellScore {
  value: number;
  zScore: number;
  colorClass: ColorClass;
}

export interface SnapshotCell {
  key: string;
  symbol: string;
  expiry: string;
  strike: number;
  spot: number;
  gex: CellScore;
  vex: CellScore;
}

export interface ExtremeMarkers {
  /** Cell keys holding the global maximum positive value (all ties). */
  maxPositive: string[];
  maxPositiveValue: number | null;
  /** Cell keys holding the global minimum negative value (all ties). */
  minNegative: string[];
  minNegativeValue: number | null;
}

export interface AtmStrike {
  instrumentKey: string;
  symbol: string;
  expiry: string;
  spot: number;
  strike: number;
}

export interface GammaLevels {
  symbol: string;
  spot: number;
  maxPositiveGammaStrike: number | null;
  maxPositiveGammaValue: number;
  maxNegativeGammaStrike: number | null;
  maxNegativeGammaValue: number;
  netGex: number;
  netVex: number;
}

export type AlertType = 'gex-flip' | 'wall-shift' | 'price-near-wall';

export type AlertSeverity = 'critical' | 'warning' | 'info';

export interface ExposureAlert {
  symbol: string;
  type: AlertType;
  severity: AlertSeverity;
  message: string;
  details: string;
}

export interface FetchFailure {
  symbol: string;
  reason: string;
  kind: FailureKind;
}

export interface FetchCycleResult {
  startedAt: string;
  finishedAt: string;
  succeeded: string[];
  failed: FetchFailure[];
  contractCount: number;
  skippedContracts: number;
}

export interface Snapshot {
  kind: 'snapshot';
  sequence: number;
  generatedAt: string;
  cells: SnapshotCell[];
  stats: Record<ExposureKind, KindStats>;
  atm: AtmStrike[];
  extremes: Record<ExposureKind, ExtremeMarkers>;
  levels: GammaLevels[];
  /** Level changes against the previous snapshot. */
  alerts: ExposureAlert[];
  cycle: FetchCycleResult | null;
}

export interface NoSnapshot {
  kind: 'no-data';
}

export function instrumentKey(instrument: Instrument): string {
  return `${instrument.symbol}|${instrument.expiry}`;
}

export function cellKey(instrument: Instrument, strike: number): string {
  return `${instrumentKey(instrument)}|${strike}`;
}
