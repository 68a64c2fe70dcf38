/**
 * Exposure Aggregator — per-strike dealer GEX / VEX from contract records.
 *
 *   GEX = Σ gamma × OI × multiplier × spot² × 0.01 × sign
 *   VEX = Σ vega  × OI × multiplier × sign
 *
 * sign is +1 for calls and −1 for puts: dealers are taken to be long call
 * gamma and short put gamma. Pure and deterministic.
 */

import {
  instrumentKey,
  type ContractRecord,
  type ExposureCell,
  type GammaLevels,
  type OptionSide,
  type RecordsByInstrument,
} from './exposureTypes.js';

export function dealerSign(side: OptionSide): 1 | -1 {
  return side === 'CALL' ? 1 : -1;
}

export function contractGex(record: ContractRecord): number {
  const spot = record.underlyingSpot;
  return record.gamma * record.openInterest * record.multiplier * spot * spot * 0.01 * dealerSign(record.side);
}

export function contractVex(record: ContractRecord): number {
  return record.vega * record.openInterest * record.multiplier * dealerSign(record.side);
}

/** Spot of the record with the latest quote time; later records win ties. */
export function latestSpot(records: readonly ContractRecord[]): number | null {
  let best: ContractRecord | null = null;
  for (const record of records) {
    if (!best || record.quoteTimeMs >= best.quoteTimeMs) best = record;
  }
  return best ? best.underlyingSpot : null;
}

function compareCells(a: ExposureCell, b: ExposureCell): number {
  if (a.instrument.symbol !== b.instrument.symbol) return a.instrument.symbol < b.instrument.symbol ? -1 : 1;
  if (a.instrument.expiry !== b.instrument.expiry) return a.instrument.expiry < b.instrument.expiry ? -1 : 1;
  return a.strike - b.strike;
}

/**
 * One cell per (instrument, strike) with at least one non-zero exposure,
 * sorted by symbol, expiry, strike.
 */
export function aggregateExposure(recordsByInstrument: RecordsByInstrument): ExposureCell[] {
  const cells: ExposureCell[] = [];
  for (const { instrument, records } of recordsByInstrument.values()) {
    const spot = latestSpot(records);
    if (spot === null) continue;
    const byStrike = new Map<number, { gex: number; vex: number }>();
    for (const record of records) {
      const totals = byStrike.get(record.strike) ?? { gex: 0, vex: 0 };
      totals.gex += contractGex(record);
      totals.vex += contractVex(record);
      byStrike.set(record.strike, totals);
    }
    for (const [strike, totals] of byStrike) {
      if (totals.gex === 0 && totals.vex === 0) continue;
      cells.push({ instrument: { ...instrument }, strike, gex: totals.gex, vex: totals.vex, spot });
    }
  }
  return cells.sort(compareCells);
}

/**
 * Key gamma levels per symbol. The walls are single (expiry, strike) cells:
 * the largest positive and the most negative GEX, first in cell order on a
 * tie. Strikes are null when the symbol has no positive (or negative) cell.
 * `netGex` / `netVex` total every cell of the symbol.
 */
export function computeGammaLevels(cells: readonly ExposureCell[]): GammaLevels[] {
  const bySymbol = new Map<string, GammaLevels & { spotKey: string }>();
  for (const cell of cells) {
    const key = instrumentKey(cell.instrument);
    let entry = bySymbol.get(cell.instrument.symbol);
    if (!entry) {
      entry = {
        symbol: cell.instrument.symbol,
        spot: cell.spot,
        spotKey: key,
        maxPositiveGammaStrike: null,
        maxPositiveGammaValue: 0,
        maxNegativeGammaStrike: null,
        maxNegativeGammaValue: 0,
        netGex: 0,
        netVex: 0,
      };
      bySymbol.set(cell.instrument.symbol, entry);
    }
    // Nearest expiry's spot; instruments of one symbol come from the same chain.
    if (key < entry.spotKey) {
      entry.spot = cell.spot;
      entry.spotKey = key;
    }
    if (cell.gex > entry.maxPositiveGammaValue) {
      entry.maxPositiveGammaValue = cell.gex;
      entry.maxPositiveGammaStrike = cell.strike;
    }
    if (cell.gex < entry.maxNegativeGammaValue) {
      entry.maxNegativeGammaValue = cell.gex;
      entry.maxNegativeGammaStrike = cell.strike;
    }
    entry.netGex += cell.gex;
    entry.netVex += cell.vex;
  }

  const levels: GammaLevels[] = [];
  for (const { spotKey: _spotKey, ...level } of bySymbol.values()) {
    levels.push(level);
  }
  return levels.sort((a, b) => (a.symbol < b.symbol ? -1 : a.symbol > b.symbol ? 1 : 0));
}
