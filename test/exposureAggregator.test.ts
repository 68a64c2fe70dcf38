import test from 'node:test';
import assert from 'node:assert/strict';

import {
  aggregateExposure,
  computeGammaLevels,
  contractGex,
  contractVex,
  dealerSign,
  latestSpot,
} from '../server/services/exposureAggregator.js';
import {
  instrumentKey,
  type ContractRecord,
  type ExposureCell,
  type Instrument,
  type OptionSide,
  type RecordsByInstrument,
} from '../server/services/exposureTypes.js';

function record(
  instrument: Instrument,
  side: OptionSide,
  strike: number,
  fields: Partial<Omit<ContractRecord, 'symbol' | 'expiry' | 'side' | 'strike'>> = {},
): ContractRecord {
  return {
    symbol: instrument.symbol,
    expiry: instrument.expiry,
    side,
    strike,
    openInterest: 10,
    gamma: 0.5,
    vega: 0.25,
    multiplier: 100,
    underlyingSpot: 100,
    quoteTimeMs: 1_000,
    ...fields,
  };
}

function byInstrument(...groups: Array<[Instrument, ContractRecord[]]>): RecordsByInstrument {
  const map: RecordsByInstrument = new Map();
  for (const [instrument, records] of groups) map.set(instrumentKey(instrument), { instrument, records });
  return map;
}

const SPY_NEAR: Instrument = { symbol: 'SPY', expiry: '2025-03-21' };
const SPY_FAR: Instrument = { symbol: 'SPY', expiry: '2025-03-28' };
const AAPL: Instrument = { symbol: 'AAPL', expiry: '2025-03-21' };

test('dealer sign is positive for calls and negative for puts', () => {
  assert.equal(dealerSign('CALL'), 1);
  assert.equal(dealerSign('PUT'), -1);
});

test('contract exposures follow the GEX and VEX formulas', () => {
  const call = record(SPY_NEAR, 'CALL', 100);
  assert.equal(contractGex(call), 50_000);
  assert.equal(contractVex(call), 250);

  const put = record(SPY_NEAR, 'PUT', 100, { openInterest: 4 });
  assert.equal(contractGex(put), -20_000);
  assert.equal(contractVex(put), -100);
});

test('latestSpot takes the newest quote and lets the later record win a tie', () => {
  assert.equal(latestSpot([]), null);
  assert.equal(
    latestSpot([
      record(SPY_NEAR, 'CALL', 100, { quoteTimeMs: 1_000, underlyingSpot: 100 }),
      record(SPY_NEAR, 'CALL', 100, { quoteTimeMs: 2_000, underlyingSpot: 101 }),
      record(SPY_NEAR, 'PUT', 100, { quoteTimeMs: 2_000, underlyingSpot: 102 }),
      record(SPY_NEAR, 'PUT', 100, { quoteTimeMs: 1_500, underlyingSpot: 103 }),
    ]),
    102,
  );
});

const RECORDS = byInstrument(
  [
    SPY_NEAR,
    [
      record(SPY_NEAR, 'CALL', 100),
      record(SPY_NEAR, 'PUT', 100, { openInterest: 4 }),
      record(SPY_NEAR, 'CALL', 95, { openInterest: 0 }),
      record(SPY_NEAR, 'PUT', 105, { openInterest: 2, gamma: 0.25, vega: 0.5 }),
    ],
  ],
  [SPY_FAR, [record(SPY_FAR, 'CALL', 100, { openInterest: 2, gamma: 0.25, vega: 0.5 })]],
  [AAPL, [record(AAPL, 'CALL', 200, { openInterest: 1, vega: 1, underlyingSpot: 200 })]],
);

test('aggregateExposure nets calls and puts per strike, drops empty strikes and sorts', () => {
  const cells = aggregateExposure(RECORDS);

  assert.deepEqual(
    cells.map((cell) => [cell.instrument.symbol, cell.instrument.expiry, cell.strike, cell.gex, cell.vex, cell.spot]),
    [
      ['AAPL', '2025-03-21', 200, 20_000, 100, 200],
      ['SPY', '2025-03-21', 100, 30_000, 150, 100],
      ['SPY', '2025-03-21', 105, -5_000, -100, 100],
      ['SPY', '2025-03-28', 100, 5_000, 100, 100],
    ],
  );
});

test('aggregateExposure skips instruments with no records', () => {
  assert.deepEqual(aggregateExposure(byInstrument([SPY_NEAR, []])), []);
});

test('aggregateExposure gives the same cells when replayed in a different record order', () => {
  const first = aggregateExposure(RECORDS);
  const reordered: RecordsByInstrument = new Map();
  for (const [key, group] of [...RECORDS.entries()].reverse()) {
    reordered.set(key, { instrument: group.instrument, records: [...group.records].reverse() });
  }

  assert.deepEqual(aggregateExposure(RECORDS), first);
  assert.deepEqual(aggregateExposure(reordered), first);
});

test('computeGammaLevels picks the walls from single cells and totals net exposure', () => {
  const levels = computeGammaLevels(aggregateExposure(RECORDS));

  assert.deepEqual(levels, [
    {
      symbol: 'AAPL',
      spot: 200,
      maxPositiveGammaStrike: 200,
      maxPositiveGammaValue: 20_000,
      maxNegativeGammaStrike: null,
      maxNegativeGammaValue: 0,
      netGex: 20_000,
      netVex: 100,
    },
    {
      symbol: 'SPY',
      spot: 100,
      maxPositiveGammaStrike: 100,
      maxPositiveGammaValue: 30_000,
      maxNegativeGammaStrike: 105,
      maxNegativeGammaValue: -5_000,
      netGex: 30_000,
      netVex: 150,
    },
  ]);
});

test('computeGammaLevels does not net a strike across expiries', () => {
  const cells: ExposureCell[] = [
    { instrument: SPY_NEAR, strike: 95, gex: -40, vex: 0, spot: 100 },
    { instrument: SPY_NEAR, strike: 100, gex: 30, vex: 0, spot: 100 },
    { instrument: SPY_NEAR, strike: 105, gex: 50, vex: 0, spot: 100 },
    { instrument: SPY_FAR, strike: 95, gex: 45, vex: 0, spot: 100 },
    { instrument: SPY_FAR, strike: 100, gex: 30, vex: 0, spot: 100 },
  ];
  const [spy] = computeGammaLevels(cells);

  assert.equal(spy.maxPositiveGammaStrike, 105);
  assert.equal(spy.maxPositiveGammaValue, 50);
  assert.equal(spy.maxNegativeGammaStrike, 95);
  assert.equal(spy.maxNegativeGammaValue, -40);
  assert.equal(spy.netGex, 115);
});

test('computeGammaLevels keeps the first cell on a tie', () => {
  const cells: ExposureCell[] = [
    { instrument: SPY_NEAR, strike: 100, gex: 10, vex: 0, spot: 100 },
    { instrument: SPY_FAR, strike: 110, gex: 10, vex: 0, spot: 100 },
  ];
  assert.equal(computeGammaLevels(cells)[0].maxPositiveGammaStrike, 100);
});

test('computeGammaLevels reports the spot of the nearest expiry', () => {
  const cells: ExposureCell[] = [
    { instrument: SPY_FAR, strike: 100, gex: 1, vex: 0, spot: 99 },
    { instrument: SPY_NEAR, strike: 100, gex: 1, vex: 0, spot: 100 },
  ];
  assert.equal(computeGammaLevels(cells)[0].spot, 100);
});
