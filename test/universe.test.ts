import test from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { pathToFileURL } from 'node:url';

import { buildUniverse, loadUniverse, normalizeSymbol, parseSymbolList } from '../server/services/universe.js';

test('normalizeSymbol trims and upper-cases', () => {
  assert.equal(normalizeSymbol('  spy '), 'SPY');
  assert.equal(normalizeSymbol('$spx'), '$SPX');
});

test('parseSymbolList splits on commas and whitespace', () => {
  assert.deepEqual(parseSymbolList(' SPY, qqq\n$SPX  BRK.B ,,'), ['SPY', 'qqq', '$SPX', 'BRK.B']);
  assert.deepEqual(parseSymbolList(''), []);
});

test('buildUniverse drops invalid and duplicate symbols and keeps first-seen order', () => {
  assert.deepEqual(buildUniverse(['spy', 'QQQ', 'SPY', '1ABC', 'bad symbol', '$spx', 'BRK/B'], 10), [
    { symbol: 'SPY' },
    { symbol: 'QQQ' },
    { symbol: '$SPX' },
    { symbol: 'BRK/B' },
  ]);
});

test('buildUniverse caps the list', () => {
  assert.deepEqual(buildUniverse(['A', 'B', 'C', 'D'], 2), [{ symbol: 'A' }, { symbol: 'B' }]);
  assert.deepEqual(buildUniverse(['A', 'B'], 0), [{ symbol: 'A' }]);
});

test('loadUniverse prefers a configured list over the bundled one', () => {
  assert.deepEqual(loadUniverse({ symbolList: 'iwm, dia', maxSymbols: 100 }), [{ symbol: 'IWM' }, { symbol: 'DIA' }]);
});

test('loadUniverse falls back to the bundled list', () => {
  const universe = loadUniverse({ maxSymbols: 100 });
  assert.equal(universe.length, 100);
  assert.deepEqual(
    universe.slice(0, 3).map((entry) => entry.symbol),
    ['$SPX', 'SPY', 'QQQ'],
  );
});

test('buildUniverse keeps pinned expiries, sorted and de-duplicated', () => {
  assert.deepEqual(
    buildUniverse(
      [
        { symbol: 'spy', expiries: ['2025-03-28', '2025-03-21', '2025-03-28'] },
        { symbol: 'QQQ', expiries: [] },
        'SPY',
      ],
      10,
    ),
    [{ symbol: 'SPY', expiries: ['2025-03-21', '2025-03-28'] }, { symbol: 'QQQ' }],
  );
});

test('loadUniverse reads symbols and pinned expiries from a universe file', async () => {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'universe-'));
  try {
    const file = path.join(dir, 'universe.json');
    await writeFile(
      file,
      JSON.stringify({ symbols: ['iwm', { symbol: '$spx', expiries: ['2025-03-21'] }, { symbol: 'dia' }] }),
      'utf8',
    );

    assert.deepEqual(loadUniverse({ maxSymbols: 10, fileUrl: pathToFileURL(file) }), [
      { symbol: 'IWM' },
      { symbol: '$SPX', expiries: ['2025-03-21'] },
      { symbol: 'DIA' },
    ]);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test('loadUniverse rejects a universe file with a malformed expiry', async () => {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'universe-'));
  try {
    const file = path.join(dir, 'universe.json');
    await writeFile(file, JSON.stringify({ symbols: [{ symbol: 'SPY', expiries: ['03/21/2025'] }] }), 'utf8');

    assert.throws(() => loadUniverse({ maxSymbols: 10, fileUrl: pathToFileURL(file) }), /Expiry must be YYYY-MM-DD/);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});
