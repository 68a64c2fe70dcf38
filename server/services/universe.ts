import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { UniverseEntry } from './exposureTypes.js';

const SYMBOL_PATTERN = /^\$?[A-Z][A-Z0-9./]{0,9}$/;

const UniverseFileSchema = z.object({
  symbols: z.array(
    z.union([
      z.string(),
      z.object({
        symbol: z.string(),
        expiries: z.array(z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expiry must be YYYY-MM-DD')).optional(),
      }),
    ]),
  ),
});

export type UniverseSource = string | UniverseEntry;

export function normalizeSymbol(value: string): string {
  return String(value || '')
    .trim()
    .toUpperCase();
}

/**
 * Normalize, validate and de-duplicate symbols, keeping first-seen order and
 * capping at `maxSymbols`. Invalid symbols are dropped with a warning. An
 * entry's expiries are de-duplicated and sorted; an empty list means every
 * expiry in the fetch window.
 */
export function buildUniverse(sources: readonly UniverseSource[], maxSymbols: number): UniverseEntry[] {
  const cap = Math.max(1, Math.floor(maxSymbols));
  const seen = new Set<string>();
  const entries: UniverseEntry[] = [];
  for (const source of sources) {
    const raw = typeof source === 'string' ? source : source.symbol;
    const symbol = normalizeSymbol(raw);
    if (!symbol) continue;
    if (!SYMBOL_PATTERN.test(symbol)) {
      console.warn(`[universe] Ignoring invalid symbol "${raw}"`);
      continue;
    }
    if (seen.has(symbol)) continue;
    seen.add(symbol);
    const expiries = typeof source === 'string' ? [] : [...new Set(source.expiries ?? [])].sort();
    entries.push(expiries.length > 0 ? { symbol, expiries } : { symbol });
  }
  if (entries.length > cap) {
    console.warn(`[universe] ${entries.length} symbols configured; using the first ${cap}`);
    return entries.slice(0, cap);
  }
  return entries;
}

/** Comma/whitespace separated list, as found in UNIVERSE_SYMBOLS. */
export function parseSymbolList(value: string): string[] {
  return String(value || '')
    .split(/[\s,]+/)
    .map((part) => part.trim())
    .filter(Boolean);
}

export interface LoadUniverseOptions {
  /** Overrides the universe file when non-empty. */
  symbolList?: string;
  maxSymbols: number;
  /** Defaults to the bundled universe.json. */
  fileUrl?: URL;
}

export function loadUniverse(options: LoadUniverseOptions): UniverseEntry[] {
  const configured = parseSymbolList(options.symbolList ?? '');
  if (configured.length > 0) {
    return buildUniverse(configured, options.maxSymbols);
  }
  const fileUrl = options.fileUrl ?? new URL('../data/universe.json', import.meta.url);
  const file = UniverseFileSchema.parse(JSON.parse(readFileSync(fileUrl, 'utf8')));
  return buildUniverse(file.symbols, options.maxSymbols);
}
