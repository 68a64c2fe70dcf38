/**
 * Alert Detector — compares the gamma levels of consecutive snapshots.
 *
 *   gex-flip         net GEX changed sign (critical when it turns negative)
 *   wall-shift       the call wall (max +GEX strike) or put wall (max −GEX
 *                    strike) moved to another strike
 *   price-near-wall  spot within `wallDistancePct` percent of either wall
 *
 * Flips and shifts need the symbol in the previous snapshot; the wall distance
 * check runs on every snapshot. Pure and deterministic.
 */

import type { AlertSeverity, AlertType, ExposureAlert, GammaLevels } from './exposureTypes.js';

export interface AlertDetectorOptions {
  /** Percent of spot; 1 means within 1%. */
  wallDistancePct: number;
  checks?: Partial<Record<AlertType, boolean>>;
}

export const DEFAULT_WALL_DISTANCE_PCT = 1;

const SEVERITY_ORDER: Record<AlertSeverity, number> = { critical: 0, warning: 1, info: 2 };

function formatExposure(value: number): string {
  const rounded = Math.round(value).toLocaleString('en-US');
  return value > 0 ? `+${rounded}` : rounded;
}

function formatStrike(value: number): string {
  return `$${value.toFixed(1)}`;
}

export function detectGexFlip(symbol: string, currentNetGex: number, previousNetGex: number | null): ExposureAlert | null {
  if (previousNetGex === null) return null;
  const change = `Net GEX went from ${formatExposure(previousNetGex)} to ${formatExposure(currentNetGex)}`;
  if (previousNetGex > 0 && currentNetGex < 0) {
    return {
      symbol,
      type: 'gex-flip',
      severity: 'critical',
      message: `${symbol}: GEX flipped negative, dealers now amplify moves`,
      details: `${change}; expect wider ranges and trend acceleration`,
    };
  }
  if (previousNetGex < 0 && currentNetGex > 0) {
    return {
      symbol,
      type: 'gex-flip',
      severity: 'warning',
      message: `${symbol}: GEX flipped positive, dealers now dampen moves`,
      details: `${change}; expect mean-reverting, range-bound trade`,
    };
  }
  return null;
}

export function detectWallShift(current: GammaLevels, previous: GammaLevels | undefined): ExposureAlert[] {
  if (!previous) return [];
  const alerts: ExposureAlert[] = [];
  const walls = [
    { name: 'Call wall', role: 'max positive GEX strike', from: previous.maxPositiveGammaStrike, to: current.maxPositiveGammaStrike },
    { name: 'Put wall', role: 'max negative GEX strike', from: previous.maxNegativeGammaStrike, to: current.maxNegativeGammaStrike },
  ];
  for (const wall of walls) {
    if (wall.from === null || wall.to === null || wall.from === wall.to) continue;
    alerts.push({
      symbol: current.symbol,
      type: 'wall-shift',
      severity: 'info',
      message: `${current.symbol}: ${wall.name} shifted ${formatStrike(wall.from)} → ${formatStrike(wall.to)}`,
      details: `The ${wall.role} moved from ${formatStrike(wall.from)} to ${formatStrike(wall.to)}`,
    });
  }
  return alerts;
}

export function detectPriceNearWall(level: GammaLevels, wallDistancePct: number): ExposureAlert[] {
  const spot = level.spot;
  if (!(spot > 0)) return [];
  const alerts: ExposureAlert[] = [];
  const walls = [
    { name: 'call wall', strike: level.maxPositiveGammaStrike, pressure: 'selling' },
    { name: 'put wall', strike: level.maxNegativeGammaStrike, pressure: 'buying' },
  ];
  for (const wall of walls) {
    if (wall.strike === null || wall.strike <= 0) continue;
    const distancePct = (Math.abs(spot - wall.strike) / spot) * 100;
    if (distancePct > wallDistancePct) continue;
    alerts.push({
      symbol: level.symbol,
      type: 'price-near-wall',
      severity: 'warning',
      message: `${level.symbol}: spot $${spot.toFixed(2)} within ${distancePct.toFixed(1)}% of the ${wall.name} ${formatStrike(wall.strike)}`,
      details: `Dealer hedging near the ${wall.name} tends to add ${wall.pressure} pressure`,
    });
  }
  return alerts;
}

/**
 * Alerts for every symbol of `current`, most severe first; within a severity
 * the order follows the symbols of `current`.
 */
export function detectAlerts(
  current: readonly GammaLevels[],
  previous: readonly GammaLevels[] | null,
  options: AlertDetectorOptions,
): ExposureAlert[] {
  const enabled = (type: AlertType) => options.checks?.[type] ?? true;
  const previousBySymbol = new Map<string, GammaLevels>();
  for (const level of previous ?? []) previousBySymbol.set(level.symbol, level);
  const alerts: ExposureAlert[] = [];

  for (const level of current) {
    const before = previousBySymbol.get(level.symbol);
    if (enabled('gex-flip')) {
      const flip = detectGexFlip(level.symbol, level.netGex, before ? before.netGex : null);
      if (flip) alerts.push(flip);
    }
    if (enabled('wall-shift')) alerts.push(...detectWallShift(level, before));
    if (enabled('price-near-wall')) alerts.push(...detectPriceNearWall(level, options.wallDistancePct));
  }

  return alerts.sort((a, b) => SEVERITY_ORDER[a.severity] - SEVERITY_ORDER[b.severity]);
}
