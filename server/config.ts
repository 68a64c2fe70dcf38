import 'dotenv/config';

// --- Server ---
export const PORT = Math.max(1, Number(process.env.PORT) || 8000);
export const HOST = String(process.env.HOST || '127.0.0.1').trim();
export const IS_PRODUCTION = String(process.env.NODE_ENV || '').toLowerCase() === 'production';

// --- Broker API ---
export const BROKER_API_BASE = String(process.env.BROKER_API_BASE || 'https://api.schwabapi.com').trim();
export const BROKER_APP_KEY = String(process.env.BROKER_APP_KEY || '').trim();
export const BROKER_APP_SECRET = String(process.env.BROKER_APP_SECRET || '').trim();
export const BROKER_REQUEST_TIMEOUT_MS = Math.max(1_000, Number(process.env.BROKER_REQUEST_TIMEOUT_MS) || 15_000);
/** Upstream allows 120 requests per minute per app key. */
export const BROKER_MAX_REQUESTS_PER_SECOND = Math.max(1, Number(process.env.BROKER_MAX_REQUESTS_PER_SECOND) || 2);

// --- Credential lifecycle ---
export const TOKEN_PATH = String(process.env.TOKEN_PATH || 'token.json').trim();
export const ACCESS_TOKEN_TTL_MS = 30 * 60 * 1000;
export const REFRESH_TOKEN_TTL_MS = 7 * 24 * 60 * 60 * 1000;
export const TOKEN_REFRESH_MARGIN_MS = Math.max(
  60_000,
  Number(process.env.TOKEN_REFRESH_MARGIN_MS) || 5 * 60 * 1000,
);
export const TOKEN_REFRESH_MAX_ATTEMPTS = Math.max(1, Math.floor(Number(process.env.TOKEN_REFRESH_MAX_ATTEMPTS) || 3));
export const TOKEN_REFRESH_BASE_BACKOFF_MS = Math.max(
  100,
  Number(process.env.TOKEN_REFRESH_BASE_BACKOFF_MS) || 2_000,
);
export const TOKEN_KEEPALIVE_INTERVAL_MS = Math.max(
  60 * 60 * 1000,
  Number(process.env.TOKEN_KEEPALIVE_INTERVAL_MS) || 24 * 60 * 60 * 1000,
);
/** Readiness turns degraded once the refresh clock has less than this left. */
export const REFRESH_EXPIRY_WARN_MS = 24 * 60 * 60 * 1000;

// --- Fetch loop ---
export const FETCH_INTERVAL_MS = Math.max(5_000, Number(process.env.FETCH_INTERVAL_MS) || 60_000);
export const FETCH_CONCURRENCY = Math.max(1, Number(process.env.FETCH_CONCURRENCY) || 4);
export const FETCH_RETRY_ATTEMPTS = Math.max(1, Math.floor(Number(process.env.FETCH_RETRY_ATTEMPTS) || 3));
export const FETCH_RETRY_BASE_MS = Math.max(0, Number(process.env.FETCH_RETRY_BASE_MS ?? 2_000));
export const FETCH_RATE_LIMIT_PAUSE_MS = Math.max(0, Number(process.env.FETCH_RATE_LIMIT_PAUSE_MS ?? 5_000));
export const FETCH_STRIKE_COUNT = Math.max(1, Number(process.env.FETCH_STRIKE_COUNT) || 100);
/** Expiries further out than this are not requested. */
export const FETCH_MAX_DAYS_TO_EXPIRY = Math.max(1, Number(process.env.FETCH_MAX_DAYS_TO_EXPIRY) || 60);
export const MAX_SYMBOLS_PER_CYCLE = Math.max(1, Number(process.env.MAX_SYMBOLS_PER_CYCLE) || 100);
export const UNIVERSE_SYMBOLS = String(process.env.UNIVERSE_SYMBOLS || '').trim();
/** JSON universe file replacing the bundled one; entries may pin expiries. */
export const UNIVERSE_FILE = String(process.env.UNIVERSE_FILE || '').trim();

// --- Market session ---
export const MARKET_TIMEZONE = String(process.env.MARKET_TIMEZONE || 'America/New_York').trim();
export const MARKET_OPEN = String(process.env.MARKET_OPEN || '09:30').trim();
export const MARKET_CLOSE = String(process.env.MARKET_CLOSE || '16:00').trim();
export const SNAPSHOT_STALENESS_MS = Math.max(
  60_000,
  Number(process.env.SNAPSHOT_STALENESS_MINUTES) * 60_000 || 5 * 60_000,
);

// --- Alerts ---
export const ALERTS_ENABLED = String(process.env.ALERTS_ENABLED ?? 'true').trim().toLowerCase() !== 'false';
/** Spot within this percent of a gamma wall raises a price-near-wall alert. */
export const ALERT_WALL_DISTANCE_PCT = Math.max(0, Number(process.env.ALERT_WALL_DISTANCE_PCT ?? 1) || 0);

// --- Activity log ---
export const ACTIVITY_LOG_PATH = String(process.env.ACTIVITY_LOG_PATH || 'logs/activity.jsonl').trim();

// --- Startup validation ---
export function validateStartupEnvironment(): void {
  const errors: string[] = [];
  const warnings: string[] = [];
  const requireNonEmpty = (name: string) => {
    const value = String(process.env[name] || '').trim();
    if (!value) {
      errors.push(`${name} is required`);
    }
  };
  const warnIfInvalidPositiveNumber = (name: string) => {
    const raw = process.env[name];
    if (raw === undefined || raw === '') return;
    const numeric = Number(raw);
    if (!Number.isFinite(numeric) || numeric <= 0) {
      warnings.push(`${name} should be a positive number (received: ${String(raw)})`);
    }
  };
  const warnIfInvalidClock = (name: string) => {
    const raw = process.env[name];
    if (raw === undefined || raw === '') return;
    if (!/^([01]\d|2[0-3]):[0-5]\d$/.test(raw.trim())) {
      errors.push(`${name} must be HH:MM (received: ${raw})`);
    }
  };

  requireNonEmpty('BROKER_APP_KEY');
  requireNonEmpty('BROKER_APP_SECRET');
  warnIfInvalidClock('MARKET_OPEN');
  warnIfInvalidClock('MARKET_CLOSE');
  if (MARKET_OPEN >= MARKET_CLOSE) {
    errors.push(`MARKET_OPEN (${MARKET_OPEN}) must be earlier than MARKET_CLOSE (${MARKET_CLOSE})`);
  }
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: MARKET_TIMEZONE });
  } catch {
    errors.push(`MARKET_TIMEZONE is not a valid IANA zone (received: ${MARKET_TIMEZONE})`);
  }
  if (!process.env.OTEL_EXPORTER_OTLP_ENDPOINT) {
    warnings.push('OTEL_EXPORTER_OTLP_ENDPOINT is not set — tracing is disabled');
  }

  [
    'BROKER_REQUEST_TIMEOUT_MS',
    'BROKER_MAX_REQUESTS_PER_SECOND',
    'TOKEN_REFRESH_MARGIN_MS',
    'TOKEN_REFRESH_MAX_ATTEMPTS',
    'TOKEN_KEEPALIVE_INTERVAL_MS',
    'FETCH_INTERVAL_MS',
    'FETCH_CONCURRENCY',
    'FETCH_RETRY_ATTEMPTS',
    'FETCH_STRIKE_COUNT',
    'FETCH_MAX_DAYS_TO_EXPIRY',
    'MAX_SYMBOLS_PER_CYCLE',
    'SNAPSHOT_STALENESS_MINUTES',
  ].forEach(warnIfInvalidPositiveNumber);

  for (const warning of warnings) {
    console.warn(`[startup-env] ${warning}`);
  }
  if (errors.length > 0) {
    for (const error of errors) {
      console.error(`[startup-env] ${error}`);
    }
    throw new Error('Startup environment validation failed');
  }
}
