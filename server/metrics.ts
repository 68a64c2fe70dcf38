import client from 'prom-client';

// Collect default metrics (memory, CPU, event loop, etc.)
client.collectDefaultMetrics({
  labels: { app: 'options-exposure-pipeline' },
});

export const httpRequestDurationSeconds = new client.Histogram({
  name: 'http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'route', 'status_code'],
  buckets: [0.005, 0.01, 0.05, 0.1, 0.5, 1, 2],
});

export const httpRequestsTotal = new client.Counter({
  name: 'http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'route', 'status_code'],
});

export const exposureCyclesTotal = new client.Counter({
  name: 'exposure_cycles_total',
  help: 'Fetch cycles by outcome (published, empty, market-closed, failed)',
  labelNames: ['outcome'],
});

export const exposureCycleDurationSeconds = new client.Histogram({
  name: 'exposure_cycle_duration_seconds',
  help: 'Wall time of a fetch → aggregate → normalize → publish cycle',
  buckets: [0.5, 1, 2, 5, 10, 20, 30, 60, 120],
});

export const fetchFailuresTotal = new client.Counter({
  name: 'exposure_fetch_failures_total',
  help: 'Per-symbol option-chain fetch failures by kind',
  labelNames: ['kind'],
});

export const exposureAlertsTotal = new client.Counter({
  name: 'exposure_alerts_total',
  help: 'Alerts raised against the previous snapshot',
  labelNames: ['type', 'severity'],
});

export const snapshotCellsGauge = new client.Gauge({
  name: 'exposure_snapshot_cells',
  help: 'Number of cells in the latest published snapshot',
});

export const snapshotSequenceGauge = new client.Gauge({
  name: 'exposure_snapshot_sequence',
  help: 'Sequence number of the latest published snapshot',
});

export const brokerRequestDurationSeconds = new client.Histogram({
  name: 'broker_request_duration_seconds',
  help: 'Latency of broker API requests',
  labelNames: ['endpoint', 'outcome'],
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 15],
});

export const tokenRefreshTotal = new client.Counter({
  name: 'token_refresh_total',
  help: 'Credential refresh attempts by outcome and trigger',
  labelNames: ['outcome', 'trigger'],
});

export const credentialExpiryGauge = new client.Gauge({
  name: 'credential_expires_timestamp_seconds',
  help: 'Unix time at which each credential clock runs out',
  labelNames: ['clock'],
});

/** Mirror the credential clocks into the expiry gauge. */
export function recordCredentialExpiry(status: { accessExpiresAt: string | null; refreshExpiresAt: string | null }): void {
  if (status.accessExpiresAt) credentialExpiryGauge.set({ clock: 'access' }, Date.parse(status.accessExpiresAt) / 1000);
  if (status.refreshExpiresAt) {
    credentialExpiryGauge.set({ clock: 'refresh' }, Date.parse(status.refreshExpiresAt) / 1000);
  }
}

export const metricsRegistry = client.register;
