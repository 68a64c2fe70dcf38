import { NodeSDK } from '@opentelemetry/sdk-node';
import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { BatchSpanProcessor } from '@opentelemetry/sdk-trace-base';

export interface TelemetryHandle {
  shutdown: () => Promise<void>;
}

/**
 * Start tracing when an OTLP endpoint is configured; otherwise a no-op.
 * Outbound fetch() calls to the broker and inbound HTTP requests are the
 * spans of interest.
 */
export function startTelemetry(otlpEndpoint: string | undefined = process.env.OTEL_EXPORTER_OTLP_ENDPOINT): TelemetryHandle | null {
  const endpoint = String(otlpEndpoint || '').trim();
  if (!endpoint) return null;

  const sdk = new NodeSDK({
    serviceName: 'options-exposure-pipeline',
    spanProcessors: [new BatchSpanProcessor(new OTLPTraceExporter({ url: endpoint }))],
    instrumentations: [
      getNodeAutoInstrumentations({
        '@opentelemetry/instrumentation-fs': { enabled: false },
        '@opentelemetry/instrumentation-net': { enabled: false },
      }),
    ],
  });
  sdk.start();
  console.log(`[telemetry] Exporting traces to ${endpoint}`);

  return {
    shutdown: () => sdk.shutdown(),
  };
}

// Started on import: index.ts loads this right after dotenv, before fastify and
// the broker client, so auto-instrumentation can patch them.
export const telemetry = startTelemetry();
