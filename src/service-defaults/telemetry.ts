/**
 * OpenTelemetry setup shared by every service: one meter provider and one
 * tracer provider per service, exported over OTLP/HTTP when an endpoint is
 * configured and scraped by Prometheus when enabled.
 */

import { IncomingMessage, ServerResponse } from 'http';
import { context, Meter, Tracer } from '@opentelemetry/api';
import { AsyncLocalStorageContextManager } from '@opentelemetry/context-async-hooks';
import { OTLPMetricExporter } from '@opentelemetry/exporter-metrics-otlp-http';
import { PrometheusExporter } from '@opentelemetry/exporter-prometheus';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { Resource } from '@opentelemetry/resources';
import { MeterProvider, MetricReader, PeriodicExportingMetricReader } from '@opentelemetry/sdk-metrics';
import { BatchSpanProcessor, SpanProcessor } from '@opentelemetry/sdk-trace-base';
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node';
import { SEMRESATTRS_SERVICE_NAME } from '@opentelemetry/semantic-conventions';
import { TelemetryConfig } from '../config';

export type MetricsRequestHandler = (req: IncomingMessage, res: ServerResponse) => void;

export interface TelemetryOptions extends TelemetryConfig {
  /** Extra readers, e.g. an in-memory reader in tests */
  metricReaders?: MetricReader[];
  /** Extra span processors, e.g. an in-memory exporter in tests */
  spanProcessors?: SpanProcessor[];
}

export interface Telemetry {
  readonly serviceName: string;
  readonly meterProvider: MeterProvider;
  readonly tracerProvider: NodeTracerProvider;
  /** Present when the Prometheus scrape endpoint is enabled */
  readonly metricsHandler?: MetricsRequestHandler;
  getMeter(name: string): Meter;
  getTracer(name: string): Tracer;
  shutdown(): Promise<void>;
}

let contextManagerInstalled = false;

/**
 * Install the async-hooks context manager once per process so active spans
 * follow async work (and show up in log entries).
 */
export function ensureContextManager(): void {
  if (contextManagerInstalled) {
    return;
  }
  context.setGlobalContextManager(new AsyncLocalStorageContextManager().enable());
  contextManagerInstalled = true;
}

export function createTelemetry(options: TelemetryOptions): Telemetry {
  ensureContextManager();

  const resource = new Resource({
    [SEMRESATTRS_SERVICE_NAME]: options.serviceName
  });

  const readers: MetricReader[] = [...(options.metricReaders ?? [])];

  let metricsHandler: MetricsRequestHandler | undefined;
  if (options.prometheusEnabled) {
    const prometheus = new PrometheusExporter({ preventServerStart: true });
    readers.push(prometheus);
    metricsHandler = (req, res) => prometheus.getMetricsRequestHandler(req, res);
  }

  if (options.otlpEndpoint) {
    readers.push(new PeriodicExportingMetricReader({
      exporter: new OTLPMetricExporter({ url: otlpUrl(options.otlpEndpoint, 'v1/metrics') }),
      exportIntervalMillis: options.exportIntervalMillis
    }));
  }

  const meterProvider = new MeterProvider({ resource, readers });

  const tracerProvider = new NodeTracerProvider({ resource });
  for (const processor of options.spanProcessors ?? []) {
    tracerProvider.addSpanProcessor(processor);
  }
  if (options.otlpEndpoint) {
    tracerProvider.addSpanProcessor(new BatchSpanProcessor(
      new OTLPTraceExporter({ url: otlpUrl(options.otlpEndpoint, 'v1/traces') })
    ));
  }

  return {
    serviceName: options.serviceName,
    meterProvider,
    tracerProvider,
    metricsHandler,
    getMeter: (name: string) => meterProvider.getMeter(name),
    getTracer: (name: string) => tracerProvider.getTracer(name),
    shutdown: async () => {
      await Promise.all([meterProvider.shutdown(), tracerProvider.shutdown()]);
    }
  };
}

function otlpUrl(endpoint: string, signalPath: string): string {
  return `${endpoint.replace(/\/+$/, '')}/${signalPath}`;
}
