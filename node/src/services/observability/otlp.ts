// Registers an OTLP/protobuf exporter pipeline pointed at the Phoenix collector.
import type { Tracer } from '@opentelemetry/api';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-proto';
import { Resource } from '@opentelemetry/resources';
import { BatchSpanProcessor } from '@opentelemetry/sdk-trace-base';
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node';

export interface TracerRegistration {
  projectName: string;
  collectorEndpoint: string;
}

export interface RegisteredTracer {
  tracer: Tracer;
  shutdown(): Promise<void>;
}

export function registerOtlpTracer({ projectName, collectorEndpoint }: TracerRegistration): RegisteredTracer {
  const provider = new NodeTracerProvider({
    resource: new Resource({
      'service.name': projectName,
      'openinference.project.name': projectName,
    }),
  });
  provider.addSpanProcessor(new BatchSpanProcessor(new OTLPTraceExporter({ url: collectorEndpoint })));
  provider.register();
  return {
    tracer: provider.getTracer('catalog-rag'),
    shutdown: () => provider.shutdown(),
  };
}

export function buildCollectorEndpoint(endpoint: string): string {
  const base = endpoint.replace(/\/+$/, '');
  return base.endsWith('/v1/traces') ? base : `${base}/v1/traces`;
}
