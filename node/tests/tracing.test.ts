import { SpanStatusCode } from '@opentelemetry/api';
import {
  BasicTracerProvider,
  InMemorySpanExporter,
  SimpleSpanProcessor,
} from '@opentelemetry/sdk-trace-base';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { buildCollectorEndpoint, type TracerRegistration } from '@/services/observability/otlp';
import { toAttributeValue } from '@/services/observability/span-backends';
import { normalizeEndpoint, Tracing } from '@/services/observability/tracing';

const HEX_TRACE_ID = /^[0-9a-f]{32}$/;

function inMemoryTracing() {
  const exporter = new InMemorySpanExporter();
  const provider = new BasicTracerProvider();
  provider.addSpanProcessor(new SimpleSpanProcessor(exporter));
  const shutdown = vi.fn(async () => undefined);
  const register = vi.fn((_registration: TracerRegistration) => ({ tracer: provider.getTracer('test'), shutdown }));
  const tracing = new Tracing({
    endpoint: 'http://phoenix.test:6006',
    projectName: 'catalog-rag-test',
    register,
    resolveHost: async () => undefined,
  });
  return { tracing, exporter, register, shutdown };
}

describe('Tracing without a backend', () => {
  it('still hands out a trace id that nested spans share', async () => {
    const tracing = new Tracing({ projectName: 'catalog-rag-test' });
    const seen: Array<string | null> = [];

    const trace = await tracing.traceRun('rag_query', { question: 'q' }, async (handle) => {
      await tracing.span('retrieve', {}, async (span) => {
        seen.push(span.traceId, tracing.currentTraceId());
        await tracing.span('vector_retrieve', {}, (inner) => {
          seen.push(inner.traceId);
        });
      });
      return handle;
    });

    expect(await tracing.isEnabled()).toBe(false);
    expect(trace.traceId).toMatch(HEX_TRACE_ID);
    expect(trace.traceUrl).toBeNull();
    expect(seen).toEqual([trace.traceId, trace.traceId, trace.traceId]);
    expect(tracing.currentTraceId()).toBeNull();
  });

  it('runs a span outside any trace with no id', async () => {
    const tracing = new Tracing({ projectName: 'catalog-rag-test' });
    const id = await tracing.span('standalone', {}, (span) => span.traceId);
    expect(id).toBeNull();
  });

  it('treats a failing registration as disabled', async () => {
    const tracing = new Tracing({
      endpoint: 'http://phoenix.test:6006',
      projectName: 'catalog-rag-test',
      register: () => {
        throw new Error('exporter unavailable');
      },
      resolveHost: async () => undefined,
    });

    const trace = await tracing.traceRun('rag_query', {}, (handle) => handle);

    expect(await tracing.isEnabled()).toBe(false);
    expect(trace.traceId).toMatch(HEX_TRACE_ID);
  });
});

describe('Tracing with an OpenTelemetry backend', () => {
  let current: ReturnType<typeof inMemoryTracing> | null = null;

  afterEach(async () => {
    await current?.tracing.shutdown();
    current = null;
  });

  it('parents nested spans on the root and reports its trace id', async () => {
    current = inMemoryTracing();
    const { tracing, exporter } = current;

    const trace = await tracing.traceRun('rag_query', { question: 'what is linen?', top_k: 3 }, async (handle) => {
      await tracing.span('retrieve', { count: 2 }, () => undefined);
      return handle;
    });

    const spans = exporter.getFinishedSpans();
    const root = spans.find((s) => s.name === 'rag_query');
    const child = spans.find((s) => s.name === 'retrieve');
    expect(root?.spanContext().traceId).toBe(trace.traceId);
    expect(child?.spanContext().traceId).toBe(trace.traceId);
    expect(child?.parentSpanId).toBe(root?.spanContext().spanId);
    expect(root?.attributes).toEqual({
      question: 'what is linen?',
      top_k: 3,
      trace_id: trace.traceId,
      'openinference.input.query': 'what is linen?',
    });
    expect(child?.attributes).toEqual({ count: 2, trace_id: trace.traceId });
    expect(trace.traceUrl).toBe(`http://phoenix.test:6006/traces/${trace.traceId}`);
  });

  it('registers the exporter once under concurrent first use', async () => {
    current = inMemoryTracing();
    const { tracing, register } = current;

    await Promise.all([
      tracing.traceRun('a', {}, () => undefined),
      tracing.traceRun('b', {}, () => undefined),
      tracing.span('c', {}, () => undefined),
    ]);

    expect(register).toHaveBeenCalledTimes(1);
    expect(register).toHaveBeenCalledWith({
      projectName: 'catalog-rag-test',
      collectorEndpoint: 'http://phoenix.test:6006/v1/traces',
    });
  });

  it('records the error on the span and rethrows it', async () => {
    current = inMemoryTracing();
    const { tracing, exporter } = current;

    await expect(
      tracing.traceRun('rag_query', {}, async () => {
        await tracing.span('llm_generate', {}, () => {
          throw new Error('model timeout');
        });
      }),
    ).rejects.toThrow('model timeout');

    const spans = exporter.getFinishedSpans();
    expect(spans.map((s) => s.name)).toEqual(['llm_generate', 'rag_query']);
    for (const span of spans) {
      expect(span.status).toEqual({ code: SpanStatusCode.ERROR, message: 'model timeout' });
      expect(span.events.map((e) => e.name)).toEqual(['exception']);
    }
  });

  it('marks cancelled work', async () => {
    current = inMemoryTracing();
    const { tracing, exporter } = current;
    const abort = new Error('aborted');
    abort.name = 'AbortError';

    await expect(
      tracing.span('vector_retrieve', {}, () => {
        throw abort;
      }),
    ).rejects.toBe(abort);

    expect(exporter.getFinishedSpans()[0]?.attributes.cancelled).toBe(true);
  });

  it('stores structured span input and output as JSON', async () => {
    current = inMemoryTracing();
    const { tracing, exporter } = current;

    await tracing.span('llm_generate', {}, (span) => {
      span.setInput({ prompt: 'hi' });
      span.setOutput('hello');
      span.setAttribute('skipped', null);
    });

    expect(exporter.getFinishedSpans()[0]?.attributes).toEqual({
      'input.value': '{"prompt":"hi"}',
      'output.value': 'hello',
    });
  });

  it('flushes the provider on shutdown', async () => {
    const { tracing, shutdown } = inMemoryTracing();
    await tracing.traceRun('rag_query', {}, () => undefined);
    await tracing.shutdown();
    expect(shutdown).toHaveBeenCalledTimes(1);
  });
});

describe('endpoint handling', () => {
  it('swaps an unresolvable host for the loopback address', async () => {
    const unresolvable = async () => {
      throw new Error('ENOTFOUND');
    };
    expect(await normalizeEndpoint('http://phoenix:6006', unresolvable)).toBe('http://127.0.0.1:6006');
    expect(await normalizeEndpoint('http://phoenix:6006/', unresolvable)).toBe('http://127.0.0.1:6006/');
    expect(await normalizeEndpoint('http://phoenix:6006', async () => undefined)).toBe('http://phoenix:6006');
    expect(await normalizeEndpoint('not a url', unresolvable)).toBe('not a url');
  });

  it('appends the OTLP traces path once', () => {
    expect(buildCollectorEndpoint('http://phoenix:6006/')).toBe('http://phoenix:6006/v1/traces');
    expect(buildCollectorEndpoint('http://phoenix:6006/v1/traces')).toBe('http://phoenix:6006/v1/traces');
  });

  it('keeps primitive attributes and encodes the rest', () => {
    expect(toAttributeValue('a')).toBe('a');
    expect(toAttributeValue(3)).toBe(3);
    expect(toAttributeValue(['x', 1])).toBe('["x",1]');
    expect(toAttributeValue(undefined)).toBeUndefined();
  });
});
