// src/services/observability/tracing.ts — trace-context layer for the answering pipeline
//
// One Tracing instance is built per process and injected wherever spans are opened. The backend is
// chosen lazily on first use and cached, including a disabled outcome, so registration happens at
// most once even when the first requests arrive together. The trace id of the current request is
// bound with AsyncLocalStorage so nested spans pick it up without it being passed around.
import { AsyncLocalStorage } from 'node:async_hooks';
import crypto from 'node:crypto';
import dns from 'node:dns/promises';
import type { Context } from '@opentelemetry/api';
import { childLogger, errorMessage } from '@/services/logger';
import { isAbortError } from '@/utils/errors';
import { buildCollectorEndpoint, registerOtlpTracer, type RegisteredTracer, type TracerRegistration } from './otlp';
import {
  NOOP_BACKEND,
  OtelTracerBackend,
  type SpanAttributes,
  type SpanRecorder,
  type TracerBackend,
} from './span-backends';

const log = childLogger('tracing');

const LOOPBACK_HOST = '127.0.0.1';

export interface TraceHandle {
  traceId: string | null;
  traceUrl: string | null;
}

/** Caller-facing span. Every method is safe to call whether or not a backend is active. */
export interface SpanHandle {
  readonly name: string;
  readonly traceId: string | null;
  setAttribute(key: string, value: unknown): void;
  setAttributes(attributes: SpanAttributes): void;
  setInput(value: unknown): void;
  setOutput(value: unknown): void;
}

export interface TracingOptions {
  /** Phoenix base URL; tracing is a no-op when absent. */
  endpoint?: string;
  projectName: string;
  register?: (registration: TracerRegistration) => RegisteredTracer | Promise<RegisteredTracer>;
  resolveHost?: (host: string) => Promise<unknown>;
}

interface TraceScope {
  traceId: string | null;
  context: Context | undefined;
}

class ScopedSpan implements SpanHandle {
  constructor(
    readonly name: string,
    private readonly recorder: SpanRecorder,
    readonly traceId: string | null,
  ) {}

  setAttribute(key: string, value: unknown): void {
    this.recorder.setAttributes({ [key]: value });
  }

  setAttributes(attributes: SpanAttributes): void {
    this.recorder.setAttributes(attributes);
  }

  setInput(value: unknown): void {
    this.recorder.setAttributes({ 'input.value': value });
  }

  setOutput(value: unknown): void {
    this.recorder.setAttributes({ 'output.value': value });
  }
}

export function generateTraceId(): string {
  return crypto.randomBytes(16).toString('hex');
}

/** Swaps an unresolvable host for the loopback address, keeping scheme, port and path. */
export async function normalizeEndpoint(
  endpoint: string,
  resolveHost: (host: string) => Promise<unknown>,
): Promise<string> {
  let url: URL;
  try {
    url = new URL(endpoint);
  } catch {
    return endpoint;
  }
  const host = url.hostname;
  if (!host) return endpoint;
  try {
    await resolveHost(host);
    return endpoint;
  } catch (err) {
    url.hostname = LOOPBACK_HOST;
    let normalized = url.toString();
    if (!endpoint.endsWith('/') && normalized.endsWith('/')) normalized = normalized.slice(0, -1);
    log.warn('tracing:endpoint_unresolvable', { host, fallback: normalized, error: errorMessage(err) });
    return normalized;
  }
}

export class Tracing {
  private backendPromise: Promise<TracerBackend> | null = null;
  private uiBase: string | null = null;
  private readonly scope = new AsyncLocalStorage<TraceScope>();

  constructor(private readonly options: TracingOptions) {}

  async isEnabled(): Promise<boolean> {
    return (await this.backend()).enabled;
  }

  currentTraceId(): string | null {
    return this.scope.getStore()?.traceId ?? null;
  }

  buildTraceUrl(traceId: string | null): string | null {
    if (!traceId || !this.uiBase) return null;
    return `${this.uiBase.replace(/\/+$/, '')}/traces/${traceId}`;
  }

  /** Child span of the current scope. Errors are recorded on the span and rethrown unchanged. */
  async span<T>(name: string, attributes: SpanAttributes, fn: (span: SpanHandle) => Promise<T> | T): Promise<T> {
    const backend = await this.backend();
    const parent = this.scope.getStore();
    const explicitId = typeof attributes.trace_id === 'string' ? attributes.trace_id : null;
    const traceId = explicitId ?? parent?.traceId ?? null;

    const recorder = backend.startSpan(name, { parent: parent?.context });
    const handle = new ScopedSpan(name, recorder, traceId);
    handle.setAttributes(traceId ? { ...attributes, trace_id: traceId } : attributes);
    return this.execute(recorder, handle, { traceId, context: recorder.context ?? parent?.context }, () => fn(handle));
  }

  /**
   * Root span for one request. The trace id comes from the backend span, or is generated locally
   * when tracing is disabled, and is visible to every nested `span` call.
   */
  async traceRun<T>(
    name: string,
    attributes: SpanAttributes,
    fn: (trace: TraceHandle, span: SpanHandle) => Promise<T> | T,
  ): Promise<T> {
    const backend = await this.backend();
    const recorder = backend.startSpan(name, { root: true });
    const traceId = recorder.traceId ?? generateTraceId();
    const handle = new ScopedSpan(name, recorder, traceId);

    const rootAttributes: SpanAttributes = { ...attributes, trace_id: traceId };
    if (attributes.question !== undefined && rootAttributes['openinference.input.query'] === undefined) {
      rootAttributes['openinference.input.query'] = attributes.question;
    }
    handle.setAttributes(rootAttributes);

    const traceHandle: TraceHandle = { traceId, traceUrl: this.buildTraceUrl(traceId) };
    return this.execute(recorder, handle, { traceId, context: recorder.context }, () => fn(traceHandle, handle));
  }

  async shutdown(): Promise<void> {
    if (!this.backendPromise) return;
    await (await this.backendPromise).shutdown();
  }

  private async execute<T>(
    recorder: SpanRecorder,
    handle: SpanHandle,
    scope: TraceScope,
    fn: () => Promise<T> | T,
  ): Promise<T> {
    try {
      return await this.scope.run(scope, fn);
    } catch (err) {
      if (isAbortError(err)) handle.setAttribute('cancelled', true);
      recorder.recordError(err);
      throw err;
    } finally {
      recorder.end();
    }
  }

  private backend(): Promise<TracerBackend> {
    if (!this.backendPromise) this.backendPromise = this.initialize();
    return this.backendPromise;
  }

  private async initialize(): Promise<TracerBackend> {
    const { endpoint, projectName } = this.options;
    if (!endpoint) {
      log.warn('tracing:disabled', { reason: 'PHOENIX_ENDPOINT not configured; spans are no-ops' });
      return NOOP_BACKEND;
    }
    try {
      const normalized = await normalizeEndpoint(endpoint, this.options.resolveHost ?? ((host) => dns.lookup(host)));
      this.uiBase = normalized;
      const collectorEndpoint = buildCollectorEndpoint(normalized);
      const register = this.options.register ?? registerOtlpTracer;
      const registered = await register({ projectName, collectorEndpoint });
      log.info('tracing:enabled', { collectorEndpoint, projectName });
      return new OtelTracerBackend(registered.tracer, () => registered.shutdown());
    } catch (err) {
      log.warn('tracing:registration_failed', { error: errorMessage(err) });
      return NOOP_BACKEND;
    }
  }
}
