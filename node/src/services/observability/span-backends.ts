// Tracer backends selected once per process: an OpenTelemetry-backed one and a no-op that absorbs every call.
import {
  context as otelContext,
  isSpanContextValid,
  SpanStatusCode,
  trace,
  type AttributeValue,
  type Context,
  type Span,
  type Tracer,
} from '@opentelemetry/api';
import { childLogger, errorMessage } from '@/services/logger';

const log = childLogger('tracing');

export type SpanAttributes = Record<string, unknown>;

/** Backend-side view of one open span. Implementations never throw. */
export interface SpanRecorder {
  /** 32-char hex id of the backend trace, when the backend assigns one. */
  readonly traceId: string | null;
  /** Context to parent child spans on. */
  readonly context: Context | undefined;
  setAttributes(attributes: SpanAttributes): void;
  recordError(error: unknown): void;
  end(): void;
}

export interface TracerBackend {
  readonly enabled: boolean;
  startSpan(name: string, options: { parent?: Context; root?: boolean }): SpanRecorder;
  shutdown(): Promise<void>;
}

export const NOOP_RECORDER: SpanRecorder = {
  traceId: null,
  context: undefined,
  setAttributes: () => undefined,
  recordError: () => undefined,
  end: () => undefined,
};

export const NOOP_BACKEND: TracerBackend = {
  enabled: false,
  startSpan: () => NOOP_RECORDER,
  shutdown: async () => undefined,
};

/** Primitives pass through; anything else is JSON-encoded. null/undefined are dropped. */
export function toAttributeValue(value: unknown): AttributeValue | undefined {
  if (value === null || value === undefined) return undefined;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

function guard(op: string, fn: () => void): void {
  try {
    fn();
  } catch (err) {
    log.debug('tracing:span_op_failed', { op, error: errorMessage(err) });
  }
}

class OtelSpanRecorder implements SpanRecorder {
  readonly traceId: string | null;

  constructor(
    private readonly span: Span,
    readonly context: Context,
  ) {
    const spanContext = span.spanContext();
    this.traceId = isSpanContextValid(spanContext) ? spanContext.traceId : null;
  }

  setAttributes(attributes: SpanAttributes): void {
    for (const [key, value] of Object.entries(attributes)) {
      const attr = toAttributeValue(value);
      if (attr === undefined) continue;
      guard('setAttribute', () => this.span.setAttribute(key, attr));
    }
  }

  recordError(error: unknown): void {
    guard('recordException', () =>
      this.span.recordException(error instanceof Error ? error : String(error)),
    );
    guard('setStatus', () => this.span.setStatus({ code: SpanStatusCode.ERROR, message: errorMessage(error) }));
  }

  end(): void {
    guard('end', () => this.span.end());
  }
}

export class OtelTracerBackend implements TracerBackend {
  readonly enabled = true;

  constructor(
    private readonly tracer: Tracer,
    private readonly onShutdown: () => Promise<void> = async () => undefined,
  ) {}

  startSpan(name: string, options: { parent?: Context; root?: boolean }): SpanRecorder {
    try {
      const parent = options.parent ?? otelContext.active();
      const span = options.root
        ? this.tracer.startSpan(name, { root: true })
        : this.tracer.startSpan(name, {}, parent);
      return new OtelSpanRecorder(span, trace.setSpan(parent, span));
    } catch (err) {
      log.warn('tracing:start_span_failed', { name, error: errorMessage(err) });
      return NOOP_RECORDER;
    }
  }

  async shutdown(): Promise<void> {
    try {
      await this.onShutdown();
    } catch (err) {
      log.warn('tracing:shutdown_failed', { error: errorMessage(err) });
    }
  }
}
