import { metrics, SpanStatusCode, trace as otelTrace } from '@opentelemetry/api';

import type { Attributes, Counter, Histogram, Span, SpanKind } from '@opentelemetry/api';

// Instruments resolve to no-ops until the host process registers an OpenTelemetry SDK.
const TRACER_NAME = 'toolcore';
const METER_NAME = 'toolcore';

export interface ToolMetricsRecord {
  tool: string;
  origin: string;
  outcome: 'succeeded' | 'failed' | 'truncated';
  latencyMs: number;
  errorKind?: string;
}

export interface ProviderStateRecord {
  providerId: string;
  from: string;
  to: string;
}

export interface SessionMetricsRecord {
  outcome: string;
  steps: number;
  durationMs: number;
}

interface Instruments {
  toolCalls: Counter;
  toolLatency: Histogram;
  providerTransitions: Counter;
  sessions: Counter;
  sessionSteps: Histogram;
}

let instruments: Instruments | undefined;

const getInstruments = (): Instruments => {
  if (instruments !== undefined) return instruments;
  const meter = metrics.getMeter(METER_NAME);
  instruments = {
    toolCalls: meter.createCounter('toolcore_tool_calls_total', { description: 'Tool invocations by outcome' }),
    toolLatency: meter.createHistogram('toolcore_tool_latency_ms', { description: 'Tool invocation latency', unit: 'ms' }),
    providerTransitions: meter.createCounter('toolcore_provider_transitions_total', { description: 'Provider lifecycle transitions' }),
    sessions: meter.createCounter('toolcore_sessions_total', { description: 'Finished agent sessions by outcome' }),
    sessionSteps: meter.createHistogram('toolcore_session_steps', { description: 'Agent loop steps per session' }),
  };
  return instruments;
};

export function recordToolMetrics(record: ToolMetricsRecord): void {
  const { toolCalls, toolLatency } = getInstruments();
  const labels: Attributes = { tool: record.tool, origin: record.origin, outcome: record.outcome };
  if (record.errorKind !== undefined) labels.error_kind = record.errorKind;
  toolCalls.add(1, labels);
  toolLatency.record(record.latencyMs, { tool: record.tool, origin: record.origin });
}

export function recordProviderTransition(record: ProviderStateRecord): void {
  getInstruments().providerTransitions.add(1, { provider: record.providerId, from: record.from, to: record.to });
}

export function recordSessionMetrics(record: SessionMetricsRecord): void {
  const { sessions, sessionSteps } = getInstruments();
  sessions.add(1, { outcome: record.outcome });
  sessionSteps.record(record.steps, { outcome: record.outcome });
}

export interface SpanOptions {
  attributes?: Attributes;
  kind?: SpanKind;
}

/** Runs `body` inside an active span; a throw marks the span as failed and is rethrown. */
export function runWithSpan<T>(name: string, options: SpanOptions, body: (span: Span) => Promise<T>): Promise<T> {
  return otelTrace.getTracer(TRACER_NAME).startActiveSpan(name, { kind: options.kind, attributes: options.attributes }, async (span) => {
    try {
      return await body(span);
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      span.recordException(failure);
      span.setStatus({ code: SpanStatusCode.ERROR, message: failure.message });
      throw error;
    } finally {
      span.end();
    }
  });
}

export function addSpanAttributes(attributes: Attributes): void {
  otelTrace.getActiveSpan()?.setAttributes(attributes);
}
