// Labor Law Assistant - Monitoring sink
// Structured span events written through the OpenTelemetry API. Exporter and
// provider registration belong to the host process; with none registered the
// API hands out a no-op tracer and every emit is free.
//
// Monitoring is strictly advisory: nothing in this module throws into a caller.

import { SpanKind, SpanStatusCode, trace, type AttributeValue, type Attributes } from "@opentelemetry/api";
import { createLogger, errorMessage, type Logger } from "./logger.js";

export type EventKind = "client" | "internal";

export type PrimitiveAttributes = Record<string, AttributeValue>;

export interface MonitoringSink {
  emit(name: string, kind: EventKind, attributes: PrimitiveAttributes): void;
}

// ─── Attribute conversion ───────────────────────────────────────────────────────

function isPrimitive(value: unknown): value is string | number | boolean {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

function toPrimitiveArray(values: unknown[]): AttributeValue | null {
  if (values.every((v): v is string => typeof v === "string")) return values;
  if (values.every((v): v is number => typeof v === "number")) return values;
  if (values.every((v): v is boolean => typeof v === "boolean")) return values;
  return null;
}

function safeJson(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

/**
 * Flattens arbitrary values into span-safe attributes: primitives and
 * homogeneous primitive arrays pass through, dates become ISO strings,
 * null/undefined become "null", everything else is JSON-encoded.
 */
export function toPrimitiveAttributes(record: Record<string, unknown>): PrimitiveAttributes {
  const out: PrimitiveAttributes = {};
  for (const [key, value] of Object.entries(record)) {
    if (isPrimitive(value)) {
      out[key] = value;
    } else if (value === null || value === undefined) {
      out[key] = "null";
    } else if (value instanceof Date) {
      out[key] = value.toISOString();
    } else if (Array.isArray(value)) {
      out[key] = toPrimitiveArray(value) ?? safeJson(value);
    } else if (typeof value === "object") {
      out[key] = safeJson(value);
    } else {
      out[key] = String(value);
    }
  }
  return out;
}

// ─── OpenTelemetry sink ─────────────────────────────────────────────────────────

/**
 * Minimal interface for the @opentelemetry/api Tracer surface we use.
 * Lets tests record spans without registering a provider.
 */
export interface SpanTracer {
  startSpan(
    name: string,
    options: { kind: SpanKind; attributes: Attributes },
  ): { setStatus(status: { code: SpanStatusCode }): unknown; end(): void };
}

export interface OtelMonitoringSinkOptions {
  serviceName: string;
  serviceVersion?: string;
  enabled?: boolean;
  /** Defaults to the globally registered tracer for `serviceName`. */
  tracer?: SpanTracer;
  logger?: Logger;
}

export class OtelMonitoringSink implements MonitoringSink {
  private readonly tracer: SpanTracer;
  private readonly serviceName: string;
  private readonly serviceVersion: string;
  private readonly logger: Logger;
  readonly enabled: boolean;

  constructor(options: OtelMonitoringSinkOptions) {
    this.serviceName = options.serviceName;
    this.serviceVersion = options.serviceVersion ?? "0.1.0";
    this.enabled = options.enabled ?? true;
    this.tracer = options.tracer ?? trace.getTracer(options.serviceName, this.serviceVersion);
    this.logger = options.logger ?? createLogger("Monitoring");
  }

  emit(name: string, kind: EventKind, attributes: PrimitiveAttributes): void {
    if (!this.enabled) return;
    try {
      const spanAttributes: Attributes = {
        "service.name": this.serviceName,
        "service.version": this.serviceVersion,
        ...attributes,
      };
      const span = this.tracer.startSpan(name, {
        kind: kind === "client" ? SpanKind.CLIENT : SpanKind.INTERNAL,
        attributes: spanAttributes,
      });
      span.setStatus({ code: SpanStatusCode.OK });
      span.end();
    } catch (err) {
      this.logger.error(`Failed to emit "${name}": ${errorMessage(err)}`);
    }
  }

  healthCheck(): { status: "healthy" | "disabled"; service_name: string } {
    return { status: this.enabled ? "healthy" : "disabled", service_name: this.serviceName };
  }
}
