import { Attributes, context, Span, SpanStatusCode, trace, Tracer } from '@opentelemetry/api';
import { AsyncLocalStorageContextManager } from '@opentelemetry/context-async-hooks';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { Resource } from '@opentelemetry/resources';
import { BatchSpanProcessor, ConsoleSpanExporter, SpanProcessor } from '@opentelemetry/sdk-trace-base';
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';
import { logger } from '../logging/logger.js';

/**
 * Standard span names, so traces group consistently across services.
 */
export const SpanNames = {
    ADMISSION: 'admission',
    CACHE_LOOKUP: 'cache_lookup',
    DISPATCH: 'dispatch',
    SANDBOX_EXECUTION: 'sandbox_execution',
    GRAPH_QUERY: 'graph_query',
    AUDIT_WRITE: 'audit_write',
    REDIS_OPERATION: 'redis_operation',
} as const;

export type SpanName = typeof SpanNames[keyof typeof SpanNames];

export type SpanAttributes = Readonly<Attributes>;

export interface TracingSettings {
    readonly enabled: boolean;
    readonly serviceName: string;
    readonly serviceVersion?: string;
    readonly environment?: string;
    /** OTLP/HTTP collector base URL; spans go to `<endpoint>/v1/traces`. */
    readonly otlpEndpoint?: string;
    readonly otlpAuthToken?: string;
    readonly console?: boolean;
}

let provider: NodeTracerProvider | null = null;
let tracer: Tracer | null = null;
let contextInstalled = false;

function installContextManager(): void {
    if (contextInstalled) return;
    context.setGlobalContextManager(new AsyncLocalStorageContextManager().enable());
    contextInstalled = true;
}

function exportProcessors(settings: TracingSettings): SpanProcessor[] {
    const processors: SpanProcessor[] = [];
    if (settings.otlpEndpoint) {
        processors.push(new BatchSpanProcessor(new OTLPTraceExporter({
            url: `${settings.otlpEndpoint.replace(/\/+$/, '')}/v1/traces`,
            ...(settings.otlpAuthToken ? { headers: { Authorization: `Bearer ${settings.otlpAuthToken}` } } : {})
        })));
    }
    if (settings.console) {
        processors.push(new BatchSpanProcessor(new ConsoleSpanExporter()));
    }
    return processors;
}

/**
 * Installs a tracer provider for this process. Passing processors replaces
 * the exporters the settings would build. Any previous provider is shut
 * down first.
 */
export async function configureTracing(settings: TracingSettings, processors?: SpanProcessor[]): Promise<void> {
    await shutdownTracing();
    if (!settings.enabled) return;

    const spanProcessors = processors ?? exportProcessors(settings);
    if (spanProcessors.length === 0) {
        logger.warn('Tracing enabled without an exporter; spans are recorded and dropped');
    }

    installContextManager();
    provider = new NodeTracerProvider({
        resource: new Resource({
            [ATTR_SERVICE_NAME]: settings.serviceName,
            ...(settings.serviceVersion ? { [ATTR_SERVICE_VERSION]: settings.serviceVersion } : {}),
            ...(settings.environment ? { 'deployment.environment': settings.environment } : {})
        }),
        spanProcessors
    });
    tracer = provider.getTracer(settings.serviceName, settings.serviceVersion);
    logger.info({
        serviceName: settings.serviceName,
        otlpEndpoint: settings.otlpEndpoint ?? null,
        console: settings.console ?? false
    }, 'Tracing configured');
}

/** Flushes pending spans and removes the provider. */
export async function shutdownTracing(): Promise<void> {
    const current = provider;
    provider = null;
    tracer = null;
    if (current) await current.shutdown();
}

export function isTracingEnabled(): boolean {
    return tracer !== null;
}

/**
 * Runs fn inside an active span. A thrown error marks the span and is
 * rethrown; when tracing is off this is a plain call.
 */
export async function withSpan<T>(name: SpanName, attributes: SpanAttributes, fn: () => Promise<T>): Promise<T> {
    if (!tracer) return fn();

    return tracer.startActiveSpan(name, { attributes }, async (span: Span) => {
        try {
            const result = await fn();
            span.setStatus({ code: SpanStatusCode.OK });
            return result;
        } catch (error) {
            setSpanError(error, span);
            throw error;
        } finally {
            span.end();
        }
    });
}

/** Adds an event to the active span, if one is recording. */
export function addSpanEvent(name: string, attributes?: SpanAttributes): void {
    const span = trace.getActiveSpan();
    if (span?.isRecording()) span.addEvent(name, attributes);
}

/** Marks a span (the active one by default) as failed and records the error. */
export function setSpanError(error: unknown, span: Span | undefined = trace.getActiveSpan()): void {
    if (!span?.isRecording()) return;
    const exception = error instanceof Error ? error : String(error);
    span.recordException(exception);
    span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error)
    });
}
