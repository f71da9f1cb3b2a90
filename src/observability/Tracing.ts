/**
 * Tracing — OpenTelemetry-Compatible Build Tracing
 *
 * Minimal interfaces that are structurally compatible with OpenTelemetry's
 * `Tracer` and `Span`, so an OTel tracer can be passed to the registry
 * directly, without an adapter or an `@opentelemetry/*` dependency.
 *
 * The registry opens one `executor.build` span per build:
 *
 * | attribute                 | value                          |
 * |---------------------------|--------------------------------|
 * | `executor.name`           | executor name                  |
 * | `executor.lock_scope`     | `'global'` or `'name'`         |
 * | `executor.cancelled`      | set when the build was aborted |
 *
 * Status is `OK` on success, `ERROR` (with the exception recorded) on
 * failure, and left `UNSET` for cancellations, which are not faults.
 *
 * @example
 * ```typescript
 * import { trace } from '@opentelemetry/api';
 *
 * const registry = new ExecutorRegistry({
 *     optionsMonitor: store,
 *     tracing: trace.getTracer('executor-registry'),
 * });
 * ```
 *
 * @module
 */

/** Span status codes matching OpenTelemetry's `SpanStatusCode` enum. */
export const SpanStatusCode = { UNSET: 0, OK: 1, ERROR: 2 } as const;

/** Matches OpenTelemetry's `SpanAttributeValue`. */
export type TraceAttributeValue =
    | string
    | number
    | boolean
    | ReadonlyArray<string>
    | ReadonlyArray<number>
    | ReadonlyArray<boolean>;

/** Structural subset of OTel's `Span`. */
export interface TraceSpan {
    setAttribute(key: string, value: TraceAttributeValue): void;
    setStatus(status: { code: number; message?: string }): void;
    /** Must be called exactly once. */
    end(): void;
    recordException(exception: Error | string): void;
}

/** Structural subset of OTel's `Tracer`. */
export interface RegistryTracer {
    startSpan(name: string, options?: {
        attributes?: Record<string, TraceAttributeValue>;
    }): TraceSpan;
}
