/**
 * DiagnosticObserver — Typed Lifecycle Events for the Executor Registry
 *
 * The registry and its executors emit structured events at each point
 * of an executor's life. When no observer is configured nothing is
 * built or dispatched.
 *
 * Design principles:
 * - Pure function observer (no class hierarchy)
 * - Discriminated union events (exhaustive switch possible)
 * - Immutable event payloads (readonly)
 * - A throwing observer never aborts a build or an eviction
 *
 * @example
 * ```typescript
 * import { ExecutorRegistry, createDiagnosticObserver } from 'executor-registry';
 *
 * // Default: compact console.debug output
 * const registry = new ExecutorRegistry({
 *     optionsMonitor: store,
 *     diagnostics: createDiagnosticObserver(),
 * });
 *
 * // Custom handler (e.g. metrics)
 * const diagnostics = createDiagnosticObserver((event) => {
 *     metrics.increment(event.type);
 * });
 * ```
 *
 * @module
 */
import { type RequestExecutor } from '../execution/RequestExecutor.js';

// ============================================================================
// Event Types (Discriminated Union)
// ============================================================================

/** Emitted once per successful build, after the executor was cached. */
export interface ExecutorCreatedEvent {
    readonly type: 'executor.created';
    readonly name: string;
    readonly executor: RequestExecutor;
    /** Milliseconds spent in the build, lock wait excluded */
    readonly durationMs: number;
    readonly timestamp: number;
}

/** Emitted once per cache entry removed by `evict()`. */
export interface ExecutorEvictedEvent {
    readonly type: 'executor.evicted';
    readonly name: string;
    readonly executor: RequestExecutor;
    readonly timestamp: number;
}

/** Emitted when a build fails or is cancelled. Nothing was cached. */
export interface BuildFailedEvent {
    readonly type: 'executor.build-failed';
    readonly name: string;
    readonly error: string;
    readonly cancelled: boolean;
    readonly durationMs: number;
    readonly timestamp: number;
}

/** Emitted after an executor ran one request through its pipeline. */
export interface RequestExecutedEvent {
    readonly type: 'request.executed';
    readonly name: string;
    readonly durationMs: number;
    /** Whether the result carried errors */
    readonly isError: boolean;
    readonly timestamp: number;
}

export type DiagnosticEvent =
    | ExecutorCreatedEvent
    | ExecutorEvictedEvent
    | BuildFailedEvent
    | RequestExecutedEvent;

/**
 * Observer function that receives diagnostic events.
 *
 * Called synchronously at the point of occurrence: it must not block.
 */
export type DiagnosticObserverFn = (event: DiagnosticEvent) => void;

// ============================================================================
// Factory
// ============================================================================

export const LOG_PREFIX = '[executor-registry]';

/**
 * Create a diagnostic observer with compact console output.
 *
 * If a custom handler is provided, events are forwarded to it instead.
 * The default handler prints:
 *
 * ```
 * [executor-registry] created   catalog 12.4ms
 * [executor-registry] evicted   catalog
 * [executor-registry] failed    catalog ✗ Schema name mismatch 0.8ms
 * [executor-registry] request   catalog ✓ 3.1ms
 * ```
 *
 * @param handler - Optional custom event handler. If omitted, uses `console.debug`.
 */
export function createDiagnosticObserver(handler?: DiagnosticObserverFn): DiagnosticObserverFn {
    if (handler) return handler;

    return (event: DiagnosticEvent): void => {
        switch (event.type) {
            case 'executor.created':
                console.debug(`${LOG_PREFIX} created   ${event.name} ${event.durationMs.toFixed(1)}ms`);
                break;

            case 'executor.evicted':
                console.debug(`${LOG_PREFIX} evicted   ${event.name}`);
                break;

            case 'executor.build-failed': {
                const status = event.cancelled ? '⊘ cancelled' : `✗ ${event.error}`;
                console.debug(`${LOG_PREFIX} failed    ${event.name} ${status} ${event.durationMs.toFixed(1)}ms`);
                break;
            }

            case 'request.executed': {
                const icon = event.isError ? '✗' : '✓';
                console.debug(`${LOG_PREFIX} request   ${event.name} ${icon} ${event.durationMs.toFixed(1)}ms`);
                break;
            }
        }
    };
}

// ============================================================================
// Dispatch
// ============================================================================

/**
 * Deliver `event` to `observer`, if any.
 *
 * A throwing observer is reported with `console.warn` and otherwise
 * ignored, so the operation that produced the event completes.
 */
export function emitDiagnostic(observer: DiagnosticObserverFn | undefined, event: DiagnosticEvent): void {
    if (!observer) return;
    try {
        observer(event);
    } catch (err) {
        console.warn(`${LOG_PREFIX} diagnostics observer failed on "${event.type}":`, err);
    }
}
