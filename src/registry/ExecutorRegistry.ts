/**
 * ExecutorRegistry — Cached, Serialized Executor Resolution
 *
 * The single place where executor names are turned into ready-to-use
 * {@link RequestExecutor}s. Executors are built on first use, cached by
 * name, and evicted when their configuration changes.
 *
 * ```
 *   getOrCreate(name)
 *        │
 *        ├─ cache hit ─────────────────────────────────► executor   (no lock)
 *        │
 *        └─ miss ──► BuildLock.serialize(name)
 *                        ├─ re-check cache ── hit ─────► executor
 *                        └─ build:
 *                             options   ← resolveExecutorOptions()
 *                             schema    ← resolveSchema()
 *                             filters   ← collectErrorFilters()
 *                             pipeline  ← composePipeline()
 *                             cache.set(name, executor)
 *                             ──► executor.created
 * ```
 *
 * @example
 * ```typescript
 * import { ExecutorRegistry, FactoryOptionsStore } from 'executor-registry';
 *
 * const store = new FactoryOptionsStore();
 * store.executor('catalog').addType('Product', productSchema);
 *
 * const registry = new ExecutorRegistry({ optionsMonitor: store, services });
 *
 * const executor = await registry.getOrCreate('catalog');
 * const result = await executor.execute({ query: '{ products { id } }' });
 *
 * // Clean teardown (e.g. in tests):
 * await registry.dispose();
 * ```
 *
 * @module
 */
import { z } from 'zod';
import {
    BuildCancelledError, RegistryDisposedError, throwIfCancelled,
} from '../core/errors.js';
import { resolveExecutorName, type ExecutorName } from '../core/types.js';
import { resolveExecutorOptions } from '../config/ExecutorOptions.js';
import { type FactoryOptionsMonitor } from '../config/FactoryOptions.js';
import { DefaultActivator } from '../execution/Activator.js';
import { collectErrorFilters, DefaultErrorHandler } from '../execution/ErrorHandler.js';
import { composePipeline } from '../execution/PipelineAssembler.js';
import { RequestExecutor } from '../execution/RequestExecutor.js';
import {
    emitDiagnostic, LOG_PREFIX, type DiagnosticObserverFn,
} from '../observability/DiagnosticObserver.js';
import { SpanStatusCode, type RegistryTracer } from '../observability/Tracing.js';
import { resolveSchema } from '../schema/SchemaAssembler.js';
import { EMPTY_SERVICES, type ServiceProvider } from '../services/ServiceProvider.js';
import { BuildLock, type LockScope } from './BuildLock.js';

// ── Configuration ────────────────────────────────────────

export interface ExecutorRegistryOptions {
    /** Source of per-name factory options and change notifications */
    readonly optionsMonitor: FactoryOptionsMonitor;
    /** Forwarded to builder actions, middleware and filter factories */
    readonly services?: ServiceProvider;
    /** Receives lifecycle events; also handed to every executor */
    readonly diagnostics?: DiagnosticObserverFn;
    /** Opens one span per build */
    readonly tracing?: RegistryTracer;
    /**
     * Build serialization scope.
     *
     * @default 'global'
     */
    readonly lockScope?: LockScope;
}

const lockScopeSchema = z.enum(['global', 'name']).default('global');

// ── Events ───────────────────────────────────────────────

export interface ExecutorLifecycleEvent {
    readonly name: ExecutorName;
    readonly executor: RequestExecutor;
}

export type ExecutorLifecycleListener = (event: ExecutorLifecycleEvent) => void;

// ============================================================================
// ExecutorRegistry
// ============================================================================

export class ExecutorRegistry {
    private readonly _executors = new Map<ExecutorName, RequestExecutor>();
    private readonly _createdListeners = new Set<ExecutorLifecycleListener>();
    private readonly _evictedListeners = new Set<ExecutorLifecycleListener>();
    private readonly _monitor: FactoryOptionsMonitor;
    private readonly _services: ServiceProvider;
    private readonly _diagnostics: DiagnosticObserverFn | undefined;
    private readonly _tracer: RegistryTracer | undefined;
    private readonly _lock: BuildLock;
    private readonly _unsubscribe: () => void;
    private _disposed = false;

    constructor(options: ExecutorRegistryOptions) {
        this._monitor = options.optionsMonitor;
        this._services = options.services ?? EMPTY_SERVICES;
        this._diagnostics = options.diagnostics;
        this._tracer = options.tracing;
        this._lock = new BuildLock(lockScopeSchema.parse(options.lockScope));
        this._unsubscribe = this._monitor.onChange((name) => this.onConfigurationChanged(name));
    }

    // ── Resolution ───────────────────────────────────────

    /**
     * Get the executor for `name`, building it on first use.
     *
     * Concurrent callers for the same name share one build: the first
     * caller builds, the others find the cached executor once the lock
     * is released. A failed or cancelled build caches nothing; the next
     * call starts over.
     *
     * @param name - Executor name; `undefined` means the default executor
     * @param signal - Optional AbortSignal honoured at every suspension point
     * @throws {RegistryDisposedError} after `dispose()`
     * @throws {BuildCancelledError} when `signal` fires during the build
     * @throws {SchemaNameMismatchError} when the schema carries another name
     */
    async getOrCreate(name?: ExecutorName, signal?: AbortSignal): Promise<RequestExecutor> {
        this._assertNotDisposed('getOrCreate');
        const key = resolveExecutorName(name);

        const cached = this._executors.get(key);
        if (cached) return cached;

        return this._lock.serialize(key, async () => {
            this._assertNotDisposed('getOrCreate');

            // Another caller may have finished this build while we waited
            const existing = this._executors.get(key);
            if (existing) return existing;

            const start = performance.now();
            const executor = await this._buildTraced(key, signal, start);
            this._executors.set(key, executor);
            // Same synchronous step as the insert: no eviction can come first
            this._publishCreated(key, executor, performance.now() - start);
            return executor;
        }, signal);
    }

    // ── Eviction ─────────────────────────────────────────

    /**
     * Remove the cached executor of `name`.
     *
     * Callers already holding the executor keep using it; the next
     * `getOrCreate()` builds a new one.
     *
     * @returns `true` if an executor was cached under `name`
     */
    evict(name?: ExecutorName): boolean {
        this._assertNotDisposed('evict');
        const key = resolveExecutorName(name);

        const executor = this._executors.get(key);
        if (!executor) return false;
        this._executors.delete(key);

        emitDiagnostic(this._diagnostics, {
            type: 'executor.evicted',
            name: key,
            executor,
            timestamp: Date.now(),
        });
        this._notify(this._evictedListeners, { name: key, executor });
        return true;
    }

    /**
     * Configuration-change callback. Evicts; never rebuilds eagerly.
     */
    onConfigurationChanged(name: ExecutorName): void {
        this.evict(name);
    }

    // ── Subscriptions ────────────────────────────────────

    /** @returns A function that removes the listener */
    onCreated(listener: ExecutorLifecycleListener): () => void {
        this._createdListeners.add(listener);
        return () => { this._createdListeners.delete(listener); };
    }

    /** @returns A function that removes the listener */
    onEvicted(listener: ExecutorLifecycleListener): () => void {
        this._evictedListeners.add(listener);
        return () => { this._evictedListeners.delete(listener); };
    }

    // ── Introspection ────────────────────────────────────

    has(name?: ExecutorName): boolean {
        return this._executors.has(resolveExecutorName(name));
    }

    get size(): number {
        return this._executors.size;
    }

    /** Cached executor names. */
    names(): ExecutorName[] {
        return [...this._executors.keys()];
    }

    get disposed(): boolean {
        return this._disposed;
    }

    // ── Teardown ─────────────────────────────────────────

    /**
     * Dispose the registry.
     *
     * New calls fail immediately with {@link RegistryDisposedError};
     * builds already running finish (or fail) before the cache is
     * cleared. Idempotent.
     */
    async dispose(): Promise<void> {
        if (this._disposed) return;
        this._disposed = true;
        this._unsubscribe();
        await this._lock.drain();
        this._executors.clear();
        this._createdListeners.clear();
        this._evictedListeners.clear();
    }

    // ── Build ────────────────────────────────────────────

    private async _buildTraced(name: ExecutorName, signal: AbortSignal | undefined, start: number): Promise<RequestExecutor> {
        const span = this._tracer?.startSpan('executor.build', {
            attributes: { 'executor.name': name, 'executor.lock_scope': this._lock.scope },
        });

        try {
            const executor = await this._build(name, signal);
            span?.setStatus({ code: SpanStatusCode.OK });
            return executor;
        } catch (err) {
            const failure = signal?.aborted && !(err instanceof BuildCancelledError)
                ? new BuildCancelledError(name, signal.reason, { cause: err })
                : err;
            const cancelled = failure instanceof BuildCancelledError;

            if (cancelled) {
                span?.setAttribute('executor.cancelled', true);
            } else {
                span?.recordException(failure instanceof Error ? failure : String(failure));
                span?.setStatus({ code: SpanStatusCode.ERROR, message: describe(failure) });
            }

            emitDiagnostic(this._diagnostics, {
                type: 'executor.build-failed',
                name,
                error: describe(failure),
                cancelled,
                durationMs: performance.now() - start,
                timestamp: Date.now(),
            });
            throw failure;
        } finally {
            span?.end();
        }
    }

    private async _build(name: ExecutorName, signal: AbortSignal | undefined): Promise<RequestExecutor> {
        throwIfCancelled(signal, name);
        const factoryOptions = this._monitor.get(name);
        const context = { executorName: name, signal };

        const options = await resolveExecutorOptions(
            factoryOptions.executorOptions,
            factoryOptions.executorOptionsActions,
            context,
        );

        const schema = await resolveSchema(name, factoryOptions, this._services, signal);
        throwIfCancelled(signal, name);

        const errorHandler = new DefaultErrorHandler(
            collectErrorFilters(factoryOptions.errorFilters, this._services, options),
            options,
        );
        const activator = new DefaultActivator(this._services);

        const pipeline = composePipeline(name, factoryOptions.pipeline, {
            services: this._services,
            activator,
            errorHandler,
            options,
        });

        return new RequestExecutor({
            schema,
            services: this._services,
            options,
            errorHandler,
            activator,
            diagnostics: this._diagnostics,
            pipeline,
        });
    }

    // ── Internals ────────────────────────────────────────

    private _publishCreated(name: ExecutorName, executor: RequestExecutor, durationMs: number): void {
        emitDiagnostic(this._diagnostics, {
            type: 'executor.created',
            name,
            executor,
            durationMs,
            timestamp: Date.now(),
        });
        this._notify(this._createdListeners, { name, executor });
    }

    private _notify(listeners: Set<ExecutorLifecycleListener>, event: ExecutorLifecycleEvent): void {
        for (const listener of [...listeners]) {
            try {
                listener(event);
            } catch (err) {
                console.warn(`${LOG_PREFIX} lifecycle listener failed for "${event.name}":`, err);
            }
        }
    }

    private _assertNotDisposed(operation: string): void {
        if (this._disposed) {
            throw new RegistryDisposedError(operation);
        }
    }
}

function describe(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
