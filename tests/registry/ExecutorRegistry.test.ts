/**
 * ExecutorRegistry Tests
 *
 * Coverage:
 *   1. Resolution: default name, reference stability, executor contents
 *   2. Concurrency: one build per name, lock scopes
 *   3. Eviction and configuration changes
 *   4. Failures: name mismatch, retry after failure
 *   5. Cancellation
 *   6. Disposal
 *   7. Observability: diagnostics, listeners, tracing
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { z } from 'zod';
import { ExecutorRegistry, type ExecutorRegistryOptions } from '../../src/registry/ExecutorRegistry.js';
import { FactoryOptionsStore } from '../../src/config/FactoryOptionsStore.js';
import {
    BuildCancelledError, InvalidExecutorNameError, RegistryDisposedError, SchemaNameMismatchError,
} from '../../src/core/errors.js';
import { OPERATION_EXECUTOR } from '../../src/execution/DefaultPipeline.js';
import { ERROR_FILTER, type ErrorFilter } from '../../src/execution/ErrorHandler.js';
import { type DiagnosticEvent } from '../../src/observability/DiagnosticObserver.js';
import {
    type RegistryTracer, type TraceAttributeValue, type TraceSpan,
} from '../../src/observability/Tracing.js';
import { SchemaBuilder } from '../../src/schema/SchemaBuilder.js';
import { ServiceCollection } from '../../src/services/ServiceProvider.js';
import { deferred, tick } from '../helpers.js';

// ── Helpers ─────────────────────────────────────────────

function createRegistry(
    store: FactoryOptionsStore,
    options: Omit<ExecutorRegistryOptions, 'optionsMonitor'> = {},
): ExecutorRegistry {
    return new ExecutorRegistry({ optionsMonitor: store, ...options });
}

function suffix(tag: string): ErrorFilter {
    return { onError: (error) => ({ ...error, message: `${error.message}${tag}` }) };
}

class RecordingSpan implements TraceSpan {
    readonly attributes: Record<string, TraceAttributeValue>;
    readonly statuses: { code: number; message?: string }[] = [];
    readonly exceptions: (Error | string)[] = [];
    ended = 0;

    constructor(readonly name: string, attributes: Record<string, TraceAttributeValue> = {}) {
        this.attributes = { ...attributes };
    }

    setAttribute(key: string, value: TraceAttributeValue): void {
        this.attributes[key] = value;
    }

    setStatus(status: { code: number; message?: string }): void {
        this.statuses.push(status);
    }

    end(): void {
        this.ended++;
    }

    recordException(exception: Error | string): void {
        this.exceptions.push(exception);
    }
}

function createTracer(): RegistryTracer & { spans: RecordingSpan[] } {
    const spans: RecordingSpan[] = [];
    return {
        spans,
        startSpan(name, options) {
            const span = new RecordingSpan(name, options?.attributes);
            spans.push(span);
            return span;
        },
    };
}

afterEach(() => {
    vi.restoreAllMocks();
});

// ============================================================================
// 1. Resolution
// ============================================================================

describe('ExecutorRegistry: resolution', () => {
    it('should build the default executor when no name is given', async () => {
        const registry = createRegistry(new FactoryOptionsStore());

        const executor = await registry.getOrCreate();

        expect(executor.name).toBe('_Default');
        expect(registry.has()).toBe(true);
        expect(registry.names()).toEqual(['_Default']);
    });

    it('should return the same instance until eviction', async () => {
        const registry = createRegistry(new FactoryOptionsStore());

        const first = await registry.getOrCreate('catalog');
        const second = await registry.getOrCreate('catalog');

        expect(second).toBe(first);
        expect(registry.size).toBe(1);
    });

    it('should reject an empty name', async () => {
        const registry = createRegistry(new FactoryOptionsStore());
        await expect(registry.getOrCreate('')).rejects.toBeInstanceOf(InvalidExecutorNameError);
    });

    it('should assemble schema, options and filters from the configuration', async () => {
        const store = new FactoryOptionsStore();
        const seenTimeouts: number[] = [];
        store.executor('catalog')
            .addType('Product', z.object({ id: z.string() }))
            .setOptions({ executionTimeoutMs: 1_000 })
            .modifyOptions((o) => { o.executionTimeoutMs = 2_000; })
            .addErrorFilter((_services, options) => {
                seenTimeouts.push(options.executionTimeoutMs);
                return suffix('-own');
            });
        const services = new ServiceCollection().add(ERROR_FILTER, suffix('-ambient'));
        const registry = createRegistry(store, { services });

        const executor = await registry.getOrCreate('catalog');

        expect(executor.schema.name).toBe('catalog');
        expect(executor.schema.typeNames).toEqual(['Product']);
        expect(executor.schema.services).toBe(services);
        expect(executor.options.executionTimeoutMs).toBe(2_000);
        expect(seenTimeouts).toEqual([2_000]);
        expect(executor.errorHandler.handle({ message: 'x' }).message).toBe('x-own-ambient');
    });

    it('should execute requests through the default pipeline', async () => {
        const services = new ServiceCollection().add(OPERATION_EXECUTOR, {
            execute: async (context) => ({ data: { schema: context.schema.name } }),
        });
        const registry = createRegistry(new FactoryOptionsStore(), { services });

        const executor = await registry.getOrCreate('catalog');

        expect(await executor.execute({ query: '{ a }' })).toEqual({ data: { schema: 'catalog' } });
    });
});

// ============================================================================
// 2. Concurrency
// ============================================================================

describe('ExecutorRegistry: concurrency', () => {
    it('should build once for concurrent callers of one name', async () => {
        const store = new FactoryOptionsStore();
        let builds = 0;
        store.executor('catalog').configureSchemaAsync(async () => {
            builds++;
            await tick(10);
        });
        const registry = createRegistry(store);
        const created = vi.fn();
        registry.onCreated(created);

        const executors = await Promise.all(
            Array.from({ length: 10 }, () => registry.getOrCreate('catalog')),
        );

        expect(builds).toBe(1);
        expect(created).toHaveBeenCalledTimes(1);
        expect(new Set(executors).size).toBe(1);
    });

    it('should never overlap builds under the global scope', async () => {
        const store = new FactoryOptionsStore();
        let active = 0;
        let maxActive = 0;
        const slowBuild = async (): Promise<void> => {
            active++;
            maxActive = Math.max(maxActive, active);
            await tick(10);
            active--;
        };
        for (const name of ['a', 'b', 'c']) store.executor(name).configureSchemaAsync(slowBuild);
        const registry = createRegistry(store);

        await Promise.all(['a', 'b', 'c'].map(name => registry.getOrCreate(name)));

        expect(maxActive).toBe(1);
        expect(registry.size).toBe(3);
    });

    it('should let different names build in parallel under the name scope', async () => {
        const store = new FactoryOptionsStore();
        let active = 0;
        let maxActive = 0;
        const slowBuild = async (): Promise<void> => {
            active++;
            maxActive = Math.max(maxActive, active);
            await tick(20);
            active--;
        };
        store.executor('a').configureSchemaAsync(slowBuild);
        store.executor('b').configureSchemaAsync(slowBuild);
        const registry = createRegistry(store, { lockScope: 'name' });

        await Promise.all([registry.getOrCreate('a'), registry.getOrCreate('b')]);

        expect(maxActive).toBe(2);
    });
});

// ============================================================================
// 3. Eviction
// ============================================================================

describe('ExecutorRegistry: eviction', () => {
    it('should evict, notify once and rebuild on the next lookup', async () => {
        const services = new ServiceCollection().add(OPERATION_EXECUTOR, {
            execute: async () => ({ data: 'ok' }),
        });
        const registry = createRegistry(new FactoryOptionsStore(), { services });
        const evicted = vi.fn();
        registry.onEvicted(evicted);

        const before = await registry.getOrCreate('catalog');
        expect(registry.evict('catalog')).toBe(true);
        expect(registry.evict('catalog')).toBe(false);

        expect(evicted).toHaveBeenCalledTimes(1);
        expect(evicted).toHaveBeenCalledWith({ name: 'catalog', executor: before });

        const after = await registry.getOrCreate('catalog');
        expect(after).not.toBe(before);

        // Holders of the evicted executor keep working
        expect(await before.execute({ query: '{ a }' })).toEqual({ data: 'ok' });
    });

    it('should evict when the configuration of a name changes', async () => {
        const store = new FactoryOptionsStore();
        const registry = createRegistry(store);
        const before = await registry.getOrCreate('catalog');

        store.executor('catalog').modifyOptions((o) => { o.includeExceptionDetails = true; });

        expect(registry.has('catalog')).toBe(false);
        const after = await registry.getOrCreate('catalog');
        expect(after).not.toBe(before);
        expect(after.options.includeExceptionDetails).toBe(true);
    });

    it('should ignore configuration changes of names that are not cached', async () => {
        const store = new FactoryOptionsStore();
        const registry = createRegistry(store);
        const evicted = vi.fn();
        registry.onEvicted(evicted);
        const cached = await registry.getOrCreate('a');

        registry.onConfigurationChanged('b');

        expect(evicted).not.toHaveBeenCalled();
        expect(await registry.getOrCreate('a')).toBe(cached);
    });

    it('should stop calling a listener once unsubscribed', async () => {
        const registry = createRegistry(new FactoryOptionsStore());
        const evicted = vi.fn();
        const unsubscribe = registry.onEvicted(evicted);
        await registry.getOrCreate('a');

        unsubscribe();
        registry.evict('a');

        expect(evicted).not.toHaveBeenCalled();
    });
});

// ============================================================================
// 4. Failures
// ============================================================================

describe('ExecutorRegistry: failures', () => {
    it('should reject a pre-built schema with another name and cache nothing', async () => {
        const store = new FactoryOptionsStore();
        store.executor('catalog').setSchema(new SchemaBuilder().setName('inventory').create());
        const diagnostics = vi.fn<(event: DiagnosticEvent) => void>();
        const registry = createRegistry(store, { diagnostics });
        const created = vi.fn();
        registry.onCreated(created);

        await expect(registry.getOrCreate('catalog')).rejects.toBeInstanceOf(SchemaNameMismatchError);

        expect(registry.has('catalog')).toBe(false);
        expect(created).not.toHaveBeenCalled();
        expect(diagnostics).toHaveBeenCalledTimes(1);
        expect(diagnostics.mock.calls[0]?.[0]).toMatchObject({
            type: 'executor.build-failed',
            name: 'catalog',
            cancelled: false,
            error: 'The schema name "inventory" does not match the executor name "catalog".',
        });
    });

    it('should give each waiter of a failed build its own attempt', async () => {
        const store = new FactoryOptionsStore();
        let attempts = 0;
        store.executor('catalog').configureSchemaAsync(async () => {
            attempts++;
            await tick(5);
            if (attempts === 1) throw new Error('schema source unavailable');
        });
        const registry = createRegistry(store);

        const outcomes = await Promise.allSettled(
            Array.from({ length: 3 }, () => registry.getOrCreate('catalog')),
        );

        expect(outcomes.map(o => o.status)).toEqual(['rejected', 'fulfilled', 'fulfilled']);
        expect(attempts).toBe(2);
        const [, second, third] = outcomes;
        expect(second?.status === 'fulfilled' && third?.status === 'fulfilled'
            && second.value === third.value).toBe(true);
    });

    it('should retry a failed build on the next call', async () => {
        const store = new FactoryOptionsStore();
        let attempts = 0;
        store.executor('catalog').configureSchemaAsync(async () => {
            attempts++;
            if (attempts === 1) throw new Error('schema source unavailable');
        });
        const registry = createRegistry(store);

        await expect(registry.getOrCreate('catalog')).rejects.toThrow('schema source unavailable');
        expect(registry.has('catalog')).toBe(false);

        const executor = await registry.getOrCreate('catalog');
        expect(executor.name).toBe('catalog');
        expect(attempts).toBe(2);
    });
});

// ============================================================================
// 5. Cancellation
// ============================================================================

describe('ExecutorRegistry: cancellation', () => {
    it('should leave the cache untouched when a build is cancelled', async () => {
        const store = new FactoryOptionsStore();
        const controller = new AbortController();
        let cancel = true;
        store.executor('catalog').configureSchemaAsync(async () => {
            if (cancel) controller.abort('shutdown');
        });
        const diagnostics = vi.fn<(event: DiagnosticEvent) => void>();
        const registry = createRegistry(store, { diagnostics });

        const error = await registry.getOrCreate('catalog', controller.signal).catch((err: unknown) => err);

        expect(error).toBeInstanceOf(BuildCancelledError);
        expect(error).toMatchObject({ executorName: 'catalog', reason: 'shutdown' });
        expect(registry.has('catalog')).toBe(false);
        expect(diagnostics.mock.calls[0]?.[0]).toMatchObject({ type: 'executor.build-failed', cancelled: true });

        cancel = false;
        expect((await registry.getOrCreate('catalog')).name).toBe('catalog');
    });

    it('should report an action failing because of the abort as a cancellation', async () => {
        const store = new FactoryOptionsStore();
        const controller = new AbortController();
        const abortError = new Error('fetch aborted');
        store.executor('catalog').configureSchemaAsync(async () => {
            controller.abort();
            throw abortError;
        });
        const registry = createRegistry(store);

        const error = await registry.getOrCreate('catalog', controller.signal).catch((err: unknown) => err);

        expect(error).toBeInstanceOf(BuildCancelledError);
        expect(error).toMatchObject({ cause: abortError });
    });

    it('should return a cached executor even with an aborted signal', async () => {
        const registry = createRegistry(new FactoryOptionsStore());
        const cached = await registry.getOrCreate('catalog');
        const controller = new AbortController();
        controller.abort();

        expect(await registry.getOrCreate('catalog', controller.signal)).toBe(cached);
    });

    it('should cancel a caller waiting for the lock without disturbing the running build', async () => {
        const store = new FactoryOptionsStore();
        const release = deferred();
        store.executor('a').configureSchemaAsync(async () => release.promise);
        const registry = createRegistry(store);
        const controller = new AbortController();

        const building = registry.getOrCreate('a');
        const waiting = registry.getOrCreate('b', controller.signal);

        controller.abort();
        await expect(waiting).rejects.toBeInstanceOf(BuildCancelledError);

        release.resolve();
        expect((await building).name).toBe('a');
        expect(registry.names()).toEqual(['a']);
    });
});

// ============================================================================
// 6. Disposal
// ============================================================================

describe('ExecutorRegistry: dispose', () => {
    it('should reject new calls after dispose', async () => {
        const registry = createRegistry(new FactoryOptionsStore());
        await registry.getOrCreate('catalog');

        await registry.dispose();

        expect(registry.disposed).toBe(true);
        expect(registry.size).toBe(0);
        await expect(registry.getOrCreate('catalog')).rejects.toBeInstanceOf(RegistryDisposedError);
        await expect(registry.getOrCreate('catalog')).rejects
            .toThrow('Cannot call getOrCreate() on a disposed executor registry.');
        expect(() => registry.evict('catalog')).toThrow(RegistryDisposedError);
    });

    it('should be idempotent', async () => {
        const registry = createRegistry(new FactoryOptionsStore());
        await registry.dispose();
        await expect(registry.dispose()).resolves.toBeUndefined();
    });

    it('should wait for a running build before clearing the cache', async () => {
        const store = new FactoryOptionsStore();
        const started = deferred();
        const release = deferred();
        store.executor('catalog').configureSchemaAsync(async () => {
            started.resolve();
            await release.promise;
        });
        const registry = createRegistry(store);

        const building = registry.getOrCreate('catalog');
        await started.promise;

        const disposing = registry.dispose();
        release.resolve();

        expect((await building).name).toBe('catalog');
        await disposing;
        expect(registry.size).toBe(0);
    });

    it('should stop listening to configuration changes', async () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const store = new FactoryOptionsStore();
        const registry = createRegistry(store);
        await registry.dispose();

        store.executor('catalog').useDefaultPipeline();

        expect(warn).not.toHaveBeenCalled();
    });
});

// ============================================================================
// 7. Observability
// ============================================================================

describe('ExecutorRegistry: observability', () => {
    it('should emit created, request and evicted events', async () => {
        const events: DiagnosticEvent[] = [];
        const services = new ServiceCollection().add(OPERATION_EXECUTOR, {
            execute: async () => ({ data: 1 }),
        });
        const registry = createRegistry(new FactoryOptionsStore(), {
            services,
            diagnostics: (event) => { events.push(event); },
        });

        const executor = await registry.getOrCreate('catalog');
        await registry.getOrCreate('catalog');
        await executor.execute({ query: '{ a }' });
        registry.evict('catalog');

        expect(events.map(e => e.type)).toEqual(['executor.created', 'request.executed', 'executor.evicted']);
        expect(events[0]).toMatchObject({ name: 'catalog', executor });
        expect(events[1]).toMatchObject({ name: 'catalog', isError: false });
        expect(events[2]).toMatchObject({ name: 'catalog', executor });
    });

    it('should announce creation before an eviction racing the insert', async () => {
        const store = new FactoryOptionsStore();
        const release = deferred();
        store.executor('catalog').configureSchemaAsync(async () => release.promise);
        const events: string[] = [];
        const registry = createRegistry(store, {
            diagnostics: (event) => { events.push(event.type); },
        });
        const live = new Set<unknown>();
        registry.onCreated(({ executor }) => { live.add(executor); });
        registry.onEvicted(({ executor }) => { live.delete(executor); });

        const building = registry.getOrCreate('catalog');
        release.resolve();
        // Change the configuration as soon as the executor becomes visible
        for (let i = 0; i < 1_000 && !registry.has('catalog'); i++) {
            await Promise.resolve();
        }
        store.executor('catalog').modifyOptions((o) => { o.includeExceptionDetails = true; });
        await building;

        expect(events).toEqual(['executor.created', 'executor.evicted']);
        expect(registry.has('catalog')).toBe(false);
        expect(live.size).toBe(0);
    });

    it('should complete a build when the diagnostics observer throws', async () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const registry = createRegistry(new FactoryOptionsStore(), {
            diagnostics: () => { throw new Error('observer down'); },
        });

        const executor = await registry.getOrCreate('catalog');

        expect(registry.has('catalog')).toBe(true);
        expect(executor.name).toBe('catalog');
        expect(warn).toHaveBeenCalledTimes(1);
        expect(warn.mock.calls[0]?.[0]).toBe('[executor-registry] diagnostics observer failed on "executor.created":');
    });

    it('should complete a build when a created listener throws', async () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const registry = createRegistry(new FactoryOptionsStore());
        const second = vi.fn();
        registry.onCreated(() => { throw new Error('listener down'); });
        registry.onCreated(second);

        const executor = await registry.getOrCreate('catalog');

        expect(second).toHaveBeenCalledWith({ name: 'catalog', executor });
        expect(warn.mock.calls[0]?.[0]).toBe('[executor-registry] lifecycle listener failed for "catalog":');
    });

    it('should trace a successful build', async () => {
        const tracing = createTracer();
        const registry = createRegistry(new FactoryOptionsStore(), { tracing });

        await registry.getOrCreate('catalog');
        await registry.getOrCreate('catalog');

        expect(tracing.spans).toHaveLength(1);
        const span = tracing.spans[0];
        expect(span?.name).toBe('executor.build');
        expect(span?.attributes).toEqual({ 'executor.name': 'catalog', 'executor.lock_scope': 'global' });
        expect(span?.statuses).toEqual([{ code: 1 }]);
        expect(span?.ended).toBe(1);
    });

    it('should trace a failed build with its exception', async () => {
        const tracing = createTracer();
        const store = new FactoryOptionsStore();
        const failure = new Error('schema source unavailable');
        store.executor('catalog').configureSchemaAsync(async () => { throw failure; });
        const registry = createRegistry(store, { tracing, lockScope: 'name' });

        await expect(registry.getOrCreate('catalog')).rejects.toBe(failure);

        const span = tracing.spans[0];
        expect(span?.attributes['executor.lock_scope']).toBe('name');
        expect(span?.exceptions).toEqual([failure]);
        expect(span?.statuses).toEqual([{ code: 2, message: 'schema source unavailable' }]);
        expect(span?.ended).toBe(1);
    });

    it('should mark a cancelled build without an error status', async () => {
        const tracing = createTracer();
        const store = new FactoryOptionsStore();
        const controller = new AbortController();
        store.executor('catalog').configureSchemaAsync(async () => { controller.abort(); });
        const registry = createRegistry(store, { tracing });

        await expect(registry.getOrCreate('catalog', controller.signal)).rejects.toBeInstanceOf(BuildCancelledError);

        const span = tracing.spans[0];
        expect(span?.attributes['executor.cancelled']).toBe(true);
        expect(span?.statuses).toEqual([]);
        expect(span?.exceptions).toEqual([]);
        expect(span?.ended).toBe(1);
    });
});
