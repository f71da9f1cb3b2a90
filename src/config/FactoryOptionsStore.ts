/**
 * FactoryOptionsStore — In-Process Configuration Source
 *
 * Holds the {@link FactoryOptions} of every executor name and notifies
 * subscribers whenever one of them changes. The registry subscribes its
 * `onConfigurationChanged()` so that a change evicts the cached
 * executor, and the next lookup rebuilds it.
 *
 * ```
 *   store.executor('catalog').useRequest(auth)
 *        │
 *        ├─► entry('catalog').pipeline.push(auth)
 *        └─► listeners('catalog') ──► registry.onConfigurationChanged('catalog')
 * ```
 *
 * @module
 */
import { resolveExecutorName, type ExecutorName } from '../core/types.js';
import { LOG_PREFIX } from '../observability/DiagnosticObserver.js';
import { type ErrorFilterFactory } from '../execution/ErrorHandler.js';
import { type RequestMiddleware } from '../execution/types.js';
import { type Schema } from '../schema/Schema.js';
import { type SchemaBuilder } from '../schema/SchemaBuilder.js';
import { type ConfigureAction } from './ConfigureAction.js';
import { ExecutorBuilder } from './ExecutorBuilder.js';
import { type ExecutorOptions } from './ExecutorOptions.js';
import { type FactoryOptions, type FactoryOptionsMonitor } from './FactoryOptions.js';

/** The mutable form of {@link FactoryOptions} handed to `configure()` callbacks. */
export interface MutableFactoryOptions {
    schema: Schema | undefined;
    schemaBuilder: SchemaBuilder | undefined;
    readonly schemaBuilderActions: ConfigureAction<SchemaBuilder>[];
    executorOptions: ExecutorOptions | undefined;
    readonly executorOptionsActions: ConfigureAction<ExecutorOptions>[];
    readonly pipeline: RequestMiddleware[];
    readonly errorFilters: ErrorFilterFactory[];
}

function createEntry(): MutableFactoryOptions {
    return {
        schema: undefined,
        schemaBuilder: undefined,
        schemaBuilderActions: [],
        executorOptions: undefined,
        executorOptionsActions: [],
        pipeline: [],
        errorFilters: [],
    };
}

export class FactoryOptionsStore implements FactoryOptionsMonitor {
    private readonly _entries = new Map<ExecutorName, MutableFactoryOptions>();
    private readonly _listeners = new Set<(name: ExecutorName) => void>();

    /**
     * Snapshot of the options for `name`.
     *
     * Arrays are copied and frozen: later configuration does not leak
     * into a build that already read its options. Unknown names get
     * empty options.
     */
    get(name: ExecutorName): FactoryOptions {
        const entry = this._entries.get(name) ?? createEntry();
        return Object.freeze({
            schema: entry.schema,
            schemaBuilder: entry.schemaBuilder,
            schemaBuilderActions: Object.freeze([...entry.schemaBuilderActions]),
            executorOptions: entry.executorOptions,
            executorOptionsActions: Object.freeze([...entry.executorOptionsActions]),
            pipeline: Object.freeze([...entry.pipeline]),
            errorFilters: Object.freeze([...entry.errorFilters]),
        });
    }

    /**
     * Mutate the options of `name`, then notify subscribers.
     *
     * @param name - Executor name; `undefined` targets the default executor
     * @param mutate - Receives the live, mutable options entry
     */
    configure(name: ExecutorName | undefined, mutate: (options: MutableFactoryOptions) => void): void {
        const key = resolveExecutorName(name);
        let entry = this._entries.get(key);
        if (!entry) {
            entry = createEntry();
            this._entries.set(key, entry);
        }
        mutate(entry);
        this._notify(key);
    }

    /** Fluent configuration API for one executor name. */
    executor(name?: ExecutorName): ExecutorBuilder {
        return new ExecutorBuilder(this, resolveExecutorName(name));
    }

    /**
     * Drop every option of `name`. Subscribers are notified when an
     * entry existed.
     *
     * @param name - Executor name; `undefined` targets the default executor
     */
    remove(name?: ExecutorName): boolean {
        const key = resolveExecutorName(name);
        const removed = this._entries.delete(key);
        if (removed) this._notify(key);
        return removed;
    }

    has(name?: ExecutorName): boolean {
        return this._entries.has(resolveExecutorName(name));
    }

    /** Configured names, in first-configuration order. */
    names(): ExecutorName[] {
        return [...this._entries.keys()];
    }

    onChange(listener: (name: ExecutorName) => void): () => void {
        this._listeners.add(listener);
        return () => {
            this._listeners.delete(listener);
        };
    }

    private _notify(name: ExecutorName): void {
        for (const listener of [...this._listeners]) {
            try {
                listener(name);
            } catch (err) {
                console.warn(`${LOG_PREFIX} configuration change listener failed for "${name}":`, err);
            }
        }
    }
}
