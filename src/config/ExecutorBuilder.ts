/**
 * ExecutorBuilder — Fluent Configuration for One Executor Name
 *
 * Thin layer over {@link FactoryOptionsStore.configure}: every call
 * records one entry in the name's factory options and triggers a change
 * notification (which evicts a cached executor of that name).
 *
 * @example
 * ```typescript
 * const store = new FactoryOptionsStore();
 *
 * store.executor('catalog')
 *     .addType('Product', z.object({ id: z.string() }))
 *     .configureSchemaAsync(async (builder) => {
 *         builder.setDescription(await loadDescription());
 *     })
 *     .modifyOptions((options) => { options.includeExceptionDetails = true; })
 *     .useRequest(authMiddleware)
 *     .useDefaultPipeline()
 *     .addErrorFilter({ onError: (error) => ({ ...error, code: error.code ?? 'UNKNOWN' }) });
 * ```
 *
 * @module
 */
import { type ZodTypeAny } from 'zod';
import { type ExecutorName } from '../core/types.js';
import { DEFAULT_PIPELINE } from '../execution/DefaultPipeline.js';
import { type ErrorFilter, type ErrorFilterFactory } from '../execution/ErrorHandler.js';
import { type RequestMiddleware } from '../execution/types.js';
import { type Schema } from '../schema/Schema.js';
import { type SchemaBuilder } from '../schema/SchemaBuilder.js';
import {
    asyncAction, syncAction, type AsyncConfigure, type SyncConfigure,
} from './ConfigureAction.js';
import {
    createExecutorOptions, type ExecutorOptions, type ExecutorOptionsInput,
} from './ExecutorOptions.js';
import { type FactoryOptionsStore } from './FactoryOptionsStore.js';

export class ExecutorBuilder {
    readonly name: ExecutorName;
    private readonly _store: FactoryOptionsStore;

    constructor(store: FactoryOptionsStore, name: ExecutorName) {
        this._store = store;
        this.name = name;
    }

    // ── Schema ───────────────────────────────────────────

    /** Serve a pre-built schema. Its name must equal this executor's name. */
    setSchema(schema: Schema): this {
        this._store.configure(this.name, (options) => { options.schema = schema; });
        return this;
    }

    setSchemaBuilder(builder: SchemaBuilder): this {
        this._store.configure(this.name, (options) => { options.schemaBuilder = builder; });
        return this;
    }

    configureSchema(configure: SyncConfigure<SchemaBuilder>): this {
        this._store.configure(this.name, (options) => {
            options.schemaBuilderActions.push(syncAction(configure));
        });
        return this;
    }

    configureSchemaAsync(configure: AsyncConfigure<SchemaBuilder>): this {
        this._store.configure(this.name, (options) => {
            options.schemaBuilderActions.push(asyncAction(configure));
        });
        return this;
    }

    /** Shortcut for `configureSchema((b) => b.addType(typeName, type))`. */
    addType(typeName: string, type: ZodTypeAny): this {
        return this.configureSchema((builder) => { builder.addType(typeName, type); });
    }

    // ── Executor Options ─────────────────────────────────

    /**
     * Replace the base options.
     *
     * @throws {InvalidExecutorOptionsError} when `input` fails validation
     */
    setOptions(input: ExecutorOptionsInput): this {
        const executorOptions = createExecutorOptions(input);
        this._store.configure(this.name, (options) => { options.executorOptions = executorOptions; });
        return this;
    }

    modifyOptions(configure: SyncConfigure<ExecutorOptions>): this {
        this._store.configure(this.name, (options) => {
            options.executorOptionsActions.push(syncAction(configure));
        });
        return this;
    }

    modifyOptionsAsync(configure: AsyncConfigure<ExecutorOptions>): this {
        this._store.configure(this.name, (options) => {
            options.executorOptionsActions.push(asyncAction(configure));
        });
        return this;
    }

    // ── Pipeline ─────────────────────────────────────────

    /** Append a middleware factory (runs after those added before it). */
    useRequest(middleware: RequestMiddleware): this {
        this._store.configure(this.name, (options) => { options.pipeline.push(middleware); });
        return this;
    }

    /** Append the default middleware, e.g. after custom outer middleware. */
    useDefaultPipeline(): this {
        this._store.configure(this.name, (options) => { options.pipeline.push(...DEFAULT_PIPELINE); });
        return this;
    }

    // ── Error Filters ────────────────────────────────────

    addErrorFilter(filter: ErrorFilter | ErrorFilterFactory): this {
        const factory: ErrorFilterFactory = typeof filter === 'function' ? filter : () => filter;
        this._store.configure(this.name, (options) => { options.errorFilters.push(factory); });
        return this;
    }
}
