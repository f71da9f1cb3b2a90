/**
 * FactoryOptions — Per-Name Build Recipe
 *
 * Everything the registry needs to build the executor of one name.
 * Supplied by a {@link FactoryOptionsMonitor}; a snapshot is taken at the
 * start of each build and not re-read afterwards.
 *
 * @module
 */
import { type ExecutorName } from '../core/types.js';
import { type ErrorFilterFactory } from '../execution/ErrorHandler.js';
import { type RequestMiddleware } from '../execution/types.js';
import { type Schema } from '../schema/Schema.js';
import { type SchemaBuilder } from '../schema/SchemaBuilder.js';
import { type ConfigureAction } from './ConfigureAction.js';
import { type ExecutorOptions } from './ExecutorOptions.js';

export interface FactoryOptions {
    /** Pre-built schema. When set, schema builder fields are ignored. */
    readonly schema?: Schema | undefined;
    /** Builder to start from (cloned per build); a fresh one otherwise */
    readonly schemaBuilder?: SchemaBuilder | undefined;
    readonly schemaBuilderActions: readonly ConfigureAction<SchemaBuilder>[];
    /** Options to start from (copied per build); defaults otherwise */
    readonly executorOptions?: ExecutorOptions | undefined;
    readonly executorOptionsActions: readonly ConfigureAction<ExecutorOptions>[];
    /** Middleware factories, outermost first. Empty means the default pipeline. */
    readonly pipeline: readonly RequestMiddleware[];
    readonly errorFilters: readonly ErrorFilterFactory[];
}

/** Options of a name nobody configured: default schema, default pipeline. */
export function emptyFactoryOptions(): FactoryOptions {
    return {
        schemaBuilderActions: [],
        executorOptionsActions: [],
        pipeline: [],
        errorFilters: [],
    };
}

/**
 * Configuration source consumed by the registry.
 *
 * `onChange` listeners receive the name whose configuration changed;
 * the returned function unsubscribes.
 */
export interface FactoryOptionsMonitor {
    get(name: ExecutorName): FactoryOptions;
    onChange(listener: (name: ExecutorName) => void): () => void;
}
