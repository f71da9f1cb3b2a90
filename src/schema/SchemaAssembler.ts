/**
 * SchemaAssembler — Resolve the Schema of an Executor
 *
 * Two paths:
 *
 * ```
 *   options.schema set? ──YES──► assert name ──► return as-is
 *          │
 *          NO
 *          ▼
 *   clone builder ──► apply builder actions (ordered)
 *          ──► + SchemaNameInterceptor(name)
 *          ──► + services
 *          ──► create() ──► assert name ──► Schema
 * ```
 *
 * Pure-function module: no state.
 *
 * @module
 */
import { SchemaNameMismatchError } from '../core/errors.js';
import { type ExecutorName } from '../core/types.js';
import { applyActions } from '../config/ConfigureAction.js';
import { type FactoryOptions } from '../config/FactoryOptions.js';
import { type ServiceProvider } from '../services/ServiceProvider.js';
import { type Schema } from './Schema.js';
import { SchemaBuilder } from './SchemaBuilder.js';
import { SchemaNameInterceptor } from './TypeInterceptor.js';

/**
 * Resolve the schema for `name` from its factory options.
 *
 * @throws {SchemaNameMismatchError} when the supplied or built schema carries another name
 * @throws {BuildCancelledError} when `signal` fires between builder actions
 */
export async function resolveSchema(
    name: ExecutorName,
    options: Pick<FactoryOptions, 'schema' | 'schemaBuilder' | 'schemaBuilderActions'>,
    services: ServiceProvider,
    signal?: AbortSignal,
): Promise<Schema> {
    if (options.schema) {
        assertSchemaName(options.schema, name);
        return options.schema;
    }

    const builder = options.schemaBuilder?.clone() ?? new SchemaBuilder();
    await applyActions(builder, options.schemaBuilderActions, { executorName: name, signal });

    builder
        .addTypeInterceptor(new SchemaNameInterceptor(name))
        .addServices(services);

    const schema = builder.create();
    // A mismatch here means an interceptor rewrote the name after ours ran
    assertSchemaName(schema, name);
    return schema;
}

/** @throws {SchemaNameMismatchError} */
export function assertSchemaName(schema: Schema, expected: ExecutorName): void {
    if (schema.name !== expected) {
        throw new SchemaNameMismatchError(expected, schema.name);
    }
}
