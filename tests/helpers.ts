/**
 * Shared test helpers.
 */
import { SchemaBuilder } from '../src/schema/SchemaBuilder.js';
import { type Schema } from '../src/schema/Schema.js';
import { EMPTY_SERVICES, type ServiceProvider } from '../src/services/ServiceProvider.js';
import { createExecutorOptions } from '../src/config/ExecutorOptions.js';
import { type ExecutionRequest } from '../src/core/types.js';
import { type RequestContext } from '../src/execution/types.js';

export interface Deferred<T> {
    readonly promise: Promise<T>;
    resolve(value: T): void;
    reject(reason: unknown): void;
}

export function deferred<T = void>(): Deferred<T> {
    let resolve: (value: T) => void = () => undefined;
    let reject: (reason: unknown) => void = () => undefined;
    const promise = new Promise<T>((res, rej) => { resolve = res; reject = rej; });
    return { promise, resolve, reject };
}

export const tick = (ms = 0): Promise<void> => new Promise(r => setTimeout(r, ms));

export function createRequestContext(
    request: ExecutionRequest = { query: '{ ping }' },
    options: { schema?: Schema; services?: ServiceProvider } = {},
): RequestContext {
    const controller = new AbortController();
    return {
        schema: options.schema ?? new SchemaBuilder().create(),
        services: options.services ?? EMPTY_SERVICES,
        request,
        options: createExecutorOptions(),
        contextData: new Map(),
        signal: controller.signal,
        abort: (reason?: unknown) => controller.abort(reason),
        result: undefined,
    };
}
