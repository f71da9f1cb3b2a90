/**
 * ErrorHandler — Error Filter Aggregation and Application
 *
 * Filters come from two places, in this order:
 *
 *   1. the executor's own `errorFilters` factories (per-name)
 *   2. every {@link ERROR_FILTER} registered in the service provider (ambient)
 *
 * The handler runs them in that order on every request-level error, so
 * per-name filters see an error before the global ones do.
 *
 * @module
 */
import { type ExecutionError } from '../core/types.js';
import { type ExecutorOptions } from '../config/ExecutorOptions.js';
import { createServiceToken, type ServiceProvider } from '../services/ServiceProvider.js';

// ── Contracts ────────────────────────────────────────────

export interface ErrorFilter {
    onError(error: ExecutionError): ExecutionError;
}

/** Builds a per-executor filter from the services and resolved options. */
export type ErrorFilterFactory = (services: ServiceProvider, options: ExecutorOptions) => ErrorFilter;

/** Token under which ambient error filters are registered. */
export const ERROR_FILTER = createServiceToken<ErrorFilter>('ErrorFilter');

export interface ErrorHandler {
    /** Pass one error through every filter, in order. */
    handle(error: ExecutionError): ExecutionError;
    /** Turn an exception caught in the pipeline into an execution error. */
    createUnexpectedError(exception: unknown): ExecutionError;
}

// ── Aggregation ──────────────────────────────────────────

/**
 * Collect the filters of one executor: factories first, then the
 * filters registered in `services`.
 */
export function collectErrorFilters(
    factories: readonly ErrorFilterFactory[],
    services: ServiceProvider,
    options: ExecutorOptions,
): ErrorFilter[] {
    const filters: ErrorFilter[] = [];
    for (const factory of factories) {
        filters.push(factory(services, options));
    }
    filters.push(...services.getServices(ERROR_FILTER));
    return filters;
}

// ── Default Handler ──────────────────────────────────────

export const UNEXPECTED_ERROR_MESSAGE = 'Unexpected Execution Error';

export class DefaultErrorHandler implements ErrorHandler {
    private readonly _filters: readonly ErrorFilter[];
    private readonly _includeExceptionDetails: boolean;

    constructor(filters: readonly ErrorFilter[], options: Pick<ExecutorOptions, 'includeExceptionDetails'>) {
        this._filters = Object.freeze([...filters]);
        this._includeExceptionDetails = options.includeExceptionDetails;
    }

    /** Number of filters applied to each error. */
    get filterCount(): number {
        return this._filters.length;
    }

    handle(error: ExecutionError): ExecutionError {
        let current = error;
        for (const filter of this._filters) {
            current = filter.onError(current);
        }
        return current;
    }

    createUnexpectedError(exception: unknown): ExecutionError {
        if (!this._includeExceptionDetails) {
            return { message: UNEXPECTED_ERROR_MESSAGE, code: 'UNEXPECTED_EXECUTION_ERROR', exception };
        }

        const message = exception instanceof Error ? exception.message : String(exception);
        const extensions: Record<string, unknown> = { message };
        if (exception instanceof Error && exception.stack) {
            extensions['stackTrace'] = exception.stack;
        }
        return { message: UNEXPECTED_ERROR_MESSAGE, code: 'UNEXPECTED_EXECUTION_ERROR', exception, extensions };
    }
}
