/**
 * RequestExecutor — The Cached Unit
 *
 * Bundles everything an executor name resolves to: the schema, the
 * resolved options, the error handler, the activator, the diagnostics
 * sink and the composed pipeline. Frozen after construction, so callers
 * that still hold a reference after eviction keep working safely.
 *
 * @module
 */
import {
    type ExecutionRequest, type ExecutionResult, type ExecutorName,
} from '../core/types.js';
import { type ExecutorOptions } from '../config/ExecutorOptions.js';
import { type DiagnosticObserverFn, emitDiagnostic } from '../observability/DiagnosticObserver.js';
import { type Schema } from '../schema/Schema.js';
import { type ServiceProvider } from '../services/ServiceProvider.js';
import { type Activator } from './Activator.js';
import { type ErrorHandler } from './ErrorHandler.js';
import { type RequestContext, type RequestDelegate } from './types.js';

export interface RequestExecutorInit {
    readonly schema: Schema;
    readonly services: ServiceProvider;
    readonly options: ExecutorOptions;
    readonly errorHandler: ErrorHandler;
    readonly activator: Activator;
    readonly diagnostics: DiagnosticObserverFn | undefined;
    readonly pipeline: RequestDelegate;
}

export const NO_RESULT_ERROR_CODE = 'NO_RESULT';

export class RequestExecutor {
    readonly schema: Schema;
    readonly services: ServiceProvider;
    readonly options: Readonly<ExecutorOptions>;
    readonly errorHandler: ErrorHandler;
    readonly activator: Activator;
    readonly diagnostics: DiagnosticObserverFn | undefined;
    private readonly _pipeline: RequestDelegate;

    constructor(init: RequestExecutorInit) {
        this.schema = init.schema;
        this.services = init.services;
        this.options = Object.freeze({ ...init.options });
        this.errorHandler = init.errorHandler;
        this.activator = init.activator;
        this.diagnostics = init.diagnostics;
        this._pipeline = init.pipeline;
        Object.freeze(this);
    }

    get name(): ExecutorName {
        return this.schema.name;
    }

    /**
     * Run one request through the pipeline.
     *
     * A pipeline that finishes without storing a result yields a single
     * `NO_RESULT` error. Exceptions are not caught here: the default
     * pipeline's exception middleware handles them, custom pipelines
     * decide for themselves.
     *
     * @param request - The request to execute
     * @param signal - Optional AbortSignal linked to the request context
     */
    async execute(request: ExecutionRequest, signal?: AbortSignal): Promise<ExecutionResult> {
        const start = performance.now();
        const { context, unlink } = this._createContext(request, signal);
        try {
            await this._pipeline(context);
        } finally {
            unlink();
        }

        const result: ExecutionResult = context.result ?? {
            errors: [this.errorHandler.handle({
                message: 'The request pipeline completed without producing a result.',
                code: NO_RESULT_ERROR_CODE,
            })],
        };

        emitDiagnostic(this.diagnostics, {
            type: 'request.executed',
            name: this.name,
            durationMs: performance.now() - start,
            isError: (result.errors?.length ?? 0) > 0,
            timestamp: Date.now(),
        });
        return result;
    }

    /**
     * Build the request context. Its controller follows the caller's
     * signal until `unlink()` detaches it.
     */
    private _createContext(
        request: ExecutionRequest,
        signal: AbortSignal | undefined,
    ): { context: RequestContext; unlink: () => void } {
        const controller = new AbortController();
        let unlink = (): void => undefined;

        if (signal) {
            if (signal.aborted) {
                controller.abort(signal.reason);
            } else {
                const onAbort = (): void => controller.abort(signal.reason);
                signal.addEventListener('abort', onAbort, { once: true });
                unlink = () => signal.removeEventListener('abort', onAbort);
            }
        }

        const context: RequestContext = {
            schema: this.schema,
            services: this.services,
            request,
            options: this.options,
            contextData: new Map(Object.entries(request.contextData ?? {})),
            signal: controller.signal,
            abort: (reason?: unknown) => controller.abort(reason),
            result: undefined,
        };
        return { context, unlink };
    }
}
