/**
 * Execution types: request context, delegates and middleware factories.
 *
 * @module
 */
import { type ExecutionRequest, type ExecutionResult, type ExecutorName } from '../core/types.js';
import { type ExecutorOptions } from '../config/ExecutorOptions.js';
import { type Schema } from '../schema/Schema.js';
import { type ServiceProvider } from '../services/ServiceProvider.js';
import { type Activator } from './Activator.js';
import { type ErrorHandler } from './ErrorHandler.js';

/**
 * Per-request state threaded through the pipeline.
 *
 * Middleware read the request and write the result; everything else is
 * fixed for the lifetime of the request.
 */
export interface RequestContext {
    readonly schema: Schema;
    readonly services: ServiceProvider;
    readonly request: ExecutionRequest;
    /** Resolved options of the executor running the request */
    readonly options: Readonly<ExecutorOptions>;
    readonly contextData: Map<string, unknown>;
    /** Fires when the caller cancels or a middleware calls `abort()` */
    readonly signal: AbortSignal;
    abort(reason?: unknown): void;
    result: ExecutionResult | undefined;
}

/** One step of a composed pipeline. */
export type RequestDelegate = (context: RequestContext) => Promise<void>;

/**
 * Shared, build-time context handed to every middleware factory of an
 * executor. Created once per pipeline composition.
 */
export interface MiddlewareFactoryContext {
    readonly executorName: ExecutorName;
    readonly services: ServiceProvider;
    readonly activator: Activator;
    readonly errorHandler: ErrorHandler;
    readonly options: ExecutorOptions;
}

/**
 * A middleware factory: receives the factory context and the remainder
 * of the pipeline, returns the handler that wraps it.
 *
 * @example
 * ```typescript
 * const timing: RequestMiddleware = (_factory, next) => async (context) => {
 *     const start = performance.now();
 *     await next(context);                       // remainder of the chain
 *     context.contextData.set('durationMs', performance.now() - start);
 * };
 * ```
 */
export type RequestMiddleware = (
    factoryContext: MiddlewareFactoryContext,
    next: RequestDelegate,
) => RequestDelegate;
