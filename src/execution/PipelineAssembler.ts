/**
 * PipelineAssembler — Middleware Chain Composition
 *
 * Folds the middleware factories right-to-left around a no-op terminal
 * delegate, producing a single delegate that runs them left-to-right:
 *
 * ```
 *   [M1, M2, M3]  ──build──►  M1(M2(M3(terminal)))
 *
 *   call: M1-pre → M2-pre → M3-pre → terminal → M3-post → M2-post → M1-post
 * ```
 *
 * Pure-function module: no state, no side effects.
 *
 * @module
 */
import { type ExecutorName } from '../core/types.js';
import { type ExecutorOptions } from '../config/ExecutorOptions.js';
import { type ServiceProvider } from '../services/ServiceProvider.js';
import { type Activator } from './Activator.js';
import { DEFAULT_PIPELINE } from './DefaultPipeline.js';
import { type ErrorHandler } from './ErrorHandler.js';
import {
    type MiddlewareFactoryContext, type RequestDelegate, type RequestMiddleware,
} from './types.js';

export interface PipelineDependencies {
    readonly services: ServiceProvider;
    readonly activator: Activator;
    readonly errorHandler: ErrorHandler;
    readonly options: ExecutorOptions;
}

/** End of every chain: does nothing. */
const terminal: RequestDelegate = () => Promise.resolve();

/**
 * Compose `middleware` into one delegate.
 *
 * An empty list is replaced by {@link DEFAULT_PIPELINE}, so the pipeline
 * is never empty. Each factory is called exactly once, innermost first.
 */
export function composePipeline(
    executorName: ExecutorName,
    middleware: readonly RequestMiddleware[],
    dependencies: PipelineDependencies,
): RequestDelegate {
    const factories = middleware.length > 0 ? middleware : DEFAULT_PIPELINE;

    const factoryContext: MiddlewareFactoryContext = Object.freeze({
        executorName,
        services: dependencies.services,
        activator: dependencies.activator,
        errorHandler: dependencies.errorHandler,
        options: dependencies.options,
    });

    let next = terminal;
    for (let i = factories.length - 1; i >= 0; i--) {
        const factory = factories[i];
        if (!factory) continue;
        next = factory(factoryContext, next);
    }
    return next;
}
