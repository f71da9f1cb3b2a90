/**
 * DefaultPipeline — Baseline Middleware
 *
 * Substituted by the pipeline assembler when an executor is configured
 * without any middleware. Outermost first:
 *
 * ```
 *   exceptionMiddleware          thrown error ──► unexpected execution error
 *     └─ timeoutMiddleware       executionTimeoutMs elapsed ──► EXECUTION_TIMEOUT
 *          └─ operationExecutionMiddleware   OPERATION_EXECUTOR.execute(context)
 * ```
 *
 * @module
 */
import { type ExecutionResult } from '../core/types.js';
import { createServiceToken } from '../services/ServiceProvider.js';
import { type RequestContext, type RequestMiddleware } from './types.js';

// ── Operation Executor Contract ──────────────────────────

/**
 * The query execution machinery: parses, validates and executes the
 * request held by the context. Supplied through the service provider.
 */
export interface OperationExecutor {
    execute(context: RequestContext): Promise<ExecutionResult>;
}

export const OPERATION_EXECUTOR = createServiceToken<OperationExecutor>('OperationExecutor');

// ── Middleware ───────────────────────────────────────────

/**
 * Catches anything thrown by the rest of the chain and stores a result
 * with one unexpected execution error, passed through the error handler.
 */
export const exceptionMiddleware: RequestMiddleware = ({ errorHandler }, next) =>
    async (context) => {
        try {
            await next(context);
        } catch (err) {
            context.result = {
                errors: [errorHandler.handle(errorHandler.createUnexpectedError(err))],
            };
        }
    };

export const TIMEOUT_ERROR_CODE = 'EXECUTION_TIMEOUT';

/**
 * Stops waiting for the rest of the chain after `executionTimeoutMs`,
 * aborts the request context and stores a timeout error.
 */
export const timeoutMiddleware: RequestMiddleware = ({ errorHandler, options }, next) =>
    async (context) => {
        let timer: ReturnType<typeof setTimeout> | undefined;
        const timedOut = new Promise<'timeout'>(resolve => {
            timer = setTimeout(() => resolve('timeout'), options.executionTimeoutMs);
        });

        try {
            const outcome = await Promise.race([
                next(context).then(() => 'completed' as const),
                timedOut,
            ]);

            if (outcome === 'timeout') {
                context.abort(new Error(`Request exceeded ${options.executionTimeoutMs}ms.`));
                context.result = {
                    errors: [errorHandler.handle({
                        message: `The request exceeded the configured timeout of ${options.executionTimeoutMs}ms.`,
                        code: TIMEOUT_ERROR_CODE,
                    })],
                };
            }
        } finally {
            clearTimeout(timer);
        }
    };

/**
 * Terminal-side middleware: hands the request to the registered
 * {@link OperationExecutor} and stores its result.
 */
export const operationExecutionMiddleware: RequestMiddleware = ({ activator, executorName }, next) => {
    const operationExecutor = activator.resolve(OPERATION_EXECUTOR);

    return async (context) => {
        if (!operationExecutor) {
            throw new Error(`No OperationExecutor is registered for executor "${executorName}".`);
        }
        const result = await operationExecutor.execute(context);
        // An aborted request already carries the result of whoever aborted it
        if (!context.signal.aborted) {
            context.result = result;
        }
        await next(context);
    };
};

export const DEFAULT_PIPELINE: readonly RequestMiddleware[] = Object.freeze([
    exceptionMiddleware,
    timeoutMiddleware,
    operationExecutionMiddleware,
]);
