/**
 * Executor Registry — Root Barrel Export
 *
 * Public API entry point. Aggregates all modules into a single flat
 * namespace for consumers.
 *
 * Architecture:
 *   src/
 *   ├── core/          ← Names, request types, errors
 *   ├── config/        ← Configure actions, executor options, factory options store
 *   ├── schema/        ← Schema, builder, interceptors, schema assembly
 *   ├── execution/     ← Pipeline assembly, default pipeline, error handling, executor
 *   ├── registry/      ← Executor registry, build lock
 *   ├── services/      ← Typed service provider
 *   └── observability/ ← Diagnostic observer, tracing
 */

// ── Core ─────────────────────────────────────────────────
/** @category Core */
export {
    DEFAULT_EXECUTOR_NAME, resolveExecutorName,
} from './core/types.js';
export type {
    ExecutorName, ExecutionRequest, ExecutionError, ExecutionResult,
} from './core/types.js';
/** @category Errors */
export {
    ExecutorRegistryError, SchemaNameMismatchError, BuildCancelledError,
    RegistryDisposedError, InvalidExecutorNameError, InvalidExecutorOptionsError,
    throwIfCancelled,
} from './core/errors.js';
export type { RegistryErrorCode } from './core/errors.js';

// ── Configuration ────────────────────────────────────────
/** @category Configuration */
export {
    applyActions, syncAction, asyncAction, compositeAction,
} from './config/ConfigureAction.js';
export type {
    ConfigureAction, SyncAction, AsyncAction, CompositeAction,
    SyncConfigure, AsyncConfigure, ActionContext,
} from './config/ConfigureAction.js';
/** @category Configuration */
export {
    executorOptionsSchema, createExecutorOptions, resolveExecutorOptions,
} from './config/ExecutorOptions.js';
export type { ExecutorOptions, ExecutorOptionsInput } from './config/ExecutorOptions.js';
/** @category Configuration */
export { emptyFactoryOptions } from './config/FactoryOptions.js';
export type { FactoryOptions, FactoryOptionsMonitor } from './config/FactoryOptions.js';
/** @category Configuration */
export { FactoryOptionsStore } from './config/FactoryOptionsStore.js';
export type { MutableFactoryOptions } from './config/FactoryOptionsStore.js';
/** @category Configuration */
export { ExecutorBuilder } from './config/ExecutorBuilder.js';

// ── Schema ───────────────────────────────────────────────
/** @category Schema */
export { Schema } from './schema/Schema.js';
export type { SchemaInit, SchemaDocument, JsonSchemaDefinition } from './schema/Schema.js';
/** @category Schema */
export { SchemaBuilder } from './schema/SchemaBuilder.js';
/** @category Schema */
export { SchemaNameInterceptor } from './schema/TypeInterceptor.js';
export type { TypeInterceptor, SchemaDefinition } from './schema/TypeInterceptor.js';
/** @category Schema */
export { resolveSchema, assertSchemaName } from './schema/SchemaAssembler.js';

// ── Execution ────────────────────────────────────────────
/** @category Execution */
export { composePipeline } from './execution/PipelineAssembler.js';
export type { PipelineDependencies } from './execution/PipelineAssembler.js';
/** @category Execution */
export {
    DEFAULT_PIPELINE, OPERATION_EXECUTOR, TIMEOUT_ERROR_CODE,
    exceptionMiddleware, timeoutMiddleware, operationExecutionMiddleware,
} from './execution/DefaultPipeline.js';
export type { OperationExecutor } from './execution/DefaultPipeline.js';
/** @category Execution */
export {
    ERROR_FILTER, UNEXPECTED_ERROR_MESSAGE, collectErrorFilters, DefaultErrorHandler,
} from './execution/ErrorHandler.js';
export type { ErrorFilter, ErrorFilterFactory, ErrorHandler } from './execution/ErrorHandler.js';
/** @category Execution */
export { DefaultActivator } from './execution/Activator.js';
export type { Activator } from './execution/Activator.js';
/** @category Execution */
export { RequestExecutor, NO_RESULT_ERROR_CODE } from './execution/RequestExecutor.js';
export type { RequestExecutorInit } from './execution/RequestExecutor.js';
export type {
    RequestContext, RequestDelegate, RequestMiddleware, MiddlewareFactoryContext,
} from './execution/types.js';

// ── Registry ─────────────────────────────────────────────
/** @category Registry */
export { ExecutorRegistry } from './registry/ExecutorRegistry.js';
export type {
    ExecutorRegistryOptions, ExecutorLifecycleEvent, ExecutorLifecycleListener,
} from './registry/ExecutorRegistry.js';
/** @category Registry */
export { BuildLock } from './registry/BuildLock.js';
export type { LockScope } from './registry/BuildLock.js';

// ── Services ─────────────────────────────────────────────
/** @category Services */
export {
    ServiceToken, ServiceCollection, createServiceToken, EMPTY_SERVICES,
} from './services/ServiceProvider.js';
export type { ServiceProvider } from './services/ServiceProvider.js';

// ── Observability ────────────────────────────────────────
/** @category Observability */
export {
    createDiagnosticObserver, emitDiagnostic, LOG_PREFIX,
} from './observability/DiagnosticObserver.js';
export type {
    DiagnosticEvent, DiagnosticObserverFn,
    ExecutorCreatedEvent, ExecutorEvictedEvent, BuildFailedEvent, RequestExecutedEvent,
} from './observability/DiagnosticObserver.js';
/** @category Observability */
export { SpanStatusCode } from './observability/Tracing.js';
export type { RegistryTracer, TraceSpan, TraceAttributeValue } from './observability/Tracing.js';
