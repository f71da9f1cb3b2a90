/**
 * Core types shared by the registry, the assemblers and the executor.
 *
 * @module
 */
import { z } from 'zod';
import { InvalidExecutorNameError } from './errors.js';

// ── Executor Names ───────────────────────────────────────

/** Cache key of an executor. Compared by exact string equality. */
export type ExecutorName = string;

/** Name used when a caller does not specify one. */
export const DEFAULT_EXECUTOR_NAME: ExecutorName = '_Default';

const executorNameSchema = z.string().min(1);

/**
 * Normalize an optional executor name.
 *
 * `undefined` maps to {@link DEFAULT_EXECUTOR_NAME}; anything that is not
 * a non-empty string is rejected.
 *
 * @throws {InvalidExecutorNameError}
 */
export function resolveExecutorName(name?: string): ExecutorName {
    if (name === undefined) return DEFAULT_EXECUTOR_NAME;
    const parsed = executorNameSchema.safeParse(name);
    if (!parsed.success) {
        throw new InvalidExecutorNameError(name);
    }
    return parsed.data;
}

// ── Requests ─────────────────────────────────────────────

/** A request handed to an executor by the transport layer. */
export interface ExecutionRequest {
    readonly query: string;
    readonly operationName?: string;
    readonly variables?: Readonly<Record<string, unknown>>;
    /** Caller-provided values copied into the request context */
    readonly contextData?: Readonly<Record<string, unknown>>;
}

/**
 * A request-level error.
 *
 * Produced by middleware and the operation executor, then passed through
 * the executor's error handler (and its filters) before it is returned.
 */
export interface ExecutionError {
    readonly message: string;
    readonly code?: string;
    readonly path?: readonly (string | number)[];
    readonly extensions?: Readonly<Record<string, unknown>>;
    /** The exception that caused this error, never serialized */
    readonly exception?: unknown;
}

export interface ExecutionResult {
    readonly data?: unknown;
    readonly errors?: readonly ExecutionError[];
    readonly extensions?: Readonly<Record<string, unknown>>;
}
