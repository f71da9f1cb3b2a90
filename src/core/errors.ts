/**
 * Errors — Typed Failure Taxonomy for the Executor Registry
 *
 * Every failure raised by this package (as opposed to a failure raised
 * by a user-supplied configuration action, which propagates unchanged)
 * is an {@link ExecutorRegistryError} carrying a machine-readable `code`.
 *
 * ```
 * ExecutorRegistryError
 *   ├── SchemaNameMismatchError      SCHEMA_NAME_MISMATCH
 *   ├── BuildCancelledError          BUILD_CANCELLED
 *   ├── RegistryDisposedError        REGISTRY_DISPOSED
 *   ├── InvalidExecutorNameError     INVALID_EXECUTOR_NAME
 *   └── InvalidExecutorOptionsError  INVALID_EXECUTOR_OPTIONS
 * ```
 *
 * @module
 */
import { type ZodIssue } from 'zod';

/**
 * Registry error codes.
 *
 * - `'SCHEMA_NAME_MISMATCH'`  — a supplied or built schema carries a different name
 * - `'BUILD_CANCELLED'`       — the caller's AbortSignal fired during a build
 * - `'REGISTRY_DISPOSED'`     — the registry was used after `dispose()`
 * - `'INVALID_EXECUTOR_NAME'` — the executor name is empty or not a string
 * - `'INVALID_EXECUTOR_OPTIONS'` — executor options input failed validation
 */
export type RegistryErrorCode =
    | 'SCHEMA_NAME_MISMATCH'
    | 'BUILD_CANCELLED'
    | 'REGISTRY_DISPOSED'
    | 'INVALID_EXECUTOR_NAME'
    | 'INVALID_EXECUTOR_OPTIONS'
    | (string & {}); // custom codes welcome — union preserves autocomplete

/**
 * Base class of all errors raised by the registry and its assemblers.
 */
export class ExecutorRegistryError extends Error {
    readonly code: RegistryErrorCode;

    constructor(code: RegistryErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ExecutorRegistryError';
        this.code = code;
    }
}

/**
 * A schema resolved for an executor does not carry the executor's name.
 *
 * Raised both for a pre-built schema with the wrong name and, as a
 * post-build check, when a builder produced a schema with another name.
 * Indicates a configuration bug, not a transient condition.
 */
export class SchemaNameMismatchError extends ExecutorRegistryError {
    readonly expected: string;
    readonly actual: string;

    constructor(expected: string, actual: string) {
        super(
            'SCHEMA_NAME_MISMATCH',
            `The schema name "${actual}" does not match the executor name "${expected}".`,
        );
        this.name = 'SchemaNameMismatchError';
        this.expected = expected;
        this.actual = actual;
    }
}

/**
 * A build was aborted through the caller's `AbortSignal`.
 *
 * Distinct from a real failure: the same name can simply be requested again.
 */
export class BuildCancelledError extends ExecutorRegistryError {
    readonly executorName: string;
    /** The `signal.reason` observed when the cancellation was detected */
    readonly reason: unknown;

    constructor(executorName: string, reason: unknown, options?: { cause?: unknown }) {
        super(
            'BUILD_CANCELLED',
            `The build of executor "${executorName}" was cancelled.`,
            options,
        );
        this.name = 'BuildCancelledError';
        this.executorName = executorName;
        this.reason = reason;
    }
}

/** The registry was used after `dispose()` was called. */
export class RegistryDisposedError extends ExecutorRegistryError {
    constructor(operation: string) {
        super(
            'REGISTRY_DISPOSED',
            `Cannot call ${operation}() on a disposed executor registry.`,
        );
        this.name = 'RegistryDisposedError';
    }
}

export class InvalidExecutorNameError extends ExecutorRegistryError {
    constructor(received: unknown) {
        super(
            'INVALID_EXECUTOR_NAME',
            `Executor names must be non-empty strings, received ${JSON.stringify(received)}.`,
        );
        this.name = 'InvalidExecutorNameError';
    }
}

/**
 * Executor options input was rejected by the options schema.
 *
 * Carries the zod issues for programmatic inspection.
 */
export class InvalidExecutorOptionsError extends ExecutorRegistryError {
    readonly issues: readonly ZodIssue[];

    constructor(issues: readonly ZodIssue[]) {
        const summary = issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        super('INVALID_EXECUTOR_OPTIONS', `Invalid executor options: ${summary}`);
        this.name = 'InvalidExecutorOptionsError';
        this.issues = issues;
    }
}

// ── Cancellation ─────────────────────────────────────────

/**
 * Throw a {@link BuildCancelledError} when `signal` has fired.
 *
 * Called at every suspension point of the build path.
 */
export function throwIfCancelled(signal: AbortSignal | undefined, executorName: string): void {
    if (signal?.aborted) {
        throw new BuildCancelledError(executorName, signal.reason);
    }
}
