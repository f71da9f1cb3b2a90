/**
 * ExecutorOptions — Resolved Executor Configuration
 *
 * The options object every executor is built with. User input enters
 * through {@link createExecutorOptions}, which validates it with zod;
 * configuration actions then mutate a fresh copy during each build
 * (see {@link resolveExecutorOptions}).
 *
 * @module
 */
import { z } from 'zod';
import { InvalidExecutorOptionsError } from '../core/errors.js';
import { applyActions, type ActionContext, type ConfigureAction } from './ConfigureAction.js';

// ── Schema ───────────────────────────────────────────────

export const executorOptionsSchema = z.object({
    /** Milliseconds a request may run before the timeout middleware stops it */
    executionTimeoutMs: z.number().int().positive().default(30_000),
    /** Expose exception messages and stack traces in unexpected errors */
    includeExceptionDetails: z.boolean().default(false),
    /**
     * Number of prepared operations an operation executor may keep.
     * Not read by the registry; carried for the `OperationExecutor`
     * service, which finds it on `context.options`.
     */
    operationCacheSize: z.number().int().nonnegative().default(100),
}).strict();

/** Partial options accepted from callers; omitted fields take their defaults. */
export type ExecutorOptionsInput = z.input<typeof executorOptionsSchema>;

/**
 * Resolved options. Mutable on purpose: configuration actions receive
 * the instance and assign fields directly.
 */
export type ExecutorOptions = z.output<typeof executorOptionsSchema>;

// ── Factory ──────────────────────────────────────────────

/**
 * Create an options object from (validated) caller input.
 *
 * @example
 * ```typescript
 * createExecutorOptions({ executionTimeoutMs: 5_000 });
 * // → { executionTimeoutMs: 5000, includeExceptionDetails: false, operationCacheSize: 100 }
 * ```
 *
 * @throws {InvalidExecutorOptionsError} when the input does not match the schema
 */
export function createExecutorOptions(input: ExecutorOptionsInput = {}): ExecutorOptions {
    const parsed = executorOptionsSchema.safeParse(input);
    if (!parsed.success) {
        throw new InvalidExecutorOptionsError(parsed.error.issues);
    }
    return parsed.data;
}

// ── Assembly ─────────────────────────────────────────────

/**
 * Resolve the options of one build.
 *
 * Starts from a copy of `base` (never mutated, so repeated builds start
 * from the same state) or from the defaults, then applies `actions`
 * in order.
 */
export async function resolveExecutorOptions(
    base: ExecutorOptions | undefined,
    actions: readonly ConfigureAction<ExecutorOptions>[],
    context: ActionContext,
): Promise<ExecutorOptions> {
    const options: ExecutorOptions = base ? { ...base } : createExecutorOptions();
    return applyActions(options, actions, context);
}
