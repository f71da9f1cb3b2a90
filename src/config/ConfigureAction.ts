/**
 * ConfigureAction — Ordered Sync/Async Configuration Steps
 *
 * Configuration and schema-builder actions come in three shapes:
 * a synchronous mutation, an asynchronous one, or both. They are modeled
 * as a tagged variant and applied through a single `applyActions()` loop
 * so that ordering holds regardless of the shape of each action:
 *
 * ```
 *   for each action (list order):
 *     ├─ cancelled? ──► BuildCancelledError
 *     ├─ sync part   (if any)
 *     ├─ async part  (if any, awaited)
 *     └─ cancelled? ──► BuildCancelledError
 * ```
 *
 * Last writer wins: later actions may overwrite what earlier ones set.
 *
 * @module
 */
import { throwIfCancelled } from '../core/errors.js';
import { type ExecutorName } from '../core/types.js';

// ── Action Variants ──────────────────────────────────────

export type SyncConfigure<T> = (target: T) => void;

export type AsyncConfigure<T> = (target: T, signal: AbortSignal) => Promise<void>;

export interface SyncAction<T> {
    readonly kind: 'sync';
    readonly configure: SyncConfigure<T>;
}

export interface AsyncAction<T> {
    readonly kind: 'async';
    readonly configureAsync: AsyncConfigure<T>;
}

/** Runs `configure` first, then awaits `configureAsync`. */
export interface CompositeAction<T> {
    readonly kind: 'both';
    readonly configure: SyncConfigure<T>;
    readonly configureAsync: AsyncConfigure<T>;
}

export type ConfigureAction<T> = SyncAction<T> | AsyncAction<T> | CompositeAction<T>;

export function syncAction<T>(configure: SyncConfigure<T>): SyncAction<T> {
    return { kind: 'sync', configure };
}

export function asyncAction<T>(configureAsync: AsyncConfigure<T>): AsyncAction<T> {
    return { kind: 'async', configureAsync };
}

export function compositeAction<T>(
    configure: SyncConfigure<T>,
    configureAsync: AsyncConfigure<T>,
): CompositeAction<T> {
    return { kind: 'both', configure, configureAsync };
}

// ── Application ──────────────────────────────────────────

export interface ActionContext {
    /** Executor being built; used to label cancellation errors */
    readonly executorName: ExecutorName;
    readonly signal?: AbortSignal;
}

/** Signal handed to async actions when the caller passed none. */
const NEVER_ABORTED: AbortSignal = new AbortController().signal;

/**
 * Apply `actions` to `target` in list order.
 *
 * Each action fully completes, including its async part, before the next
 * one starts. A failing action aborts the sequence; its error propagates
 * unchanged.
 *
 * @returns `target`, after every action was applied
 * @throws {BuildCancelledError} when `context.signal` fires between steps
 */
export async function applyActions<T>(
    target: T,
    actions: readonly ConfigureAction<T>[],
    context: ActionContext,
): Promise<T> {
    const signal = context.signal ?? NEVER_ABORTED;

    for (const action of actions) {
        throwIfCancelled(signal, context.executorName);

        switch (action.kind) {
            case 'sync':
                action.configure(target);
                break;

            case 'async':
                await action.configureAsync(target, signal);
                break;

            case 'both':
                action.configure(target);
                await action.configureAsync(target, signal);
                break;
        }

        throwIfCancelled(signal, context.executorName);
    }

    return target;
}
