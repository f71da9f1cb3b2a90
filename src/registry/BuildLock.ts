/**
 * BuildLock — Async Mutex for the Executor Build Path
 *
 * Serializes executor builds with promise chaining: each caller appends
 * a gate to the tail of a chain and waits for the previous gate to open
 * before running its build.
 *
 * Architecture:
 *   ┌─────────────────────────────────────────────────────┐
 *   │  getOrCreate('a') ──► serialize('a') ──► build      │
 *   │  getOrCreate('b') ──► queue behind 'a' (global)     │
 *   │                   └─► runs in parallel   (name)     │
 *   └─────────────────────────────────────────────────────┘
 *
 * Scopes:
 *   - `'global'` (default): one chain for every name. Builds never
 *     overlap, whatever their names.
 *   - `'name'`: one chain per name. At most one build per name; builds
 *     for different names may overlap.
 *
 * Properties:
 *   - Strict FIFO per chain
 *   - Cooperative with AbortSignal: a waiter rejects as soon as its
 *     signal fires, without breaking the chain for those behind it
 *   - Completed chains are pruned from the map
 *
 * @module
 * @internal
 */
import { BuildCancelledError } from '../core/errors.js';

export type LockScope = 'global' | 'name';

const GLOBAL_CHAIN = '*';

interface Gate {
    readonly promise: Promise<void>;
    readonly open: () => void;
}

function createGate(): Gate {
    let open: () => void = () => undefined;
    const promise = new Promise<void>(resolve => { open = resolve; });
    return { promise, open };
}

/**
 * Wait for `prev`, or reject when `signal` fires first.
 */
function waitForTurn(prev: Promise<void>, signal: AbortSignal | undefined, name: string): Promise<void> {
    if (!signal) return prev;

    return new Promise<void>((resolve, reject) => {
        if (signal.aborted) {
            reject(new BuildCancelledError(name, signal.reason));
            return;
        }

        const onAbort = (): void => {
            reject(new BuildCancelledError(name, signal.reason));
        };
        signal.addEventListener('abort', onAbort, { once: true });

        void prev.then(() => {
            signal.removeEventListener('abort', onAbort);
            resolve();
        });
    });
}

export class BuildLock {
    private readonly _scope: LockScope;
    /** Tail of each serialization chain, keyed by chain id */
    private readonly _chains = new Map<string, Promise<void>>();
    private _holders = 0;

    constructor(scope: LockScope = 'global') {
        this._scope = scope;
    }

    get scope(): LockScope {
        return this._scope;
    }

    /**
     * Run `fn` once every earlier caller on the same chain has finished.
     *
     * @param name - Executor name (selects the chain under `'name'` scope)
     * @param fn - The build step to serialize
     * @param signal - Optional AbortSignal for cancellation while waiting
     * @returns The result of `fn()`
     * @throws {BuildCancelledError} if the signal fires while waiting
     */
    async serialize<T>(name: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
        const key = this._scope === 'global' ? GLOBAL_CHAIN : name;
        const prev = this._chains.get(key) ?? Promise.resolve();

        const gate = createGate();
        this._chains.set(key, gate.promise);

        try {
            await waitForTurn(prev, signal, name);
        } catch (err) {
            // Keep the chain intact: our gate opens once the previous holder is done
            void prev.then(() => this._release(key, gate));
            throw err;
        }

        this._holders++;
        try {
            return await fn();
        } finally {
            this._holders--;
            this._release(key, gate);
        }
    }

    /**
     * Resolve once every chain that exists right now has drained.
     */
    async drain(): Promise<void> {
        await Promise.all([...this._chains.values()]);
    }

    /** Number of callers currently inside `fn()`. Should never exceed 1 under `'global'`. */
    get holders(): number {
        return this._holders;
    }

    /** Number of chains with queued or running callers. 0 when idle. */
    get activeChains(): number {
        return this._chains.size;
    }

    private _release(key: string, gate: Gate): void {
        gate.open();
        if (this._chains.get(key) === gate.promise) {
            this._chains.delete(key);
        }
    }
}
