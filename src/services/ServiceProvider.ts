/**
 * ServiceProvider — Typed Service Lookup
 *
 * The registry treats the service provider as an opaque capability: it
 * forwards it to schema builder actions, middleware factories and error
 * filter factories, and asks it for one thing only, the ambient
 * {@link ErrorFilter}s registered under a token.
 *
 * Tokens hold the bindings themselves (keyed by container), so that
 * lookups stay fully typed without a heterogeneous map.
 *
 * @example
 * ```typescript
 * const CLOCK = createServiceToken<() => number>('Clock');
 *
 * const services = new ServiceCollection()
 *     .add(CLOCK, () => Date.now());
 *
 * services.getService(CLOCK)?.();
 * ```
 *
 * @module
 */

// ── Tokens ───────────────────────────────────────────────

/**
 * Identifies a service of type `T`.
 *
 * Compared by identity; the description is only used in messages.
 */
export class ServiceToken<T> {
    readonly description: string;
    private readonly _bindings = new WeakMap<object, T[]>();

    constructor(description: string) {
        this.description = description;
    }

    /** @internal Append an instance for `owner`. */
    bind(owner: object, instance: T): void {
        const list = this._bindings.get(owner);
        if (list) {
            list.push(instance);
        } else {
            this._bindings.set(owner, [instance]);
        }
    }

    /** @internal All instances bound for `owner`, in registration order. */
    resolve(owner: object): readonly T[] {
        return this._bindings.get(owner) ?? [];
    }

    toString(): string {
        return `ServiceToken(${this.description})`;
    }
}

export function createServiceToken<T>(description: string): ServiceToken<T> {
    return new ServiceToken<T>(description);
}

// ── Provider Contract ────────────────────────────────────

export interface ServiceProvider {
    /** Last instance registered for `token`, if any. */
    getService<T>(token: ServiceToken<T>): T | undefined;
    /** Every instance registered for `token`, in registration order. */
    getServices<T>(token: ServiceToken<T>): readonly T[];
}

// ── In-Memory Implementation ─────────────────────────────

/**
 * Minimal in-process service provider.
 *
 * Multiple registrations under one token are kept, so that
 * `getServices()` can return them all (e.g. ambient error filters).
 */
export class ServiceCollection implements ServiceProvider {
    add<T>(token: ServiceToken<T>, instance: T): this {
        token.bind(this, instance);
        return this;
    }

    getService<T>(token: ServiceToken<T>): T | undefined {
        const instances = token.resolve(this);
        return instances[instances.length - 1];
    }

    getServices<T>(token: ServiceToken<T>): readonly T[] {
        return [...token.resolve(this)];
    }
}

/** A provider with no registrations, used when the caller supplies none. */
export const EMPTY_SERVICES: ServiceProvider = new ServiceCollection();
