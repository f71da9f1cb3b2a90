/**
 * Activator — Service-Aware Instance Creation for Middleware
 *
 * Middleware factories use the activator to obtain collaborators: a
 * registered service when there is one, or an instance created from the
 * provider otherwise.
 *
 * @module
 */
import { type ServiceProvider, type ServiceToken } from '../services/ServiceProvider.js';

export interface Activator {
    /** Registered service for `token`, if any. */
    resolve<T>(token: ServiceToken<T>): T | undefined;
    /** Registered service for `token`, or the result of `create(services)`. */
    getOrCreate<T>(token: ServiceToken<T>, create: (services: ServiceProvider) => T): T;
    /** A new instance built from the provider. */
    createInstance<T>(create: (services: ServiceProvider) => T): T;
}

export class DefaultActivator implements Activator {
    private readonly _services: ServiceProvider;

    constructor(services: ServiceProvider) {
        this._services = services;
    }

    resolve<T>(token: ServiceToken<T>): T | undefined {
        return this._services.getService(token);
    }

    getOrCreate<T>(token: ServiceToken<T>, create: (services: ServiceProvider) => T): T {
        return this._services.getService(token) ?? create(this._services);
    }

    createInstance<T>(create: (services: ServiceProvider) => T): T {
        return create(this._services);
    }
}
