/**
 * SchemaBuilder — Fluent Schema Definition
 *
 * Collects types, a name, a description and context data, then compiles
 * them into an immutable {@link Schema}. Setters are last-writer-wins:
 * registering the same type name twice keeps the second definition.
 *
 * @example
 * ```typescript
 * const schema = new SchemaBuilder()
 *     .setName('catalog')
 *     .addType('Product', z.object({ id: z.string(), price: z.number() }))
 *     .create();
 * ```
 *
 * @module
 */
import { type ZodTypeAny } from 'zod';
import { DEFAULT_EXECUTOR_NAME } from '../core/types.js';
import { EMPTY_SERVICES, type ServiceProvider } from '../services/ServiceProvider.js';
import { Schema } from './Schema.js';
import { type SchemaDefinition, type TypeInterceptor } from './TypeInterceptor.js';

export class SchemaBuilder {
    private _name: string | undefined;
    private _description: string | undefined;
    private readonly _types = new Map<string, ZodTypeAny>();
    private readonly _contextData = new Map<string, unknown>();
    private readonly _interceptors: TypeInterceptor[] = [];
    private _services: ServiceProvider = EMPTY_SERVICES;

    setName(name: string): this {
        this._name = name;
        return this;
    }

    setDescription(description: string): this {
        this._description = description;
        return this;
    }

    addType(name: string, type: ZodTypeAny): this {
        this._types.set(name, type);
        return this;
    }

    setContextData(key: string, value: unknown): this {
        this._contextData.set(key, value);
        return this;
    }

    addTypeInterceptor(interceptor: TypeInterceptor): this {
        this._interceptors.push(interceptor);
        return this;
    }

    /** Attach the service provider the compiled schema will expose. */
    addServices(services: ServiceProvider): this {
        this._services = services;
        return this;
    }

    /**
     * Copy this builder, so that a build can apply its actions without
     * touching a builder shared through the configuration.
     */
    clone(): SchemaBuilder {
        const copy = new SchemaBuilder();
        copy._name = this._name;
        copy._description = this._description;
        copy._services = this._services;
        for (const [name, type] of this._types) copy._types.set(name, type);
        for (const [key, value] of this._contextData) copy._contextData.set(key, value);
        copy._interceptors.push(...this._interceptors);
        return copy;
    }

    /** Run the completion phases and freeze the result. */
    create(): Schema {
        const definition: SchemaDefinition = {
            name: this._name,
            description: this._description,
            types: new Map(this._types),
            contextData: new Map(this._contextData),
        };

        for (const interceptor of this._interceptors) {
            interceptor.onBeforeCompleteName?.(definition);
        }

        // Unnamed schemas belong to the default executor
        definition.name = definition.name ?? DEFAULT_EXECUTOR_NAME;

        for (const interceptor of this._interceptors) {
            interceptor.onAfterCompleteName?.(definition);
        }

        return new Schema({
            name: definition.name ?? DEFAULT_EXECUTOR_NAME,
            description: definition.description,
            types: definition.types,
            contextData: definition.contextData,
            services: this._services,
        });
    }
}
