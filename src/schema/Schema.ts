/**
 * Schema — Immutable Compiled Schema
 *
 * Produced by {@link SchemaBuilder.create}. Holds the named types the
 * executor serves (as zod types), free-form context data, and the
 * service provider the schema was built with.
 *
 * @module
 */
import { type ZodTypeAny } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { type ServiceProvider } from '../services/ServiceProvider.js';

/** JSON Schema emitted by zod-to-json-schema for a single type */
export type JsonSchemaDefinition = ReturnType<typeof zodToJsonSchema>;

export interface SchemaDocument {
    readonly title: string;
    readonly description?: string;
    readonly definitions: Readonly<Record<string, JsonSchemaDefinition>>;
}

export interface SchemaInit {
    readonly name: string;
    readonly description?: string | undefined;
    readonly types: ReadonlyMap<string, ZodTypeAny>;
    readonly contextData: ReadonlyMap<string, unknown>;
    readonly services: ServiceProvider;
}

export class Schema {
    readonly name: string;
    readonly description: string | undefined;
    readonly services: ServiceProvider;
    private readonly _types: ReadonlyMap<string, ZodTypeAny>;
    private readonly _contextData: ReadonlyMap<string, unknown>;

    constructor(init: SchemaInit) {
        this.name = init.name;
        this.description = init.description;
        this.services = init.services;
        this._types = new Map(init.types);
        this._contextData = new Map(init.contextData);
        Object.freeze(this);
    }

    /** Names of the registered types, in registration order. */
    get typeNames(): readonly string[] {
        return [...this._types.keys()];
    }

    getType(name: string): ZodTypeAny | undefined {
        return this._types.get(name);
    }

    hasType(name: string): boolean {
        return this._types.has(name);
    }

    getContextData(key: string): unknown {
        return this._contextData.get(key);
    }

    /**
     * Render every type as a JSON Schema definition.
     *
     * ```json
     * { "title": "_Default", "definitions": { "User": { "type": "object", ... } } }
     * ```
     */
    toJsonSchema(): SchemaDocument {
        const definitions: Record<string, JsonSchemaDefinition> = {};
        for (const [typeName, type] of this._types) {
            definitions[typeName] = zodToJsonSchema(type, { target: 'jsonSchema7', $refStrategy: 'none' });
        }
        return this.description !== undefined
            ? { title: this.name, description: this.description, definitions }
            : { title: this.name, definitions };
    }
}
