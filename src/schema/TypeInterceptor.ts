/**
 * TypeInterceptor — Hooks into Schema Completion
 *
 * Interceptors observe and rewrite the mutable schema definition while
 * {@link SchemaBuilder.create} runs its completion phases:
 *
 *   collect → beforeCompleteName → completeName → afterCompleteName → freeze
 *
 * @module
 */
import { type ZodTypeAny } from 'zod';

/** Mutable view of the schema while it is being completed. */
export interface SchemaDefinition {
    name: string | undefined;
    description: string | undefined;
    readonly types: Map<string, ZodTypeAny>;
    readonly contextData: Map<string, unknown>;
}

export interface TypeInterceptor {
    onBeforeCompleteName?(definition: SchemaDefinition): void;
    onAfterCompleteName?(definition: SchemaDefinition): void;
}

/**
 * Forces the schema name during name completion.
 *
 * Added by the schema assembler so that a built schema always carries
 * the name of the executor it is built for, whatever the builder
 * actions did.
 */
export class SchemaNameInterceptor implements TypeInterceptor {
    private readonly _schemaName: string;

    constructor(schemaName: string) {
        this._schemaName = schemaName;
    }

    onBeforeCompleteName(definition: SchemaDefinition): void {
        definition.name = this._schemaName;
    }
}
