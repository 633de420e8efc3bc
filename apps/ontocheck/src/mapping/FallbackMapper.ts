/**
 * Mapper that retries with a second strategy when the similarity service
 * behind the first one fails. Other mapping errors (strict mode, empty
 * schema) are not retried.
 */

import {
    MappingError,
    type Column,
    type EngineLogger,
    type FieldMapper,
    type FieldMapping,
    type MappingOptions,
    type OntologySchema,
} from "@ontocheck/engine";

export class FallbackMapper implements FieldMapper {
    readonly id: FieldMapper["id"];

    private readonly primary: FieldMapper;
    private readonly fallback: FieldMapper;
    private readonly logger: EngineLogger;

    constructor(primary: FieldMapper, fallback: FieldMapper, logger: EngineLogger) {
        this.id = primary.id;
        this.primary = primary;
        this.fallback = fallback;
        this.logger = logger;
    }

    async map(
        columns: readonly Column[],
        schema: OntologySchema,
        options?: MappingOptions
    ): Promise<FieldMapping> {
        try {
            return await this.primary.map(columns, schema, options);
        }
        catch (error) {
            if (!(error instanceof MappingError) || error.reason !== "similarity-service") {
                throw error;
            }
            this.logger.warn("Similarity service failed, falling back", {
                fallback: this.fallback.id,
                error   : error.message,
            });
            return this.fallback.map(columns, schema, options);
        }
    }
}
