/**
 * OpenAI embedding similarity
 *
 * Describes a column and an ontology property in plain text, embeds both
 * with the OpenAI embeddings API and scores them by cosine similarity.
 * Embeddings are cached per text for the lifetime of the service, so each
 * column and property is embedded once per run however many pairs it
 * appears in.
 */

import OpenAI from "openai";
import {
    cosineSimilarity,
    createConsoleLogger,
    type Column,
    type EngineLogger,
    type OntologyProperty,
    type SimilarityService,
} from "@ontocheck/engine";

/**
 * Configuration options for the OpenAI similarity service
 */
export interface OpenAISimilarityServiceConfig {
    /** OpenAI API key (defaults to OPENAI_API_KEY env var) */
    apiKey?: string;

    /** Embedding model (default: text-embedding-3-small) */
    model?: string;

    logger?: EngineLogger;
}

export const DEFAULT_EMBEDDING_MODEL = "text-embedding-3-small";

/**
 * Text embedded for a column: its name with separators spelled out, its
 * inferred type and its typical value pattern.
 */
export function describeColumn(column: Column): string {
    const words = column.name.replace(/[_\-.]+/g, " ").trim();
    let text = `Dataset column "${words}" of type ${column.type}.`;

    const pattern = column.features.categorical.pattern;
    if (pattern) {
        text += ` Typical value shape: ${pattern}.`;
    }
    return text;
}

/**
 * Text embedded for an ontology property.
 */
export function describeProperty(property: OntologyProperty): string {
    let text = `Ontology property "${property.name}" of type ${property.type}.`;

    if (property.description) {
        text += ` ${property.description}`;
    }
    if (property.aliases?.length) {
        text += ` Also known as: ${property.aliases.join(", ")}.`;
    }
    return text;
}

/**
 * OpenAI-backed SimilarityService implementation
 */
export class OpenAISimilarityService implements SimilarityService {
    readonly id = "openai-embeddings";

    private client: OpenAI;
    private model: string;
    private logger: EngineLogger;

    /** In-flight and settled embeddings by text; failed lookups are evicted */
    private cache = new Map<string, Promise<number[]>>();

    constructor(config: OpenAISimilarityServiceConfig = {}) {
        this.client = new OpenAI({
            apiKey: config.apiKey ?? process.env.OPENAI_API_KEY,
        });
        this.model = config.model ?? DEFAULT_EMBEDDING_MODEL;
        this.logger = config.logger ?? createConsoleLogger("OpenAISimilarity");
    }

    async score(column: Column, property: OntologyProperty): Promise<number> {
        const [left, right] = await Promise.all([
            this.embed(describeColumn(column)),
            this.embed(describeProperty(property)),
        ]);
        return cosineSimilarity(left, right);
    }

    /**
     * Number of distinct texts embedded or being embedded
     */
    get cacheSize(): number {
        return this.cache.size;
    }

    private embed(text: string): Promise<number[]> {
        const cached = this.cache.get(text);
        if (cached) {
            return cached;
        }

        const pending = this.requestEmbedding(text);
        this.cache.set(text, pending);
        pending.catch(() => {
            this.cache.delete(text);
        });
        return pending;
    }

    private async requestEmbedding(text: string): Promise<number[]> {
        this.logger.debug("Requesting embedding", { model: this.model, length: text.length });

        const response = await this.client.embeddings.create({
            model: this.model,
            input: text,
        });

        const embedding = response.data[0]?.embedding;
        if (!embedding || embedding.length === 0) {
            throw new Error("No embedding returned by OpenAI");
        }
        return embedding;
    }
}
