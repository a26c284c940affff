import { cleanModelOutput } from "../../core/llmFactory";
import { LLMTimeoutError } from "../../core/errors";
import { logger, errorMessage } from "../../core/logger";
import { DEFAULT_REGISTRY, DomainRegistry } from "./registry";
import { collectionIdentificationPrompt } from "./prompts";
import { CollectionListSchema } from "./schema";
import type { TextGenerator } from "./types";

export const AI_COLLECTION_LIMIT = 4;
export const DEFAULT_MAX_COLLECTIONS = 3;
export const RELATIONSHIP_MAX_COLLECTIONS = 5;
export const DEFAULT_AI_TIMEOUT_MS = 30_000;

export interface ResolverOptions {
    generateText?: TextGenerator;
    aiTimeoutMs?: number;
    maxCollections?: number;
    registry?: DomainRegistry;
}

export function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new LLMTimeoutError(timeoutMs)), timeoutMs);
    });
    return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

function tryParseJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch (e) {
        logger.debug(`Collection list is not valid JSON: ${errorMessage(e)}`);
        return undefined;
    }
}

function unique(names: string[]): string[] {
    return Array.from(new Set(names));
}

/**
 * Decodes the identification answer into known collection names. A JSON array is
 * preferred; when none can be decoded the raw text is scanned for literal names,
 * ordered by where they first appear.
 */
export function parseIdentifiedCollections(response: string, collections: string[]): string[] {
    const byLowerName = new Map(collections.map(name => [name.toLowerCase(), name]));
    const cleaned = cleanModelOutput(response);
    const arrayText = cleaned.match(/\[[\s\S]*?\]/)?.[0];
    const parsed = arrayText ? CollectionListSchema.safeParse(tryParseJson(arrayText)) : null;

    if (parsed?.success) {
        const known = parsed.data.flatMap(name => {
            const match = byLowerName.get(name.trim().toLowerCase());
            return match ? [match] : [];
        });
        return unique(known).slice(0, AI_COLLECTION_LIMIT);
    }

    const lowerText = response.toLowerCase();
    return collections
        .map(name => ({ name, index: lowerText.indexOf(name.toLowerCase()) }))
        .filter(entry => entry.index >= 0)
        .sort((a, b) => a.index - b.index)
        .map(entry => entry.name)
        .slice(0, AI_COLLECTION_LIMIT);
}

export async function identifyCollectionsWithAI(
    generateText: TextGenerator,
    userQuery: string,
    collections: string[],
    timeoutMs: number = DEFAULT_AI_TIMEOUT_MS
): Promise<string[]> {
    try {
        const prompt = collectionIdentificationPrompt(userQuery, collections);
        const response = await withTimeout(generateText(prompt, 100, 0.1), timeoutMs);
        const identified = parseIdentifiedCollections(response, collections);
        logger.info(`AI identified collections: ${JSON.stringify(identified)}`);
        return identified;
    } catch (e) {
        logger.warn(`AI collection identification failed, falling back to keyword matching: ${errorMessage(e)}`);
        return [];
    }
}

export function matchCollectionsByKeyword(userQuery: string, collections: string[], registry: DomainRegistry = DEFAULT_REGISTRY): string[] {
    const queryLower = userQuery.toLowerCase();
    return unique(collections.filter(collection => {
        if (queryLower.includes(collection.toLowerCase())) return true;
        const keywords = registry.collectionKeywords[collection] ?? [];
        return keywords.some(keyword => queryLower.includes(keyword));
    }));
}

export function addRelatedCollections(
    relevant: string[],
    collections: string[],
    userQuery: string,
    registry: DomainRegistry = DEFAULT_REGISTRY
): string[] {
    const queryLower = userQuery.toLowerCase();
    const updated = [...relevant];
    const add = (collection: string, reason: string) => {
        if (collections.includes(collection) && !updated.includes(collection)) {
            updated.push(collection);
            logger.info(`Added ${collection} collection due to ${reason}`);
        }
    };

    for (const junction of registry.relationships.junctions) {
        if (relevant.includes(junction.collection)) {
            junction.endpoints.forEach(endpoint => add(endpoint, `${junction.collection} relationship`));
        }
    }

    for (const organization of registry.relationships.organizations) {
        const mentioned = organization.terms.some(term => queryLower.includes(term));
        const member = organization.members.find(m => relevant.includes(m));
        if (mentioned && member) {
            add(organization.collection, `${member}-${organization.collection} relationship`);
        }
    }

    return updated;
}

export function collectionLimit(userQuery: string, options: Pick<ResolverOptions, "maxCollections" | "registry"> = {}): number {
    const registry = options.registry ?? DEFAULT_REGISTRY;
    const base = options.maxCollections ?? DEFAULT_MAX_COLLECTIONS;
    const queryLower = userQuery.toLowerCase();
    const isRelationshipQuery = registry.relationshipTerms.some(term => queryLower.includes(term));
    return isRelationshipQuery ? Math.max(base, RELATIONSHIP_MAX_COLLECTIONS) : base;
}

/**
 * Picks the collections pertinent to a question, most relevant first.
 * AI identification → keyword match → relationship expansion → priority defaults.
 */
export async function resolveRelevantCollections(
    userQuery: string,
    collections: string[],
    options: ResolverOptions = {}
): Promise<string[]> {
    const registry = options.registry ?? DEFAULT_REGISTRY;

    let relevant: string[] = [];
    if (options.generateText && collections.length > 0) {
        relevant = await identifyCollectionsWithAI(options.generateText, userQuery, collections, options.aiTimeoutMs);
    }

    if (relevant.length === 0) {
        relevant = matchCollectionsByKeyword(userQuery, collections, registry);
    }

    relevant = addRelatedCollections(relevant, collections, userQuery, registry);

    if (relevant.length === 0) {
        relevant = registry.priorityCollections.filter(c => collections.includes(c));
        logger.info("No specific collections detected, using priority collections");
    }

    return relevant.slice(0, collectionLimit(userQuery, options));
}

export function determineTargetCollection(
    userQuery: string,
    collections: string[],
    relevant: string[],
    registry: DomainRegistry = DEFAULT_REGISTRY
): string {
    if (relevant.length > 0) return relevant[0];

    const queryLower = userQuery.toLowerCase();
    for (const [collection, keywords] of Object.entries(registry.targetPriority)) {
        if (collections.includes(collection) && keywords.some(keyword => queryLower.includes(keyword))) {
            return collection;
        }
    }

    return collections[0] ?? registry.defaultTargetCollection;
}
