import * as fs from "fs";
import { z } from "zod";
import defaultRegistry from "./registry/collections.json";

const KeywordMap = z.record(z.string(), z.array(z.string()));

export const DomainRegistrySchema = z.object({
    defaultTargetCollection: z.string().min(1),
    systemCollectionPrefixes: z.array(z.string()),
    collectionKeywords: KeywordMap,
    targetPriority: KeywordMap,
    priorityCollections: z.array(z.string()),
    relationships: z.object({
        junctions: z.array(z.object({
            collection: z.string(),
            endpoints: z.array(z.string()),
        })),
        organizations: z.array(z.object({
            collection: z.string(),
            terms: z.array(z.string()),
            members: z.array(z.string()),
        })),
    }),
    relationshipTerms: z.array(z.string()),
    dateFields: z.array(z.string()),
    intentKeywords: z.object({
        count: z.array(z.string()),
        first: z.array(z.string()),
        last: z.array(z.string()),
    }),
    writeKeywords: z.array(z.string()),
});

export type DomainRegistry = z.infer<typeof DomainRegistrySchema>;

export const DEFAULT_REGISTRY: DomainRegistry = DomainRegistrySchema.parse(defaultRegistry);

/**
 * Loads a registry describing another database's collections. Without a path the
 * bundled school-database registry is used.
 */
export function loadDomainRegistry(filePath?: string): DomainRegistry {
    if (!filePath) return DEFAULT_REGISTRY;
    const content = fs.readFileSync(filePath, "utf-8");
    return DomainRegistrySchema.parse(JSON.parse(content));
}

export function isSystemCollection(name: string, registry: DomainRegistry = DEFAULT_REGISTRY): boolean {
    return registry.systemCollectionPrefixes.some(prefix => name.startsWith(prefix));
}
