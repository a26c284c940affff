import { logger, errorMessage } from "../../core/logger";
import { DATA_TYPE_MAPPING_GUIDE } from "./prompts";
import { ERROR_MESSAGES, formatMessage } from "./messages";
import type { SchemaFetcher } from "./types";

export const NO_SCHEMA_AVAILABLE = "No schema information available";

/**
 * Assembles the per-collection schema blocks handed to every prompt. Pure: the same
 * mapping always yields the same text, in the mapping's insertion order.
 */
export function buildSchemaContext(schemaByCollection: Record<string, string>): string {
    const entries = Object.entries(schemaByCollection);
    if (entries.length === 0) {
        return NO_SCHEMA_AVAILABLE;
    }

    return entries
        .map(([collection, schema]) => `Collection '${collection}':\n${schema}\n\n${DATA_TYPE_MAPPING_GUIDE}`)
        .join("\n\n");
}

export async function collectSchemaInfo(fetchSchema: SchemaFetcher, relevantCollections: string[]): Promise<Record<string, string>> {
    const schemaInfo: Record<string, string> = {};

    for (const collection of relevantCollections) {
        try {
            schemaInfo[collection] = await fetchSchema([collection]);
        } catch (e) {
            logger.warn(`Could not get schema for ${collection}: ${errorMessage(e)}`);
            schemaInfo[collection] = formatMessage(ERROR_MESSAGES.SCHEMA_UNAVAILABLE, { collection, error: errorMessage(e) });
        }
    }

    return schemaInfo;
}
