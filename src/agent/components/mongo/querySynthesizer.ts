import { cleanModelOutput } from "../../core/llmFactory";
import { logger, errorMessage } from "../../core/logger";
import { DEFAULT_REGISTRY, DomainRegistry } from "./registry";
import { mqlGenerationPrompt } from "./prompts";
import { ERROR_MESSAGES, formatMessage } from "./messages";
import type { TextGenerator } from "./types";

export const MQL_MAX_TOKENS = 1000;
export const MQL_TEMPERATURE = 0.1;

export interface PermissionDecision {
    allowed: boolean;
    message: string;
    keyword?: string;
}

/**
 * Read-only gate on the raw question: any write-intent keyword, anywhere, denies it.
 */
export function checkQueryPermissions(userQuery: string, registry: DomainRegistry = DEFAULT_REGISTRY): PermissionDecision {
    const queryLower = userQuery.toLowerCase();
    const keyword = registry.writeKeywords.find(k => queryLower.includes(k));
    if (keyword) {
        return { allowed: false, message: ERROR_MESSAGES.WRITE_OPERATION_DENIED, keyword };
    }
    return { allowed: true, message: "" };
}

export function countAllQuery(targetCollection: string): string {
    return `db.${targetCollection}.aggregate([{"$count": "total"}])`;
}

export async function synthesizeQuery(
    generateText: TextGenerator,
    userQuery: string,
    schemaContext: string,
    targetCollection: string
): Promise<string> {
    const prompt = mqlGenerationPrompt(targetCollection, schemaContext, userQuery);

    try {
        const response = await generateText(prompt, MQL_MAX_TOKENS, MQL_TEMPERATURE);
        logger.debug(`Raw MQL response: ${response}`);
        const query = cleanModelOutput(response);
        if (!query) {
            throw new Error("Model returned an empty query");
        }
        return query;
    } catch (e) {
        logger.error(formatMessage(ERROR_MESSAGES.MQL_GENERATION_ERROR, { error: errorMessage(e) }));
        return countAllQuery(targetCollection);
    }
}
