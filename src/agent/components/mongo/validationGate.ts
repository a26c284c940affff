import { cleanModelOutput } from "../../core/llmFactory";
import { logger, errorMessage } from "../../core/logger";
import { queryAnalysisPrompt, queryCheckPrompt } from "./prompts";
import { QueryAnalysis, QueryAnalysisSchema } from "./schema";
import type { TextGenerator } from "./types";

/**
 * Fails open: any error means "no check needed" so a possibly imperfect query still runs.
 */
export async function needsValidation(
    generateText: TextGenerator,
    query: string,
    userQuery: string,
    schemaContext: string
): Promise<boolean> {
    try {
        const answer = await generateText(queryCheckPrompt(query, userQuery, schemaContext), 10, 0.1);
        return cleanModelOutput(answer).toUpperCase().replace(/[^A-Z]/g, "") === "YES";
    } catch (e) {
        logger.warn(`Error checking if query needs validation: ${errorMessage(e)}`);
        return false;
    }
}

export function parseQueryAnalysis(response: string): QueryAnalysis {
    const cleaned = cleanModelOutput(response);
    const start = cleaned.indexOf("{");
    const end = cleaned.lastIndexOf("}");

    if (start !== -1 && end > start) {
        try {
            const parsed = QueryAnalysisSchema.safeParse(JSON.parse(cleaned.slice(start, end + 1)));
            if (parsed.success) return parsed.data;
            logger.warn(`Query analysis has an unexpected shape: ${parsed.error.message}`);
        } catch (e) {
            logger.warn(`Failed to parse query analysis JSON: ${errorMessage(e)}`);
        }
    }

    return { has_issues: false, issues: "Could not analyze query", fixed_query: null };
}

export async function analyzeQueryIssues(
    generateText: TextGenerator,
    query: string,
    userQuery: string,
    schemaContext: string
): Promise<QueryAnalysis> {
    try {
        const response = await generateText(queryAnalysisPrompt(query, userQuery, schemaContext), 800, 0.1);
        return parseQueryAnalysis(response);
    } catch (e) {
        logger.warn(`Error analyzing query issues: ${errorMessage(e)}`);
        return { has_issues: false, issues: `Analysis failed: ${errorMessage(e)}`, fixed_query: null };
    }
}
