export const ERROR_MESSAGES = {
    COLLECTIONS_LIST_FAILED: "Error listing collections: {error}",
    SCHEMA_RETRIEVAL_FAILED: "Error getting schema information: {error}",
    SCHEMA_UNAVAILABLE: "Collection '{collection}' exists but detailed schema unavailable: {error}",
    QUERY_GENERATION_FAILED: "Error generating query with MQL generator: {error}",
    MQL_GENERATION_ERROR: "Error generating MQL query: {error}",
    QUERY_CHECK_FAILED: "Error checking generated query: {error}",
    QUERY_EXECUTION_FAILED: "Error executing query: {error}",
    NO_QUERY_TO_EXECUTE: "No query to execute",
    ALL_RETRIES_FAILED: "All query attempts failed. Last error: {error}",
    FALLBACK_QUERY_FAILED: "Even fallback query failed: {error}",
    ANSWER_FORMATTING_FAILED: "Error formatting answer: {error}",
    WORKFLOW_EXECUTION_FAILED: "Error in structured agent query: {error}",
    UNEXPECTED_ERROR: "An unexpected error occurred: {error}",
    UNABLE_TO_RETRIEVE_INFO: "I apologize, but I was unable to retrieve the requested information.",
    QUERY_PROCESSING_ERROR: "I apologize, but I encountered an error while processing your query: {error}",
    FORMATTING_ERROR_FALLBACK: "I apologize, but I encountered an error while formatting the response. Raw result: {result}",
    WRITE_OPERATION_DENIED: "I can't help with that type of request. Let me know if you'd like to search for or view any data instead!",
} as const;

export const SUCCESS_MESSAGES = {
    COLLECTIONS_DISCOVERED: "Found {count} collections: {collections}",
    RELEVANT_COLLECTIONS_IDENTIFIED: "Relevant collections identified: {collections}",
    SCHEMA_RETRIEVED: "Retrieved schema for {count} collections: {collections}",
    TARGET_COLLECTION_DETERMINED: "Target collection for query generation: {collection}",
    MQL_QUERY_GENERATED: "Generated MongoDB command: {query}",
    QUERY_EXECUTED_SUCCESS: "Query executed successfully on attempt {attempt}",
    QUERY_EXECUTION_COMPLETE: "Query executed successfully. Result: {result}",
    FALLBACK_QUERY_SUCCESS: "Fallback query succeeded",
    ANSWER_FORMATTED: "Final answer generated: {answer}",
} as const;

/**
 * Fills `{name}` placeholders. Unknown placeholders are left untouched.
 */
export function formatMessage(template: string, values: Record<string, string | number>): string {
    return template.replace(/\{(\w+)\}/g, (match, key: string) =>
        key in values ? String(values[key]) : match
    );
}
