export type AgentErrorCode =
    | "QUERY_EXECUTION_FAILED"
    | "QUERY_PARSE_FAILED"
    | "READ_ONLY_VIOLATION"
    | "LLM_TIMEOUT"
    | "CONFIGURATION_INVALID";

export class AgentError extends Error {
    constructor(public readonly code: AgentErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class QueryExecutionError extends AgentError {
    constructor(message: string, public readonly lastQuery?: string) {
        super("QUERY_EXECUTION_FAILED", message);
    }
}

export class QueryParseError extends AgentError {
    constructor(message: string) {
        super("QUERY_PARSE_FAILED", message);
    }
}

export class ReadOnlyViolationError extends AgentError {
    constructor(message: string) {
        super("READ_ONLY_VIOLATION", message);
    }
}

export class LLMTimeoutError extends AgentError {
    constructor(public readonly timeoutMs: number) {
        super("LLM_TIMEOUT", `Request timeout after ${timeoutMs / 1000} seconds`);
    }
}

export class ConfigurationError extends AgentError {
    constructor(message: string) {
        super("CONFIGURATION_INVALID", message);
    }
}
