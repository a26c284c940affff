import { cleanModelOutput } from "../../core/llmFactory";
import { QueryExecutionError } from "../../core/errors";
import { logger, errorMessage } from "../../core/logger";
import { DEFAULT_REGISTRY, DomainRegistry } from "./registry";
import { queryFixPrompt } from "./prompts";
import { countAllQuery } from "./querySynthesizer";
import { convertCapitalizedLiterals, normalizeQuotes, stripStringLiterals } from "./queryParser";
import { isEmptyResult, previewResult } from "./results";
import { ERROR_MESSAGES, SUCCESS_MESSAGES, formatMessage } from "./messages";
import type { QueryExecutor, TextGenerator } from "./types";

export const DEFAULT_MAX_RETRIES = 3;

/** Recovery applied after a failed attempt, indexed by the retry that triggers it. */
export const RETRY_STRATEGIES = ["normalize", "regenerate"] as const;

export type RepairStrategy = typeof RETRY_STRATEGIES[number] | "empty_repair" | "fallback";

export interface RepairRequest {
    query: string;
    userQuery: string;
    schemaContext: string;
    targetCollection: string;
    executor: QueryExecutor;
}

export interface RepairOutcome {
    result: unknown;
    finalQuery: string;
    /** Executions of the main loop; the empty-result repair and the hard fallback are not counted. */
    attempts: number;
    strategies: RepairStrategy[];
}

export interface RepairEngineOptions {
    generateText?: TextGenerator;
    maxRetries?: number;
    registry?: DomainRegistry;
}

function countOf(text: string, char: string): number {
    return text.split(char).length - 1;
}

/**
 * Canonicalizes a command before execution: double-quoted strings, JSON literals, no
 * trailing semicolon, and missing `]` / `)` closers appended. String contents are kept
 * as written. Idempotent.
 */
export function fixQuerySyntax(query: string): string {
    if (!query) return query;

    let fixed = query.trim().replace(/;+$/, "").trim();
    fixed = convertCapitalizedLiterals(normalizeQuotes(fixed));

    const code = stripStringLiterals(fixed);
    const missingBrackets = countOf(code, "[") - countOf(code, "]");
    if (fixed.startsWith("db.") && missingBrackets > 0) {
        const trailingParens = fixed.match(/\)+$/)?.[0] ?? "";
        fixed = fixed.slice(0, fixed.length - trailingParens.length) + "]".repeat(missingBrackets) + trailingParens;
    }

    const missingParens = countOf(code, "(") - countOf(code, ")");
    if (missingParens > 0) {
        fixed += ")".repeat(missingParens);
    }

    return fixed;
}

export function looksExecutable(query: string): boolean {
    return /^db\.[\w.$-]+\.aggregate\(/.test(query) && query.endsWith(")");
}

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function detectSortField(schemaContext: string, registry: DomainRegistry = DEFAULT_REGISTRY): string {
    const field = registry.dateFields.find(f => new RegExp(`\\b${escapeRegExp(f)}\\b`).test(schemaContext));
    return field ?? "_id";
}

/**
 * Rule-based replacement for a query that keeps failing, keyed on the question's intent.
 */
export function regenerateQuery(
    userQuery: string,
    schemaContext: string,
    targetCollection: string,
    registry: DomainRegistry = DEFAULT_REGISTRY
): string {
    const target = targetCollection || registry.defaultTargetCollection;
    const queryLower = userQuery.toLowerCase();
    const { count, first, last } = registry.intentKeywords;

    if (count.some(word => queryLower.includes(word))) {
        return countAllQuery(target);
    }
    if (first.some(word => queryLower.includes(word))) {
        const field = detectSortField(schemaContext, registry);
        return `db.${target}.aggregate([{"$sort": {"${field}": 1}}, {"$limit": 1}])`;
    }
    if (last.some(word => queryLower.includes(word))) {
        const field = detectSortField(schemaContext, registry);
        return `db.${target}.aggregate([{"$sort": {"${field}": -1}}, {"$limit": 1}])`;
    }
    return `db.${target}.aggregate([{"$limit": 5}])`;
}

export class QueryRepairEngine {
    readonly maxRetries: number;
    private readonly generateText?: TextGenerator;
    private readonly registry: DomainRegistry;

    constructor(options: RepairEngineOptions = {}) {
        this.maxRetries = Math.max(1, options.maxRetries ?? DEFAULT_MAX_RETRIES);
        this.generateText = options.generateText;
        this.registry = options.registry ?? DEFAULT_REGISTRY;
    }

    /**
     * Bounded retry loop: at most `maxRetries` attempts, each preceded by syntax
     * normalization; failures escalate normalize → regenerate → hard fallback.
     */
    async executeWithRepair(request: RepairRequest): Promise<RepairOutcome> {
        const strategies: RepairStrategy[] = [];
        let current = request.query;
        let retryCount = 0;
        let attempts = 0;
        let lastError: unknown = null;

        while (retryCount < this.maxRetries) {
            const candidate = fixQuerySyntax(current);
            attempts++;
            logger.info(`Attempt ${attempts}: Executing query: ${candidate}`);

            let result: unknown;
            try {
                result = await request.executor(candidate);
            } catch (e) {
                lastError = e;
                retryCount++;
                logger.warn(`Attempt ${attempts} failed: ${errorMessage(e)} | query: ${candidate}`);
                if (retryCount < this.maxRetries) {
                    const strategy = RETRY_STRATEGIES[Math.min(retryCount, RETRY_STRATEGIES.length) - 1];
                    strategies.push(strategy);
                    current = strategy === "normalize"
                        ? fixQuerySyntax(current)
                        : regenerateQuery(request.userQuery, request.schemaContext, request.targetCollection, this.registry);
                    logger.info(`Retry ${retryCount} using ${strategy} strategy: ${current}`);
                }
                continue;
            }

            logger.info(formatMessage(SUCCESS_MESSAGES.QUERY_EXECUTED_SUCCESS, { attempt: attempts }));

            if (isEmptyResult(result)) {
                logger.warn("Query returned empty result. Asking LLM to check and fix the query...");
                const recovered = await this.recoverEmptyResult(candidate, request);
                if (recovered) {
                    strategies.push("empty_repair");
                    return { result: recovered.result, finalQuery: recovered.query, attempts, strategies };
                }
                return { result, finalQuery: candidate, attempts, strategies };
            }

            return { result, finalQuery: candidate, attempts, strategies };
        }

        const fallbackQuery = countAllQuery(request.targetCollection || this.registry.defaultTargetCollection);
        strategies.push("fallback");
        logger.info(`Final fallback: ${fallbackQuery}`);
        try {
            const result = await request.executor(fallbackQuery);
            logger.info(SUCCESS_MESSAGES.FALLBACK_QUERY_SUCCESS);
            return { result, finalQuery: fallbackQuery, attempts, strategies };
        } catch (e) {
            logger.error(formatMessage(ERROR_MESSAGES.FALLBACK_QUERY_FAILED, { error: errorMessage(e) }));
            throw new QueryExecutionError(
                formatMessage(ERROR_MESSAGES.ALL_RETRIES_FAILED, { error: errorMessage(lastError ?? e) }),
                fallbackQuery
            );
        }
    }

    /**
     * Asks the model to correct a query that ran but matched nothing. Returns null when
     * no usable command comes back.
     */
    async requestQueryFix(query: string, userQuery: string, schemaContext: string): Promise<string | null> {
        if (!this.generateText) return null;

        try {
            const response = await this.generateText(queryFixPrompt(query, userQuery, schemaContext), 1000, 0.1);
            const repaired = fixQuerySyntax(cleanModelOutput(response));
            if (!looksExecutable(repaired)) {
                logger.warn(`Discarding repair that is not an executable command: ${previewResult(repaired)}`);
                return null;
            }
            return repaired;
        } catch (e) {
            logger.warn(`Query repair request failed: ${errorMessage(e)}`);
            return null;
        }
    }

    private async recoverEmptyResult(query: string, request: RepairRequest): Promise<{ query: string; result: unknown } | null> {
        const repaired = await this.requestQueryFix(query, request.userQuery, request.schemaContext);
        if (!repaired || repaired === query) return null;

        logger.info(`LLM provided fixed query: ${repaired}`);
        try {
            const result = await request.executor(repaired);
            if (!isEmptyResult(result)) {
                logger.info("Fixed query returned results!");
                return { query: repaired, result };
            }
            logger.warn("Fixed query also returned empty results");
        } catch (e) {
            logger.warn(`Fixed query failed: ${errorMessage(e)}`);
        }
        return null;
    }
}
