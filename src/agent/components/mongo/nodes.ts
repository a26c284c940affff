import { AIMessage, ToolMessage } from "@langchain/core/messages";
import { logger, errorMessage } from "../../core/logger";
import { DEFAULT_REGISTRY, isSystemCollection } from "./registry";
import { determineTargetCollection, resolveRelevantCollections } from "./collectionResolver";
import { buildSchemaContext, collectSchemaInfo } from "./schemaContext";
import { checkQueryPermissions, countAllQuery, synthesizeQuery } from "./querySynthesizer";
import { QueryRepairEngine, fixQuerySyntax, looksExecutable } from "./queryRepair";
import { analyzeQueryIssues, needsValidation } from "./validationGate";
import { formatAnswerPrompt } from "./prompts";
import { previewResult } from "./results";
import { ERROR_MESSAGES, SUCCESS_MESSAGES, formatMessage } from "./messages";
import { WorkflowState, WorkflowUpdate, withStepStatus } from "./state";
import type { AgentOptions, WorkflowDependencies } from "./types";

export type WorkflowNode = (state: WorkflowState) => Promise<WorkflowUpdate>;

export interface WorkflowNodes {
    listCollections: WorkflowNode;
    getSchema: WorkflowNode;
    generateQuery: WorkflowNode;
    needChecker: WorkflowNode;
    checkQuery: WorkflowNode;
    runQuery: WorkflowNode;
    formatAnswer: WorkflowNode;
}

export const ANSWER_MAX_TOKENS = 500;
export const ANSWER_TEMPERATURE = 0.3;

function toolMessage(content: string, toolCallId: string): ToolMessage {
    return new ToolMessage({ content, tool_call_id: toolCallId });
}

export function createWorkflowNodes(deps: WorkflowDependencies, options: AgentOptions = {}): WorkflowNodes {
    const registry = options.registry ?? DEFAULT_REGISTRY;
    const repairEngine = new QueryRepairEngine({
        generateText: deps.generateText,
        maxRetries: options.maxRetries,
        registry,
    });

    const targetOf = (state: WorkflowState) =>
        determineTargetCollection(state.user_query, state.collections, state.relevant_collections, registry);

    const listCollections: WorkflowNode = async (state) => {
        logger.info("Step 1: Discovering database collections...");
        try {
            const names = await deps.listCollections();
            const collections = Array.from(new Set(
                names.map(name => name.trim()).filter(name => name && !isSystemCollection(name, registry))
            ));
            const summary = formatMessage(SUCCESS_MESSAGES.COLLECTIONS_DISCOVERED, {
                count: collections.length,
                collections: collections.join(", "),
            });
            logger.info(summary);
            return {
                collections,
                step_status: withStepStatus(state, "list_collections", "success"),
                messages: [toolMessage(summary, "list_collections_call")],
            };
        } catch (e) {
            const error = formatMessage(ERROR_MESSAGES.COLLECTIONS_LIST_FAILED, { error: errorMessage(e) });
            logger.error(error);
            return {
                collections: [],
                error_info: error,
                step_status: withStepStatus(state, "list_collections", "failed"),
                messages: [toolMessage(error, "list_collections_call")],
            };
        }
    };

    const getSchema: WorkflowNode = async (state) => {
        logger.info("Step 2: Identifying relevant collections and retrieving schema...");
        try {
            const relevant = await resolveRelevantCollections(state.user_query, state.collections, {
                generateText: deps.generateText,
                aiTimeoutMs: options.aiTimeoutMs,
                maxCollections: options.maxCollections,
                registry,
            });
            logger.info(formatMessage(SUCCESS_MESSAGES.RELEVANT_COLLECTIONS_IDENTIFIED, { collections: relevant.join(", ") }));

            const schemaInfo = await collectSchemaInfo(deps.fetchSchema, relevant);
            const summary = formatMessage(SUCCESS_MESSAGES.SCHEMA_RETRIEVED, {
                count: Object.keys(schemaInfo).length,
                collections: Object.keys(schemaInfo).join(", "),
            });
            logger.info(summary);
            return {
                relevant_collections: relevant,
                schema_info: schemaInfo,
                step_status: withStepStatus(state, "get_schema", "success"),
                messages: [toolMessage(summary, "get_schema_call")],
            };
        } catch (e) {
            const error = formatMessage(ERROR_MESSAGES.SCHEMA_RETRIEVAL_FAILED, { error: errorMessage(e) });
            logger.error(error);
            return {
                relevant_collections: [],
                schema_info: {},
                error_info: error,
                step_status: withStepStatus(state, "get_schema", "failed"),
                messages: [toolMessage(error, "get_schema_call")],
            };
        }
    };

    const generateQuery: WorkflowNode = async (state) => {
        logger.info("Step 3: Generating MongoDB query...");

        const permission = checkQueryPermissions(state.user_query, registry);
        if (!permission.allowed) {
            logger.warn(`Write-intent keyword "${permission.keyword}" found, refusing request`);
            return {
                generated_query: "",
                formatted_answer: permission.message,
                step_status: withStepStatus(state, "generate_query", "denied"),
                messages: [new AIMessage(permission.message)],
            };
        }

        const target = targetOf(state);
        logger.info(formatMessage(SUCCESS_MESSAGES.TARGET_COLLECTION_DETERMINED, { collection: target }));
        try {
            const query = await synthesizeQuery(deps.generateText, state.user_query, buildSchemaContext(state.schema_info), target);
            const summary = formatMessage(SUCCESS_MESSAGES.MQL_QUERY_GENERATED, { query });
            logger.info(summary);
            return {
                generated_query: query,
                step_status: withStepStatus(state, "generate_query", "success"),
                messages: [new AIMessage(summary)],
            };
        } catch (e) {
            const error = formatMessage(ERROR_MESSAGES.QUERY_GENERATION_FAILED, { error: errorMessage(e) });
            logger.error(error);
            return {
                generated_query: countAllQuery(target),
                error_info: error,
                step_status: withStepStatus(state, "generate_query", "failed"),
                messages: [new AIMessage(error)],
            };
        }
    };

    const needChecker: WorkflowNode = async (state) => {
        logger.info("Step 4: Deciding whether the query needs a check...");
        const needsCheck = await needsValidation(
            deps.generateText,
            state.generated_query,
            state.user_query,
            buildSchemaContext(state.schema_info)
        );
        logger.info(`Query needs checking: ${needsCheck}`);
        return {
            needs_check: needsCheck,
            step_status: withStepStatus(state, "need_checker", "success"),
        };
    };

    const checkQuery: WorkflowNode = async (state) => {
        logger.info("Step 5: Checking generated query...");
        try {
            const analysis = await analyzeQueryIssues(
                deps.generateText,
                state.generated_query,
                state.user_query,
                buildSchemaContext(state.schema_info)
            );

            let query = state.generated_query;
            if (analysis.has_issues && analysis.fixed_query) {
                const fixed = fixQuerySyntax(analysis.fixed_query.trim());
                if (looksExecutable(fixed)) {
                    logger.info(`Query issues found: ${analysis.issues}. Using fixed query: ${fixed}`);
                    query = fixed;
                } else {
                    logger.warn(`Ignoring suggested fix that is not an executable command: ${previewResult(fixed)}`);
                }
            }

            return {
                generated_query: query,
                query_issues: analysis.issues || null,
                step_status: withStepStatus(state, "check_query", "success"),
                messages: [new AIMessage(`Query check: ${analysis.has_issues ? analysis.issues : "no issues found"}`)],
            };
        } catch (e) {
            const error = formatMessage(ERROR_MESSAGES.QUERY_CHECK_FAILED, { error: errorMessage(e) });
            logger.error(error);
            return {
                error_info: error,
                step_status: withStepStatus(state, "check_query", "failed"),
            };
        }
    };

    const runQuery: WorkflowNode = async (state) => {
        logger.info("Step 6: Executing query...");
        try {
            if (!state.generated_query) {
                throw new Error(ERROR_MESSAGES.NO_QUERY_TO_EXECUTE);
            }

            const outcome = await repairEngine.executeWithRepair({
                query: state.generated_query,
                userQuery: state.user_query,
                schemaContext: buildSchemaContext(state.schema_info),
                targetCollection: targetOf(state),
                executor: deps.executeQuery,
            });
            const summary = formatMessage(SUCCESS_MESSAGES.QUERY_EXECUTION_COMPLETE, { result: previewResult(outcome.result) });
            logger.info(summary);
            return {
                query_result: outcome.result ?? null,
                generated_query: outcome.finalQuery,
                step_status: withStepStatus(state, "run_query", "success"),
                messages: [toolMessage(summary, "run_query_call")],
            };
        } catch (e) {
            const error = formatMessage(ERROR_MESSAGES.QUERY_EXECUTION_FAILED, { error: errorMessage(e) });
            logger.error(error);
            return {
                query_result: null,
                error_info: error,
                step_status: withStepStatus(state, "run_query", "failed"),
                messages: [toolMessage(error, "run_query_call")],
            };
        }
    };

    const formatAnswer: WorkflowNode = async (state) => {
        logger.info("Step 7: Formatting final answer...");

        if (state.query_result === null) {
            const answer = state.error_info
                ? formatMessage(ERROR_MESSAGES.QUERY_PROCESSING_ERROR, { error: state.error_info })
                : ERROR_MESSAGES.UNABLE_TO_RETRIEVE_INFO;
            return { formatted_answer: answer, messages: [new AIMessage(answer)] };
        }

        const resultText = JSON.stringify(state.query_result, null, 2) ?? String(state.query_result);
        try {
            const response = await deps.generateText(
                formatAnswerPrompt(state.user_query, resultText),
                ANSWER_MAX_TOKENS,
                ANSWER_TEMPERATURE
            );
            const answer = response.trim();
            if (!answer) {
                throw new Error("Model returned an empty answer");
            }
            logger.info(formatMessage(SUCCESS_MESSAGES.ANSWER_FORMATTED, { answer: previewResult(answer) }));
            return { formatted_answer: answer, messages: [new AIMessage(answer)] };
        } catch (e) {
            const error = formatMessage(ERROR_MESSAGES.ANSWER_FORMATTING_FAILED, { error: errorMessage(e) });
            logger.error(error);
            const fallback = formatMessage(ERROR_MESSAGES.FORMATTING_ERROR_FALLBACK, {
                result: JSON.stringify(state.query_result) ?? String(state.query_result),
            });
            return { formatted_answer: fallback, error_info: error, messages: [new AIMessage(fallback)] };
        }
    };

    return { listCollections, getSchema, generateQuery, needChecker, checkQuery, runQuery, formatAnswer };
}
