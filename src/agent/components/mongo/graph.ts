import { END, START, StateGraph } from "@langchain/langgraph";
import { logger, errorMessage } from "../../core/logger";
import { createWorkflowNodes } from "./nodes";
import { parseResults } from "./results";
import { ERROR_MESSAGES, formatMessage } from "./messages";
import { WorkflowAnnotation, WorkflowState, createInitialWorkflowState } from "./state";
import type {
    AgentOptions,
    QueryAgentResponse,
    StepName,
    StepStatus,
    WorkflowDependencies,
    WorkflowStepReport,
} from "./types";

export const DEFAULT_RECURSION_LIMIT = 50;

export const STEP_LABELS: ReadonlyArray<[StepName, string]> = [
    ["list_collections", "List Collections"],
    ["get_schema", "Get Schema"],
    ["generate_query", "Generate Query"],
    ["need_checker", "Need Checker"],
    ["check_query", "Check Query"],
    ["run_query", "Run Query"],
];

export type AgentStreamEvent =
    | { type: "step"; step: StepName; status: StepStatus }
    | { type: "query_generated"; query: string }
    | { type: "result"; data: QueryAgentResponse };

export interface QueryAgent {
    run(userQuery: string, threadId?: string): Promise<QueryAgentResponse>;
    stream(userQuery: string, threadId?: string): AsyncGenerator<AgentStreamEvent>;
}

// A denied request ends the run right after generation.
export function decideAfterGenerate(state: Pick<WorkflowState, "step_status">): "need_checker" | typeof END {
    return state.step_status.generate_query === "denied" ? END : "need_checker";
}

export function decideAfterNeedCheck(state: Pick<WorkflowState, "needs_check">): "check_query" | "run_query" {
    return state.needs_check ? "check_query" : "run_query";
}

export function buildQueryGraph(deps: WorkflowDependencies, options: AgentOptions = {}) {
    const nodes = createWorkflowNodes(deps, options);

    const workflow = new StateGraph(WorkflowAnnotation)
        .addNode("list_collections", nodes.listCollections)
        .addNode("get_schema", nodes.getSchema)
        .addNode("generate_query", nodes.generateQuery)
        .addNode("need_checker", nodes.needChecker)
        .addNode("check_query", nodes.checkQuery)
        .addNode("run_query", nodes.runQuery)
        .addNode("format_answer", nodes.formatAnswer);

    workflow.addEdge(START, "list_collections");
    workflow.addEdge("list_collections", "get_schema");
    workflow.addEdge("get_schema", "generate_query");
    workflow.addConditionalEdges("generate_query", decideAfterGenerate, {
        need_checker: "need_checker",
        [END]: END,
    });
    workflow.addConditionalEdges("need_checker", decideAfterNeedCheck, {
        check_query: "check_query",
        run_query: "run_query",
    });
    workflow.addEdge("check_query", "run_query");
    workflow.addEdge("run_query", "format_answer");
    workflow.addEdge("format_answer", END);

    return workflow.compile({ checkpointer: options.checkpointer });
}

/**
 * One entry per tracked step. Check Query reads "skipped" when the checker ran and
 * decided against it; steps never reached read "pending".
 */
export function extractWorkflowSteps(state: Pick<WorkflowState, "step_status" | "needs_check">): WorkflowStepReport[] {
    return STEP_LABELS.map(([step, label]) => {
        const status = state.step_status[step];
        if (status) return { step: label, status };
        if (step === "check_query" && state.step_status.need_checker && !state.needs_check) {
            return { step: label, status: "skipped" };
        }
        return { step: label, status: "pending" };
    });
}

export function checkWorkflowSuccess(state: Pick<WorkflowState, "step_status">): boolean {
    return Object.values(state.step_status).every(status => status === "success");
}

export function buildResponse(userQuery: string, state: WorkflowState, startedAt: number): QueryAgentResponse {
    return {
        success: checkWorkflowSuccess(state),
        query: userQuery,
        generated_query: state.generated_query,
        results: parseResults(state.query_result),
        formatted_answer: state.formatted_answer,
        error: state.error_info,
        execution_time: (Date.now() - startedAt) / 1000,
        workflow_steps: extractWorkflowSteps(state),
        collections_found: state.collections.length,
        schema_retrieved: Object.keys(state.schema_info).length,
    };
}

function failureResponse(userQuery: string, error: unknown, startedAt: number): QueryAgentResponse {
    const message = formatMessage(ERROR_MESSAGES.WORKFLOW_EXECUTION_FAILED, { error: errorMessage(error) });
    logger.error(message);
    return {
        success: false,
        query: userQuery,
        generated_query: null,
        results: [],
        formatted_answer: formatMessage(ERROR_MESSAGES.UNEXPECTED_ERROR, { error: errorMessage(error) }),
        error: message,
        execution_time: (Date.now() - startedAt) / 1000,
        workflow_steps: [],
        collections_found: 0,
        schema_retrieved: 0,
    };
}

/**
 * Natural language → MongoDB aggregation agent. Never throws: every failure comes
 * back as an envelope with `success: false`.
 */
export function createQueryAgent(deps: WorkflowDependencies, options: AgentOptions = {}): QueryAgent {
    const graph = buildQueryGraph(deps, options);
    const recursionLimit = options.recursionLimit ?? DEFAULT_RECURSION_LIMIT;

    return {
        async run(userQuery, threadId = "default") {
            const startedAt = Date.now();
            logger.info(`Processing query: ${userQuery}`);
            try {
                const finalState = await graph.invoke(createInitialWorkflowState(userQuery), {
                    configurable: { thread_id: threadId },
                    recursionLimit,
                });
                return buildResponse(userQuery, finalState, startedAt);
            } catch (e) {
                return failureResponse(userQuery, e, startedAt);
            }
        },

        async *stream(userQuery, threadId = "default") {
            const startedAt = Date.now();
            const seen: Partial<Record<StepName, StepStatus>> = {};
            let lastQuery = "";
            let finalState: WorkflowState | null = null;

            try {
                const stream = await graph.stream(createInitialWorkflowState(userQuery), {
                    configurable: { thread_id: threadId },
                    recursionLimit,
                    streamMode: "values",
                });

                for await (const state of stream) {
                    for (const [step] of STEP_LABELS) {
                        const status = state.step_status[step];
                        if (status && seen[step] !== status) {
                            seen[step] = status;
                            yield { type: "step", step, status };
                        }
                    }
                    if (state.generated_query && state.generated_query !== lastQuery) {
                        lastQuery = state.generated_query;
                        yield { type: "query_generated", query: lastQuery };
                    }
                    finalState = state;
                }
            } catch (e) {
                yield { type: "result", data: failureResponse(userQuery, e, startedAt) };
                return;
            }

            yield {
                type: "result",
                data: finalState
                    ? buildResponse(userQuery, finalState, startedAt)
                    : failureResponse(userQuery, new Error("Workflow produced no state"), startedAt),
            };
        },
    };
}
