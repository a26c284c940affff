import type { BaseCheckpointSaver } from "@langchain/langgraph";
import type { TextGenerator } from "../../core/llmFactory";
import type { DomainRegistry } from "./registry";

export type { TextGenerator };

export type StepName =
    | "list_collections"
    | "get_schema"
    | "generate_query"
    | "need_checker"
    | "check_query"
    | "run_query";

export type StepStatus = "pending" | "success" | "failed" | "denied" | "skipped";

export type StepStatusMap = Partial<Record<StepName, StepStatus>>;

export type CollectionLister = () => Promise<string[]>;

export type SchemaFetcher = (collectionNames: string[]) => Promise<string>;

export type QueryExecutor = (queryText: string) => Promise<unknown>;

export interface WorkflowDependencies {
    listCollections: CollectionLister;
    fetchSchema: SchemaFetcher;
    executeQuery: QueryExecutor;
    generateText: TextGenerator;
}

export interface AgentOptions {
    maxRetries?: number;
    aiTimeoutMs?: number;
    maxCollections?: number;
    registry?: DomainRegistry;
    checkpointer?: BaseCheckpointSaver;
    recursionLimit?: number;
}

export interface WorkflowStepReport {
    step: string;
    status: StepStatus;
}

export interface QueryAgentResponse {
    success: boolean;
    query: string;
    generated_query: string | null;
    results: Record<string, unknown>[];
    formatted_answer: string;
    error: string | null;
    execution_time: number;
    workflow_steps: WorkflowStepReport[];
    collections_found: number;
    schema_retrieved: number;
}
