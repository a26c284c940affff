import { Annotation } from "@langchain/langgraph";
import { BaseMessage, HumanMessage } from "@langchain/core/messages";
import type { StepName, StepStatus, StepStatusMap } from "./types";

/** Messages a checkpointed thread keeps; older ones are dropped. */
export const MAX_THREAD_MESSAGES = 30;

export function appendRecentMessages(existing: BaseMessage[], next: BaseMessage[]): BaseMessage[] {
    return existing.concat(next).slice(-MAX_THREAD_MESSAGES);
}

// Every field but `messages` is replaced wholesale, so a fresh input fully resets a
// reused thread; `messages` keeps the recent conversation for the checkpointer.
export const WorkflowAnnotation = Annotation.Root({
    messages: Annotation<BaseMessage[]>({
        reducer: appendRecentMessages,
        default: () => [],
    }),
    user_query: Annotation<string>({
        reducer: (_, next) => next,
        default: () => "",
    }),
    collections: Annotation<string[]>({
        reducer: (_, next) => next,
        default: () => [],
    }),
    relevant_collections: Annotation<string[]>({
        reducer: (_, next) => next,
        default: () => [],
    }),
    schema_info: Annotation<Record<string, string>>({
        reducer: (_, next) => next,
        default: () => ({}),
    }),
    generated_query: Annotation<string>({
        reducer: (_, next) => next,
        default: () => "",
    }),
    query_result: Annotation<unknown>({
        reducer: (_, next) => next,
        default: () => null,
    }),
    formatted_answer: Annotation<string>({
        reducer: (_, next) => next,
        default: () => "",
    }),
    step_status: Annotation<StepStatusMap>({
        reducer: (_, next) => next,
        default: () => ({}),
    }),
    error_info: Annotation<string | null>({
        reducer: (_, next) => next,
        default: () => null,
    }),
    needs_check: Annotation<boolean>({
        reducer: (_, next) => next,
        default: () => false,
    }),
    query_issues: Annotation<string | null>({
        reducer: (_, next) => next,
        default: () => null,
    }),
});

export type WorkflowState = typeof WorkflowAnnotation.State;
export type WorkflowUpdate = typeof WorkflowAnnotation.Update;

export function createInitialWorkflowState(userQuery: string): WorkflowUpdate {
    return {
        messages: [new HumanMessage(userQuery)],
        user_query: userQuery,
        collections: [],
        relevant_collections: [],
        schema_info: {},
        generated_query: "",
        query_result: null,
        formatted_answer: "",
        step_status: {},
        error_info: null,
        needs_check: false,
        query_issues: null,
    };
}

export function withStepStatus(state: Pick<WorkflowState, "step_status">, step: StepName, status: StepStatus): StepStatusMap {
    return { ...state.step_status, [step]: status };
}
