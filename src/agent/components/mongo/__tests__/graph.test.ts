import { before, describe, it } from "node:test";
import assert from "node:assert/strict";
import { END, MemorySaver } from "@langchain/langgraph";
import { HumanMessage } from "@langchain/core/messages";
import { setLogLevel } from "../../../core/logger";
import {
    AgentStreamEvent,
    checkWorkflowSuccess,
    createQueryAgent,
    decideAfterGenerate,
    decideAfterNeedCheck,
    extractWorkflowSteps,
} from "../graph";
import { ERROR_MESSAGES } from "../messages";
import { MAX_THREAD_MESSAGES, appendRecentMessages } from "../state";
import { countAllQuery } from "../querySynthesizer";
import type { QueryExecutor, TextGenerator, WorkflowDependencies } from "../types";
import { recordingExecutor, scriptedGenerator, unavailableGenerator } from "./fakes";

function dependencies(generateText: TextGenerator, executeQuery: QueryExecutor, overrides: Partial<WorkflowDependencies> = {}): WorkflowDependencies {
    return {
        listCollections: async () => ["students", "courses"],
        fetchSchema: async (names) => `${names[0]}: name String, active Boolean, age Number`,
        generateText,
        executeQuery,
        ...overrides,
    };
}

describe("query workflow", () => {
    before(() => setLogLevel("silent"));

    describe("decision functions", () => {
        it("ends after a denied generation", () => {
            assert.equal(decideAfterGenerate({ step_status: { generate_query: "denied" } }), END);
            assert.equal(decideAfterGenerate({ step_status: { generate_query: "success" } }), "need_checker");
            assert.equal(decideAfterGenerate({ step_status: { generate_query: "failed" } }), "need_checker");
        });

        it("routes to the checker only when asked", () => {
            assert.equal(decideAfterNeedCheck({ needs_check: true }), "check_query");
            assert.equal(decideAfterNeedCheck({ needs_check: false }), "run_query");
        });
    });

    describe("step reporting", () => {
        it("marks Check Query as skipped when the checker declined it", () => {
            const steps = extractWorkflowSteps({
                needs_check: false,
                step_status: {
                    list_collections: "success",
                    get_schema: "success",
                    generate_query: "success",
                    need_checker: "success",
                    run_query: "success",
                },
            });
            assert.deepEqual(steps.map(s => s.status), ["success", "success", "success", "success", "skipped", "success"]);
        });

        it("leaves unreached steps pending", () => {
            const steps = extractWorkflowSteps({
                needs_check: false,
                step_status: { list_collections: "success", get_schema: "success", generate_query: "denied" },
            });
            assert.deepEqual(steps.map(s => s.status), ["success", "success", "denied", "pending", "pending", "pending"]);
        });

        it("succeeds only when every recorded step succeeded", () => {
            assert.equal(checkWorkflowSuccess({ step_status: { list_collections: "success", run_query: "success" } }), true);
            assert.equal(checkWorkflowSuccess({ step_status: { list_collections: "success", generate_query: "denied" } }), false);
        });
    });

    it("answers a count question when the LLM is unavailable", async () => {
        const executor = recordingExecutor([{ total: 42 }]);
        const agent = createQueryAgent(dependencies(unavailableGenerator, executor.executeQuery));

        const response = await agent.run("How many students are there?");

        assert.equal(response.success, true);
        assert.equal(response.generated_query, countAllQuery("students"));
        assert.deepEqual(executor.executed, [countAllQuery("students")]);
        assert.deepEqual(response.results, [{ total: 42 }]);
        assert.equal(
            response.formatted_answer,
            'I apologize, but I encountered an error while formatting the response. Raw result: {"total":42}'
        );
        assert.equal(response.error, "Error formatting answer: LLM unavailable");
        assert.equal(response.collections_found, 2);
        assert.equal(response.schema_retrieved, 1);
        assert.deepEqual(response.workflow_steps, [
            { step: "List Collections", status: "success" },
            { step: "Get Schema", status: "success" },
            { step: "Generate Query", status: "success" },
            { step: "Need Checker", status: "success" },
            { step: "Check Query", status: "skipped" },
            { step: "Run Query", status: "success" },
        ]);
    });

    it("refuses write requests without running anything", async () => {
        const executor = recordingExecutor([[{ total: 1 }]]);
        const agent = createQueryAgent(dependencies(unavailableGenerator, executor.executeQuery));

        const response = await agent.run("Please delete all students");

        assert.equal(response.success, false);
        assert.equal(response.generated_query, "");
        assert.equal(response.formatted_answer, ERROR_MESSAGES.WRITE_OPERATION_DENIED);
        assert.deepEqual(response.results, []);
        assert.deepEqual(executor.executed, []);
        assert.deepEqual(response.workflow_steps.map(s => s.status), ["success", "success", "denied", "pending", "pending", "pending"]);
    });

    it("reports the normalized query after a retried execution", async () => {
        const llm = scriptedGenerator({
            identify: '["students"]',
            generate: "db.students.aggregate([{'$match': {'active': True}}])",
            needCheck: "NO",
            format: "Ana is active.",
        });
        const executor = recordingExecutor([new Error("unexpected token"), [{ name: "Ana" }]]);
        const agent = createQueryAgent(dependencies(llm.generateText, executor.executeQuery));

        const response = await agent.run("Which students are active?");

        const normalized = 'db.students.aggregate([{"$match": {"active": true}}])';
        assert.equal(response.generated_query, normalized);
        assert.deepEqual(executor.executed, [normalized, normalized]);
        assert.equal(response.success, true);
        assert.equal(response.formatted_answer, "Ana is active.");
        assert.deepEqual(response.workflow_steps[5], { step: "Run Query", status: "success" });
        assert.deepEqual(llm.calls, ["identify", "generate", "needCheck", "format"]);
    });

    it("keeps the repaired query when the first one matched nothing", async () => {
        const original = 'db.students.aggregate([{"$match": {"name": "ana"}}])';
        const repaired = 'db.students.aggregate([{"$match": {"name": {"$regex": "ana", "$options": "i"}}}])';
        const llm = scriptedGenerator({
            identify: '["students"]',
            generate: original,
            needCheck: "NO",
            fix: repaired,
            format: "Found Ana.",
        });
        const executed: string[] = [];
        const agent = createQueryAgent(dependencies(llm.generateText, async (queryText) => {
            executed.push(queryText);
            return queryText === repaired ? [{ name: "Ana" }] : [];
        }));

        const response = await agent.run("Find the student named ana");

        assert.equal(response.generated_query, repaired);
        assert.deepEqual(executed, [original, repaired]);
        assert.deepEqual(response.results, [{ name: "Ana" }]);
        assert.equal(response.success, true);
    });

    it("applies an executable fix from the query check", async () => {
        const llm = scriptedGenerator({
            identify: '["students"]',
            generate: 'db.students.aggregate([{"$match": {"age": "20"}}])',
            needCheck: "YES",
            analyze: '{"has_issues": true, "issues": "age is a Number", "fixed_query": "db.students.aggregate([{\'$match\': {\'age\': 20}}])"}',
            format: "One student is 20.",
        });
        const executor = recordingExecutor([[{ name: "Ana", age: 20 }]]);
        const agent = createQueryAgent(dependencies(llm.generateText, executor.executeQuery));

        const response = await agent.run("Students aged 20");

        assert.deepEqual(executor.executed, ['db.students.aggregate([{"$match": {"age": 20}}])']);
        assert.deepEqual(response.workflow_steps[4], { step: "Check Query", status: "success" });
        assert.equal(response.success, true);
    });

    it("ignores a suggested fix that is not a command", async () => {
        const generated = 'db.students.aggregate([{"$match": {"age": "20"}}])';
        const llm = scriptedGenerator({
            identify: '["students"]',
            generate: generated,
            needCheck: "YES",
            analyze: '{"has_issues": true, "issues": "age is a Number", "fixed_query": "use a number for age"}',
            format: "No students found.",
        });
        const executor = recordingExecutor([[{ name: "Ana" }]]);
        const agent = createQueryAgent(dependencies(llm.generateText, executor.executeQuery));

        await agent.run("Students aged 20");

        assert.deepEqual(executor.executed, [generated]);
    });

    it("hides system collections", async () => {
        const executor = recordingExecutor([{ total: 3 }]);
        const agent = createQueryAgent(dependencies(unavailableGenerator, executor.executeQuery, {
            listCollections: async () => ["system.views", "checkpoints", "students", " students "],
        }));

        const response = await agent.run("How many students are there?");

        assert.equal(response.collections_found, 1);
    });

    it("keeps going with defaults when collection discovery fails", async () => {
        const executor = recordingExecutor([{ total: 0 }]);
        const agent = createQueryAgent(dependencies(unavailableGenerator, executor.executeQuery, {
            listCollections: async () => {
                throw new Error("connection refused");
            },
        }));

        const response = await agent.run("How many are there?");

        assert.equal(response.success, false);
        assert.deepEqual(response.workflow_steps[0], { step: "List Collections", status: "failed" });
        assert.equal(response.generated_query, countAllQuery("departments"));
        assert.equal(response.collections_found, 0);
    });

    it("explains an execution failure in the answer", async () => {
        const executor = recordingExecutor([new Error("down")]);
        const agent = createQueryAgent(dependencies(unavailableGenerator, executor.executeQuery), { maxRetries: 1 });

        const response = await agent.run("How many students are there?");

        assert.equal(response.success, false);
        assert.deepEqual(response.results, []);
        assert.equal(executor.executed.length, 2);
        assert.equal(
            response.formatted_answer,
            "I apologize, but I encountered an error while processing your query: " +
            "Error executing query: All query attempts failed. Last error: down"
        );
    });

    it("turns an unexpected workflow error into a failed response", async () => {
        const executor = recordingExecutor([{ total: 1 }]);
        const agent = createQueryAgent(dependencies(unavailableGenerator, executor.executeQuery), { recursionLimit: 2 });

        const response = await agent.run("How many students are there?");

        assert.equal(response.success, false);
        assert.equal(response.generated_query, null);
        assert.ok(response.formatted_answer.startsWith("An unexpected error occurred: "));
        assert.deepEqual(response.workflow_steps, []);
    });

    it("starts each run on a thread from a clean state", async () => {
        const executor = recordingExecutor([{ total: 42 }]);
        const agent = createQueryAgent(dependencies(unavailableGenerator, executor.executeQuery), {
            checkpointer: new MemorySaver(),
        });

        const first = await agent.run("How many students are there?", "thread-1");
        const second = await agent.run("Please remove the courses", "thread-1");

        assert.equal(first.success, true);
        assert.equal(second.generated_query, "");
        assert.deepEqual(second.results, []);
        assert.deepEqual(second.workflow_steps[5], { step: "Run Query", status: "pending" });
    });

    it("keeps only the recent messages of a checkpointed thread", async () => {
        const checkpointer = new MemorySaver();
        const executor = recordingExecutor([{ total: 42 }]);
        const agent = createQueryAgent(dependencies(unavailableGenerator, executor.executeQuery), { checkpointer });

        for (let i = 0; i < 8; i++) {
            await agent.run(`How many students are there? (${i})`, "busy-thread");
        }

        const tuple = await checkpointer.getTuple({ configurable: { thread_id: "busy-thread" } });
        const messages = tuple?.checkpoint.channel_values.messages;
        assert.ok(Array.isArray(messages));
        assert.equal(messages.length, MAX_THREAD_MESSAGES);
    });

    it("drops the oldest messages past the thread limit", () => {
        const history = Array.from({ length: MAX_THREAD_MESSAGES }, (_, i) => new HumanMessage(`q${i}`));
        const kept = appendRecentMessages(history, [new HumanMessage("latest")]);

        assert.equal(kept.length, MAX_THREAD_MESSAGES);
        assert.equal(kept[0].content, "q1");
        assert.equal(kept[kept.length - 1].content, "latest");
    });

    it("streams step updates and the final response", async () => {
        const executor = recordingExecutor([{ total: 42 }]);
        const agent = createQueryAgent(dependencies(unavailableGenerator, executor.executeQuery));

        const events: AgentStreamEvent[] = [];
        for await (const event of agent.stream("How many students are there?")) {
            events.push(event);
        }

        assert.deepEqual(events[0], { type: "step", step: "list_collections", status: "success" });
        assert.ok(events.some(e => e.type === "query_generated" && e.query === countAllQuery("students")));
        const last = events[events.length - 1];
        assert.equal(last.type, "result");
        assert.ok(last.type === "result" && last.data.success);
    });
});
