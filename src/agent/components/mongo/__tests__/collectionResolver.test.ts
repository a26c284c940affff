import { before, describe, it } from "node:test";
import assert from "node:assert/strict";
import { setLogLevel } from "../../../core/logger";
import { LLMTimeoutError } from "../../../core/errors";
import {
    addRelatedCollections,
    collectionLimit,
    determineTargetCollection,
    matchCollectionsByKeyword,
    parseIdentifiedCollections,
    resolveRelevantCollections,
    withTimeout,
} from "../collectionResolver";
import { scriptedGenerator, unavailableGenerator } from "./fakes";

describe("collectionResolver", () => {
    before(() => setLogLevel("silent"));

    describe("parseIdentifiedCollections", () => {
        it("keeps known names from a JSON array, matched case-insensitively", () => {
            const result = parseIdentifiedCollections('["Students", "enrollments", "unknown"]', ["students", "courses", "enrollments"]);
            assert.deepEqual(result, ["students", "enrollments"]);
        });

        it("reads the array out of a fenced answer", () => {
            assert.deepEqual(parseIdentifiedCollections('```json\n["courses"]\n```', ["students", "courses"]), ["courses"]);
        });

        it("falls back to scanning text in order of appearance", () => {
            assert.deepEqual(parseIdentifiedCollections("Use courses and then students", ["students", "courses"]), ["courses", "students"]);
        });

        it("returns at most four collections", () => {
            const names = ["a1", "b2", "c3", "d4", "e5"];
            assert.equal(parseIdentifiedCollections(JSON.stringify(names), names).length, 4);
        });
    });

    describe("keyword matching and relationships", () => {
        it("matches collection names and synonyms", () => {
            assert.deepEqual(matchCollectionsByKeyword("How many students are there?", ["students", "courses"]), ["students"]);
            assert.deepEqual(matchCollectionsByKeyword("list every instructor", ["students", "teachers"]), ["teachers"]);
        });

        it("adds both endpoints of a junction collection", () => {
            const result = addRelatedCollections(["enrollments"], ["students", "courses", "enrollments"], "show enrollments");
            assert.deepEqual(result, ["enrollments", "students", "courses"]);
        });

        it("adds the organization when a member is relevant and the query mentions it", () => {
            const result = addRelatedCollections(["students"], ["students", "departments"], "students per department");
            assert.deepEqual(result, ["students", "departments"]);
        });

        it("only adds collections that exist", () => {
            assert.deepEqual(addRelatedCollections(["enrollments"], ["enrollments"], "show enrollments"), ["enrollments"]);
        });

        it("relaxes the cap for relationship queries", () => {
            assert.equal(collectionLimit("How many students are there?"), 3);
            assert.equal(collectionLimit("students with their courses"), 5);
            assert.equal(collectionLimit("show everything", { maxCollections: 6 }), 6);
        });
    });

    describe("resolveRelevantCollections", () => {
        it("uses keyword matching without a text generator", async () => {
            assert.deepEqual(await resolveRelevantCollections("How many students are there?", ["students", "courses"]), ["students"]);
        });

        it("prefers the AI identification when it names known collections", async () => {
            const llm = scriptedGenerator({ identify: '["courses"]' });
            const result = await resolveRelevantCollections("What classes exist?", ["students", "courses"], { generateText: llm.generateText });
            assert.deepEqual(result, ["courses"]);
            assert.deepEqual(llm.calls, ["identify"]);
        });

        it("falls back to keywords when the AI call fails", async () => {
            const result = await resolveRelevantCollections("How many students are there?", ["students", "courses"], {
                generateText: unavailableGenerator,
            });
            assert.deepEqual(result, ["students"]);
        });

        it("falls back to keywords when the AI call times out", async () => {
            const result = await resolveRelevantCollections("How many students are there?", ["students", "courses"], {
                generateText: () => new Promise<string>(() => undefined),
                aiTimeoutMs: 10,
            });
            assert.deepEqual(result, ["students"]);
        });

        it("uses the priority collections when nothing matches", async () => {
            const result = await resolveRelevantCollections("show me everything", ["courses", "students", "teachers", "departments"]);
            assert.deepEqual(result, ["students", "departments", "courses"]);
        });

        it("returns a capped subset of the available collections", async () => {
            const collections = ["students", "courses", "teachers", "departments", "enrollments", "rooms"];
            const result = await resolveRelevantCollections(
                "students with department courses teachers enroll registration",
                collections
            );
            assert.ok(result.length <= 5);
            assert.ok(result.every(name => collections.includes(name)));
        });

        it("returns nothing when there are no collections", async () => {
            assert.deepEqual(await resolveRelevantCollections("How many students?", []), []);
        });
    });

    describe("determineTargetCollection", () => {
        it("takes the most relevant collection first", () => {
            assert.equal(determineTargetCollection("anything", ["students", "courses"], ["courses", "students"]), "courses");
        });

        it("uses the priority keywords when nothing is relevant", () => {
            assert.equal(determineTargetCollection("list departments", ["students", "departments"], []), "departments");
        });

        it("falls back to the first collection, then the default", () => {
            assert.equal(determineTargetCollection("hello", ["courses"], []), "courses");
            assert.equal(determineTargetCollection("hello", [], []), "departments");
        });
    });

    describe("withTimeout", () => {
        it("passes through a value that arrives in time", async () => {
            assert.equal(await withTimeout(Promise.resolve("ok"), 50), "ok");
        });

        it("rejects with LLMTimeoutError after the deadline", async () => {
            await assert.rejects(withTimeout(new Promise<string>(() => undefined), 5), LLMTimeoutError);
        });
    });
});
