import { after, before, describe, it } from "node:test";
import assert from "node:assert/strict";
import { ChatAnthropic } from "@langchain/anthropic";
import { ChatGoogleGenerativeAI } from "@langchain/google-genai";
import { ChatOpenAI } from "@langchain/openai";
import { ChatResult } from "@langchain/core/outputs";
import { FakeListChatModel } from "@langchain/core/utils/testing";
import { setLogLevel } from "../logger";
import { cleanModelOutput, getLLM, invokeLLM } from "../llmFactory";

class UnauthorizedChatModel extends FakeListChatModel {
    async _generate(): Promise<ChatResult> {
        throw new Error("Request failed with status code 401");
    }
}

describe("llmFactory", () => {
    const savedKeys: Record<string, string | undefined> = {};
    const KEY_NAMES = ["ANTHROPIC_API_KEY", "GROQ_API_KEY"];

    before(() => {
        setLogLevel("silent");
        for (const name of KEY_NAMES) {
            savedKeys[name] = process.env[name];
            delete process.env[name];
        }
    });

    after(() => {
        for (const name of KEY_NAMES) {
            if (savedKeys[name] !== undefined) process.env[name] = savedKeys[name];
        }
    });

    describe("cleanModelOutput", () => {
        it("strips think blocks and code fences", () => {
            assert.equal(
                cleanModelOutput('<think>which collection?</think>\n```javascript\ndb.students.aggregate([{"$limit": 1}])\n```'),
                'db.students.aggregate([{"$limit": 1}])'
            );
        });

        it("trims plain answers", () => {
            assert.equal(cleanModelOutput("  YES \n"), "YES");
        });
    });

    describe("getLLM", () => {
        it("builds the model for each provider", () => {
            assert.ok(getLLM({ config: { provider: "anthropic", apiKey: "test-key" } }) instanceof ChatAnthropic);
            assert.ok(getLLM({ config: { provider: "gemini", apiKey: "test-key" } }) instanceof ChatGoogleGenerativeAI);
            assert.ok(getLLM({ config: { provider: "openai", apiKey: "test-key" } }) instanceof ChatOpenAI);
            assert.ok(getLLM({ config: { provider: "openrouter", apiKey: "test-key" } }) instanceof ChatOpenAI);
        });

        it("fails without an API key", () => {
            assert.throws(() => getLLM({ config: { provider: "anthropic" } }), { message: "API Key for anthropic is missing." });
        });
    });

    describe("invokeLLM", () => {
        it("returns the answer text without reasoning", async () => {
            const llm = new FakeListChatModel({ responses: ["<think>count it</think> There are 42 students."] });
            assert.equal(await invokeLLM(llm, "How many students?"), "There are 42 students.");
        });

        it("explains authentication failures", async () => {
            const llm = new UnauthorizedChatModel({ responses: [] });
            await assert.rejects(invokeLLM(llm, "hi"), {
                message: "Authentication failed (401). Please check your API Key and Base URL.",
            });
        });
    });
});
