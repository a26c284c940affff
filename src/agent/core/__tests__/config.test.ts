import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { loadSettings } from "../config";
import { ConfigurationError } from "../errors";

describe("loadSettings", () => {
    it("applies defaults to an empty environment", () => {
        const settings = loadSettings({});
        assert.equal(settings.MONGODB_URI, "mongodb://localhost:27017");
        assert.equal(settings.DATABASE_NAME, "school_db");
        assert.equal(settings.PORT, 3001);
        assert.equal(settings.LLM_PROVIDER, "openai");
        assert.equal(settings.MAX_RETRIES, 3);
        assert.equal(settings.AI_TIMEOUT_MS, 30000);
        assert.equal(settings.MAX_QUERY_RESULTS, 100);
        assert.equal(settings.LOG_LEVEL, "info");
        assert.equal(settings.MODEL_NAME, undefined);
        assert.equal(settings.COLLECTION_REGISTRY_PATH, undefined);
    });

    it("coerces numbers and treats blank values as unset", () => {
        const settings = loadSettings({ PORT: "8080", MAX_RETRIES: " 5 ", DATABASE_NAME: "  ", LLM_PROVIDER: "anthropic" });
        assert.equal(settings.PORT, 8080);
        assert.equal(settings.MAX_RETRIES, 5);
        assert.equal(settings.DATABASE_NAME, "school_db");
        assert.equal(settings.LLM_PROVIDER, "anthropic");
    });

    it("rejects invalid values with a ConfigurationError", () => {
        assert.throws(() => loadSettings({ LLM_PROVIDER: "cohere" }), (error: unknown) => {
            assert.ok(error instanceof ConfigurationError);
            assert.equal(error.code, "CONFIGURATION_INVALID");
            assert.ok(error.message.startsWith("Invalid configuration: LLM_PROVIDER"));
            return true;
        });
        assert.throws(() => loadSettings({ MAX_RETRIES: "0" }), ConfigurationError);
        assert.throws(() => loadSettings({ PORT: "not-a-port" }), ConfigurationError);
    });
});
