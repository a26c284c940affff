import type { BaseCheckpointSaver } from "@langchain/langgraph";
import { Settings, loadSettings } from "./core/config";
import { createTextGenerator } from "./core/llmFactory";
import { setLogLevel } from "./core/logger";
import { createQueryAgent, QueryAgent } from "./components/mongo/graph";
import { MongoDatabaseClient } from "./components/mongo/mongoClient";
import { loadDomainRegistry } from "./components/mongo/registry";

export interface AgentRuntime {
    settings: Settings;
    database: MongoDatabaseClient;
    agent: QueryAgent;
}

/**
 * Wires settings, the MongoDB client and the LLM into a ready agent.
 */
export async function createRuntime(
    settings: Settings = loadSettings(),
    options: { checkpointer?: BaseCheckpointSaver } = {}
): Promise<AgentRuntime> {
    setLogLevel(settings.LOG_LEVEL);

    const database = MongoDatabaseClient.getInstance({
        uri: settings.MONGODB_URI,
        databaseName: settings.DATABASE_NAME,
        maxResults: settings.MAX_QUERY_RESULTS,
    });
    await database.connect();

    const agent = createQueryAgent(
        {
            listCollections: () => database.listCollections(),
            fetchSchema: names => database.describeCollections(names),
            executeQuery: queryText => database.executeQuery(queryText),
            generateText: createTextGenerator({ provider: settings.LLM_PROVIDER, modelName: settings.MODEL_NAME }),
        },
        {
            maxRetries: settings.MAX_RETRIES,
            aiTimeoutMs: settings.AI_TIMEOUT_MS,
            registry: loadDomainRegistry(settings.COLLECTION_REGISTRY_PATH),
            checkpointer: options.checkpointer,
        }
    );

    return { settings, database, agent };
}
