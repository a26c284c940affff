#!/usr/bin/env node
import { loadSettings } from "./agent/core/config";
import { logger, errorMessage } from "./agent/core/logger";
import { createRuntime } from "./agent/runtime";

async function main() {
    const query = process.argv[2] || "How many students are there?";
    console.log(`Executing Query: ${query}`);

    const { agent, database } = await createRuntime(loadSettings());
    try {
        const response = await agent.run(query, process.argv[3] || "cli");
        console.log("\n--- Result ---");
        console.log(`Success: ${response.success}`);
        console.log(`Query: ${response.generated_query ?? "(none)"}`);
        console.log(`Answer: ${response.formatted_answer}`);
        if (response.error) console.log(`Error: ${response.error}`);
        console.log("Steps:");
        for (const step of response.workflow_steps) {
            console.log(`  ${step.step}: ${step.status}`);
        }
        console.log(`Time: ${response.execution_time.toFixed(2)}s`);
        process.exitCode = response.success ? 0 : 1;
    } finally {
        await database.disconnect();
    }
}

main().catch(e => {
    logger.error(`Agent failed: ${errorMessage(e)}`);
    process.exit(1);
});
