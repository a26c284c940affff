import { randomUUID } from 'crypto';
import express, { Request, Response } from 'express';
import cors from 'cors';
import { loadSettings } from "./agent/core/config";
import { logger, errorMessage } from "./agent/core/logger";
import { createRuntime } from "./agent/runtime";
import type { QueryAgent } from "./agent/components/mongo/graph";
import { DEFAULT_REGISTRY, DomainRegistry, isSystemCollection } from "./agent/components/mongo/registry";
import { QueryRequest, QueryRequestSchema } from "./agent/components/mongo/schema";

export interface DatabaseInspector {
    readonly databaseName: string;
    ping(): Promise<boolean>;
    listCollections(): Promise<string[]>;
    describeCollections(collectionNames: string[]): Promise<string>;
}

function parseQueryRequest(req: Request, res: Response): QueryRequest | null {
    const parsed = QueryRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
        res.status(400).json({ error: parsed.error.issues[0]?.message ?? "Invalid request" });
        return null;
    }
    return parsed.data;
}

// A request without a thread id gets a thread of its own.
function threadIdOf(req: Request): string {
    return typeof req.query.thread_id === 'string' && req.query.thread_id ? req.query.thread_id : randomUUID();
}

export function createApp(agent: QueryAgent, database: DatabaseInspector, registry: DomainRegistry = DEFAULT_REGISTRY) {
    const app = express();
    app.use(cors());
    app.use(express.json());

    app.post('/api/structured/query', async (req, res) => {
        const request = parseQueryRequest(req, res);
        if (!request) return;

        const response = await agent.run(request.query, threadIdOf(req));
        if (request.max_results !== undefined) {
            response.results = response.results.slice(0, request.max_results);
        }
        res.json(response);
    });

    app.post('/api/structured/stream', async (req, res) => {
        const request = parseQueryRequest(req, res);
        if (!request) return;

        // Set headers for SSE
        res.setHeader('Content-Type', 'text/event-stream');
        res.setHeader('Cache-Control', 'no-cache');
        res.setHeader('Connection', 'keep-alive');

        try {
            for await (const event of agent.stream(request.query, threadIdOf(req))) {
                res.write(`data: ${JSON.stringify(event)}\n\n`);
            }
            res.write(`event: end\ndata: {}\n\n`);
        } catch (error) {
            logger.error(`Streaming error: ${errorMessage(error)}`);
            res.write(`event: error\ndata: ${JSON.stringify({ message: errorMessage(error) })}\n\n`);
        } finally {
            res.end();
        }
    });

    app.get('/api/structured/health', (_req, res) => {
        res.json({ status: "healthy", service: "structured-query-agent" });
    });

    app.get('/api/database/health', async (_req, res) => {
        const connected = await database.ping();
        res.status(connected ? 200 : 503).json({
            status: connected ? "healthy" : "unhealthy",
            database: database.databaseName,
        });
    });

    app.get('/api/database/collections', async (_req, res) => {
        try {
            const collections = (await database.listCollections()).filter(name => !isSystemCollection(name, registry));
            res.json({ success: true, collections });
        } catch (error) {
            logger.error(`Failed to list collections: ${errorMessage(error)}`);
            res.status(500).json({ success: false, error: errorMessage(error) });
        }
    });

    app.get('/api/database/schema/:name', async (req, res) => {
        try {
            const schema = await database.describeCollections([req.params.name]);
            res.json({ success: true, collection: req.params.name, schema });
        } catch (error) {
            logger.error(`Failed to describe ${req.params.name}: ${errorMessage(error)}`);
            res.status(500).json({ success: false, error: errorMessage(error) });
        }
    });

    return app;
}

async function main() {
    const settings = loadSettings();
    const { agent, database } = await createRuntime(settings);
    const app = createApp(agent, database);

    const server = app.listen(settings.PORT, () => {
        logger.info(`Server running on http://localhost:${settings.PORT}`);
        logger.info(`API Endpoint: http://localhost:${settings.PORT}/api/structured/query`);
    });

    const shutdown = () => {
        server.close();
        database.disconnect()
            .then(() => process.exit(0))
            .catch(error => {
                logger.error(`Error during shutdown: ${errorMessage(error)}`);
                process.exit(1);
            });
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
}

if (require.main === module) {
    main().catch(error => {
        logger.error(`Server failed to start: ${errorMessage(error)}`);
        process.exit(1);
    });
}
