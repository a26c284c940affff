import { AggregateOptions, Db, Decimal128, Document, Long, MongoClient, ObjectId } from "mongodb";
import { QueryExecutionError } from "../../core/errors";
import { logger, errorMessage } from "../../core/logger";
import { applyResultLimit, parseAggregateCommand } from "./queryParser";
import { isRecord } from "./results";

/**
 * MongoDatabaseClient - pooled connection to one database, read-only by construction.
 *
 * Only `aggregate` commands reach the server; `$out` and `$merge` stages are rejected
 * before that, and every pipeline without its own `$limit` is capped.
 *
 * Environment Variables:
 * - MONGODB_URI: connection string (default: mongodb://localhost:27017)
 * - DATABASE_NAME: database to query (default: school_db)
 * - MAX_QUERY_RESULTS: cap appended to pipelines without a `$limit`
 */

export interface MongoClientConfig {
    uri: string;
    databaseName: string;
    maxResults?: number;
    sampleSize?: number;
}

export interface FieldDescription {
    name: string;
    types: string[];
    example: string;
}

export const DEFAULT_MAX_RESULTS = 100;
export const DEFAULT_SAMPLE_SIZE = 5;

export function bsonTypeName(value: unknown): string {
    if (value === null || value === undefined) return "Null";
    if (value instanceof ObjectId) return "ObjectId";
    if (value instanceof Date) return "Date";
    if (value instanceof Decimal128 || value instanceof Long) return "Number";
    if (Array.isArray(value)) return "Array";
    if (typeof value === "string") return "String";
    if (typeof value === "number" || typeof value === "bigint") return "Number";
    if (typeof value === "boolean") return "Boolean";
    return "Object";
}

/** A number when it converts exactly, otherwise the decimal text. */
export function exactNumber(text: string): number | string {
    const number = Number(text);
    const canonical = text.includes(".") ? text.replace(/0+$/, "").replace(/\.$/, "") : text;
    return Number.isFinite(number) && String(number) === canonical ? number : text;
}

/**
 * Converts driver values into plain JSON: ObjectIds become hex strings, Dates ISO strings.
 * 64-bit and decimal numbers stay numbers only while that is exact.
 */
export function toPlainValue(value: unknown): unknown {
    if (value instanceof ObjectId) return value.toHexString();
    if (value instanceof Date) return value.toISOString();
    if (value instanceof Decimal128) return exactNumber(value.toString());
    if (value instanceof Long || typeof value === "bigint") return exactNumber(value.toString());
    if (Array.isArray(value)) return value.map(toPlainValue);
    if (isRecord(value)) {
        return Object.fromEntries(Object.entries(value).map(([key, inner]) => [key, toPlainValue(inner)]));
    }
    return value;
}

function exampleOf(value: unknown): string {
    const text = JSON.stringify(toPlainValue(value)) ?? String(value);
    return text.length > 60 ? `${text.slice(0, 60)}...` : text;
}

/** Top-level fields of the sampled documents, in order of first appearance. */
export function describeFields(documents: Document[]): FieldDescription[] {
    const fields = new Map<string, FieldDescription>();

    for (const doc of documents) {
        for (const [name, value] of Object.entries(doc)) {
            const type = bsonTypeName(value);
            const existing = fields.get(name);
            if (!existing) {
                fields.set(name, { name, types: [type], example: exampleOf(value) });
            } else if (!existing.types.includes(type)) {
                existing.types.push(type);
            }
        }
    }

    return Array.from(fields.values());
}

export function formatCollectionSchema(collection: string, fields: FieldDescription[], documentCount: number): string {
    const lines = fields.map(f => `  - ${f.name}: ${f.types.join(" | ")} (e.g. ${f.example})`);
    return [`Collection: ${collection} (${documentCount} documents)`, "Fields:", ...lines].join("\n");
}

function aggregateOptions(raw: Record<string, unknown>): AggregateOptions {
    const options: AggregateOptions = {};
    if (typeof raw.allowDiskUse === "boolean") options.allowDiskUse = raw.allowDiskUse;
    if (typeof raw.maxTimeMS === "number") options.maxTimeMS = raw.maxTimeMS;
    return options;
}

export class MongoDatabaseClient {
    private client: MongoClient | null = null;
    private db: Db | null = null;
    private readonly maxResults: number;
    private readonly sampleSize: number;
    private static instances: Map<string, MongoDatabaseClient> = new Map();

    private constructor(private readonly config: MongoClientConfig) {
        this.maxResults = config.maxResults ?? DEFAULT_MAX_RESULTS;
        this.sampleSize = config.sampleSize ?? DEFAULT_SAMPLE_SIZE;
    }

    public static getInstance(config: MongoClientConfig): MongoDatabaseClient {
        const key = `${config.uri}_db_${config.databaseName}`;
        let instance = MongoDatabaseClient.instances.get(key);
        if (!instance) {
            instance = new MongoDatabaseClient(config);
            MongoDatabaseClient.instances.set(key, instance);
        }
        return instance;
    }

    get databaseName(): string {
        return this.config.databaseName;
    }

    get isConnected(): boolean {
        return this.db !== null;
    }

    async connect() {
        if (this.db) return;

        const client = new MongoClient(this.config.uri, { serverSelectionTimeoutMS: 5000 });
        try {
            await client.connect();
            const db = client.db(this.config.databaseName);
            await db.command({ ping: 1 });
            this.client = client;
            this.db = db;
            logger.info(`Successfully connected to MongoDB database "${this.config.databaseName}".`);
        } catch (e) {
            logger.error("Failed to connect to database: " + errorMessage(e));
            await client.close();
            throw e;
        }
    }

    private requireDb(): Db {
        if (!this.db) {
            throw new QueryExecutionError("Database not connected");
        }
        return this.db;
    }

    async ping(): Promise<boolean> {
        try {
            await this.requireDb().command({ ping: 1 });
            return true;
        } catch (e) {
            logger.warn(`Database ping failed: ${errorMessage(e)}`);
            return false;
        }
    }

    async listCollections(): Promise<string[]> {
        const infos = await this.requireDb().listCollections({}, { nameOnly: true }).toArray();
        return infos.map(info => info.name).sort();
    }

    async describeCollections(collectionNames: string[]): Promise<string> {
        const db = this.requireDb();
        const blocks: string[] = [];

        for (const name of collectionNames) {
            const collection = db.collection(name);
            const [count, samples] = await Promise.all([
                collection.estimatedDocumentCount(),
                collection.find({}).limit(this.sampleSize).toArray(),
            ]);
            blocks.push(formatCollectionSchema(name, describeFields(samples), count));
        }

        return blocks.join("\n\n");
    }

    /**
     * Runs one shell-style aggregate command and returns plain JSON documents.
     * Parse and read-only violations are thrown before any connection is needed.
     */
    async executeQuery(queryText: string): Promise<unknown[]> {
        const command = parseAggregateCommand(queryText);
        const db = this.requireDb();
        const pipeline = applyResultLimit(command.pipeline, this.maxResults);

        logger.debug(`Aggregating ${command.collection}: ${JSON.stringify(pipeline)}`);
        try {
            const docs = await db.collection(command.collection).aggregate(pipeline, aggregateOptions(command.options)).toArray();
            return docs.map(toPlainValue);
        } catch (e) {
            logger.error(`Database Error: ${errorMessage(e)}`);
            throw new QueryExecutionError(`Database Error: ${errorMessage(e)}`, queryText);
        }
    }

    async disconnect() {
        if (this.client) {
            await this.client.close();
            this.client = null;
            this.db = null;
            logger.info("Database connection closed.");
        }
    }
}
