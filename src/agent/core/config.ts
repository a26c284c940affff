import { z } from "zod";
import * as dotenv from "dotenv";
import { ConfigurationError } from "./errors";

dotenv.config();

export const SettingsSchema = z.object({
    MONGODB_URI: z.string().min(1).default("mongodb://localhost:27017"),
    DATABASE_NAME: z.string().min(1).default("school_db"),
    PORT: z.coerce.number().int().positive().default(3001),
    LLM_PROVIDER: z.enum(["openai", "anthropic", "gemini", "openrouter"]).default("openai"),
    MODEL_NAME: z.string().optional(),
    MAX_RETRIES: z.coerce.number().int().min(1).max(10).default(3),
    AI_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    MAX_QUERY_RESULTS: z.coerce.number().int().positive().default(100),
    COLLECTION_REGISTRY_PATH: z.string().optional(),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
});

export type Settings = z.infer<typeof SettingsSchema>;

/**
 * Reads and validates runtime settings. Empty strings are treated as unset so a
 * blank line in `.env` falls back to the default.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
    const cleaned: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value.trim() !== "") cleaned[key] = value.trim();
    }

    const parsed = SettingsSchema.safeParse(cleaned);
    if (!parsed.success) {
        const details = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`).join("; ");
        throw new ConfigurationError(`Invalid configuration: ${details}`);
    }
    return parsed.data;
}
