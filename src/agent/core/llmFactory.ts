import { ChatOpenAI } from "@langchain/openai";
import { ChatAnthropic } from "@langchain/anthropic";
import { ChatGoogleGenerativeAI } from "@langchain/google-genai";
import { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { BaseMessage } from "@langchain/core/messages";
import * as dotenv from "dotenv";
import { logger, errorMessage } from "./logger";

dotenv.config();

export interface LLMConfig {
    provider?: 'openai' | 'anthropic' | 'gemini' | 'openrouter';
    apiKey?: string;
    baseUrl?: string;
    modelName?: string;
    temperature?: number;
    maxTokens?: number;
}

/**
 * The only LLM touchpoint of the workflow: prompt in, text out.
 */
export type TextGenerator = (prompt: string, maxTokens: number, temperature: number) => Promise<string>;

function defaultModel(provider: NonNullable<LLMConfig["provider"]>): string {
    if (provider === 'anthropic') return "claude-3-5-sonnet-20240620";
    if (provider === 'gemini') return "gemini-1.5-pro";
    return "gpt-4o";
}

function apiKeyFor(provider: NonNullable<LLMConfig["provider"]>): string {
    if (provider === 'anthropic') return process.env.ANTHROPIC_API_KEY || "";
    if (provider === 'gemini') return process.env.GOOGLE_API_KEY || "";
    if (provider === 'openrouter') return process.env.OPENROUTER_API_KEY || process.env.OPENAI_API_KEY || "";
    return process.env.OPENAI_API_KEY || "";
}

export function getLLM(options: { config?: LLMConfig } = {}): BaseChatModel {
    const provider = options.config?.provider || 'openai';
    const modelName = options.config?.modelName || process.env.MODEL_NAME || defaultModel(provider);
    const temperature = options.config?.temperature ?? parseFloat(process.env.TEMPERATURE || "0");
    const maxTokens = options.config?.maxTokens;
    const apiKey = (options.config?.apiKey || apiKeyFor(provider)).trim();

    if (!apiKey && !options.config?.baseUrl) {
        // Groq speaks the OpenAI protocol, so it doubles as a keyless-default for local runs
        if (process.env.GROQ_API_KEY) {
            return new ChatOpenAI({
                modelName: options.config?.modelName || "llama-3.1-70b-versatile",
                temperature,
                maxTokens,
                openAIApiKey: process.env.GROQ_API_KEY,
                configuration: { baseURL: "https://api.groq.com/openai/v1" },
            });
        }
        throw new Error(`API Key for ${provider} is missing.`);
    }

    if (provider === 'anthropic') {
        logger.debug(`[LLM Factory] Initializing Anthropic with model ${modelName}.`);
        return new ChatAnthropic({
            modelName,
            temperature,
            maxTokens,
            anthropicApiKey: apiKey,
        });
    }

    if (provider === 'gemini') {
        logger.debug(`[LLM Factory] Initializing Gemini with model ${modelName}.`);
        return new ChatGoogleGenerativeAI({
            model: modelName,
            temperature,
            maxOutputTokens: maxTokens,
            apiKey,
        });
    }

    // Default: OpenAI or Compatible
    let baseUrl = options.config?.baseUrl || process.env.OPENAI_BASE_URL;
    if (provider === 'openrouter' && !baseUrl) {
        baseUrl = "https://openrouter.ai/api/v1";
    }

    logger.debug(`[LLM Factory] Initializing OpenAI/Compatible with model ${modelName} at ${baseUrl || 'standard endpoint'}.`);
    return new ChatOpenAI({
        modelName,
        temperature,
        maxTokens,
        openAIApiKey: apiKey || "not-needed",
        configuration: {
            baseURL: baseUrl || undefined,
            defaultHeaders: {
                "HTTP-Referer": "http://localhost:3001",
                "X-Title": "Node MQL Agent"
            }
        },
    });
}

/**
 * Strips reasoning blocks and markdown code fences some models wrap around answers.
 */
export function cleanModelOutput(text: string): string {
    let content = text.replace(/<think>[\s\S]*?<\/think>/gi, '');
    const fenced = content.match(/```[a-zA-Z]*\s*\n?([\s\S]*?)```/);
    if (fenced) {
        content = fenced[1];
    }
    return content.trim();
}

export async function invokeLLM(llm: BaseChatModel, prompt: string | BaseMessage[]): Promise<string> {
    try {
        const response = await llm.invoke(prompt);
        const content = typeof response.content === 'string' ? response.content : JSON.stringify(response.content);
        return content.replace(/<think>[\s\S]*?<\/think>/gi, '').trim();
    } catch (error) {
        const message = errorMessage(error);
        logger.error(`[LLM Error] ${message}`);
        if (message.includes('401')) {
            throw new Error(`Authentication failed (401). Please check your API Key and Base URL.`);
        }
        throw error;
    }
}

export function createTextGenerator(config: LLMConfig = {}): TextGenerator {
    return async (prompt, maxTokens, temperature) => {
        const llm = getLLM({ config: { ...config, maxTokens, temperature } });
        return invokeLLM(llm, prompt);
    };
}
