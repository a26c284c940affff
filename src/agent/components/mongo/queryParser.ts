import { BSON } from "mongodb";
import { QueryParseError, ReadOnlyViolationError } from "../../core/errors";
import { isRecord } from "./results";

export interface AggregateCommand {
    collection: string;
    pipeline: Record<string, unknown>[];
    options: Record<string, unknown>;
}

const COMMAND_PATTERN = /^db\.([A-Za-z_][\w.-]*?)\.(\w+)\(([\s\S]*)\)$/;

/** A double-quoted literal, escapes included. */
export const STRING_LITERAL = String.raw`"(?:[^"\\]|\\.)*"`;

export const FORBIDDEN_STAGES = ["$out", "$merge"];

function closingQuote(text: string, start: number): number {
    const quote = text[start];
    for (let i = start + 1; i < text.length; i++) {
        if (text[i] === "\\") {
            i++;
        } else if (text[i] === quote) {
            return i;
        }
    }
    return -1;
}

/**
 * Rewrites single-quoted literals as double-quoted ones. Double-quoted literals are left
 * as they are, apostrophes inside them included. An unterminated quote is kept verbatim.
 */
export function normalizeQuotes(text: string): string {
    let out = "";
    let i = 0;
    while (i < text.length) {
        const ch = text[i];
        const end = ch === '"' || ch === "'" ? closingQuote(text, i) : -1;
        if (end < 0) {
            out += ch;
            i++;
            continue;
        }
        if (ch === '"') {
            out += text.slice(i, end + 1);
        } else {
            const body = text.slice(i + 1, end).replace(/\\(.)|"/g, (match: string, escaped: string | undefined) => {
                if (escaped === undefined) return '\\"';
                return escaped === "'" ? "'" : match;
            });
            out += `"${body}"`;
        }
        i = end + 1;
    }
    return out;
}

/**
 * `String.replace` that never rewrites inside a double-quoted literal. `pattern` must not
 * itself start with a quote.
 */
export function replaceOutsideStrings(text: string, pattern: RegExp, replace: (groups: RegExpExecArray) => string): string {
    const combined = new RegExp(`${STRING_LITERAL}|${pattern.source}`, "g");
    const exact = new RegExp(`^(?:${pattern.source})$`);
    return text.replace(combined, (match: string) => {
        if (match.startsWith('"')) return match;
        const groups = exact.exec(match);
        return groups ? replace(groups) : match;
    });
}

/** Blanks out every string literal, leaving only the code around them. */
export function stripStringLiterals(text: string): string {
    return text.replace(new RegExp(STRING_LITERAL, "g"), '""');
}

export function convertCapitalizedLiterals(text: string): string {
    return replaceOutsideStrings(text, /([:\[,(]\s*)(True|False|None)\b/, m => `${m[1]}${m[2] === "None" ? "null" : m[2].toLowerCase()}`);
}

/**
 * Rewrites shell syntax (helpers, bare keys, capitalized True/False/None, trailing commas)
 * into extended JSON. String contents are never touched.
 */
export function shellToJson(text: string): string {
    let json = normalizeQuotes(text);

    json = replaceOutsideStrings(json, new RegExp(String.raw`ObjectId\(\s*(${STRING_LITERAL})\s*\)`), m => `{"$oid": ${m[1]}}`);
    json = replaceOutsideStrings(
        json,
        new RegExp(String.raw`(?:new\s+Date|ISODate)\(\s*(${STRING_LITERAL})\s*\)`),
        m => `{"$date": ${m[1]}}`
    );
    json = replaceOutsideStrings(json, /(?:new\s+Date|ISODate)\(\s*\)/, () => `{"$date": "${new Date().toISOString()}"}`);

    json = convertCapitalizedLiterals(json);
    json = replaceOutsideStrings(json, /([{,]\s*)([A-Za-z_$][\w$]*)\s*:/, m => `${m[1]}"${m[2]}":`);
    json = replaceOutsideStrings(json, /,(\s*[\]}])/, m => m[1]);
    return json;
}

function parseExtendedJson(text: string): unknown {
    return BSON.EJSON.parse(text, { relaxed: true });
}

function parseIfExtendedJson(text: string): { value: unknown } | null {
    try {
        return { value: parseExtendedJson(text) };
    } catch {
        return null;
    }
}

/** Parses the call arguments as extended JSON, falling back to shell syntax. */
function parseArguments(args: string): unknown {
    const plain = parseIfExtendedJson(`[${args}]`);
    if (plain) return plain.value;

    try {
        return parseExtendedJson(`[${shellToJson(args)}]`);
    } catch (e) {
        throw new QueryParseError(`Could not parse aggregate arguments: ${e instanceof Error ? e.message : String(e)}`);
    }
}

function assertReadOnly(pipeline: Record<string, unknown>[]) {
    for (const stage of pipeline) {
        const forbidden = FORBIDDEN_STAGES.find(name => name in stage);
        if (forbidden) {
            throw new ReadOnlyViolationError(`Stage ${forbidden} is not allowed in read-only mode`);
        }
    }
}

/**
 * Parses `db.<collection>.aggregate(<pipeline>[, <options>])`. Any other method is
 * rejected, as is a pipeline that writes.
 */
export function parseAggregateCommand(text: string): AggregateCommand {
    const command = text.trim().replace(/;+$/, "").trim();
    const match = command.match(COMMAND_PATTERN);
    if (!match) {
        throw new QueryParseError(`Unrecognized MongoDB command: ${command}`);
    }

    const [, collection, method, args] = match;
    if (method !== "aggregate") {
        throw new ReadOnlyViolationError(`Only aggregate commands are allowed, got "${method}"`);
    }

    const parsed = parseArguments(args);

    if (!Array.isArray(parsed) || parsed.length === 0 || parsed.length > 2) {
        throw new QueryParseError("aggregate expects a pipeline and optional options");
    }

    const [pipeline, options = {}] = parsed;
    if (!Array.isArray(pipeline) || !pipeline.every(isRecord)) {
        throw new QueryParseError("Aggregation pipeline must be an array of stages");
    }
    if (!isRecord(options)) {
        throw new QueryParseError("Aggregate options must be an object");
    }

    assertReadOnly(pipeline);
    return { collection, pipeline, options };
}

export function applyResultLimit(pipeline: Record<string, unknown>[], maxResults: number): Record<string, unknown>[] {
    if (pipeline.some(stage => "$limit" in stage)) {
        return pipeline;
    }
    return [...pipeline, { $limit: maxResults }];
}
