export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Empty means: nothing, an empty list, a `{ result }` envelope holding nothing, or a
 * string that is blank, contains `[]`, or says "empty".
 */
export function isEmptyResult(result: unknown): boolean {
    if (result === null || result === undefined) {
        return true;
    }
    if (Array.isArray(result)) {
        return result.length === 0;
    }
    if (isRecord(result)) {
        if ("result" in result) {
            const inner = result.result;
            return Array.isArray(inner) ? inner.length === 0 : inner === null || inner === undefined;
        }
        return false;
    }
    if (typeof result === "string") {
        const lower = result.toLowerCase();
        return result.trim() === "" || lower.includes("[]") || lower.includes("empty");
    }
    return false;
}

function toRows(items: unknown[]): Record<string, unknown>[] {
    return items.map(item => (isRecord(item) ? item : { result: item }));
}

/**
 * Normalizes whatever the executor returned into a list of records.
 */
export function parseResults(results: unknown): Record<string, unknown>[] {
    if (results === null || results === undefined) {
        return [];
    }
    if (typeof results === "string") {
        let parsed: unknown;
        try {
            parsed = JSON.parse(results);
        } catch {
            return [{ content: results }];
        }
        return Array.isArray(parsed) ? toRows(parsed) : [{ result: parsed }];
    }
    if (Array.isArray(results)) {
        return toRows(results);
    }
    if (isRecord(results)) {
        return [results];
    }
    return [{ result: String(results) }];
}

export function previewResult(result: unknown, maxLength = 200): string {
    const text = typeof result === "string" ? result : JSON.stringify(result) ?? String(result);
    return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}
