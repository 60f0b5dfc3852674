import { StepData } from './types';

/**
 * Parse a JSON object out of a model response.
 *
 * Accepts a fenced ```json block, a bare object, or an object surrounded by
 * prose. Anything else comes back as `{ error, rawResponse }` so the step
 * still records what the model said.
 */
export function parseJsonResponse(response: string): StepData {
    const fenced = response.match(/```(?:json)?\s*([\s\S]*?)(?:```|$)/);
    const candidates = [
        fenced?.[1]?.trim(),
        response.trim(),
        response.match(/\{[\s\S]*\}/)?.[0],
    ];

    for (const candidate of candidates) {
        if (!candidate) continue;
        try {
            const parsed: unknown = JSON.parse(candidate);
            if (isRecord(parsed)) {
                return parsed;
            }
        } catch (error) {
            if (!(error instanceof SyntaxError)) throw error;
        }
    }

    return { error: 'JSON parse failed', rawResponse: response };
}

/**
 * Read a 0-100 score from a model answer such as "85" or "Score: 85/100"
 */
export function parseScore(response: string, fallback: number): number {
    const match = response.trim().match(/^(\d+(?:\.\d+)?)\b/)
        ?? response.match(/score\D{0,12}(\d+(?:\.\d+)?)/i)
        ?? response.match(/(\d+(?:\.\d+)?)\s*\/\s*100/);
    if (!match) return fallback;

    const score = parseFloat(match[1]);
    if (Number.isNaN(score) || score < 0 || score > 100) return fallback;
    return score;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function stringField(data: StepData, key: string, fallback = ''): string {
    const value = data[key];
    return typeof value === 'string' ? value : fallback;
}

export function arrayField(data: StepData, key: string): unknown[] {
    const value = data[key];
    return Array.isArray(value) ? value : [];
}
