import { z } from 'zod';
import { GenerationError } from '../../domain/errors/PipelineErrors';

/**
 * Parses a model's JSON answer and validates it against the stage schema.
 * Tolerates markdown code fences around the JSON.
 */
export function parseStageOutput<S extends z.ZodTypeAny>(raw: string, schema: S, what: string): z.infer<S> {
    const jsonText = extractJson(raw);
    if (!jsonText) {
        throw new GenerationError(`The ${what} response was empty`);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(jsonText);
    } catch {
        throw new GenerationError(`The ${what} response was not valid JSON`);
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
        const issue = result.error.issues[0];
        const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
        throw new GenerationError(`The ${what} response was malformed${where}: ${issue?.message ?? 'invalid shape'}`);
    }
    return result.data;
}

function extractJson(raw: string): string {
    const trimmed = raw.replace(/```(?:json)?\n?|\n?```/g, '').trim();
    const start = trimmed.indexOf('{');
    const end = trimmed.lastIndexOf('}');
    if (start >= 0 && end > start) {
        return trimmed.substring(start, end + 1);
    }
    return trimmed;
}
