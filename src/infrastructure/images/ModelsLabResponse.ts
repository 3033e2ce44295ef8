import { z } from 'zod';

/**
 * Envelope shared by ModelsLab generation and fetch endpoints.
 * `success` carries output URLs, `processing` an id to fetch later.
 */
const ModelsLabResponseSchema = z.object({
    status: z.string(),
    id: z.union([z.number(), z.string()]).optional(),
    eta: z.number().optional(),
    output: z.array(z.string()).optional(),
    message: z.unknown().optional(),
});

export type ModelsLabOutcome =
    | { state: 'success'; outputUrl: string }
    | { state: 'processing'; requestId: string; etaSeconds?: number }
    | { state: 'error'; reason: string };

/**
 * Reads a ModelsLab response body into one of the three outcomes.
 */
export function parseModelsLabResponse(body: unknown): ModelsLabOutcome {
    const parsed = ModelsLabResponseSchema.safeParse(body);
    if (!parsed.success) {
        return { state: 'error', reason: 'unexpected response shape' };
    }

    const { status, id, eta, output, message } = parsed.data;
    switch (status.toLowerCase()) {
        case 'success': {
            const outputUrl = output?.[0];
            return outputUrl
                ? { state: 'success', outputUrl }
                : { state: 'error', reason: 'success response without output' };
        }
        case 'processing':
        case 'queued':
            if (id === undefined) {
                return { state: 'error', reason: 'processing response without request id' };
            }
            return { state: 'processing', requestId: String(id), etaSeconds: eta };
        default:
            return { state: 'error', reason: describeMessage(message) };
    }
}

function describeMessage(message: unknown): string {
    if (typeof message === 'string' && message.trim()) {
        return message.trim();
    }
    return 'provider reported an error';
}
