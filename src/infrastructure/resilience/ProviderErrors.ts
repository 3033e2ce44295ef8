import { GenerationError, PipelineError, summarizeMessage } from '../../domain/errors/PipelineErrors';
import { getHttpStatus } from './RetryUtils';

/**
 * Converts a failed provider call into a pipeline error with a short summary.
 * Provider payloads are never copied into the message.
 */
export function toProviderError(provider: string, action: string, error: unknown): PipelineError {
    if (error instanceof PipelineError) {
        return error;
    }

    const status = getHttpStatus(error);
    if (status !== undefined) {
        return new GenerationError(`${provider} ${action} failed with HTTP ${status}`);
    }

    const code = readErrorCode(error);
    if (code) {
        return new GenerationError(`${provider} ${action} failed: network error (${code})`);
    }

    const message = error instanceof Error ? error.message : String(error);
    return new GenerationError(`${provider} ${action} failed: ${summarizeMessage(message)}`);
}

function readErrorCode(error: unknown): string | undefined {
    if (typeof error !== 'object' || error === null || !('code' in error)) {
        return undefined;
    }
    return typeof error.code === 'string' ? error.code : undefined;
}
