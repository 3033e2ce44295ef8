/**
 * Error taxonomy for the comic pipeline.
 * Every failure a stage surfaces to the orchestrator carries one of these kinds.
 */
export const PIPELINE_ERROR_KINDS = [
    'InvalidInputError',
    'GenerationError',
    'AssemblyError',
    'TimeoutError',
] as const;
export type PipelineErrorKind = (typeof PIPELINE_ERROR_KINDS)[number];

/**
 * Base class for typed pipeline failures.
 */
export abstract class PipelineError extends Error {
    abstract readonly kind: PipelineErrorKind;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * Malformed, empty or unsupported input. Never retried.
 */
export class InvalidInputError extends PipelineError {
    readonly kind = 'InvalidInputError';
}

/**
 * A text, image or video provider call failed or returned unusable output.
 */
export class GenerationError extends PipelineError {
    readonly kind = 'GenerationError';
}

/**
 * A required upstream artifact was missing when the comic was assembled.
 */
export class AssemblyError extends PipelineError {
    readonly kind = 'AssemblyError';
}

/**
 * A provider never resolved a pending request within the allotted window.
 */
export class ProviderTimeoutError extends PipelineError {
    readonly kind = 'TimeoutError';
}

const MAX_ERROR_MESSAGE_LENGTH = 300;

/**
 * Maps any thrown value onto the taxonomy. Untyped errors count as generation failures.
 */
export function classifyError(error: unknown): { kind: PipelineErrorKind; message: string } {
    const message = error instanceof Error ? error.message : String(error);
    const kind = error instanceof PipelineError ? error.kind : 'GenerationError';
    return { kind, message: summarizeMessage(message) };
}

/**
 * Trims provider detail down to a single short line.
 */
export function summarizeMessage(message: string): string {
    const firstLine = message.split('\n')[0].trim() || 'Unknown error';
    return firstLine.length > MAX_ERROR_MESSAGE_LENGTH
        ? `${firstLine.substring(0, MAX_ERROR_MESSAGE_LENGTH - 3)}...`
        : firstLine;
}
