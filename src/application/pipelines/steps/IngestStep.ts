/**
 * Ingest step - turns the request's text or uploaded document into clean source text.
 */

import { PipelineStep, StageContext } from '../PipelineInfrastructure';
import { IDocumentExtractor } from '../../../domain/ports/IDocumentExtractor';
import { IngestResult, freezeResult, STAGE_LABELS } from '../../../domain/entities/StageResult';
import { InvalidInputError } from '../../../domain/errors/PipelineErrors';

const DEFAULT_MAX_SOURCE_CHARS = 40000;

export class IngestStep implements PipelineStep {
    readonly name = 'ingest';
    readonly label = STAGE_LABELS.ingest;

    constructor(
        private readonly documentExtractor: IDocumentExtractor,
        private readonly maxSourceChars: number = DEFAULT_MAX_SOURCE_CHARS
    ) { }

    async execute(context: StageContext): Promise<IngestResult> {
        const { input } = context;
        const hasText = input.text !== undefined && input.text.trim().length > 0;

        let raw: string;
        if (hasText && input.text !== undefined) {
            raw = input.text;
        } else if (input.document) {
            console.log(`[${context.jobId}] Extracting text from ${input.document.originalName}`);
            raw = await this.documentExtractor.extractText(input.document);
        } else {
            throw new InvalidInputError('Either text or a document is required');
        }

        let content = normalizeWhitespace(raw);
        if (!content) {
            throw new InvalidInputError('The source text is empty');
        }
        if (content.length > this.maxSourceChars) {
            console.warn(`[${context.jobId}] Source truncated from ${content.length} to ${this.maxSourceChars} characters`);
            content = content.substring(0, this.maxSourceChars);
        }

        const wordCount = content.split(/\s+/).filter(Boolean).length;
        console.log(`[${context.jobId}] Ingested ${wordCount} words`);

        return freezeResult({
            stage: 'ingest',
            title: input.title,
            content,
            wordCount,
            sourceType: hasText ? 'text' : 'document',
            language: input.targetLanguage,
        });
    }
}

/**
 * Normalizes line endings, collapses runs of spaces and keeps paragraph breaks.
 */
export function normalizeWhitespace(text: string): string {
    return text
        .replace(/\r\n?/g, '\n')
        .replace(/[^\S\n]+/g, ' ')
        .replace(/ *\n */g, '\n')
        .replace(/\n{3,}/g, '\n\n')
        .trim();
}
