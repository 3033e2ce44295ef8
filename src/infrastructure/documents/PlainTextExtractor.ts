import fs from 'fs/promises';
import path from 'path';
import { DocumentType, IDocumentExtractor, describeUnsupportedDocument } from '../../domain/ports/IDocumentExtractor';
import { SourceDocument } from '../../domain/entities/ComicJob';
import { InvalidInputError } from '../../domain/errors/PipelineErrors';

const TEXT_MIME_TYPES = new Set(['text/plain', 'text/markdown', 'text/x-markdown']);
const TEXT_EXTENSIONS = new Set(['.txt', '.md', '.markdown']);

/**
 * Reads plain text and markdown uploads as strict UTF-8.
 */
export class PlainTextExtractor implements IDocumentExtractor {
    readonly acceptedExtensions = ['.txt', '.md'];

    supports(document: DocumentType): boolean {
        const extension = path.extname(document.originalName).toLowerCase();
        return TEXT_MIME_TYPES.has(document.mimeType.toLowerCase()) || TEXT_EXTENSIONS.has(extension);
    }

    async extractText(document: SourceDocument): Promise<string> {
        if (!this.supports(document)) {
            throw new InvalidInputError(describeUnsupportedDocument(document, this.acceptedExtensions));
        }

        const bytes = await readUpload(document);
        if (bytes.includes(0)) {
            throw new InvalidInputError(`Document ${document.originalName} looks like binary content`);
        }

        // The decoder drops a leading byte order mark
        try {
            return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
        } catch {
            throw new InvalidInputError(`Document ${document.originalName} is not valid UTF-8 text`);
        }
    }
}

/**
 * Reads an uploaded file, reporting a missing or unreadable file as invalid input.
 */
export async function readUpload(document: SourceDocument): Promise<Buffer> {
    try {
        return await fs.readFile(document.path);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new InvalidInputError(`Could not read uploaded document ${document.originalName}: ${reason}`);
    }
}
