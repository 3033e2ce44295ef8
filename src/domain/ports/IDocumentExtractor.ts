import { SourceDocument } from '../entities/ComicJob';

export type DocumentType = Pick<SourceDocument, 'originalName' | 'mimeType'>;

/**
 * IDocumentExtractor - Port for turning an uploaded document into text.
 * Implementations: PlainTextExtractor, PdfTextExtractor, MultiFormatDocumentExtractor
 */
export interface IDocumentExtractor {
    /** File extensions this extractor reads, e.g. `.pdf` */
    readonly acceptedExtensions: readonly string[];

    /** Whether the document's type can be read at all */
    supports(document: DocumentType): boolean;

    /**
     * Returns the document's text.
     * Rejects with InvalidInputError for unsupported or unreadable documents.
     */
    extractText(document: SourceDocument): Promise<string>;
}

/**
 * Message for an upload whose type no extractor reads.
 */
export function describeUnsupportedDocument(document: DocumentType, acceptedExtensions: readonly string[]): string {
    const choices = acceptedExtensions.length > 1
        ? `${acceptedExtensions.slice(0, -1).join(', ')} or ${acceptedExtensions[acceptedExtensions.length - 1]}`
        : acceptedExtensions.join('');
    return `Unsupported document type: ${document.mimeType || 'unknown'} (${document.originalName}). Upload a ${choices} file.`;
}
