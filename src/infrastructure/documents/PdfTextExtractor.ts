import path from 'path';
import pdfParse from 'pdf-parse';
import { DocumentType, IDocumentExtractor, describeUnsupportedDocument } from '../../domain/ports/IDocumentExtractor';
import { SourceDocument } from '../../domain/entities/ComicJob';
import { InvalidInputError } from '../../domain/errors/PipelineErrors';
import { readUpload } from './PlainTextExtractor';

const PDF_SIGNATURE = '%PDF-';

/**
 * Extracts the text layer of uploaded PDFs. Scanned pages without text are not OCR'd.
 */
export class PdfTextExtractor implements IDocumentExtractor {
    readonly acceptedExtensions = ['.pdf'];

    supports(document: DocumentType): boolean {
        return document.mimeType.toLowerCase() === 'application/pdf'
            || path.extname(document.originalName).toLowerCase() === '.pdf';
    }

    async extractText(document: SourceDocument): Promise<string> {
        if (!this.supports(document)) {
            throw new InvalidInputError(describeUnsupportedDocument(document, this.acceptedExtensions));
        }

        const bytes = await readUpload(document);
        if (bytes.subarray(0, 1024).indexOf(PDF_SIGNATURE) < 0) {
            throw new InvalidInputError(`Document ${document.originalName} is not a PDF file`);
        }

        let result: Awaited<ReturnType<typeof pdfParse>>;
        try {
            result = await pdfParse(bytes);
        } catch (error) {
            if (isPasswordError(error)) {
                throw new InvalidInputError(`Document ${document.originalName} is password protected`);
            }
            const reason = error instanceof Error ? error.message : String(error);
            throw new InvalidInputError(`Could not read PDF ${document.originalName}: ${reason}`);
        }

        const text = result.text.trim();
        if (!text) {
            throw new InvalidInputError(
                `Document ${document.originalName} contains no extractable text (${result.numpages} page(s))`
            );
        }
        console.log(`[Documents] Extracted ${text.length} characters from ${result.numpages} page(s) of ${document.originalName}`);
        return text;
    }
}

function isPasswordError(error: unknown): boolean {
    return typeof error === 'object'
        && error !== null
        && 'name' in error
        && error.name === 'PasswordException';
}
