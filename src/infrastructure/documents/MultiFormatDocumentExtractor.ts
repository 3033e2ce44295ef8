import { DocumentType, IDocumentExtractor, describeUnsupportedDocument } from '../../domain/ports/IDocumentExtractor';
import { SourceDocument } from '../../domain/entities/ComicJob';
import { InvalidInputError } from '../../domain/errors/PipelineErrors';

/**
 * Routes each upload to the first extractor that reads its type.
 */
export class MultiFormatDocumentExtractor implements IDocumentExtractor {
    readonly acceptedExtensions: readonly string[];

    constructor(private readonly extractors: readonly IDocumentExtractor[]) {
        this.acceptedExtensions = extractors.flatMap((extractor) => extractor.acceptedExtensions);
    }

    supports(document: DocumentType): boolean {
        return this.extractors.some((extractor) => extractor.supports(document));
    }

    async extractText(document: SourceDocument): Promise<string> {
        const extractor = this.extractors.find((candidate) => candidate.supports(document));
        if (!extractor) {
            throw new InvalidInputError(describeUnsupportedDocument(document, this.acceptedExtensions));
        }
        return extractor.extractText(document);
    }
}
