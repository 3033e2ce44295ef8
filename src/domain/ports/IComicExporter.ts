import { OutputFormat } from '../entities/ComicJob';
import { AssembledComic } from '../entities/StageResult';

/**
 * IComicExporter - Port for one output format.
 * Implementations: PdfComicExporter, CbzComicExporter, WebComicExporter, VideoPlaylistExporter
 */
export interface IComicExporter {
    readonly format: OutputFormat;
    readonly mimeType: string;
    readonly fileExtension: string;
    export(comic: AssembledComic): Promise<Buffer>;
}
