/**
 * Assembly step - combines every earlier result into the finished comic
 * and exports it in each requested format.
 */

import { PipelineStep, StageContext, StageReporter, requireStageResult, throwIfCancelled } from '../PipelineInfrastructure';
import { IComicExporter } from '../../../domain/ports/IComicExporter';
import { IArtifactStore } from '../../../domain/ports/IArtifactStore';
import { ComicArtifact, OutputFormat } from '../../../domain/entities/ComicJob';
import {
    AssembledComic,
    AssembledPage,
    AssemblyResult,
    PanelArtwork,
    PanelText,
    VideoClip,
    freezeResult, STAGE_LABELS,
} from '../../../domain/entities/StageResult';
import { AssemblyError, classifyError } from '../../../domain/errors/PipelineErrors';
import { groupByPage } from '../../../domain/services/PanelLayout';

export class AssemblyStep implements PipelineStep {
    readonly name = 'assembly';
    readonly label = STAGE_LABELS.assembly;
    private readonly exporters: Map<OutputFormat, IComicExporter>;

    constructor(
        exporters: IComicExporter[],
        private readonly artifactStore: IArtifactStore
    ) {
        this.exporters = new Map(exporters.map((exporter) => [exporter.format, exporter]));
    }

    async execute(context: StageContext, reporter: StageReporter): Promise<AssemblyResult> {
        const comic = buildComic(context);
        const formats = context.input.outputFormats;
        const artifacts: ComicArtifact[] = [];

        try {
            for (const format of formats) {
                throwIfCancelled(context, reporter);
                reporter.message(`Exporting ${format.toUpperCase()}`);
                artifacts.push(await this.exportFormat(context.jobId, comic, format));
                reporter.progress(artifacts.length, formats.length, `Exported ${artifacts.length} of ${formats.length} formats`);
            }
        } catch (error) {
            await this.discard(context.jobId, artifacts);
            throw error;
        }

        return freezeResult({ stage: 'assembly', comic, artifacts });
    }

    private async exportFormat(jobId: string, comic: AssembledComic, format: OutputFormat): Promise<ComicArtifact> {
        const exporter = this.exporters.get(format);
        if (!exporter) {
            throw new AssemblyError(`No exporter is available for the ${format} format`);
        }

        let data: Buffer;
        try {
            data = await exporter.export(comic);
        } catch (error) {
            if (error instanceof AssemblyError) {
                throw error;
            }
            const { message } = classifyError(error);
            throw new AssemblyError(`Exporting ${format} failed: ${message}`);
        }

        const fileName = `${slugify(comic.title)}.${exporter.fileExtension}`;
        const stored = await this.artifactStore.save(jobId, fileName, data);
        console.log(`[${jobId}] Exported ${format}: ${fileName} (${stored.sizeBytes} bytes)`);

        return {
            format,
            fileName,
            mimeType: exporter.mimeType,
            path: stored.path,
            sizeBytes: stored.sizeBytes,
        };
    }

    private async discard(jobId: string, artifacts: ComicArtifact[]): Promise<void> {
        for (const artifact of artifacts) {
            try {
                await this.artifactStore.removeFile(artifact.path);
            } catch (error) {
                console.warn(`[${jobId}] Could not remove partial artifact ${artifact.fileName}:`, error);
            }
        }
    }
}

/**
 * Joins script, text, artwork and clips into pages of panels.
 * Every script panel must have its artwork and text, and a clip when video was requested.
 */
export function buildComic(context: StageContext): AssembledComic {
    const { story } = requireStageResult(context, 'story', AssemblyError);
    const { script } = requireStageResult(context, 'script', AssemblyError);
    const { panels: texts } = requireStageResult(context, 'text', AssemblyError);
    const { artwork } = requireStageResult(context, 'visual', AssemblyError);
    const clips = context.input.includeVideo ? requireStageResult(context, 'video', AssemblyError).clips : [];

    const scriptNumbers = new Set(script.panels.map((panel) => panel.panelNumber));
    const artworkByPanel = indexByPanel<PanelArtwork>(artwork, scriptNumbers, 'artwork');
    const textByPanel = indexByPanel<PanelText>(texts, scriptNumbers, 'text');
    const clipByPanel = indexByPanel<VideoClip>(clips, scriptNumbers, 'video clip');

    const pages: AssembledPage[] = [];
    for (const [pageNumber, pagePanels] of groupByPage(script.panels)) {
        pages.push({
            pageNumber,
            panels: [...pagePanels]
                .sort((a, b) => a.panelNumber - b.panelNumber)
                .map((panel) => {
                    const art = artworkByPanel.get(panel.panelNumber);
                    if (!art) {
                        throw new AssemblyError(`Missing artwork for panel ${panel.panelNumber}`);
                    }
                    const text = textByPanel.get(panel.panelNumber);
                    if (!text) {
                        throw new AssemblyError(`Missing text for panel ${panel.panelNumber}`);
                    }
                    const clip = clipByPanel.get(panel.panelNumber);
                    if (context.input.includeVideo && !clip) {
                        throw new AssemblyError(`Missing video clip for panel ${panel.panelNumber}`);
                    }
                    return {
                        panelNumber: panel.panelNumber,
                        description: panel.description,
                        imageUrl: art.imageUrl,
                        caption: text.caption,
                        dialogue: text.dialogue,
                        soundEffects: text.soundEffects,
                        clip,
                    };
                }),
        });
    }

    return {
        title: script.title,
        summary: story.summary,
        artStyle: context.input.artStyle,
        language: context.input.targetLanguage,
        pages,
    };
}

function indexByPanel<T extends { panelNumber: number }>(
    items: readonly T[],
    scriptNumbers: Set<number>,
    what: string
): Map<number, T> {
    const indexed = new Map<number, T>();
    for (const item of items) {
        if (!scriptNumbers.has(item.panelNumber)) {
            throw new AssemblyError(`Found ${what} for panel ${item.panelNumber}, which is not in the script`);
        }
        indexed.set(item.panelNumber, item);
    }
    return indexed;
}

/**
 * File-name-safe version of a title.
 */
export function slugify(title: string): string {
    const slug = title
        .normalize('NFKD')
        .replace(/[\u0300-\u036f]/g, '')
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '')
        .substring(0, 60)
        .replace(/-+$/g, '');
    return slug || 'comic';
}
