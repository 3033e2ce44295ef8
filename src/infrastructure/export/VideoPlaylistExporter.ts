import { IComicExporter } from '../../domain/ports/IComicExporter';
import { AssembledComic } from '../../domain/entities/StageResult';
import { AssemblyError } from '../../domain/errors/PipelineErrors';

export interface PlaylistEntry {
    panelNumber: number;
    pageNumber: number;
    videoUrl: string;
    posterUrl: string;
    durationSeconds: number;
    caption?: string;
}

export interface ComicPlaylist {
    title: string;
    language: string;
    totalDurationSeconds: number;
    clips: PlaylistEntry[];
}

/**
 * Exports the animated panels as an ordered JSON playlist.
 */
export class VideoPlaylistExporter implements IComicExporter {
    readonly format = 'video';
    readonly mimeType = 'application/json';
    readonly fileExtension = 'json';

    async export(comic: AssembledComic): Promise<Buffer> {
        return Buffer.from(JSON.stringify(buildPlaylist(comic), null, 2), 'utf-8');
    }
}

export function buildPlaylist(comic: AssembledComic): ComicPlaylist {
    const clips: PlaylistEntry[] = [];
    for (const page of comic.pages) {
        for (const panel of page.panels) {
            if (!panel.clip) {
                throw new AssemblyError(`Panel ${panel.panelNumber} has no video clip to export`);
            }
            clips.push({
                panelNumber: panel.panelNumber,
                pageNumber: page.pageNumber,
                videoUrl: panel.clip.videoUrl,
                posterUrl: panel.imageUrl,
                durationSeconds: panel.clip.durationSeconds,
                caption: panel.caption,
            });
        }
    }

    if (clips.length === 0) {
        throw new AssemblyError('Comic has no video clips to export');
    }

    const total = clips.reduce((sum, clip) => sum + clip.durationSeconds, 0);
    return {
        title: comic.title,
        language: comic.language,
        totalDurationSeconds: Math.round(total * 10) / 10,
        clips,
    };
}
