import { IComicExporter } from '../../domain/ports/IComicExporter';
import { AssembledComic, AssembledPanel } from '../../domain/entities/StageResult';
import { escapeHtml } from './markup';

const STYLES = `
body { font-family: Georgia, serif; background: #f4f1ea; margin: 0; padding: 24px; }
header, .page { max-width: 960px; margin: 0 auto 32px; }
.page { background: #fff; padding: 16px; box-shadow: 0 2px 8px rgba(0,0,0,.15); }
.panels { display: grid; grid-template-columns: repeat(auto-fit, minmax(280px, 1fr)); gap: 12px; }
.panel { border: 3px solid #111; background: #fff; }
.panel img, .panel video { width: 100%; display: block; }
.caption { background: #fff7c2; padding: 6px 8px; font-style: italic; }
.dialogue { padding: 4px 8px; margin: 0; }
.sfx { font-weight: bold; letter-spacing: 2px; padding: 4px 8px; }
.page-number { text-align: center; color: #777; font-size: 12px; }
`.trim();

/**
 * Single-file HTML reader. Images and clips are referenced by URL, not embedded.
 */
export class WebComicExporter implements IComicExporter {
    readonly format = 'web';
    readonly mimeType = 'text/html';
    readonly fileExtension = 'html';

    async export(comic: AssembledComic): Promise<Buffer> {
        return Buffer.from(renderComicHtml(comic), 'utf-8');
    }
}

export function renderComicHtml(comic: AssembledComic): string {
    const pages = comic.pages
        .map((page) => [
            `<section class="page" id="page-${page.pageNumber}">`,
            '<div class="panels">',
            ...page.panels.map(renderPanel),
            '</div>',
            `<div class="page-number">${page.pageNumber}</div>`,
            '</section>',
        ].join('\n'))
        .join('\n');

    return [
        '<!DOCTYPE html>',
        `<html lang="${escapeHtml(comic.language)}">`,
        '<head>',
        '<meta charset="utf-8">',
        '<meta name="viewport" content="width=device-width, initial-scale=1">',
        `<title>${escapeHtml(comic.title)}</title>`,
        `<style>${STYLES}</style>`,
        '</head>',
        '<body>',
        `<header><h1>${escapeHtml(comic.title)}</h1><p>${escapeHtml(comic.summary)}</p></header>`,
        pages,
        '</body>',
        '</html>',
        '',
    ].join('\n');
}

function renderPanel(panel: AssembledPanel): string {
    const parts: string[] = [`<figure class="panel" data-panel="${panel.panelNumber}">`];

    if (panel.caption) {
        parts.push(`<div class="caption">${escapeHtml(panel.caption)}</div>`);
    }
    if (panel.clip) {
        parts.push(
            `<video src="${escapeHtml(panel.clip.videoUrl)}" poster="${escapeHtml(panel.imageUrl)}" controls loop muted playsinline></video>`
        );
    } else {
        parts.push(`<img src="${escapeHtml(panel.imageUrl)}" alt="${escapeHtml(panel.description)}" loading="lazy">`);
    }
    for (const line of panel.dialogue) {
        parts.push(`<p class="dialogue"><strong>${escapeHtml(line.character)}:</strong> ${escapeHtml(line.text)}</p>`);
    }
    if (panel.soundEffects.length > 0) {
        parts.push(`<div class="sfx">${escapeHtml(panel.soundEffects.join(' '))}</div>`);
    }

    parts.push('</figure>');
    return parts.join('\n');
}
