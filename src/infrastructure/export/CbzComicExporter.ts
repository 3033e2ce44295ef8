import JSZip from 'jszip';
import { IComicExporter } from '../../domain/ports/IComicExporter';
import { IAssetFetcher } from '../../domain/ports/IAssetFetcher';
import { AssembledComic } from '../../domain/entities/StageResult';
import { escapeXml } from './markup';

/**
 * Packs panel images into a comic book archive with a ComicInfo.xml descriptor.
 * Images are named so that readers display them in panel order.
 */
export class CbzComicExporter implements IComicExporter {
    readonly format = 'cbz';
    readonly mimeType = 'application/vnd.comicbook+zip';
    readonly fileExtension = 'cbz';

    constructor(private readonly assets: IAssetFetcher) { }

    async export(comic: AssembledComic): Promise<Buffer> {
        const zip = new JSZip();
        let imageCount = 0;

        for (const page of comic.pages) {
            for (const panel of page.panels) {
                const image = await this.assets.fetch(panel.imageUrl);
                const name = `${pad(page.pageNumber, 3)}_${pad(panel.panelNumber, 4)}.${imageExtension(image)}`;
                zip.file(name, image);
                imageCount++;
            }
        }

        zip.file('ComicInfo.xml', buildComicInfo(comic, imageCount));

        return zip.generateAsync({ type: 'nodebuffer', compression: 'STORE' });
    }
}

export function buildComicInfo(comic: AssembledComic, imageCount: number): string {
    return [
        '<?xml version="1.0" encoding="utf-8"?>',
        '<ComicInfo xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance" xmlns:xsd="http://www.w3.org/2001/XMLSchema">',
        `  <Title>${escapeXml(comic.title)}</Title>`,
        `  <Summary>${escapeXml(comic.summary)}</Summary>`,
        `  <PageCount>${imageCount}</PageCount>`,
        `  <LanguageISO>${escapeXml(comic.language)}</LanguageISO>`,
        `  <Genre>${escapeXml(comic.artStyle)}</Genre>`,
        '</ComicInfo>',
        '',
    ].join('\n');
}

function imageExtension(image: Buffer): string {
    if (image.subarray(0, 3).equals(Buffer.from([0xff, 0xd8, 0xff]))) {
        return 'jpg';
    }
    if (image.subarray(0, 4).toString('ascii') === 'RIFF' && image.subarray(8, 12).toString('ascii') === 'WEBP') {
        return 'webp';
    }
    return 'png';
}

function pad(value: number, width: number): string {
    return String(value).padStart(width, '0');
}
