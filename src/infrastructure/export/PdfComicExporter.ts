import PDFDocument from 'pdfkit';
import { IComicExporter } from '../../domain/ports/IComicExporter';
import { IAssetFetcher } from '../../domain/ports/IAssetFetcher';
import { AssembledComic, AssembledPanel } from '../../domain/entities/StageResult';

const PAGE_MARGIN = 36;
const GUTTER = 12;
const CAPTION_HEIGHT = 56;

/**
 * Renders the comic as a PDF: a cover page, then one page per comic page
 * with panels laid out in a two-column grid.
 */
export class PdfComicExporter implements IComicExporter {
    readonly format = 'pdf';
    readonly mimeType = 'application/pdf';
    readonly fileExtension = 'pdf';

    constructor(private readonly assets: IAssetFetcher) { }

    async export(comic: AssembledComic): Promise<Buffer> {
        const images = new Map<number, Buffer>();
        for (const page of comic.pages) {
            for (const panel of page.panels) {
                images.set(panel.panelNumber, await this.assets.fetch(panel.imageUrl));
            }
        }

        const doc = new PDFDocument({
            size: 'A4',
            margin: PAGE_MARGIN,
            info: { Title: comic.title, Subject: comic.summary },
        });
        const rendered = collect(doc);

        this.drawCover(doc, comic);
        for (const page of comic.pages) {
            doc.addPage();
            this.drawPage(doc, page.pageNumber, page.panels, images);
        }
        doc.end();

        return rendered;
    }

    private drawCover(doc: PDFKit.PDFDocument, comic: AssembledComic): void {
        const width = doc.page.width - PAGE_MARGIN * 2;
        doc.fontSize(32).text(comic.title, PAGE_MARGIN, doc.page.height / 3, { width, align: 'center' });
        doc.moveDown();
        doc.fontSize(13).text(comic.summary, { width, align: 'center' });
        doc.moveDown();
        doc.fontSize(10).fillColor('#666666').text(`${comic.artStyle} edition`, { width, align: 'center' });
        doc.fillColor('#000000');
    }

    private drawPage(
        doc: PDFKit.PDFDocument,
        pageNumber: number,
        panels: AssembledPanel[],
        images: Map<number, Buffer>
    ): void {
        const columns = panels.length === 1 ? 1 : 2;
        const rows = Math.ceil(panels.length / columns);
        const cellWidth = (doc.page.width - PAGE_MARGIN * 2 - GUTTER * (columns - 1)) / columns;
        const cellHeight = (doc.page.height - PAGE_MARGIN * 2 - 20 - GUTTER * (rows - 1)) / rows;
        const imageHeight = Math.max(cellHeight - CAPTION_HEIGHT, cellHeight / 2);

        panels.forEach((panel, index) => {
            const x = PAGE_MARGIN + (index % columns) * (cellWidth + GUTTER);
            const y = PAGE_MARGIN + Math.floor(index / columns) * (cellHeight + GUTTER);

            const image = images.get(panel.panelNumber);
            if (image) {
                doc.image(image, x, y, { fit: [cellWidth, imageHeight], align: 'center', valign: 'center' });
            }
            doc.rect(x, y, cellWidth, imageHeight).lineWidth(1.5).stroke();

            doc.fontSize(9).text(panelText(panel), x, y + imageHeight + 4, {
                width: cellWidth,
                height: cellHeight - imageHeight - 4,
                ellipsis: true,
            });
        });

        doc.fontSize(8).text(String(pageNumber), PAGE_MARGIN, doc.page.height - PAGE_MARGIN - 18, {
            width: doc.page.width - PAGE_MARGIN * 2,
            align: 'center',
        });
    }
}

function panelText(panel: AssembledPanel): string {
    const lines: string[] = [];
    if (panel.caption) {
        lines.push(panel.caption);
    }
    for (const line of panel.dialogue) {
        lines.push(`${line.character}: "${line.text}"`);
    }
    if (panel.soundEffects.length > 0) {
        lines.push(panel.soundEffects.join(' '));
    }
    return lines.join('\n');
}

function collect(doc: PDFKit.PDFDocument): Promise<Buffer> {
    return new Promise((resolve, reject) => {
        const chunks: Buffer[] = [];
        doc.on('data', (chunk: Buffer) => chunks.push(chunk));
        doc.on('end', () => resolve(Buffer.concat(chunks)));
        doc.on('error', reject);
    });
}
