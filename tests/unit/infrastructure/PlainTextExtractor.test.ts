import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { PlainTextExtractor } from '../../../src/infrastructure/documents/PlainTextExtractor';
import { InvalidInputError } from '../../../src/domain/errors/PipelineErrors';

describe('PlainTextExtractor', () => {
    const extractor = new PlainTextExtractor();
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'comic-extract-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    function upload(name: string, content: string | Buffer, mimeType = 'text/plain') {
        const filePath = path.join(dir, name);
        fs.writeFileSync(filePath, content);
        return { originalName: name, mimeType, path: filePath, sizeBytes: Buffer.byteLength(content) };
    }

    it('should support text and markdown by type or extension', () => {
        expect(extractor.supports({ originalName: 'a.bin', mimeType: 'text/markdown' })).toBe(true);
        expect(extractor.supports({ originalName: 'Notes.MD', mimeType: 'application/octet-stream' })).toBe(true);
        expect(extractor.supports({ originalName: 'story.pdf', mimeType: 'application/pdf' })).toBe(false);
    });

    it('should read the file and drop a byte order mark', async () => {
        const document = upload('story.txt', '\uFEFFOnce upon a time.');

        await expect(extractor.extractText(document)).resolves.toBe('Once upon a time.');
    });

    it('should refuse unsupported types', async () => {
        const document = upload('story.pdf', '%PDF-1.4', 'application/pdf');

        await expect(extractor.extractText(document)).rejects.toThrow(
            new InvalidInputError('Unsupported document type: application/pdf (story.pdf). Upload a .txt or .md file.')
        );
    });

    it('should refuse text that is not valid UTF-8', async () => {
        const document = upload('story.txt', Buffer.from([0x48, 0x69, 0xc3, 0x28]));

        await expect(extractor.extractText(document)).rejects.toThrow(
            new InvalidInputError('Document story.txt is not valid UTF-8 text')
        );
    });

    it('should refuse binary content', async () => {
        const document = upload('story.txt', Buffer.from([0x48, 0x00, 0x49]));

        await expect(extractor.extractText(document)).rejects.toThrow('Document story.txt looks like binary content');
    });

    it('should fail as invalid input when the file is gone', async () => {
        const document = { originalName: 'gone.txt', mimeType: 'text/plain', path: path.join(dir, 'gone.txt'), sizeBytes: 1 };

        await expect(extractor.extractText(document)).rejects.toBeInstanceOf(InvalidInputError);
    });
});
