import { AssemblyStep, buildComic, slugify } from '../../../../src/application/pipelines/steps/AssemblyStep';
import { StageContext, createStageContext, silentReporter, withResult } from '../../../../src/application/pipelines/PipelineInfrastructure';
import { ComicJobInput } from '../../../../src/domain/entities/ComicJob';
import { ScriptPanel } from '../../../../src/domain/entities/StageResult';
import { AssemblyError } from '../../../../src/domain/errors/PipelineErrors';
import { InMemoryArtifactStore, PNG_DATA_URL, StubExporter, buildInput } from '../../../helpers/comicFakes';

interface ContextOptions {
    input?: Partial<ComicJobInput>;
    skipArtworkFor?: number;
    extraTextFor?: number;
    withClips?: boolean;
}

function fullContext(options: ContextOptions = {}): StageContext {
    const panels: ScriptPanel[] = [1, 2, 3].map((panelNumber) => ({
        panelNumber,
        pageNumber: panelNumber < 3 ? 1 : 2,
        description: `Panel ${panelNumber} scene`,
        mood: 'hopeful',
        cameraAngle: 'wide shot',
        characters: [],
    }));
    const textNumbers = options.extraTextFor ? [1, 2, 3, options.extraTextFor] : [1, 2, 3];

    let context = createStageContext('job_1', buildInput(options.input));
    context = withResult(context, {
        stage: 'story',
        story: { title: 'Story', summary: 'Summary.', genre: 'x', themes: [], characters: [], scenes: [{ sceneNumber: 1, setting: '', summary: 's' }] },
    });
    context = withResult(context, { stage: 'script', script: { title: 'Rainy Day Robot', pageCount: 2, panels, colorPalette: [] } });
    context = withResult(context, {
        stage: 'text',
        panels: textNumbers.map((panelNumber) => ({
            panelNumber,
            caption: `Caption ${panelNumber}`,
            dialogue: [],
            soundEffects: [],
        })),
    });
    context = withResult(context, {
        stage: 'visual',
        artwork: panels
            .filter((panel) => panel.panelNumber !== options.skipArtworkFor)
            .map((panel) => ({ panelNumber: panel.panelNumber, pageNumber: panel.pageNumber, prompt: 'p', imageUrl: PNG_DATA_URL })),
    });
    if (options.withClips) {
        context = withResult(context, {
            stage: 'video',
            clips: panels.map((panel) => ({
                panelNumber: panel.panelNumber,
                prompt: 'm',
                videoUrl: `https://cdn.example.com/${panel.panelNumber}.mp4`,
                durationSeconds: 2,
            })),
        });
    }
    return context;
}

describe('AssemblyStep', () => {
    describe('buildComic', () => {
        it('should join every stage into pages of panels', () => {
            const comic = buildComic(fullContext());

            expect(comic.title).toBe('Rainy Day Robot');
            expect(comic.summary).toBe('Summary.');
            expect(comic.pages.map((page) => [page.pageNumber, page.panels.map((p) => p.panelNumber)])).toEqual([
                [1, [1, 2]],
                [2, [3]],
            ]);
            expect(comic.pages[0].panels[0]).toEqual({
                panelNumber: 1,
                description: 'Panel 1 scene',
                imageUrl: PNG_DATA_URL,
                caption: 'Caption 1',
                dialogue: [],
                soundEffects: [],
                clip: undefined,
            });
        });

        it('should attach clips when video was requested', () => {
            const comic = buildComic(fullContext({ input: { outputFormats: ['video'], includeVideo: true }, withClips: true }));

            expect(comic.pages[1].panels[0].clip?.videoUrl).toBe('https://cdn.example.com/3.mp4');
        });

        it('should fail when a panel has no artwork', () => {
            expect(() => buildComic(fullContext({ skipArtworkFor: 2 }))).toThrow(new AssemblyError('Missing artwork for panel 2'));
        });

        it('should fail on text for a panel the script does not have', () => {
            expect(() => buildComic(fullContext({ extraTextFor: 9 }))).toThrow(
                'Found text for panel 9, which is not in the script'
            );
        });

        it('should fail when video was requested but no clips exist', () => {
            expect(() => buildComic(fullContext({ input: { outputFormats: ['video'], includeVideo: true } }))).toThrow(
                new AssemblyError('The video stage result is missing')
            );
        });
    });

    describe('execute', () => {
        it('should export and store each requested format', async () => {
            const store = new InMemoryArtifactStore();
            const step = new AssemblyStep([new StubExporter('pdf'), new StubExporter('web')], store);

            const result = await step.execute(fullContext({ input: { outputFormats: ['pdf', 'web'] } }), silentReporter);

            expect(result.artifacts).toEqual([
                { format: 'pdf', fileName: 'rainy-day-robot.pdf', mimeType: 'test/pdf', path: 'job_1/rainy-day-robot.pdf', sizeBytes: 19 },
                { format: 'web', fileName: 'rainy-day-robot.html', mimeType: 'test/web', path: 'job_1/rainy-day-robot.html', sizeBytes: 19 },
            ]);
            expect(store.files.get('job_1/rainy-day-robot.pdf')?.toString()).toBe('pdf:Rainy Day Robot');
        });

        it('should remove earlier artifacts when a later export fails', async () => {
            const store = new InMemoryArtifactStore();
            const step = new AssemblyStep([new StubExporter('pdf'), new StubExporter('cbz', true)], store);

            await expect(
                step.execute(fullContext({ input: { outputFormats: ['pdf', 'cbz'] } }), silentReporter)
            ).rejects.toThrow(new AssemblyError('Exporting cbz failed: renderer crashed'));
            expect(store.files.size).toBe(0);
        });

        it('should fail for a format without an exporter', async () => {
            const step = new AssemblyStep([new StubExporter('pdf')], new InMemoryArtifactStore());

            await expect(
                step.execute(fullContext({ input: { outputFormats: ['web'] } }), silentReporter)
            ).rejects.toThrow('No exporter is available for the web format');
        });
    });

    describe('slugify', () => {
        it('should make titles file-name safe', () => {
            expect(slugify('Café: The Return!')).toBe('cafe-the-return');
            expect(slugify('???')).toBe('comic');
        });
    });
});
