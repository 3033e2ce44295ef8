/**
 * Text step - writes captions, dialogue and sound effects in panel batches.
 */

import { PipelineStep, StageContext, StageReporter, requireStageResult, throwIfCancelled } from '../PipelineInfrastructure';
import { ILlmClient } from '../../../domain/ports/ILlmClient';
import { PanelText, ScriptPanel, TextResult, freezeResult, STAGE_LABELS } from '../../../domain/entities/StageResult';
import { GenerationError } from '../../../domain/errors/PipelineErrors';
import { chunk, mapWithConcurrency } from '../Concurrency';
import { parseStageOutput } from '../StageOutputParser';
import { PanelTextSchema } from '../StageSchemas';
import { COMIC_WRITER_SYSTEM_PROMPT, PANEL_TEXT_PROMPT, fillTemplate } from '../../prompts/ComicPrompts';

export interface TextStepOptions {
    batchSize: number;
    captionMaxWords: number;
    maxParallelBatches: number;
}

export class TextStep implements PipelineStep {
    readonly name = 'text';
    readonly label = STAGE_LABELS.text;

    constructor(
        private readonly llmClient: ILlmClient,
        private readonly options: TextStepOptions
    ) { }

    async execute(context: StageContext, reporter: StageReporter): Promise<TextResult> {
        const { script } = requireStageResult(context, 'script');
        const { story } = requireStageResult(context, 'story');
        const batches = chunk(script.panels, this.options.batchSize);
        const characters = story.characters.map((c) => `- ${c.name}: ${c.description}`).join('\n') || '- (none named)';

        console.log(`[${context.jobId}] Writing text for ${script.panels.length} panels in ${batches.length} batch(es)`);
        let finished = 0;

        const results = await mapWithConcurrency(batches, this.options.maxParallelBatches, async (batch) => {
            throwIfCancelled(context, reporter);
            const texts = await this.writeBatch(batch, characters, context.input.targetLanguage);
            finished++;
            reporter.progress(finished, batches.length, `Lettered ${finished} of ${batches.length} panel batches`);
            return texts;
        });

        const panels = results.flat().sort((a, b) => a.panelNumber - b.panelNumber);
        return freezeResult({ stage: 'text', panels });
    }

    private async writeBatch(batch: ScriptPanel[], characters: string, language: string): Promise<PanelText[]> {
        const raw = await this.llmClient.generateText({
            system: COMIC_WRITER_SYSTEM_PROMPT,
            prompt: fillTemplate(PANEL_TEXT_PROMPT, {
                language,
                characters,
                captionMaxWords: this.options.captionMaxWords,
                panels: batch
                    .map((panel) => `${panel.panelNumber}. [${panel.mood}] ${panel.description} (characters: ${panel.characters.join(', ') || 'none'})`)
                    .join('\n'),
            }),
            jsonMode: true,
        });

        const parsed = parseStageOutput(raw, PanelTextSchema, 'panel text');
        assertSamePanels(batch, parsed.panels.map((panel) => panel.panelNumber));

        return parsed.panels.map((panel) => {
            const caption = panel.caption?.trim();
            return {
                panelNumber: panel.panelNumber,
                caption: caption ? truncateWords(caption, this.options.captionMaxWords) : undefined,
                dialogue: panel.dialogue.map((line) => ({ character: line.character.trim(), text: line.text.trim() })),
                soundEffects: panel.soundEffects.map((effect) => effect.trim()).filter(Boolean),
            };
        });
    }
}

function assertSamePanels(batch: ScriptPanel[], returned: number[]): void {
    const expected = batch.map((panel) => panel.panelNumber);
    const unique = new Set(returned);
    const matches =
        returned.length === expected.length &&
        unique.size === expected.length &&
        expected.every((panelNumber) => unique.has(panelNumber));

    if (!matches) {
        throw new GenerationError(
            `Panel text batch mismatch: expected panels [${expected.join(', ')}], got [${returned.join(', ')}]`
        );
    }
}

/**
 * Keeps at most `maxWords` words, marking the cut with an ellipsis.
 */
export function truncateWords(text: string, maxWords: number): string {
    const words = text.split(/\s+/).filter(Boolean);
    if (words.length <= maxWords) {
        return words.join(' ');
    }
    return `${words.slice(0, maxWords).join(' ')}...`;
}
