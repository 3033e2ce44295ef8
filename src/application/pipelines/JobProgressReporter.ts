import { StageReporter } from './PipelineInfrastructure';
import { ProgressSpan } from './ProgressWeights';
import { ComicJobPatch } from '../../domain/entities/ComicJob';
import { JobRegistry } from '../JobRegistry';

// Keeps intermediate progress strictly below the stage's milestone.
const INTERMEDIATE_CEILING = 0.99;

/**
 * Publishes a running stage's detail to the registry.
 * Once the job disappears it marks itself cancelled and ignores further reports.
 */
export class JobProgressReporter implements StageReporter {
    private isCancelled = false;

    constructor(
        private readonly registry: JobRegistry,
        private readonly jobId: string,
        private readonly span: ProgressSpan
    ) { }

    get cancelled(): boolean {
        return this.isCancelled;
    }

    message(text: string): void {
        this.apply({ message: text });
    }

    progress(done: number, total: number, text?: string): void {
        if (total <= 0) {
            return;
        }
        const fraction = Math.min(Math.max(done / total, 0), 1);
        const value = this.span.start + (this.span.end - this.span.start) * fraction * INTERMEDIATE_CEILING;
        const current = this.registry.get(this.jobId)?.progress ?? 0;

        this.apply({
            progress: Math.max(current, Math.round(value * 10000) / 10000),
            ...(text !== undefined && { message: text }),
        });
    }

    private apply(patch: ComicJobPatch): void {
        if (this.isCancelled) {
            return;
        }
        try {
            if (!this.registry.update(this.jobId, patch)) {
                this.isCancelled = true;
            }
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            console.warn(`[${this.jobId}] Progress update rejected: ${reason}`);
        }
    }
}
