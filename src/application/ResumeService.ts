import { JobRegistry } from './JobRegistry';
import { JobScheduler } from './JobScheduler';
import { stageFromLabel } from '../domain/entities/StageResult';

/**
 * Restores persisted work on application startup.
 * Queued jobs are scheduled again; jobs caught mid-run cannot resume a half-finished
 * stage, so they are failed and stay queryable.
 */
export class ResumeService {
    constructor(
        private readonly registry: JobRegistry,
        private readonly scheduler: Pick<JobScheduler, 'schedule'>
    ) { }

    resumeAll(): { rescheduled: number; interrupted: number } {
        const interrupted = this.registry.listByStatus('processing');
        for (const job of interrupted) {
            console.warn(`[Resume] Job ${job.id} was interrupted during "${job.currentStage}"`);
            this.registry.fail(job.id, {
                stage: stageFromLabel(job.currentStage),
                kind: 'GenerationError',
                message: 'Interrupted by service restart',
            });
        }

        const queued = this.registry.listByStatus('queued');
        for (const job of queued) {
            this.scheduler.schedule(job.id);
        }

        if (queued.length > 0 || interrupted.length > 0) {
            console.log(`[Resume] Rescheduled ${queued.length} queued job(s), failed ${interrupted.length} interrupted job(s)`);
        }
        return { rescheduled: queued.length, interrupted: interrupted.length };
    }
}
