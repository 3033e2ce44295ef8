/**
 * Anything that can run a job to a terminal state.
 */
export interface JobRunner {
    run(jobId: string): Promise<void>;
}

/**
 * Counting semaphore; waiters are released in arrival order.
 */
class Semaphore {
    private permits: number;
    private waiting: Array<() => void> = [];

    constructor(permits: number) {
        this.permits = permits;
    }

    async acquire(): Promise<void> {
        if (this.permits > 0) {
            this.permits--;
            return;
        }
        return new Promise(resolve => {
            this.waiting.push(resolve);
        });
    }

    release(): void {
        const next = this.waiting.shift();
        if (next) {
            next();
        } else {
            this.permits++;
        }
    }
}

/**
 * Bounded worker pool for pipeline runs.
 * `schedule` returns at once; at most `maxConcurrentJobs` runs are in progress.
 */
export class JobScheduler {
    private readonly semaphore: Semaphore;
    private readonly inFlight = new Set<Promise<void>>();
    private waitingCount = 0;
    private activeCount = 0;

    constructor(
        private readonly runner: JobRunner,
        maxConcurrentJobs: number
    ) {
        this.semaphore = new Semaphore(Math.max(1, Math.floor(maxConcurrentJobs)));
    }

    schedule(jobId: string): void {
        const task: Promise<void> = this.execute(jobId)
            .catch((error) => {
                console.error(`[Scheduler] Run for ${jobId} crashed:`, error);
            })
            .finally(() => {
                this.inFlight.delete(task);
            });
        this.inFlight.add(task);
    }

    get stats(): { active: number; waiting: number } {
        return { active: this.activeCount, waiting: this.waitingCount };
    }

    /**
     * Resolves once every scheduled run has finished.
     */
    async onIdle(): Promise<void> {
        while (this.inFlight.size > 0) {
            await Promise.all(Array.from(this.inFlight));
        }
    }

    private async execute(jobId: string): Promise<void> {
        this.waitingCount++;
        await this.semaphore.acquire();
        this.waitingCount--;
        this.activeCount++;
        console.log(`[Scheduler] Running ${jobId} (${this.activeCount} active, ${this.waitingCount} waiting)`);

        try {
            await this.runner.run(jobId);
        } finally {
            this.activeCount--;
            this.semaphore.release();
        }
    }
}
