import { JobRunner, JobScheduler } from '../../../src/application/JobScheduler';

/**
 * Runner whose runs stay open until released by the test.
 */
class GatedRunner implements JobRunner {
    readonly started: string[] = [];
    private readonly gates = new Map<string, () => void>();

    run(jobId: string): Promise<void> {
        this.started.push(jobId);
        return new Promise((resolve) => {
            this.gates.set(jobId, resolve);
        });
    }

    finish(jobId: string): void {
        this.gates.get(jobId)?.();
    }
}

const flush = () => new Promise((resolve) => setImmediate(resolve));

describe('JobScheduler', () => {
    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => { });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should run no more jobs at once than allowed', async () => {
        const runner = new GatedRunner();
        const scheduler = new JobScheduler(runner, 2);

        scheduler.schedule('job_1');
        scheduler.schedule('job_2');
        scheduler.schedule('job_3');
        await flush();

        expect(runner.started).toEqual(['job_1', 'job_2']);
        expect(scheduler.stats).toEqual({ active: 2, waiting: 1 });

        runner.finish('job_1');
        await flush();

        expect(runner.started).toEqual(['job_1', 'job_2', 'job_3']);
        expect(scheduler.stats).toEqual({ active: 2, waiting: 0 });

        runner.finish('job_2');
        runner.finish('job_3');
        await scheduler.onIdle();

        expect(scheduler.stats).toEqual({ active: 0, waiting: 0 });
    });

    it('should return from schedule before the run finishes', () => {
        const runner = new GatedRunner();
        const scheduler = new JobScheduler(runner, 1);

        expect(scheduler.schedule('job_1')).toBeUndefined();
        runner.finish('job_1');
    });

    it('should treat a limit below one as one', async () => {
        const runner = new GatedRunner();
        const scheduler = new JobScheduler(runner, 0);

        scheduler.schedule('job_1');
        scheduler.schedule('job_2');
        await flush();

        expect(runner.started).toEqual(['job_1']);

        runner.finish('job_1');
        await flush();
        runner.finish('job_2');
        await scheduler.onIdle();

        expect(runner.started).toEqual(['job_1', 'job_2']);
    });

    it('should log a crashed run and keep going', async () => {
        const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => { });
        const runner: JobRunner = {
            run: jest.fn()
                .mockRejectedValueOnce(new Error('boom'))
                .mockResolvedValueOnce(undefined),
        };
        const scheduler = new JobScheduler(runner, 1);

        scheduler.schedule('job_1');
        scheduler.schedule('job_2');
        await scheduler.onIdle();

        expect(runner.run).toHaveBeenCalledTimes(2);
        expect(errorSpy).toHaveBeenCalledWith('[Scheduler] Run for job_1 crashed:', expect.any(Error));
        expect(scheduler.stats).toEqual({ active: 0, waiting: 0 });
    });
});
