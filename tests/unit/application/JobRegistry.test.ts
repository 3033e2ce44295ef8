import fs from 'fs';
import os from 'os';
import path from 'path';
import { JobRegistry } from '../../../src/application/JobRegistry';
import { JobStateError } from '../../../src/domain/entities/ComicJob';
import { buildInput } from '../../helpers/comicFakes';

const artifact = {
    format: 'pdf' as const,
    fileName: 'rainy-day-robot.pdf',
    mimeType: 'application/pdf',
    path: 'job_1/rainy-day-robot.pdf',
    sizeBytes: 42,
};

describe('JobRegistry', () => {
    describe('in memory', () => {
        it('should create jobs with unique ids', () => {
            const registry = new JobRegistry();

            const ids = new Set([registry.create(buildInput()).id, registry.create(buildInput()).id, registry.create(buildInput()).id]);

            expect(ids.size).toBe(3);
            ids.forEach((id) => expect(id).toMatch(/^job_[a-f0-9]{8}$/));
            expect(registry.size).toBe(3);
        });

        it('should return null for unknown jobs', () => {
            const registry = new JobRegistry();

            expect(registry.get('job_missing')).toBeNull();
            expect(registry.update('job_missing', { message: 'x' })).toBeNull();
            expect(registry.start('job_missing')).toBeNull();
        });

        it('should replace the stored job on every update', () => {
            const registry = new JobRegistry();
            const created = registry.create(buildInput());

            const started = registry.start(created.id);
            const updated = registry.update(created.id, { progress: 0.3, currentStage: 'Writing story' });

            expect(started?.status).toBe('processing');
            expect(updated?.progress).toBe(0.3);
            expect(registry.get(created.id)).toBe(updated);
            expect(created.status).toBe('queued');
        });

        it('should propagate lifecycle violations', () => {
            const registry = new JobRegistry();
            const job = registry.create(buildInput());
            registry.start(job.id);
            registry.complete(job.id, { pdf: artifact }, { title: 'Rainy Day Robot', pageCount: 1, panelCount: 4, clipCount: 0 });

            expect(() => registry.update(job.id, { message: 'late' })).toThrow(JobStateError);
        });

        it('should list summaries newest first', () => {
            jest.useFakeTimers();
            try {
                const registry = new JobRegistry();
                jest.setSystemTime(new Date('2026-01-01T10:00:00Z'));
                const first = registry.create(buildInput({ title: 'First' }));
                jest.setSystemTime(new Date('2026-01-01T11:00:00Z'));
                const second = registry.create(buildInput({ title: 'Second' }));

                expect(registry.list().map((summary) => summary.id)).toEqual([second.id, first.id]);
                expect(registry.list()[0].title).toBe('Second');
            } finally {
                jest.useRealTimers();
            }
        });

        it('should keep newest-first order for jobs created in the same millisecond', () => {
            jest.useFakeTimers();
            try {
                jest.setSystemTime(new Date('2026-01-01T10:00:00Z'));
                const registry = new JobRegistry();
                const a = registry.create(buildInput());
                const b = registry.create(buildInput());
                const c = registry.create(buildInput());

                expect(registry.list().map((summary) => summary.id)).toEqual([c.id, b.id, a.id]);
            } finally {
                jest.useRealTimers();
            }
        });

        it('should filter by status', () => {
            const registry = new JobRegistry();
            const a = registry.create(buildInput());
            registry.create(buildInput());
            registry.start(a.id);

            expect(registry.listByStatus('processing').map((job) => job.id)).toEqual([a.id]);
            expect(registry.listByStatus('queued')).toHaveLength(1);
        });

        it('should delete jobs', () => {
            const registry = new JobRegistry();
            const job = registry.create(buildInput());

            expect(registry.delete(job.id)).toBe(true);
            expect(registry.delete(job.id)).toBe(false);
            expect(registry.get(job.id)).toBeNull();
        });
    });

    describe('persistence', () => {
        let tempDir: string;
        let jobsPath: string;

        beforeEach(() => {
            tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'comic-registry-'));
            jobsPath = path.join(tempDir, 'data', 'jobs.json');
        });

        afterEach(() => {
            fs.rmSync(tempDir, { recursive: true, force: true });
        });

        it('should write every change to disk', () => {
            const registry = new JobRegistry({ persistencePath: jobsPath });
            const job = registry.create(buildInput());

            const saved = JSON.parse(fs.readFileSync(jobsPath, 'utf-8'));
            expect(Object.keys(saved)).toEqual([job.id]);
            expect(saved[job.id].status).toBe('queued');
        });

        it('should reload jobs with their dates and results', () => {
            const first = new JobRegistry({ persistencePath: jobsPath });
            const job = first.create(buildInput());
            first.start(job.id);
            first.complete(job.id, { pdf: artifact }, { title: 'Rainy Day Robot', pageCount: 1, panelCount: 4, clipCount: 0 });

            const second = new JobRegistry({ persistencePath: jobsPath });
            const loaded = second.get(job.id);

            expect(loaded?.status).toBe('completed');
            expect(loaded?.progress).toBe(1);
            expect(loaded?.createdAt).toBeInstanceOf(Date);
            expect(loaded?.createdAt.getTime()).toBe(job.createdAt.getTime());
            expect(loaded?.result?.pdf?.fileName).toBe('rainy-day-robot.pdf');
        });

        it('should skip unreadable entries', () => {
            fs.mkdirSync(path.dirname(jobsPath), { recursive: true });
            fs.writeFileSync(jobsPath, JSON.stringify({ job_broken: { id: 'job_broken', status: 'exploded' } }));
            const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => { });

            const registry = new JobRegistry({ persistencePath: jobsPath });

            expect(registry.size).toBe(0);
            expect(warnSpy).toHaveBeenCalled();
            warnSpy.mockRestore();
        });

        it('should remove deleted jobs from disk', () => {
            const registry = new JobRegistry({ persistencePath: jobsPath });
            const job = registry.create(buildInput());

            registry.delete(job.id);

            expect(JSON.parse(fs.readFileSync(jobsPath, 'utf-8'))).toEqual({});
        });
    });
});
