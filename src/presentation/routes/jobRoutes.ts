import fs from 'fs';
import { Router, Request, Response } from 'express';
import { JobRegistry } from '../../application/JobRegistry';
import { ComicArtifact, ComicJob, OUTPUT_FORMATS, OutputFormat } from '../../domain/entities/ComicJob';
import { IArtifactStore } from '../../domain/ports/IArtifactStore';
import { asyncHandler, BadRequestError, ConflictError, NotFoundError } from '../middleware/errorHandler';

export interface JobRouteDependencies {
    registry: JobRegistry;
    artifactStore: IArtifactStore;
}

function isOutputFormat(value: string): value is OutputFormat {
    return OUTPUT_FORMATS.some((format) => format === value);
}

function toArtifactView(jobId: string, artifact: ComicArtifact): Record<string, unknown> {
    return {
        file_name: artifact.fileName,
        mime_type: artifact.mimeType,
        size_bytes: artifact.sizeBytes,
        download_url: `/api/v1/download/${jobId}?format=${artifact.format}`,
    };
}

/**
 * Public status view of a job. Storage paths stay internal.
 */
export function toStatusResponse(job: ComicJob): Record<string, unknown> {
    const response: Record<string, unknown> = {
        job_id: job.id,
        status: job.status,
        progress: job.progress,
        current_stage: job.currentStage,
        message: job.message,
        created_at: job.createdAt.toISOString(),
        updated_at: job.updatedAt.toISOString(),
    };

    if (job.status === 'completed' && job.result) {
        const result: Record<string, unknown> = {};
        for (const artifact of Object.values(job.result)) {
            result[artifact.format] = toArtifactView(job.id, artifact);
        }
        response.result = result;
    }

    if (job.metadata) {
        response.metadata = {
            title: job.metadata.title,
            page_count: job.metadata.pageCount,
            panel_count: job.metadata.panelCount,
            clip_count: job.metadata.clipCount,
        };
    }

    if (job.status === 'failed' && job.error) {
        response.error = {
            stage: job.error.stage,
            kind: job.error.kind,
            message: job.error.message,
        };
    }

    if (job.completedAt) {
        response.completed_at = job.completedAt.toISOString();
    }

    return response;
}

/**
 * Creates job status, download, listing and deletion routes.
 */
export function createJobRoutes(deps: JobRouteDependencies): Router {
    const router = Router();
    const { registry, artifactStore } = deps;

    /**
     * GET /api/v1/status/:jobId
     *
     * Returns the current status, and results once completed.
     */
    router.get(
        '/api/v1/status/:jobId',
        asyncHandler(async (req: Request, res: Response) => {
            const { jobId } = req.params;
            const job = registry.get(jobId);

            if (!job) {
                throw new NotFoundError(`Job not found: ${jobId}`);
            }

            res.json(toStatusResponse(job));
        })
    );

    /**
     * GET /api/v1/download/:jobId?format=pdf
     *
     * Streams one produced artifact as an attachment.
     */
    router.get(
        '/api/v1/download/:jobId',
        asyncHandler(async (req: Request, res: Response) => {
            const { jobId } = req.params;
            const job = registry.get(jobId);
            if (!job) {
                throw new NotFoundError(`Job not found: ${jobId}`);
            }

            const format = typeof req.query.format === 'string' ? req.query.format.toLowerCase() : 'pdf';
            if (!isOutputFormat(format)) {
                throw new BadRequestError(`Unknown format: ${format}. Expected one of ${OUTPUT_FORMATS.join(', ')}`);
            }
            if (job.status !== 'completed') {
                throw new ConflictError(`Comic not ready: job ${jobId} is ${job.status}`);
            }

            const artifact = job.result?.[format];
            if (!artifact) {
                throw new NotFoundError(`Format ${format} was not produced for job ${jobId}`);
            }

            let data: Buffer;
            try {
                data = await artifactStore.read(artifact.path);
            } catch (error) {
                console.warn(`[Download] Artifact ${artifact.fileName} for ${jobId} is unreadable:`, error);
                throw new NotFoundError(`File not found for format ${format}`);
            }

            res.attachment(artifact.fileName);
            res.setHeader('Content-Type', artifact.mimeType);
            res.send(data);
        })
    );

    /**
     * GET /api/v1/jobs
     *
     * Lists all jobs, newest first.
     */
    router.get(
        '/api/v1/jobs',
        asyncHandler(async (_req: Request, res: Response) => {
            const jobs = registry.list().map((summary) => ({
                job_id: summary.id,
                status: summary.status,
                progress: summary.progress,
                current_stage: summary.currentStage,
                title: summary.title,
                output_formats: summary.outputFormats,
                created_at: summary.createdAt.toISOString(),
                updated_at: summary.updatedAt.toISOString(),
            }));

            res.json({
                total: jobs.length,
                jobs,
            });
        })
    );

    /**
     * DELETE /api/v1/jobs/:jobId[?keep_artifacts=true]
     *
     * Forgets the job and removes its files. A run still in progress notices on its
     * next update and stops.
     */
    router.delete(
        '/api/v1/jobs/:jobId',
        asyncHandler(async (req: Request, res: Response) => {
            const { jobId } = req.params;
            const job = registry.get(jobId);
            if (!job || !registry.delete(jobId)) {
                throw new NotFoundError(`Job not found: ${jobId}`);
            }

            const keepArtifacts = req.query.keep_artifacts === 'true';
            if (!keepArtifacts) {
                await artifactStore.removeJob(jobId);
            }
            if (job.input.document) {
                await fs.promises.rm(job.input.document.path, { force: true });
            }
            console.log(`[Jobs] Deleted ${jobId}${keepArtifacts ? ' (artifacts kept)' : ''}`);

            res.json({
                job_id: jobId,
                deleted: true,
            });
        })
    );

    return router;
}
