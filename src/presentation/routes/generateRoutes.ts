import fs from 'fs';
import path from 'path';
import { Router, Request, Response } from 'express';
import multer from 'multer';
import { v4 as uuidv4 } from 'uuid';
import { JobRegistry } from '../../application/JobRegistry';
import { JobScheduler } from '../../application/JobScheduler';
import { SourceDocument } from '../../domain/entities/ComicJob';
import { IDocumentExtractor, describeUnsupportedDocument } from '../../domain/ports/IDocumentExtractor';
import { asyncHandler, BadRequestError } from '../middleware/errorHandler';
import {
    PageLimits,
    createGenerateRequestSchema,
    formatValidationError,
} from '../validation/requestSchemas';

export interface GenerateRouteOptions extends PageLimits {
    uploadDir: string;
    maxUploadBytes: number;
}

export interface GenerateRouteDependencies {
    registry: JobRegistry;
    scheduler: Pick<JobScheduler, 'schedule'>;
    documentExtractor: IDocumentExtractor;
    options: GenerateRouteOptions;
}

function createUpload(options: GenerateRouteOptions): multer.Multer {
    const storage = multer.diskStorage({
        destination: (_req, _file, cb) => {
            fs.mkdir(options.uploadDir, { recursive: true }, (error) => cb(error, options.uploadDir));
        },
        filename: (_req, file, cb) => {
            const safeName = path.basename(file.originalname).replace(/[^\w.-]+/g, '_');
            cb(null, `${uuidv4().substring(0, 8)}-${safeName}`);
        },
    });

    return multer({
        storage,
        limits: { fileSize: options.maxUploadBytes, files: 1 },
    });
}

async function discardUpload(file: Express.Multer.File | undefined): Promise<void> {
    if (!file) {
        return;
    }
    await fs.promises.rm(file.path, { force: true });
}

/**
 * Creates the comic generation route.
 */
export function createGenerateRoutes(deps: GenerateRouteDependencies): Router {
    const router = Router();
    const upload = createUpload(deps.options);
    const schema = createGenerateRequestSchema(deps.options);

    /**
     * POST /api/v1/generate
     *
     * Accepts JSON or multipart (with an optional `file`), queues a comic job
     * and returns immediately with its ID.
     */
    router.post(
        '/api/v1/generate',
        upload.single('file'),
        asyncHandler(async (req: Request, res: Response) => {
            const file = req.file;
            const parsed = schema.safeParse(req.body ?? {});
            if (!parsed.success) {
                await discardUpload(file);
                throw new BadRequestError(formatValidationError(parsed.error));
            }

            const request = parsed.data;
            const text = request.text !== undefined && request.text.trim().length > 0 ? request.text : undefined;
            if (!text && !file) {
                throw new BadRequestError('Either text or a file is required');
            }

            let document: SourceDocument | undefined;
            if (file) {
                document = {
                    originalName: file.originalname,
                    mimeType: file.mimetype,
                    path: file.path,
                    sizeBytes: file.size,
                };
                if (!deps.documentExtractor.supports(document)) {
                    await discardUpload(file);
                    throw new BadRequestError(
                        describeUnsupportedDocument(document, deps.documentExtractor.acceptedExtensions)
                    );
                }
            }

            const job = deps.registry.create({
                text,
                document,
                title: request.title,
                artStyle: request.art_style,
                targetPages: request.target_pages,
                targetAudience: request.target_audience,
                targetLanguage: request.target_language,
                outputFormats: request.output_formats,
                includeVideo: request.output_formats.includes('video'),
            });
            console.log(
                `[Generate] Queued ${job.id}: "${job.input.title}" (${job.input.targetPages} page(s), ${job.input.outputFormats.join(', ')})`
            );

            deps.scheduler.schedule(job.id);

            res.status(202).json({
                job_id: job.id,
                status: job.status,
            });
        })
    );

    return router;
}
