import fs from 'fs/promises';
import path from 'path';
import { IArtifactStore, StoredArtifact } from '../../domain/ports/IArtifactStore';

/**
 * Stores comic artifacts on local disk, one directory per job.
 */
export class LocalArtifactStore implements IArtifactStore {
    private readonly rootDir: string;

    constructor(rootDir: string) {
        this.rootDir = path.resolve(rootDir);
    }

    async save(jobId: string, fileName: string, data: Buffer): Promise<StoredArtifact> {
        const jobDir = this.jobDir(jobId);
        const filePath = this.resolveInside(path.join(jobDir, path.basename(fileName)));

        await fs.mkdir(jobDir, { recursive: true });
        await fs.writeFile(filePath, data);
        console.log(`[Storage] Saved ${path.basename(filePath)} for ${jobId} (${data.length} bytes)`);

        return { path: filePath, sizeBytes: data.length };
    }

    async read(filePath: string): Promise<Buffer> {
        return fs.readFile(this.resolveInside(filePath));
    }

    async removeFile(filePath: string): Promise<void> {
        await fs.rm(this.resolveInside(filePath), { force: true });
    }

    async removeJob(jobId: string): Promise<void> {
        await fs.rm(this.jobDir(jobId), { recursive: true, force: true });
        console.log(`[Storage] Removed artifacts for ${jobId}`);
    }

    private jobDir(jobId: string): string {
        return this.resolveInside(path.join(this.rootDir, path.basename(jobId)));
    }

    private resolveInside(filePath: string): string {
        const resolved = path.resolve(this.rootDir, filePath);
        const relative = path.relative(this.rootDir, resolved);
        if (relative.startsWith('..') || path.isAbsolute(relative)) {
            throw new Error(`Artifact path escapes the storage root: ${filePath}`);
        }
        return resolved;
    }
}
