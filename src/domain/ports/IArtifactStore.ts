export interface StoredArtifact {
    path: string;
    sizeBytes: number;
}

/**
 * IArtifactStore - Port for storing produced comic files per job.
 * Implementations: LocalArtifactStore
 */
export interface IArtifactStore {
    save(jobId: string, fileName: string, data: Buffer): Promise<StoredArtifact>;
    read(path: string): Promise<Buffer>;
    /** Removes a single file; missing files are ignored */
    removeFile(path: string): Promise<void>;
    /** Removes everything stored for the job */
    removeJob(jobId: string): Promise<void>;
}
