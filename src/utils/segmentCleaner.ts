import fs from 'fs';
import { Logger } from 'winston';
import { FileHandle } from '../types';
import { SegmentFile } from '../playlist/segmentFile';
import { ConfigLoader } from './configLoader';
import logger from './logger';

/**
 * Deletes segment files once nothing references them. Segments handed to a
 * playlist are created through track(); the handles a playlist evicts are
 * given back through dispose().
 */
export class SegmentCleaner {
    private isEnabled: boolean;
    private removed = 0;
    private logger: Logger;

    constructor(
        options: {
            isEnabled?: boolean;
            loggerInstance?: Logger;
        } = {}
    ) {
        this.isEnabled = options.isEnabled ?? ConfigLoader.getInstance().getCleanupConfig().enabled;
        this.logger = options.loggerInstance || logger;
    }

    public get removedCount(): number {
        return this.removed;
    }

    /** Wraps a segment path in a handle that deletes the file on final release. */
    public track(filePath: string): SegmentFile {
        return new SegmentFile(filePath, file => this.removeFile(file.path), this.logger);
    }

    /** Drops the caller's reference on each evicted handle. */
    public dispose(files: readonly FileHandle[]): void {
        for (const file of files) {
            file.unref();
        }
    }

    private removeFile(filePath: string): void {
        if (!this.isEnabled) {
            this.logger.debug(`Cleanup disabled, keeping segment: ${filePath}`);
            return;
        }

        try {
            fs.unlinkSync(filePath);
            this.removed++;
            this.logger.debug(`Removed segment file: ${filePath}`);
        } catch (error) {
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
                this.logger.warn(`Segment file already gone: ${filePath}`);
                return;
            }
            this.logger.error(`Error removing segment file ${filePath}:`, error);
        }
    }
}
