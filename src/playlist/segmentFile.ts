import { Logger } from 'winston';
import { FileHandle } from '../types';
import logger from '../utils/logger';

/**
 * Reference-counted handle on a segment or playlist file. The creator holds
 * the first reference. `onRelease` runs once, when the last reference drops.
 */
export class SegmentFile implements FileHandle {
    public readonly path: string;
    private refs = 1;
    private onRelease?: (file: SegmentFile) => void;
    private logger: Logger;

    constructor(filePath: string, onRelease?: (file: SegmentFile) => void, loggerInstance?: Logger) {
        this.path = filePath;
        this.onRelease = onRelease;
        this.logger = loggerInstance || logger;
    }

    public get refCount(): number {
        return this.refs;
    }

    public get released(): boolean {
        return this.refs === 0;
    }

    public ref(): SegmentFile {
        if (this.refs === 0) {
            this.logger.warn(`Reference taken on released file: ${this.path}`);
            return this;
        }
        this.refs++;
        return this;
    }

    public unref(): void {
        if (this.refs === 0) {
            this.logger.warn(`Reference dropped on released file: ${this.path}`);
            return;
        }
        this.refs--;
        if (this.refs === 0) {
            this.logger.debug(`Last reference released: ${this.path}`);
            const onRelease = this.onRelease;
            this.onRelease = undefined;
            onRelease?.(this);
        }
    }
}
