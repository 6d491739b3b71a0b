import { Logger } from 'winston';
import { EntryOptions, FileHandle } from '../types';
import logger from '../utils/logger';

/**
 * One media segment in a playlist. Holds a reference on its file from
 * construction until destroy().
 */
export class M3u8Entry {
    public readonly url: string;
    public readonly file: FileHandle;
    public readonly title?: string;
    public readonly duration: number;
    public readonly length: number;
    public readonly offset: number;
    public readonly discontinuous: boolean;
    private destroyed = false;

    private constructor(options: EntryOptions) {
        this.url = options.url;
        this.file = options.file.ref();
        this.title = options.title;
        this.duration = options.duration;
        this.length = options.length ?? 0;
        this.offset = options.offset ?? 0;
        this.discontinuous = options.discontinuous ?? false;
    }

    /** Returns null when the URL is empty. */
    public static create(options: EntryOptions, loggerInstance?: Logger): M3u8Entry | null {
        if (!options.url) {
            (loggerInstance || logger).warn('Rejected playlist entry with an empty URL');
            return null;
        }
        return new M3u8Entry(options);
    }

    public get isDestroyed(): boolean {
        return this.destroyed;
    }

    public destroy(): void {
        if (this.destroyed) return;
        this.destroyed = true;
        this.file.unref();
    }
}
