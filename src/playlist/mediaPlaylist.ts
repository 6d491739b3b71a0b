import { Logger } from 'winston';
import { AddEntryOptions, FileHandle, MediaPlaylistOptions, PlaylistType } from '../types';
import { ConfigLoader } from '../utils/configLoader';
import logger from '../utils/logger';
import { M3u8Entry } from './m3u8Entry';
import {
    M3U8_ALLOW_CACHE_TAG,
    M3U8_BYTERANGE_TAG,
    M3U8_DISCONTINUITY_TAG,
    M3U8_ENDLIST_TAG,
    M3U8_HEADER_TAG,
    M3U8_INF_TAG,
    M3U8_MEDIA_SEQUENCE_TAG,
    M3U8_TARGETDURATION_TAG,
    M3U8_VERSION_TAG,
    MIN_BYTERANGE_VERSION,
    formatDuration,
    joinUrl
} from './tags';

/**
 * Playlist of one rendition: a FIFO window of segments, oldest first.
 *
 * `sequenceNumber` is one past the absolute index of the newest segment, so
 * `sequenceNumber - length` is the media sequence of the oldest one still
 * listed. Evicted segments are not remembered beyond that count.
 */
export class MediaPlaylist {
    public readonly name: string;
    public readonly baseUrl: string;
    public readonly bitrate: number;
    public readonly version: number;
    public readonly windowSize: number;
    public readonly allowCache: boolean;
    public readonly chunked: boolean;
    private file: FileHandle | null;
    private type: PlaylistType = 'EVENT';
    private endList = false;
    private sequence = 0;
    // Array-backed queue; `head` is the index of the oldest live entry.
    private queue: M3u8Entry[] = [];
    private head = 0;
    private logger: Logger;

    constructor(options: MediaPlaylistOptions, loggerInstance?: Logger) {
        this.logger = loggerInstance || logger;
        this.name = options.name;
        this.baseUrl = options.baseUrl;
        this.bitrate = options.bitrate;
        this.version = options.version;
        this.windowSize = options.windowSize;
        this.allowCache = options.allowCache;
        this.file = options.file.ref();

        let chunked = options.chunked;
        if (!chunked && options.version < MIN_BYTERANGE_VERSION) {
            this.logger.warn(`[${options.name}] Byte-range media segments are not supported for versions < ${MIN_BYTERANGE_VERSION}, using whole segments`);
            chunked = true;
        }
        this.chunked = chunked;
    }

    /**
     * Builds a playlist from the `playlist` section of the loaded
     * configuration. Fields in `overrides` take precedence.
     */
    public static fromConfig(
        name: string,
        file: FileHandle,
        bitrate: number,
        overrides: Partial<Omit<MediaPlaylistOptions, 'name' | 'file' | 'bitrate'>> = {},
        loggerInstance?: Logger
    ): MediaPlaylist {
        const defaults = ConfigLoader.getInstance().getPlaylistConfig();
        return new MediaPlaylist({
            name,
            file,
            bitrate,
            baseUrl: overrides.baseUrl ?? defaults.baseUrl,
            version: overrides.version ?? defaults.version,
            windowSize: overrides.windowSize ?? defaults.windowSize,
            allowCache: overrides.allowCache ?? defaults.allowCache,
            chunked: overrides.chunked ?? defaults.chunked
        }, loggerInstance);
    }

    public get playlistType(): PlaylistType {
        return this.type;
    }

    public get hasEndList(): boolean {
        return this.endList;
    }

    public get sequenceNumber(): number {
        return this.sequence;
    }

    public get length(): number {
        return this.queue.length - this.head;
    }

    public get mediaSequence(): number {
        return this.sequence - this.length;
    }

    public get entries(): readonly M3u8Entry[] {
        return this.queue.slice(this.head);
    }

    /** Longest segment duration in whole seconds, truncated. */
    public get targetDuration(): number {
        let target = 0;
        for (let i = this.head; i < this.queue.length; i++) {
            if (this.queue[i].duration > target) {
                target = this.queue[i].duration;
            }
        }
        return Math.trunc(target);
    }

    public get totalDuration(): number {
        let total = 0;
        for (let i = this.head; i < this.queue.length; i++) {
            total += this.queue[i].duration;
        }
        return total;
    }

    /**
     * Appends a segment, first evicting the oldest ones while the listed
     * duration is at or above the window size. The check runs before the
     * append, so the window may exceed `windowSize` by up to one segment.
     *
     * Returns the evicted files oldest first, each with a reference the caller
     * now owns, or null when the playlist is closed or the entry is invalid.
     */
    public addEntry(options: AddEntryOptions): FileHandle[] | null {
        if (this.type === 'VOD') {
            this.logger.debug(`[${this.name}] Ignoring segment ${options.path}: playlist is closed`);
            return null;
        }

        const entry = M3u8Entry.create({
            url: joinUrl(this.baseUrl, options.path),
            file: options.file,
            title: options.title,
            duration: options.duration,
            length: options.length,
            offset: options.offset,
            discontinuous: options.discontinuous
        }, this.logger);
        if (!entry) {
            return null;
        }

        const evicted: FileHandle[] = [];
        if (this.windowSize !== 0) {
            while (this.length > 0 && this.totalDuration >= this.windowSize) {
                const oldEntry = this.popHead();
                evicted.push(oldEntry.file.ref());
                oldEntry.destroy();
            }
        }
        if (evicted.length > 0) {
            this.logger.debug(`[${this.name}] Evicted ${evicted.length} segment(s)`);
        }

        this.sequence = options.index + 1;
        this.queue.push(entry);

        return evicted;
    }

    /** Marks the playlist finished: no more segments, end tag rendered. */
    public close(): void {
        this.type = 'VOD';
        this.endList = true;
    }

    public setEndList(endList: boolean): void {
        this.endList = endList;
    }

    public render(): string {
        let output = `${M3U8_HEADER_TAG}\n`;
        output += `${M3U8_VERSION_TAG}${this.version}\n`;
        output += `${M3U8_ALLOW_CACHE_TAG}${this.allowCache ? 'YES' : 'NO'}\n`;
        output += `${M3U8_MEDIA_SEQUENCE_TAG}${this.mediaSequence}\n`;
        output += `${M3U8_TARGETDURATION_TAG}${this.targetDuration}\n`;
        output += '\n';

        for (let i = this.head; i < this.queue.length; i++) {
            const entry = this.queue[i];
            if (entry.discontinuous) {
                output += `${M3U8_DISCONTINUITY_TAG}\n`;
            }
            output += `${M3U8_INF_TAG}${formatDuration(entry.duration, this.version)},${entry.title ?? ''}\n`;
            if (!this.chunked) {
                output += `${M3U8_BYTERANGE_TAG}${entry.length}@${entry.offset}\n`;
            }
            output += `${entry.url}\n`;
        }

        if (this.endList) {
            output += M3U8_ENDLIST_TAG;
        }

        return output;
    }

    /** Releases every segment reference and the playlist's own file. */
    public destroy(): void {
        for (let i = this.head; i < this.queue.length; i++) {
            this.queue[i].destroy();
        }
        this.queue = [];
        this.head = 0;

        if (this.file) {
            this.file.unref();
            this.file = null;
        }
    }

    private popHead(): M3u8Entry {
        const entry = this.queue[this.head];
        this.head++;
        // Compact once the dead prefix outgrows the live part.
        if (this.head > 32 && this.head * 2 > this.queue.length) {
            this.queue = this.queue.slice(this.head);
            this.head = 0;
        }
        return entry;
    }
}
