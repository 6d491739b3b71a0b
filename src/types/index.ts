/**
 * Storage behind a segment or a playlist. Holders take a reference with
 * `ref()` and drop it with `unref()`; the storage is released when the last
 * reference goes away.
 */
export interface FileHandle {
    readonly path: string;
    ref(): FileHandle;
    unref(): void;
}

export type PlaylistType = 'EVENT' | 'VOD';

export interface EntryOptions {
    url: string;
    file: FileHandle;
    title?: string;
    duration: number;       // seconds
    length?: number;        // byte count, byte-range mode only
    offset?: number;        // byte offset, byte-range mode only
    discontinuous?: boolean;
}

export interface AddEntryOptions {
    path: string;           // relative to the playlist's base URL
    file: FileHandle;
    title?: string;
    duration: number;
    length?: number;
    offset?: number;
    index: number;          // absolute index of the segment being added
    discontinuous?: boolean;
}

export interface MediaPlaylistOptions {
    name: string;
    baseUrl: string;
    file: FileHandle;
    bitrate: number;
    version: number;
    windowSize: number;     // seconds of media kept, 0 keeps everything
    allowCache: boolean;
    chunked: boolean;
}
