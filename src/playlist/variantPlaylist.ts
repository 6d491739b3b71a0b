import { Logger } from 'winston';
import { FileHandle } from '../types';
import logger from '../utils/logger';
import { MediaPlaylist } from './mediaPlaylist';
import { M3U8_HEADER_TAG, M3U8_VARIANT_TAG, PLAYLIST_EXTENSION } from './tags';

/**
 * Master playlist: one media playlist per rendition, keyed by name. Owns its
 * variants and destroys them on removal or on its own destroy().
 *
 * Variants render in insertion order. The text is rebuilt on every add or
 * remove and served from cache in between.
 */
export class VariantPlaylist {
    public readonly name: string;
    public readonly baseUrl: string;
    private file: FileHandle | null;
    private variants = new Map<string, MediaPlaylist>();
    private playlistStr = '';
    private logger: Logger;

    constructor(name: string, baseUrl: string, file: FileHandle, loggerInstance?: Logger) {
        this.name = name;
        this.baseUrl = baseUrl;
        this.file = file.ref();
        this.logger = loggerInstance || logger;
        this.update();
    }

    public get size(): number {
        return this.variants.size;
    }

    public names(): string[] {
        return Array.from(this.variants.keys());
    }

    /** Returns false, leaving the registry untouched, if the name is taken. */
    public addVariant(playlist: MediaPlaylist): boolean {
        if (this.variants.has(playlist.name)) {
            this.logger.debug(`[${this.name}] Variant ${playlist.name} already registered`);
            return false;
        }
        this.variants.set(playlist.name, playlist);
        this.update();
        this.logger.info(`[${this.name}] Added variant ${playlist.name} (${playlist.bitrate} bps)`);
        return true;
    }

    public getVariant(name: string): MediaPlaylist | undefined {
        return this.variants.get(name);
    }

    /** Destroys and unregisters the named variant. False if there is none. */
    public removeVariant(name: string): boolean {
        const variant = this.variants.get(name);
        if (!variant) {
            this.logger.debug(`[${this.name}] No variant named ${name} to remove`);
            return false;
        }
        this.variants.delete(name);
        variant.destroy();
        this.update();
        this.logger.info(`[${this.name}] Removed variant ${name}`);
        return true;
    }

    public render(): string {
        return this.playlistStr;
    }

    public destroy(): void {
        for (const variant of this.variants.values()) {
            variant.destroy();
        }
        this.variants.clear();
        this.update();

        if (this.file) {
            this.file.unref();
            this.file = null;
        }
    }

    private update(): void {
        let output = `${M3U8_HEADER_TAG}\n`;
        for (const variant of this.variants.values()) {
            output += `${M3U8_VARIANT_TAG}${variant.bitrate}\n`;
            output += `${variant.baseUrl}/${variant.name}${PLAYLIST_EXTENSION}\n`;
        }
        this.playlistStr = output;
    }
}
