export const M3U8_HEADER_TAG = '#EXTM3U';
export const M3U8_VERSION_TAG = '#EXT-X-VERSION:';
export const M3U8_ALLOW_CACHE_TAG = '#EXT-X-ALLOW-CACHE:';
export const M3U8_MEDIA_SEQUENCE_TAG = '#EXT-X-MEDIA-SEQUENCE:';
export const M3U8_TARGETDURATION_TAG = '#EXT-X-TARGETDURATION:';
export const M3U8_DISCONTINUITY_TAG = '#EXT-X-DISCONTINUITY';
export const M3U8_INF_TAG = '#EXTINF:';
export const M3U8_BYTERANGE_TAG = '#EXT-X-BYTERANGE:';
export const M3U8_ENDLIST_TAG = '#EXT-X-ENDLIST';
export const M3U8_VARIANT_TAG = '#EXT-X-STREAM-INF:PROGRAM-ID=1,BANDWIDTH=';

/** Lowest protocol version that allows fractional #EXTINF durations. */
export const MIN_FLOAT_DURATION_VERSION = 3;
/** Lowest protocol version that allows #EXT-X-BYTERANGE. */
export const MIN_BYTERANGE_VERSION = 4;

export const PLAYLIST_EXTENSION = '.m3u8';

/**
 * Formats a segment duration for #EXTINF. Older versions only take whole
 * seconds, rounded half up; newer ones take two decimals with a '.' separator.
 */
export function formatDuration(duration: number, version: number): string {
    if (version < MIN_FLOAT_DURATION_VERSION) {
        return String(Math.floor(duration + 0.5));
    }
    return duration.toFixed(2);
}

/**
 * Joins a base URL and a relative path with a single '/'. Empty parts are
 * skipped and the scheme separator of an absolute URL is left alone.
 */
export function joinUrl(baseUrl: string, relativePath: string): string {
    if (!baseUrl) return relativePath;
    if (!relativePath) return baseUrl;
    return `${baseUrl.replace(/\/+$/, '')}/${relativePath.replace(/^\/+/, '')}`;
}
