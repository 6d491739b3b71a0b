export * from './types';
export { SegmentFile } from './playlist/segmentFile';
export { M3u8Entry } from './playlist/m3u8Entry';
export { MediaPlaylist } from './playlist/mediaPlaylist';
export { VariantPlaylist } from './playlist/variantPlaylist';
export { formatDuration, joinUrl, MIN_BYTERANGE_VERSION } from './playlist/tags';
export { SegmentCleaner } from './utils/segmentCleaner';
export { ConfigLoader, AppConfig, CleanupConfig, LoggingConfig, PlaylistConfig } from './utils/configLoader';
export { default as logger, reloadLoggerConfig } from './utils/logger';
