import fs from 'fs';
import { MediaPlaylist } from '../../src/playlist/mediaPlaylist';
import { SegmentFile } from '../../src/playlist/segmentFile';
import { SegmentCleaner } from '../../src/utils/segmentCleaner';
import { createMockLogger, MockLogger } from '../mockLogger';

jest.mock('fs', () => ({
    ...jest.requireActual('fs'),
    unlinkSync: jest.fn(),
}));

const mockedUnlink = jest.mocked(fs.unlinkSync);

describe('SegmentCleaner', () => {
    let mock: MockLogger;

    beforeEach(() => {
        jest.clearAllMocks();
        mock = createMockLogger();
    });

    it('should delete a segment only after the playlist and the caller release it', () => {
        const cleaner = new SegmentCleaner({ isEnabled: true, loggerInstance: mock.logger });
        const playlist = new MediaPlaylist({
            name: 'low',
            baseUrl: '',
            file: new SegmentFile('/playlists/low.m3u8'),
            bitrate: 400000,
            version: 3,
            windowSize: 4,
            allowCache: true,
            chunked: true
        }, mock.logger);

        const first = cleaner.track('/segments/0.ts');
        playlist.addEntry({ path: '0.ts', file: first, duration: 4, index: 0 });
        first.unref();
        expect(mockedUnlink).not.toHaveBeenCalled();

        const second = cleaner.track('/segments/1.ts');
        const evicted = playlist.addEntry({ path: '1.ts', file: second, duration: 4, index: 1 });
        second.unref();
        expect(evicted).toEqual([first]);
        expect(mockedUnlink).not.toHaveBeenCalled();

        cleaner.dispose(evicted ?? []);

        expect(mockedUnlink).toHaveBeenCalledTimes(1);
        expect(mockedUnlink).toHaveBeenCalledWith('/segments/0.ts');
        expect(cleaner.removedCount).toBe(1);
    });

    it('should keep files when cleanup is disabled', () => {
        const cleaner = new SegmentCleaner({ isEnabled: false, loggerInstance: mock.logger });
        const file = cleaner.track('/segments/0.ts');

        cleaner.dispose([file]);

        expect(file.released).toBe(true);
        expect(mockedUnlink).not.toHaveBeenCalled();
        expect(cleaner.removedCount).toBe(0);
    });

    it('should warn when the file is already gone', () => {
        mockedUnlink.mockImplementationOnce(() => {
            throw Object.assign(new Error('no such file'), { code: 'ENOENT' });
        });
        const cleaner = new SegmentCleaner({ isEnabled: true, loggerInstance: mock.logger });

        cleaner.dispose([cleaner.track('/segments/0.ts')]);

        expect(mock.warn).toHaveBeenCalledWith('Segment file already gone: /segments/0.ts');
        expect(mock.error).not.toHaveBeenCalled();
        expect(cleaner.removedCount).toBe(0);
    });

    it('should log other removal errors without throwing', () => {
        const failure = Object.assign(new Error('permission denied'), { code: 'EACCES' });
        mockedUnlink.mockImplementationOnce(() => {
            throw failure;
        });
        const cleaner = new SegmentCleaner({ isEnabled: true, loggerInstance: mock.logger });

        expect(() => cleaner.dispose([cleaner.track('/segments/0.ts')])).not.toThrow();
        expect(mock.error).toHaveBeenCalledWith('Error removing segment file /segments/0.ts:', failure);
        expect(cleaner.removedCount).toBe(0);
    });
});
