import { M3u8Entry } from '../../src/playlist/m3u8Entry';
import { SegmentFile } from '../../src/playlist/segmentFile';
import { createMockLogger } from '../mockLogger';

describe('SegmentFile', () => {
    it('should start with one reference held by the creator', () => {
        const file = new SegmentFile('/segments/0.ts');
        expect(file.refCount).toBe(1);
        expect(file.released).toBe(false);
    });

    it('should call onRelease exactly once when the last reference drops', () => {
        const onRelease = jest.fn();
        const file = new SegmentFile('/segments/0.ts', onRelease);

        file.ref();
        file.unref();
        expect(onRelease).not.toHaveBeenCalled();

        file.unref();
        expect(onRelease).toHaveBeenCalledTimes(1);
        expect(onRelease).toHaveBeenCalledWith(file);
        expect(file.released).toBe(true);
    });

    it('should warn instead of going negative on extra unref', () => {
        const mock = createMockLogger();
        const onRelease = jest.fn();
        const file = new SegmentFile('/segments/0.ts', onRelease, mock.logger);

        file.unref();
        file.unref();

        expect(file.refCount).toBe(0);
        expect(onRelease).toHaveBeenCalledTimes(1);
        expect(mock.warn).toHaveBeenCalledWith('Reference dropped on released file: /segments/0.ts');
    });
});

describe('M3u8Entry', () => {
    it('should take a reference on its file and keep the given fields', () => {
        const file = new SegmentFile('/segments/3.ts');
        const entry = M3u8Entry.create({
            url: 'http://cdn.test/live/3.ts',
            file,
            title: 'third',
            duration: 4.5,
            length: 2048,
            offset: 512,
            discontinuous: true
        });

        expect(entry).not.toBeNull();
        if (entry) {
            expect(file.refCount).toBe(2);
            expect(entry.url).toBe('http://cdn.test/live/3.ts');
            expect(entry.title).toBe('third');
            expect(entry.duration).toBe(4.5);
            expect(entry.length).toBe(2048);
            expect(entry.offset).toBe(512);
            expect(entry.discontinuous).toBe(true);
        }
    });

    it('should default byte range and discontinuity fields', () => {
        const entry = M3u8Entry.create({ url: 'a.ts', file: new SegmentFile('a.ts'), duration: 2 });

        expect(entry?.length).toBe(0);
        expect(entry?.offset).toBe(0);
        expect(entry?.discontinuous).toBe(false);
        expect(entry?.title).toBeUndefined();
    });

    it('should reject an empty URL without touching the file', () => {
        const mock = createMockLogger();
        const file = new SegmentFile('/segments/0.ts');

        const entry = M3u8Entry.create({ url: '', file, duration: 2 }, mock.logger);

        expect(entry).toBeNull();
        expect(file.refCount).toBe(1);
        expect(mock.warn).toHaveBeenCalledWith('Rejected playlist entry with an empty URL');
    });

    it('should release its reference once on destroy', () => {
        const file = new SegmentFile('/segments/0.ts');
        const entry = M3u8Entry.create({ url: '0.ts', file, duration: 2 });

        entry?.destroy();
        entry?.destroy();

        expect(entry?.isDestroyed).toBe(true);
        expect(file.refCount).toBe(1);
    });
});
