import { describe, it, expect } from 'vitest';
import { GenerationSession } from './GenerationSession';
import { Song } from '../models/Song';
import { SongSegment } from '../models/SongSegment';
import { MockTokenGenerator } from '../providers/MockTokenGenerator';
import { TokenGenerator } from '../interfaces/TokenGenerator';
import { Stage, Track } from '../config/GenerationConfig';

function at(song: Song, index: number): SongSegment {
    const segment = song.segment(index);
    if (!segment) throw new Error(`No segment ${index}`);
    return segment;
}

function range(start: number, count: number): number[] {
    return Array.from({ length: count }, (_, i) => start + i);
}

const SCRIPT = "#length 10t\n[verse]\na\n#length 4t\n[chorus]\nb";

describe('GenerationSession', () => {
    it('should generate every segment and split the tokens back', async () => {
        const session = new GenerationSession(new Song(), new MockTokenGenerator());
        session.setLyrics(SCRIPT);

        const report = await session.generate();
        const song = session.song();

        expect(report.generator).toBe('MockGenerator');
        expect(report.resumePoint).toBe(0);
        expect(report.buffersWritten).toBe(8);
        expect(report.diagnostics).toEqual([]);
        expect(report.segments).toEqual([
            { name: 'verse', start: 0, end: 10 },
            { name: 'chorus', start: 10, end: 14 }
        ]);
        expect(at(song, 0).track(Stage.Base, Track.Vocal)).toEqual(range(0, 10));
        expect(at(song, 0).track(Stage.Base, Track.Instrumental)).toEqual(range(10000, 10));
        expect(at(song, 1).track(Stage.Base, Track.Vocal)).toEqual([10, 11, 12, 13]);
        expect(at(song, 1).track(Stage.Fine, Track.Vocal)).toEqual(range(100080, 32));
        expect(session.lastCacheSnapshot()?.segments).toEqual([['verse', 0, 10], ['chorus', 10, 14]]);
    });

    it('should regenerate only the rewound tail', async () => {
        const session = new GenerationSession(new Song(), new MockTokenGenerator());
        session.setLyrics(SCRIPT);
        await session.generate();

        session.setGenerator(new MockTokenGenerator({ maxTokensPerSegment: 2 }));
        // 100ms = 5 tokens: chorus (4) dropped, verse shortened by 1
        const report = await session.generate({ rewindMs: 100 });
        const song = session.song();

        expect(report.rewind).toEqual({ requestedTokens: 5, droppedSegments: 1, unusedTokens: 0 });
        expect(report.resumePoint).toBe(9);
        expect(report.segments).toEqual([
            { name: 'verse', start: 0, end: 9 },
            { name: 'chorus', start: 9, end: 11 }
        ]);
        expect(at(song, 0).track(Stage.Base, Track.Vocal)).toEqual(range(0, 9));
        expect(at(song, 0).cachedLength(Stage.Fine, Track.Vocal)).toBe(72);
        expect(at(song, 1).track(Stage.Base, Track.Vocal)).toEqual([9, 10]);
        expect(at(song, 1).track(Stage.Fine, Track.Instrumental)).toEqual(range(110072, 16));
    });

    it('should report stages the generator did not produce', async () => {
        const session = new GenerationSession(new Song(), new MockTokenGenerator({ stages: [Stage.Base] }));
        session.setLyrics(SCRIPT);

        const report = await session.generate();

        expect(report.buffersWritten).toBe(4);
        expect(report.diagnostics.filter(d => d.code === 'transfer-skipped')).toHaveLength(4);
        expect(at(session.song(), 0).cachedLength(Stage.Fine, Track.Vocal)).toBe(0);
    });

    it('should leave the song untouched when the generator fails', async () => {
        const session = new GenerationSession(new Song(), new MockTokenGenerator());
        session.setLyrics(SCRIPT);
        await session.generate();

        const failing: TokenGenerator = {
            name: 'Failing',
            generate: async ({ cache }) => {
                cache.track(Stage.Base, Track.Vocal).push(-1);
                throw new Error('model offline');
            }
        };
        session.setGenerator(failing);

        await expect(session.generate({ rewindMs: 100 })).rejects.toThrow('model offline');
        expect(at(session.song(), 1).track(Stage.Base, Track.Vocal)).toEqual([10, 11, 12, 13]);
    });

    it('should interleave the base stage of the whole song', async () => {
        const session = new GenerationSession(new Song(), new MockTokenGenerator());
        session.setLyrics(SCRIPT);
        await session.generate();

        const stream = session.interleavedBaseStage();

        expect(stream).toHaveLength(28);
        expect(stream.slice(0, 4)).toEqual([0, 10000, 1, 10001]);
        expect(stream.slice(-2)).toEqual([13, 10013]);
    });

    it('should keep tokens of unchanged segments across a lyric edit', async () => {
        const session = new GenerationSession(new Song(), new MockTokenGenerator());
        session.setLyrics(SCRIPT);
        await session.generate();
        const generator = new MockTokenGenerator();
        session.setGenerator(generator);

        session.setLyrics(SCRIPT + "\n#length 3t\n[outro]\nc");
        const report = await session.generate();

        expect(generator.calls).toBe(1);
        expect(report.resumePoint).toBe(14);
        expect(at(session.song(), 0).track(Stage.Base, Track.Vocal)).toEqual(range(0, 10));
        expect(at(session.song(), 2).track(Stage.Base, Track.Vocal)).toEqual([14, 15, 16]);
    });
});
