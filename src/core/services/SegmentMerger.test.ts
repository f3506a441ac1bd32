import { describe, it, expect } from 'vitest';
import { SegmentMerger } from './SegmentMerger';
import { SongSegment } from '../models/SongSegment';
import { DiagnosticLog } from '../models/Diagnostics';
import { TaggedLyricsParser } from '../parsers/TaggedLyricsParser';
import { Stage, Track } from '../config/GenerationConfig';

const parser = new TaggedLyricsParser();

/** Parses a script and gives segment i the single base token i + 1. */
function segmentsOf(script: string, withTokens = false): SongSegment[] {
    return parser.parse(script).map((descriptor, i) => {
        const segment = SongSegment.fromDescriptor(descriptor);
        if (withTokens) segment.setTrack(Stage.Base, Track.Vocal, [i + 1]);
        return segment;
    });
}

const tokensOf = (segments: SongSegment[]) => segments.map(s => s.track(Stage.Base, Track.Vocal));

describe('SegmentMerger', () => {
    it('should merge by position by default', () => {
        const previous = segmentsOf("[a]\n1\n[b]\n2", true);
        const next = segmentsOf("[b]\n2\n[a]\n1\n[c]\n3");

        const report = new SegmentMerger().merge(previous, next);

        expect(report.strategy).toBe('positional');
        expect(tokensOf(next)).toEqual([[1], [2], []]);
    });

    it('should follow sections by name and occurrence', () => {
        const previous = segmentsOf("[verse]\na\n[chorus]\nb", true);
        const next = segmentsOf("[intro]\nx\n[verse]\na\n[chorus]\nb");
        const diagnostics = new DiagnosticLog();

        const report = new SegmentMerger('identity').merge(previous, next, diagnostics);

        expect(report.pairs).toEqual([
            { newIndex: 0, oldIndex: null },
            { newIndex: 1, oldIndex: 0 },
            { newIndex: 2, oldIndex: 1 }
        ]);
        expect(tokensOf(next)).toEqual([[], [1], [2]]);
        expect(diagnostics.hasIssues()).toBe(false);
    });

    it('should prefer the id tag over the name', () => {
        const previous = segmentsOf("#id v1\n[verse]\na\n#id v2\n[verse]\nb", true);
        const next = segmentsOf("#id v2\n[verse]\nb\n#id v1\n[verse]\na");

        new SegmentMerger('identity').merge(previous, next);

        expect(tokensOf(next)).toEqual([[2], [1]]);
    });

    it('should flag names whose count changed', () => {
        const previous = segmentsOf("[verse]\na\n[verse]\nb", true);
        const next = segmentsOf("[verse]\nc");
        const diagnostics = new DiagnosticLog();

        const report = new SegmentMerger('identity').merge(previous, next, diagnostics);

        expect(report.pairs).toEqual([{ newIndex: 0, oldIndex: 0 }]);
        expect(diagnostics.byCode('merge-ambiguous').map(d => d.context)).toEqual([
            { name: 'verse', before: 2, after: 1 }
        ]);
    });

    it('should start a repeated id empty', () => {
        const previous = segmentsOf("#id x\n[a]\n1", true);
        const next = segmentsOf("#id x\n[a]\n1\n#id x\n[b]\n2");
        const diagnostics = new DiagnosticLog();

        const report = new SegmentMerger('identity').merge(previous, next, diagnostics);

        expect(report.pairs).toEqual([
            { newIndex: 0, oldIndex: 0 },
            { newIndex: 1, oldIndex: null }
        ]);
        expect(diagnostics.byCode('merge-ambiguous')).toHaveLength(1);
    });

    it('should build keys from id tags and name occurrences', () => {
        expect(SegmentMerger.identityKeys(segmentsOf("[verse]\na\n#id hook\n[chorus]\nb\n[verse]\nc"))).toEqual([
            'name:verse:0', 'id:hook', 'name:verse:1'
        ]);
    });
});
