import { elementSize, MS_PER_TOKEN, Stage, STAGES, Track, TRACKS } from "../config/GenerationConfig";
import { DiagnosticSink, reportDiagnostic } from "../models/Diagnostics";
import { Song } from "../models/Song";
import { StageTrackGrid, TokenBuffer } from "../models/StageTrackGrid";
import { CacheSnapshot, cacheSnapshotSchema, readSnapshotFields } from "../schemas/Snapshots";
import { Logger } from "../utils/Logger";

/**
 * Where one segment's tokens sit in the flat buffers.
 * Offsets are in base-stage tokens for every stage; `end` is exclusive.
 */
export interface SegmentBoundary {
    name: string;
    start: number;
    end: number;
}

export interface RewindResult {
    /** Base-stage tokens the duration converted to */
    requestedTokens: number;
    /** Boundary records removed entirely */
    droppedSegments: number;
    /** Tokens that could not be rewound because the table ran out */
    unusedTokens: number;
}

/**
 * Flat, generator-ready view of a song's cached tokens plus a table of
 * segment boundaries. Built from a Song, rewound, extended by a generator,
 * then split back into the Song with transferToSong.
 */
export class GenerationCache {
    private tracks = new StageTrackGrid();
    private boundaries: SegmentBoundary[] = [];

    public static createFromSong(song: Song): GenerationCache {
        const cache = new GenerationCache();

        for (const stage of STAGES) {
            cache.addTracks(stage, song.mergeSegments(stage));
        }

        // Segments without base-stage tokens get no record and take no space.
        let cursor = 0;
        for (const segment of song) {
            const segmentLength = segment.cachedLength(Stage.Base, Track.Vocal);
            if (segmentLength === 0) continue;

            cache.addSegment(segment.name(), cursor, cursor + segmentLength);
            cursor += segmentLength;
        }

        Logger.debug(`[GenerationCache] Created from song: ${cache.boundaries.length} segments, ${cursor} tokens`);
        return cache;
    }

    public addSegment(name: string, start: number, end: number) {
        this.boundaries.push({ name, start, end });
    }

    /** Moves the end of an existing record, e.g. after a generator extended it. */
    public setSegmentEnd(index: number, end: number) {
        const boundary = this.boundaries[index];
        if (!boundary) {
            throw new RangeError(`No segment boundary at index ${index}`);
        }
        this.boundaries[index] = { ...boundary, end };
    }

    /** Installs one flat buffer per track for the stage. Extra tracks are ignored. */
    public addTracks(stage: Stage, tracks: TokenBuffer[]) {
        tracks.forEach((tokens, track) => {
            if (StageTrackGrid.isInShape(stage, track)) {
                this.tracks.set(stage, track, tokens);
            }
        });
    }

    public segments(): readonly SegmentBoundary[] {
        return this.boundaries;
    }

    /**
     * The live flat buffer for a stage and track; generators append to it.
     * Outside the stage/track shape an unattached empty buffer is returned.
     */
    public track(stage: number, track: number): TokenBuffer {
        if (!StageTrackGrid.isInShape(stage, track)) return [];
        return this.tracks.get(stage, track);
    }

    /** End of the last boundary record, where generation resumes. */
    public resumePoint(): number {
        const last = this.boundaries[this.boundaries.length - 1];
        return last ? last.end : 0;
    }

    public totalLength(): number {
        return this.boundaries.reduce((sum, b) => sum + (b.end - b.start), 0);
    }

    /**
     * Discards the last `durationMs` of the boundary table, 20 ms per token.
     * Whole segments are dropped from the end while the remaining duration is
     * longer than them; the next one is shortened. Flat buffers are untouched.
     * Negative and non-finite durations rewind nothing.
     */
    public rewind(durationMs: number, diagnostics?: DiagnosticSink): RewindResult {
        const safeMs = Number.isFinite(durationMs) ? Math.max(0, durationMs) : 0;
        const requestedTokens = Math.floor(safeMs / MS_PER_TOKEN);
        let tokens = requestedTokens;
        let droppedSegments = 0;

        for (let index = this.boundaries.length - 1; index >= 0; index--) {
            const boundary = this.boundaries[index];
            const length = boundary.end - boundary.start;

            if (tokens > length) {
                tokens -= length;
                this.boundaries.pop();
                droppedSegments++;
            } else {
                this.boundaries[index] = { ...boundary, end: boundary.end - tokens };
                tokens = 0;
                break;
            }
        }

        if (tokens > 0) {
            reportDiagnostic(diagnostics, {
                code: 'rewind-clamped',
                message: `[GenerationCache] Rewind of ${durationMs}ms ran past the start, ${tokens} tokens unused`,
                context: { durationMs, requestedTokens, unusedTokens: tokens }
            });
        }

        Logger.debug(`[GenerationCache] Rewound ${durationMs}ms: dropped ${droppedSegments} segments, resume at ${this.resumePoint()}`);
        return { requestedTokens, droppedSegments, unusedTokens: tokens };
    }

    /**
     * Cuts every flat buffer at the resume point so that whatever a
     * generator appends replaces the rewound tail.
     */
    public truncateToBoundaries() {
        const resumePoint = this.resumePoint();
        for (const stage of STAGES) {
            const limit = resumePoint * elementSize(stage);
            for (const track of TRACKS) {
                const buffer = this.tracks.get(stage, track);
                if (buffer.length > limit) buffer.splice(limit);
            }
        }
    }

    /**
     * Splits the flat buffers back into the song's segments, by position.
     * Stage offsets are scaled by the stage element size. A slice that would
     * start past the buffer (or an empty buffer) leaves the segment's tokens
     * as they were; a slice that ends past the buffer is shortened.
     * @returns Number of segment buffers replaced.
     */
    public transferToSong(song: Song, diagnostics?: DiagnosticSink): number {
        let written = 0;

        this.boundaries.forEach((boundary, index) => {
            const segment = song.segment(index);
            if (!segment) {
                reportDiagnostic(diagnostics, {
                    code: 'transfer-skipped',
                    message: `[GenerationCache] Boundary ${index} '${boundary.name}' has no segment in the song`,
                    context: { segment: index, name: boundary.name }
                });
                return;
            }

            for (const stage of STAGES) {
                const size = elementSize(stage);
                for (const track of TRACKS) {
                    const buffer = this.tracks.get(stage, track);
                    const startPos = boundary.start * size;
                    let endPos = boundary.end * size;

                    if (startPos > buffer.length || buffer.length === 0) {
                        // An empty buffer is a stage that has not run yet.
                        reportDiagnostic(diagnostics, {
                            code: 'transfer-skipped',
                            message: `[GenerationCache] Segment ${index} stage ${stage} track ${track}: buffer has ${buffer.length} elements, slice starts at ${startPos}`,
                            context: { segment: index, stage, track, start: startPos, available: buffer.length }
                        }, buffer.length === 0);
                        continue;
                    }

                    // A later stage may still be behind the base stage.
                    if (endPos > buffer.length) {
                        reportDiagnostic(diagnostics, {
                            code: 'transfer-clamped',
                            message: `[GenerationCache] Segment ${index} stage ${stage} track ${track}: slice end ${endPos} clamped to ${buffer.length}`,
                            context: { segment: index, stage, track, end: endPos, available: buffer.length }
                        });
                        endPos = buffer.length;
                    }

                    segment.setTrack(stage, track, buffer.slice(startPos, endPos));
                    written++;
                }
            }
        });

        return written;
    }

    public save(): CacheSnapshot {
        return {
            tracks: this.tracks.toArrays(),
            segments: this.boundaries.map((b): [string, number, number] => [b.name, b.start, b.end])
        };
    }

    /**
     * Restores a snapshot from save(). Missing or malformed fields keep
     * their current value.
     */
    public load(data: unknown, diagnostics?: DiagnosticSink) {
        const fields = readSnapshotFields(cacheSnapshotSchema.partial(), data, "GenerationCache", diagnostics);
        if (!fields) return;

        if (fields.tracks !== undefined) {
            this.tracks = StageTrackGrid.fromArrays(fields.tracks);
        }
        if (fields.segments !== undefined) {
            this.boundaries = fields.segments.map(([name, start, end]) => ({ name, start, end }));
        }
    }
}
