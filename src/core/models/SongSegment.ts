import { LENGTH_TAG, Stage, Track, TRACKS } from "../config/GenerationConfig";
import { interleaveTracks } from "../utils/Interleave";
import { SegmentDescriptor, SegmentTags } from "./SegmentDescriptor";
import { StageTrackGrid, TokenBuffer } from "./StageTrackGrid";

/**
 * One section of a song: its header, tags, lyrics and the tokens
 * generated for it so far, per stage and track.
 */
export class SongSegment {
    private tracks = new StageTrackGrid();

    private constructor(
        private readonly segmentName: string,
        private readonly segmentTags: SegmentTags,
        private readonly segmentLyrics: string
    ) { }

    public static create(name: string, tags: SegmentTags, lyrics: string): SongSegment {
        return new SongSegment(name, { ...tags }, lyrics);
    }

    public static fromDescriptor(descriptor: SegmentDescriptor): SongSegment {
        return SongSegment.create(descriptor.name, descriptor.tags, descriptor.lyrics);
    }

    public name(): string {
        return this.segmentName;
    }

    public tags(): Readonly<SegmentTags> {
        return this.segmentTags;
    }

    public lyrics(): string {
        return this.segmentLyrics;
    }

    public toString(): string {
        return `[${this.segmentName}]\n${this.segmentLyrics}\n\n`;
    }

    /** True when name, tags and lyrics all match. Cached tokens are not compared. */
    public hasSameContent(other: SongSegment): boolean {
        if (this.segmentName !== other.segmentName || this.segmentLyrics !== other.segmentLyrics) {
            return false;
        }
        const keys = Object.keys(this.segmentTags);
        return keys.length === Object.keys(other.segmentTags).length
            && keys.every(key => other.segmentTags[key] === this.segmentTags[key]);
    }

    /**
     * Frame count from the `length` tag, if the script set one.
     */
    public trackLength(): number | undefined {
        const value = this.segmentTags[LENGTH_TAG];
        return typeof value === 'number' ? value : undefined;
    }

    public cachedLength(stage: Stage, track: Track): number {
        return this.tracks.length(stage, track);
    }

    public track(stage: Stage, track: Track): TokenBuffer {
        return this.tracks.get(stage, track);
    }

    public setTrack(stage: Stage, track: Track, tokens: TokenBuffer) {
        this.tracks.set(stage, track, tokens);
    }

    public clearStage(stage: Stage) {
        this.tracks.clearStage(stage);
    }

    /** Adopts a deep copy of the other segment's cached tokens. */
    public merge(other: SongSegment) {
        this.tracks = other.tracks.clone();
    }

    public clone(): SongSegment {
        const copy = SongSegment.create(this.segmentName, this.segmentTags, this.segmentLyrics);
        copy.merge(this);
        return copy;
    }

    /**
     * Interleaves the base-stage tracks [V V V] [I I I] -> [V I V I V I].
     * Throws InterleaveLengthError while the tracks differ in length.
     */
    public mergedStage1Tracks(): number[] {
        return interleaveTracks(TRACKS.map(track => this.tracks.get(Stage.Base, track)));
    }

    /** Plain copy of the cached tokens, [stage][track][token]. */
    public tracksToArrays(): number[][][] {
        return this.tracks.toArrays();
    }

    public loadTracks(data: readonly (readonly (readonly number[])[])[]) {
        this.tracks = StageTrackGrid.fromArrays(data);
    }
}
