import {
    DEFAULT_SYSTEM_PROMPT,
    DEFAULT_TRACK_LENGTH,
    FRAMES_PER_SECOND,
    Stage,
    TRACKS,
} from "../config/GenerationConfig";
import { SegmentParser } from "../interfaces/SegmentParser";
import { TaggedLyricsParser } from "../parsers/TaggedLyricsParser";
import { MergeReport, MergeStrategy, SegmentMerger } from "../services/SegmentMerger";
import { readSnapshotFields, SongSnapshot, songSnapshotSchema } from "../schemas/Snapshots";
import { Logger } from "../utils/Logger";
import { DiagnosticSink } from "./Diagnostics";
import { SongSegment } from "./SongSegment";
import { TokenBuffer } from "./StageTrackGrid";

export interface SongOptions {
    /** Frames used for segments without a `#length` tag */
    defaultTrackLength?: number;
    systemPrompt?: string;
    genre?: string;
    /** How cached tokens follow segments across lyric edits. Default: positional. */
    mergeStrategy?: MergeStrategy;
    parser?: SegmentParser;
}

/**
 * A lyric script split into segments, plus the global generation parameters.
 * Editing the lyrics re-parses them and carries cached tokens forward.
 */
export class Song implements Iterable<SongSegment> {
    private segmentList: SongSegment[] = [];
    private audioPromptTokens: TokenBuffer = [];
    private rawLyricsText = "";
    private structuredLyrics = "";

    private defaultLength: number;
    private systemPromptText: string;
    private genreText: string;

    private readonly parser: SegmentParser;
    private readonly merger: SegmentMerger;

    constructor(options: SongOptions = {}) {
        this.defaultLength = options.defaultTrackLength ?? DEFAULT_TRACK_LENGTH;
        this.systemPromptText = options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
        this.genreText = options.genre ?? "";
        this.parser = options.parser ?? new TaggedLyricsParser();
        this.merger = new SegmentMerger(options.mergeStrategy);
    }

    public toString(): string {
        return this.structuredLyrics;
    }

    public [Symbol.iterator](): Iterator<SongSegment> {
        return this.segmentList[Symbol.iterator]();
    }

    public get size(): number {
        return this.segmentList.length;
    }

    public segment(index: number): SongSegment | undefined {
        return this.segmentList[index];
    }

    public segments(): readonly SongSegment[] {
        return this.segmentList;
    }

    /**
     * Replaces the lyric script. Segments that survive the re-parse keep
     * their cached tokens; see SegmentMerger for how they are matched.
     */
    public setLyrics(lyricsText: string, diagnostics?: DiagnosticSink): MergeReport {
        this.rawLyricsText = lyricsText;

        const next = this.parser
            .parse(this.rawLyricsText.trim(), diagnostics)
            .map(descriptor => SongSegment.fromDescriptor(descriptor));

        const report = this.merger.merge(this.segmentList, next, diagnostics);
        this.segmentList = next;
        this.structuredLyrics = this.segmentList.map(s => s.toString()).join("");

        Logger.debug(`[Song] Parsed ${next.length} segments (${report.strategy} merge)`);
        return report;
    }

    public rawLyrics(): string {
        return this.rawLyricsText;
    }

    /** The script rebuilt from the parsed segments. */
    public lyrics(): string {
        return this.structuredLyrics;
    }

    public defaultTrackLength(): number {
        return this.defaultLength;
    }

    public setDefaultTrackLength(trackLength: number) {
        this.defaultLength = trackLength;
    }

    public systemPrompt(): string {
        return this.systemPromptText;
    }

    public setSystemPrompt(systemPrompt: string) {
        this.systemPromptText = systemPrompt;
    }

    public audioPrompt(): TokenBuffer {
        return this.audioPromptTokens;
    }

    public setAudioPrompt(audioPrompt: TokenBuffer) {
        this.audioPromptTokens = audioPrompt;
    }

    public genre(): string {
        return this.genreText;
    }

    public setGenre(genre: string) {
        this.genreText = genre;
    }

    /** Target length of one segment in frames. */
    public segmentLength(index: number): number {
        return this.segmentList[index]?.trackLength() ?? this.defaultLength;
    }

    /** Target length of the whole song in frames (50 per second). */
    public length(): number {
        return this.segmentList.reduce((sum, _, index) => sum + this.segmentLength(index), 0);
    }

    public lengthSeconds(): number {
        return this.length() / FRAMES_PER_SECOND;
    }

    /** Drops the cached tokens of one stage in every segment. */
    public clearCache(stage: Stage) {
        this.segmentList.forEach(segment => segment.clearStage(stage));
    }

    /**
     * Concatenates every segment's buffer for the stage, one flat buffer per track.
     * Segments without tokens contribute nothing.
     */
    public mergeSegments(stage: Stage): TokenBuffer[] {
        return TRACKS.map(track =>
            this.segmentList.flatMap(segment => segment.track(stage, track))
        );
    }

    public clone(): Song {
        const copy = new Song({
            defaultTrackLength: this.defaultLength,
            systemPrompt: this.systemPromptText,
            genre: this.genreText,
            mergeStrategy: this.merger.getStrategy(),
            parser: this.parser
        });
        copy.rawLyricsText = this.rawLyricsText;
        copy.structuredLyrics = this.structuredLyrics;
        copy.audioPromptTokens = [...this.audioPromptTokens];
        copy.segmentList = this.segmentList.map(segment => segment.clone());
        return copy;
    }

    public save(): SongSnapshot {
        return {
            rawLyrics: this.rawLyricsText,
            defaultTrackLength: this.defaultLength,
            systemPrompt: this.systemPromptText,
            audioPrompt: [...this.audioPromptTokens],
            genre: this.genreText,
            segmentTracks: this.segmentList.map(segment => segment.tracksToArrays())
        };
    }

    /**
     * Restores a snapshot from save(). Missing or malformed fields keep
     * their current value. Segment tokens are installed by position.
     */
    public load(data: unknown, diagnostics?: DiagnosticSink) {
        const fields = readSnapshotFields(songSnapshotSchema.partial(), data, "Song", diagnostics);
        if (!fields) return;

        if (fields.defaultTrackLength !== undefined) this.defaultLength = fields.defaultTrackLength;
        if (fields.systemPrompt !== undefined) this.systemPromptText = fields.systemPrompt;
        if (fields.genre !== undefined) this.genreText = fields.genre;
        if (fields.audioPrompt !== undefined) this.audioPromptTokens = [...fields.audioPrompt];
        if (fields.rawLyrics !== undefined) this.setLyrics(fields.rawLyrics, diagnostics);

        const segmentTracks = fields.segmentTracks;
        if (segmentTracks !== undefined) {
            this.segmentList.forEach((segment, index) => segment.loadTracks(segmentTracks[index] ?? []));
        }
    }
}
