import { Stage } from "../config/GenerationConfig";
import { TokenGenerator } from "../interfaces/TokenGenerator";
import { Diagnostic, DiagnosticLog } from "../models/Diagnostics";
import { Song } from "../models/Song";
import { CacheSnapshot } from "../schemas/Snapshots";
import { interleaveTracks } from "../utils/Interleave";
import { Logger } from "../utils/Logger";
import { GenerationCache, RewindResult, SegmentBoundary } from "./GenerationCache";
import { MergeReport } from "./SegmentMerger";

export interface GenerateOptions {
    /** Regenerate the last N milliseconds of cached audio first */
    rewindMs?: number;
}

export interface GenerationReport {
    generator: string;
    /** Base-stage token where the generator started */
    resumePoint: number;
    rewind?: RewindResult;
    /** Segment buffers replaced in the song */
    buffersWritten: number;
    segments: SegmentBoundary[];
    diagnostics: Diagnostic[];
}

/**
 * Main facade for a generation session.
 * Owns the song, runs generate -> rewind -> transfer cycles against a generator.
 */
export class GenerationSession {
    private lastSnapshot: CacheSnapshot | null = null;

    constructor(
        private readonly currentSong: Song,
        private generator: TokenGenerator
    ) { }

    public song(): Song {
        return this.currentSong;
    }

    public setGenerator(generator: TokenGenerator) {
        this.generator = generator;
    }

    public setLyrics(text: string): MergeReport {
        const report = this.currentSong.setLyrics(text);
        Logger.info(`[Session] Lyrics updated: ${this.currentSong.size} segments, ${this.currentSong.lengthSeconds()}s`);
        return report;
    }

    /**
     * Runs one generation pass. The song only changes once the generator
     * has finished; a failing generator leaves it untouched.
     */
    public async generate(options: GenerateOptions = {}): Promise<GenerationReport> {
        const diagnostics = new DiagnosticLog();
        const cache = GenerationCache.createFromSong(this.currentSong);

        let rewind: RewindResult | undefined;
        if (options.rewindMs !== undefined && options.rewindMs > 0) {
            rewind = cache.rewind(options.rewindMs, diagnostics);
        }
        cache.truncateToBoundaries();

        const resumePoint = cache.resumePoint();
        Logger.info(`[Session] ${this.generator.name} resuming at token ${resumePoint}`);

        try {
            await this.generator.generate({ song: this.currentSong, cache });
        } catch (e) {
            Logger.error(`[Session] Generator ${this.generator.name} failed`, e);
            throw e;
        }

        const buffersWritten = cache.transferToSong(this.currentSong, diagnostics);
        this.lastSnapshot = cache.save();

        return {
            generator: this.generator.name,
            resumePoint,
            rewind,
            buffersWritten,
            segments: cache.segments().map(b => ({ ...b })),
            diagnostics: [...diagnostics.entries()]
        };
    }

    /** Cache state after the last completed generate() call. */
    public lastCacheSnapshot(): CacheSnapshot | null {
        return this.lastSnapshot;
    }

    /**
     * The base stage of the whole song as one time-major stream,
     * the form a single-stream consumer expects.
     */
    public interleavedBaseStage(): number[] {
        return interleaveTracks(this.currentSong.mergeSegments(Stage.Base));
    }
}
