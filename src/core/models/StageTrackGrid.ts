import { NR_STAGES, NR_TRACKS, Stage, Track } from "../config/GenerationConfig";
import { TrackShapeError } from "./Errors";

/** Token ids of one stage/track, in generation order. */
export type TokenBuffer = number[];

/**
 * Fixed-shape NR_STAGES x NR_TRACKS container of token buffers.
 * A buffer that has not been generated yet is empty, never missing.
 */
export class StageTrackGrid {
    private buffers: TokenBuffer[][];

    constructor() {
        this.buffers = Array.from({ length: NR_STAGES }, () =>
            Array.from({ length: NR_TRACKS }, (): TokenBuffer => [])
        );
    }

    /**
     * Builds a grid from nested arrays. Entries outside the fixed shape are
     * ignored, missing ones stay empty. Buffers are copied.
     */
    public static fromArrays(data: readonly (readonly (readonly number[])[])[]): StageTrackGrid {
        const grid = new StageTrackGrid();
        for (let stage = 0; stage < NR_STAGES; stage++) {
            for (let track = 0; track < NR_TRACKS; track++) {
                const tokens = data[stage]?.[track];
                if (tokens) grid.buffers[stage][track] = [...tokens];
            }
        }
        return grid;
    }

    public static isInShape(stage: number, track: number): boolean {
        return Number.isInteger(stage) && Number.isInteger(track)
            && stage >= 0 && stage < NR_STAGES
            && track >= 0 && track < NR_TRACKS;
    }

    public get(stage: Stage, track: Track): TokenBuffer {
        this.assertShape(stage, track);
        return this.buffers[stage][track];
    }

    public set(stage: Stage, track: Track, tokens: TokenBuffer) {
        this.assertShape(stage, track);
        this.buffers[stage][track] = tokens;
    }

    public length(stage: Stage, track: Track): number {
        return this.get(stage, track).length;
    }

    public clearStage(stage: Stage) {
        for (let track = 0; track < NR_TRACKS; track++) {
            this.set(stage, track, []);
        }
    }

    public clone(): StageTrackGrid {
        return StageTrackGrid.fromArrays(this.buffers);
    }

    /** Deep copy as plain nested arrays, [stage][track][token]. */
    public toArrays(): number[][][] {
        return this.buffers.map(stage => stage.map(tokens => [...tokens]));
    }

    private assertShape(stage: number, track: number) {
        if (!StageTrackGrid.isInShape(stage, track)) {
            throw new TrackShapeError(stage, track);
        }
    }
}
