/**
 * Reference configuration of the staged generator.
 * Stage 0 runs at 50 tokens per second; each stage-0 token covers 20 ms.
 */
export const NR_STAGES = 2;
export const NR_TRACKS = 2;

export const FRAMES_PER_SECOND = 50;
export const MS_PER_TOKEN = 20;

/** Flat elements per stage-0 token, indexed by stage. */
export const STAGE_ELEMENT_SIZES: readonly number[] = [1, 8];

export const DEFAULT_TRACK_LENGTH = 1500;
export const DEFAULT_SYSTEM_PROMPT = "Generate music from the given lyrics segment by segment.";

export const LENGTH_TAG = "length";
export const TOKEN_UNIT_SUFFIX = "t";

export enum Stage {
    Base = 0,
    Fine = 1,
}

export enum Track {
    Vocal = 0,
    Instrumental = 1,
}

export const STAGES: readonly Stage[] = [Stage.Base, Stage.Fine];
export const TRACKS: readonly Track[] = [Track.Vocal, Track.Instrumental];

export function elementSize(stage: Stage): number {
    return STAGE_ELEMENT_SIZES[stage] ?? STAGE_ELEMENT_SIZES[STAGE_ELEMENT_SIZES.length - 1];
}
