import { elementSize, Stage, STAGES, TRACKS } from "../config/GenerationConfig";
import { GenerationContext, TokenGenerator } from "../interfaces/TokenGenerator";
import { GenerationCache } from "../services/GenerationCache";

export interface MockGeneratorOptions {
    /** Stop each segment after this many base tokens */
    maxTokensPerSegment?: number;
    /** Stages to produce; the others are left as they are */
    stages?: readonly Stage[];
    /** Simulated latency per call */
    delayMs?: number;
}

/**
 * Deterministic stand-in for the generation model. Each token encodes its
 * stage, track and flat position, see tokenAt().
 */
export class MockTokenGenerator implements TokenGenerator {
    public name = "MockGenerator";
    public calls = 0;

    constructor(private readonly options: MockGeneratorOptions = {}) { }

    public static tokenAt(stage: Stage, track: number, position: number): number {
        return stage * 100000 + track * 10000 + position;
    }

    public async generate({ song, cache }: GenerationContext): Promise<void> {
        this.calls++;
        if (this.options.delayMs) {
            await new Promise(resolve => setTimeout(resolve, this.options.delayMs));
        }

        // Every record but the last is complete; the last may have been rewound.
        const covered = cache.segments().length;

        for (let index = Math.max(0, covered - 1); index < song.size; index++) {
            const segment = song.segment(index);
            if (!segment) break;

            const target = Math.min(song.segmentLength(index), this.options.maxTokensPerSegment ?? Infinity);
            const existing = cache.segments()[index];
            const start = existing ? existing.start : cache.resumePoint();
            const have = existing ? existing.end - existing.start : 0;
            if (have >= target) continue;

            this.appendTokens(cache, start + have, target - have);

            if (existing) {
                cache.setSegmentEnd(index, start + target);
            } else {
                cache.addSegment(segment.name(), start, start + target);
            }
        }
    }

    private appendTokens(cache: GenerationCache, fromToken: number, count: number) {
        const stages = this.options.stages ?? STAGES;
        for (const stage of stages) {
            const size = elementSize(stage);
            for (const track of TRACKS) {
                const buffer = cache.track(stage, track);
                const first = fromToken * size;
                for (let position = first; position < first + count * size; position++) {
                    buffer.push(MockTokenGenerator.tokenAt(stage, track, position));
                }
            }
        }
    }
}
