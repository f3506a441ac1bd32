import { Song } from "../models/Song";
import { GenerationCache } from "../services/GenerationCache";

export interface GenerationContext {
    /** The song being generated; read-only for the generator */
    song: Song;

    /**
     * Flat buffers truncated at the resume point. The generator appends to
     * `cache.track(stage, track)` and records or extends segment boundaries.
     */
    cache: GenerationCache;
}

/**
 * A source of tokens, i.e. the generation model.
 */
export interface TokenGenerator {
    /**
     * Name of the generator.
     */
    name: string;

    /**
     * Extends the cache from its resume point to the end of the song.
     * @param context Song and cache to extend
     */
    generate(context: GenerationContext): Promise<void>;
}
