/**
 * Base class for misuse of the token cache API (wrong shape, bad index).
 * Degraded data is never thrown; see Diagnostics.
 */
export class TokenCacheError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class TrackShapeError extends TokenCacheError {
    constructor(public readonly stage: number, public readonly track: number) {
        super(`No buffer at stage ${stage}, track ${track}`);
    }
}

export class InterleaveLengthError extends TokenCacheError {
    constructor(public readonly lengths: number[]) {
        super(`Cannot interleave tracks of unequal length: ${lengths.join(", ")}`);
    }
}
