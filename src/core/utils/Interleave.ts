import { InterleaveLengthError } from "../models/Errors";

/**
 * Reorders track-major buffers into one time-major stream:
 * [V V V] [I I I] -> [V I V I V I]
 * All tracks must have the same length.
 */
export function interleaveTracks(tracks: readonly (readonly number[])[]): number[] {
    if (tracks.length === 0) return [];

    const steps = tracks[0].length;
    if (tracks.some(t => t.length !== steps)) {
        throw new InterleaveLengthError(tracks.map(t => t.length));
    }

    const output: number[] = new Array(steps * tracks.length);
    for (let step = 0; step < steps; step++) {
        for (let track = 0; track < tracks.length; track++) {
            output[step * tracks.length + track] = tracks[track][step];
        }
    }
    return output;
}

/**
 * Inverse of interleaveTracks. A trailing partial step is dropped.
 */
export function deinterleaveTracks(stream: readonly number[], nrTracks: number): number[][] {
    if (!Number.isInteger(nrTracks) || nrTracks <= 0) {
        throw new RangeError(`Track count must be a positive integer, got ${nrTracks}`);
    }

    const steps = Math.floor(stream.length / nrTracks);
    const tracks: number[][] = Array.from({ length: nrTracks }, () => []);
    for (let step = 0; step < steps; step++) {
        for (let track = 0; track < nrTracks; track++) {
            tracks[track].push(stream[step * nrTracks + track]);
        }
    }
    return tracks;
}
