import { z } from 'zod';
import { DiagnosticSink, reportDiagnostic } from '../models/Diagnostics';

// ---------------------------------------------------------------------------
// Generation cache snapshot: { tracks: [stage][track][token], segments: [name, start, end][] }
// ---------------------------------------------------------------------------

export const tokenBufferSchema = z.array(z.number().int());

export const stageTracksSchema = z.array(z.array(tokenBufferSchema));

export const boundaryTupleSchema = z.tuple([
    z.string(),
    z.number().int().nonnegative(),
    z.number().int().nonnegative(),
]);

export const cacheSnapshotSchema = z.object({
    tracks: stageTracksSchema,
    segments: z.array(boundaryTupleSchema),
});

export type CacheSnapshot = z.infer<typeof cacheSnapshotSchema>;

// ---------------------------------------------------------------------------
// Song snapshot
// ---------------------------------------------------------------------------

export const songSnapshotSchema = z.object({
    rawLyrics: z.string(),
    defaultTrackLength: z.number().int().positive(),
    systemPrompt: z.string(),
    audioPrompt: tokenBufferSchema,
    genre: z.string(),
    /** Cached tokens per segment, by position */
    segmentTracks: z.array(stageTracksSchema),
});

export type SongSnapshot = z.infer<typeof songSnapshotSchema>;

/**
 * Validates each field of a partial snapshot on its own. Missing fields
 * are left out; malformed ones are left out and reported.
 * @param schema The `.partial()` form of a snapshot schema.
 * @returns The valid fields, or undefined when nothing could be read.
 */
export function readSnapshotFields<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    data: unknown,
    source: string,
    diagnostics?: DiagnosticSink
): T | undefined {
    if (typeof data !== 'object' || data === null || Array.isArray(data)) {
        reportDiagnostic(diagnostics, {
            code: 'snapshot-field-ignored',
            message: `[${source}] Snapshot is not an object, nothing restored`,
            context: { field: '*' },
        });
        return undefined;
    }

    const result = schema.safeParse(data);
    if (result.success) {
        return result.data;
    }

    // Drop only the offending fields and keep the rest.
    const badFields = new Set(result.error.issues.map((issue) => String(issue.path[0] ?? '*')));
    badFields.forEach((field) => {
        reportDiagnostic(diagnostics, {
            code: 'snapshot-field-ignored',
            message: `[${source}] Ignoring malformed snapshot field '${field}'`,
            context: { field },
        });
    });

    const cleaned = Object.fromEntries(Object.entries(data).filter(([key]) => !badFields.has(key)));
    const retry = schema.safeParse(cleaned);
    return retry.success ? retry.data : undefined;
}
