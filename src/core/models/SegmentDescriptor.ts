/**
 * A tag value after coercion. `length` becomes a frame count,
 * every other tag keeps its trimmed text.
 */
export type TagValue = number | string;

export type SegmentTags = Record<string, TagValue>;

/**
 * One `[Section]` block of a tagged lyric script, as produced by a parser.
 */
export interface SegmentDescriptor {
    /** Header text between the brackets, e.g. "verse" */
    readonly name: string;

    /** Tags written on the `#tag value` lines right before the header */
    readonly tags: Readonly<SegmentTags>;

    /** Lyric body, trimmed */
    readonly lyrics: string;
}
