import { SegmentDescriptor } from "../models/SegmentDescriptor";
import { DiagnosticSink } from "../models/Diagnostics";

/**
 * Interface for lyric script parsing strategies.
 */
export interface SegmentParser {
    /**
     * Splits a tagged lyric script into segment descriptors.
     * @param rawText The lyric script.
     * @param diagnostics Receives tags that were dropped.
     * @returns Segments in script order.
     */
    parse(rawText: string, diagnostics?: DiagnosticSink): SegmentDescriptor[];
}
