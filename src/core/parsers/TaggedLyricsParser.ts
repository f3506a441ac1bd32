import { SegmentParser } from "../interfaces/SegmentParser";
import { SegmentDescriptor, SegmentTags } from "../models/SegmentDescriptor";
import { DiagnosticSink, reportDiagnostic } from "../models/Diagnostics";
import { parseTagValue } from "./TagValueParser";

/**
 * Parses lyric scripts made of `#tag value` lines followed by a
 * `[Section]` header and free lyric text:
 *
 *   #length 12.5
 *   #mood calm
 *   [verse]
 *   first line
 *
 * Tags belong to the header that follows them and are not inherited.
 */
export class TaggedLyricsParser implements SegmentParser {
    // Group 1: tag block (up to the header), Group 2: section name, Group 3: lyrics
    // Lyrics end at the next header, the next tag block or the end of input.
    private static SEGMENT_REGEX = /(#[\s\S]*?(?=\[))?\[([\p{L}\p{N}\p{M}_]+)\]([\s\S]*?)(?=\[|#|$)/gu;
    // Group 1: tag name, Group 2: raw value up to the next tag
    private static TAG_REGEX = /#([\p{L}\p{N}\p{M}_]+)([\s\S]*?)(?=#|$)/gu;

    public parse(rawText: string, diagnostics?: DiagnosticSink): SegmentDescriptor[] {
        const segments: SegmentDescriptor[] = [];

        for (const match of rawText.matchAll(TaggedLyricsParser.SEGMENT_REGEX)) {
            const tagBlock = match[1] ?? "";
            const name = match[2].trim();
            const lyrics = match[3].trim();

            segments.push({
                name,
                tags: this.parseTags(tagBlock, name, diagnostics),
                lyrics
            });
        }

        return segments;
    }

    private parseTags(tagBlock: string, segmentName: string, diagnostics?: DiagnosticSink): SegmentTags {
        const tags: SegmentTags = {};

        for (const match of tagBlock.matchAll(TaggedLyricsParser.TAG_REGEX)) {
            const tagName = match[1].trim().toLowerCase();
            const rawValue = match[2].trim();

            const value = parseTagValue(tagName, rawValue);
            if (value === undefined) {
                reportDiagnostic(diagnostics, {
                    code: 'invalid-tag',
                    message: `[Parser] Invalid tag #${tagName} ${rawValue}`,
                    context: { segment: segmentName, tag: tagName, value: rawValue }
                });
                continue;
            }

            tags[tagName] = value;
        }

        return tags;
    }
}
