import { SongSegment } from "../models/SongSegment";
import { DiagnosticSink, reportDiagnostic } from "../models/Diagnostics";

export const IDENTITY_TAG = "id";

/**
 * positional: segment i inherits old segment i's tokens.
 * identity: segments inherit from the old segment with the same `#id` tag,
 * or failing that the same name and occurrence number.
 */
export type MergeStrategy = 'positional' | 'identity';

export interface MergePair {
    newIndex: number;
    /** Old segment the tokens came from, null if the segment starts empty */
    oldIndex: number | null;
}

export interface MergeReport {
    strategy: MergeStrategy;
    pairs: MergePair[];
}

/**
 * Carries cached tokens forward from the previous segment list
 * when the lyrics are re-parsed.
 */
export class SegmentMerger {
    constructor(private readonly strategy: MergeStrategy = 'positional') { }

    public getStrategy(): MergeStrategy {
        return this.strategy;
    }

    public merge(previous: readonly SongSegment[], next: readonly SongSegment[], diagnostics?: DiagnosticSink): MergeReport {
        const pairs = this.strategy === 'identity'
            ? this.matchByIdentity(previous, next, diagnostics)
            : next.map((_, i) => ({ newIndex: i, oldIndex: i < previous.length ? i : null }));

        for (const pair of pairs) {
            if (pair.oldIndex !== null) {
                next[pair.newIndex].merge(previous[pair.oldIndex]);
            }
        }

        return { strategy: this.strategy, pairs };
    }

    private matchByIdentity(previous: readonly SongSegment[], next: readonly SongSegment[], diagnostics?: DiagnosticSink): MergePair[] {
        const oldKeys = SegmentMerger.identityKeys(previous);
        const newKeys = SegmentMerger.identityKeys(next);

        const oldByKey = new Map<string, number>();
        oldKeys.forEach((key, index) => {
            if (!oldByKey.has(key)) oldByKey.set(key, index);
        });

        this.flagAmbiguousNames(previous, next, diagnostics);

        const used = new Set<number>();
        return newKeys.map((key, newIndex) => {
            const oldIndex = oldByKey.get(key);
            if (oldIndex === undefined || used.has(oldIndex)) {
                if (oldIndex !== undefined) {
                    reportDiagnostic(diagnostics, {
                        code: 'merge-ambiguous',
                        message: `[Merge] Segment key '${key}' appears more than once, segment ${newIndex} starts empty`,
                        context: { segment: newIndex, key }
                    });
                }
                return { newIndex, oldIndex: null };
            }
            used.add(oldIndex);
            return { newIndex, oldIndex };
        });
    }

    /**
     * `id:<tag>` when the segment carries an `#id` tag, otherwise
     * `name:<name>:<occurrence>` counting earlier segments of the same name.
     */
    public static identityKeys(segments: readonly SongSegment[]): string[] {
        const seen = new Map<string, number>();
        return segments.map(segment => {
            const id = segment.tags()[IDENTITY_TAG];
            if (id !== undefined) return `id:${id}`;

            const occurrence = seen.get(segment.name()) ?? 0;
            seen.set(segment.name(), occurrence + 1);
            return `name:${segment.name()}:${occurrence}`;
        });
    }

    // Occurrence matching guesses when a name was added or removed
    // somewhere other than at the end.
    private flagAmbiguousNames(previous: readonly SongSegment[], next: readonly SongSegment[], diagnostics?: DiagnosticSink) {
        const count = (segments: readonly SongSegment[]) => {
            const counts = new Map<string, number>();
            segments
                .filter(s => s.tags()[IDENTITY_TAG] === undefined)
                .forEach(s => counts.set(s.name(), (counts.get(s.name()) ?? 0) + 1));
            return counts;
        };

        const oldCounts = count(previous);
        const newCounts = count(next);

        newCounts.forEach((newCount, name) => {
            const oldCount = oldCounts.get(name) ?? 0;
            if (oldCount > 0 && oldCount !== newCount) {
                reportDiagnostic(diagnostics, {
                    code: 'merge-ambiguous',
                    message: `[Merge] '${name}' occurs ${oldCount} times before and ${newCount} after the edit, matched by occurrence`,
                    context: { name, before: oldCount, after: newCount }
                });
            }
        });
    }
}
