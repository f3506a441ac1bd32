export * from "./core/config/GenerationConfig";

export type { SegmentParser } from "./core/interfaces/SegmentParser";
export type { GenerationContext, TokenGenerator } from "./core/interfaces/TokenGenerator";

export type { SegmentDescriptor, SegmentTags, TagValue } from "./core/models/SegmentDescriptor";
export type { Diagnostic, DiagnosticCode, DiagnosticSink } from "./core/models/Diagnostics";
export { DiagnosticLog } from "./core/models/Diagnostics";
export { TokenCacheError, TrackShapeError, InterleaveLengthError } from "./core/models/Errors";
export type { TokenBuffer } from "./core/models/StageTrackGrid";
export { StageTrackGrid } from "./core/models/StageTrackGrid";
export { SongSegment } from "./core/models/SongSegment";
export type { SongOptions } from "./core/models/Song";
export { Song } from "./core/models/Song";

export { TaggedLyricsParser } from "./core/parsers/TaggedLyricsParser";
export { parseTagValue } from "./core/parsers/TagValueParser";

export type { MergeStrategy, MergePair, MergeReport } from "./core/services/SegmentMerger";
export { SegmentMerger, IDENTITY_TAG } from "./core/services/SegmentMerger";
export type { SegmentBoundary, RewindResult } from "./core/services/GenerationCache";
export { GenerationCache } from "./core/services/GenerationCache";
export type { GenerateOptions, GenerationReport } from "./core/services/GenerationSession";
export { GenerationSession } from "./core/services/GenerationSession";

export type { MockGeneratorOptions } from "./core/providers/MockTokenGenerator";
export { MockTokenGenerator } from "./core/providers/MockTokenGenerator";

export type { CacheSnapshot, SongSnapshot } from "./core/schemas/Snapshots";
export { cacheSnapshotSchema, songSnapshotSchema } from "./core/schemas/Snapshots";

export type { LogEntry, LogLevel } from "./core/utils/Logger";
export { Logger } from "./core/utils/Logger";
export { interleaveTracks, deinterleaveTracks } from "./core/utils/Interleave";
