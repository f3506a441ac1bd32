import { FRAMES_PER_SECOND, LENGTH_TAG, TOKEN_UNIT_SUFFIX } from "../config/GenerationConfig";
import { TagValue } from "../models/SegmentDescriptor";

const INTEGER_REGEX = /^[+-]?\d+$/;
const DECIMAL_REGEX = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;

/**
 * Coerces a raw tag value.
 * `length` is a token count when suffixed with `t` ("200t"), otherwise
 * seconds converted to frames ("3.0" -> 150). Other tags stay as text.
 * @returns The value, or undefined when it cannot be coerced.
 */
export function parseTagValue(name: string, rawValue: string): TagValue | undefined {
    if (name !== LENGTH_TAG) return rawValue;

    if (rawValue.endsWith(TOKEN_UNIT_SUFFIX)) {
        const count = rawValue.slice(0, -TOKEN_UNIT_SUFFIX.length).trim();
        if (!INTEGER_REGEX.test(count)) return undefined;

        const tokens = parseInt(count, 10);
        return Number.isSafeInteger(tokens) ? tokens : undefined;
    }

    if (!DECIMAL_REGEX.test(rawValue)) return undefined;

    const frames = Number(rawValue) * FRAMES_PER_SECOND;
    return Number.isFinite(frames) ? Math.trunc(frames) : undefined;
}
