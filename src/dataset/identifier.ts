/**
 * @file Identifier Normalizer
 *
 * Canonicalizes raw device identifiers (IMEI) into comparable strings.
 * Spreadsheet exports tend to hand identifiers back as floats, so an
 * integer-valued number may arrive rendered with a trailing `.0`.
 *
 * @module dataset/identifier
 */

/** Suffix left behind when an integer identifier was read as a float. */
const FLOAT_SUFFIX: string = '.0';

export type IdentifierFaultHandler = (raw: unknown, error: unknown) => void;

/**
 * Render a number without exponent notation. Integers go through BigInt
 * so identifiers above 1e21 keep every digit.
 */
function number_render(value: number): string {
    if (!Number.isFinite(value)) return '';
    if (Number.isInteger(value)) return BigInt(value).toString();
    return String(value);
}

/**
 * Normalize a raw identifier value.
 *
 * - null/undefined → `''`
 * - trims surrounding whitespace
 * - strips one trailing `.0`, and only at the very end
 * - never parses strings as numbers, so leading zeros survive
 *
 * Never throws. A fault (e.g. an object whose `toString` throws) yields `''`
 * and is reported through `onError` so the caller can log the raw value.
 */
export function identifier_normalize(raw: unknown, onError?: IdentifierFaultHandler): string {
    try {
        if (raw === null || raw === undefined) return '';

        const text: string = typeof raw === 'number' ? number_render(raw) : String(raw);
        const trimmed: string = text.trim();

        if (trimmed.endsWith(FLOAT_SUFFIX)) {
            return trimmed.slice(0, -FLOAT_SUFFIX.length);
        }
        return trimmed;
    } catch (error: unknown) {
        onError?.(raw, error);
        return '';
    }
}
