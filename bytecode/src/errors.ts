export type BytecodeErrorKind =
    /** Wrong form, or not a bytecode file at all */
    | "MagicMismatch"
    /** Produced by a different compiler build */
    | "VersionMismatch"
    /** A declared section runs past the end of the buffer */
    | "TruncatedBuffer"
    /** Offset or size arithmetic leaves the addressable range, or sizes don't add up */
    | "SectionOverflow"
    /** An overflow index or large header offset points outside its table */
    | "InvalidOverflowReference"
    | "DebugInfoBoundsError";

export type ErrorValue = number | bigint | string;

export class BytecodeFormatError extends Error {
    override name = "BytecodeFormatError";

    constructor(
        public kind: BytecodeErrorKind,
        public section: string,
        public expected: ErrorValue,
        public actual: ErrorValue,
        detail?: string,
    ) {
        super(`${kind} in ${section}: ${detail ?? `expected ${formatValue(expected)}, got ${formatValue(actual)}`}`);
    }
}

function formatValue(value: ErrorValue) {
    return typeof value === "bigint" ? `0x${value.toString(16)}` : String(value);
}
