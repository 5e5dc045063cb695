import { entries } from "../../utils/index.ts";
import {
    type FunctionHeader,
    functionHeaderFields,
    largeFunctionHeader,
    type SmallFunctionHeader,
    smallFunctionHeader,
} from "./bitfields.ts";
import { BytecodeFormatError } from "./errors.ts";
import type { ArrayView } from "./views.ts";

export enum FunctionHeaderFlag {
    /** `"use strict";` applies to this function */
    StrictMode = 1 << 0,
    HasExceptionHandler = 1 << 1,
    HasDebugInfo = 1 << 2,
    /** Only the flags and the large header offset of a compact header are meaningful */
    Overflowed = 1 << 3,
}

export function hasFlag(flags: number, flag: FunctionHeaderFlag) {
    return (flags & flag) !== 0;
}

export function setFlag(flags: number, flag: FunctionHeaderFlag, enabled = true) {
    return (enabled ? flags | flag : flags & ~flag) & 0xff;
}

export function isOverflowed(header: SmallFunctionHeader) {
    return hasFlag(header.flags, FunctionHeaderFlag.Overflowed);
}

/**
 * Makes the compact header equivalent to `large` if all of its fields fit, otherwise an
 * overflow reference to a copy of `large` stored at `large.infoOffset`.
 */
export function packFunctionHeader(large: FunctionHeader): SmallFunctionHeader {
    const small = smallFunctionHeader.empty();
    small.flags = setFlag(large.flags, FunctionHeaderFlag.Overflowed, false);

    for (const [field] of entries(functionHeaderFields)) {
        if (!smallFunctionHeader.fits(field, large[field])) {
            setLargeHeaderOffset(small, large.infoOffset);
            return small;
        }

        small[field] = large[field];
    }

    return small;
}

export function unpackFunctionHeader(small: SmallFunctionHeader): FunctionHeader {
    if (isOverflowed(small)) {
        throw Error(`Function header is overflowed, its fields live at 0x${getLargeHeaderOffset(small).toString(16)}`);
    }

    return { ...small };
}

// any two fields could hold the large offset, these are the biggest
export function setLargeHeaderOffset(small: SmallFunctionHeader, largeHeaderOffset: number) {
    small.flags = setFlag(small.flags, FunctionHeaderFlag.Overflowed);
    small.offset = largeHeaderOffset & 0xffff;
    small.infoOffset = largeHeaderOffset >>> 16;
}

export function getLargeHeaderOffset(small: SmallFunctionHeader) {
    if (!isOverflowed(small)) throw Error("Function header is not overflowed");

    return ((small.infoOffset << 16) | small.offset) >>> 0;
}

/**
 * Reads the full header a compact one stands for, following its overflow reference if needed.
 * Large headers live in the info area, so a reference before `sectionsEnd` is invalid.
 */
export function resolveFunctionHeader(
    small: SmallFunctionHeader,
    file: ArrayView<number>,
    sectionsEnd: number,
): FunctionHeader {
    if (!isOverflowed(small)) return unpackFunctionHeader(small);

    const offset = getLargeHeaderOffset(small);
    const end = offset + largeFunctionHeader.byteSize;

    if (offset < sectionsEnd) {
        throw new BytecodeFormatError(
            "InvalidOverflowReference",
            "functionHeaders",
            sectionsEnd,
            offset,
            `large header at 0x${offset.toString(16)} overlaps sections ending at 0x${sectionsEnd.toString(16)}`,
        );
    }

    if (end > file.length) {
        throw new BytecodeFormatError(
            "InvalidOverflowReference",
            "functionHeaders",
            file.length,
            end,
            `large header at 0x${offset.toString(16)} ends past the end of the file (${file.length} bytes)`,
        );
    }

    return file.readAt(largeFunctionHeader, offset);
}
