import { entries, mapValues, padSize } from "../../utils/index.ts";
import {
    cjsModuleEntry,
    debugInfoHeader,
    offsetLengthPair,
    smallFunctionHeader,
    smallStringTableEntry,
} from "./bitfields.ts";
import { BytecodeFormatError } from "./errors.ts";
import { type FileHeader, HEADER_SIZE } from "./header.ts";
import { uint32 } from "./views.ts";

/** Offsets and lengths are 32-bit throughout the format */
export const MAX_FILE_SIZE = 0xFFFFFFFF;

export interface SectionRange {
    offset: number;
    size: number;
}

export type SectionSizes = ReturnType<typeof sectionSizes>;
export type SectionName = keyof SectionSizes;

export interface SectionLayout {
    sections: Record<SectionName, SectionRange>;
    /** End of the last section, where function bytecode may start */
    end: number;
}

/**
 * Byte size of every section, in file order. Only the string overflow table has no count of its
 * own: it is whatever `stringTableBytes` leaves after the small entries.
 */
export function sectionSizes(header: FileHeader) {
    const smallEntryBytes = header.stringCount * smallStringTableEntry.byteSize;
    const overflowBytes = header.stringTableBytes - smallEntryBytes;

    if (overflowBytes < 0 || overflowBytes % offsetLengthPair.byteSize !== 0) {
        throw new BytecodeFormatError(
            "SectionOverflow",
            "stringTableOverflowEntries",
            smallEntryBytes,
            header.stringTableBytes,
            `stringTableBytes (${header.stringTableBytes}) must be ${smallEntryBytes} bytes of small entries`
                + ` plus a whole number of ${offsetLengthPair.byteSize}-byte overflow entries`,
        );
    }

    const cjsModuleCount = header.cjsModuleCount;

    return {
        functionHeaders: header.functionCount * smallFunctionHeader.byteSize,
        stringTableEntries: smallEntryBytes,
        identifierHashes: header.identifierCount * uint32.byteSize,
        stringTableOverflowEntries: overflowBytes,
        stringStorage: header.stringStorageSize,
        arrayBuffer: header.arrayBufferSize,
        objKeyBuffer: header.objKeyBufferSize,
        objValueBuffer: header.objValueBufferSize,
        regExpTable: header.regExpCount * offsetLengthPair.byteSize,
        regExpStorage: header.regExpStorageSize,
        cjsModuleTable: cjsModuleCount >= 0 ? cjsModuleCount * cjsModuleEntry.byteSize : 0,
        cjsModuleTableStatic: cjsModuleCount < 0 ? -cjsModuleCount * uint32.byteSize : 0,
    };
}

/** Non-empty sections start on a 4-byte boundary; empty ones take no space at all. */
export function alignSection(offset: number, size: number) {
    return size === 0 ? offset : padSize(offset);
}

/** Lays sections out one after another, starting right after the file header. */
export function placeSections(sizes: SectionSizes): SectionLayout {
    let end = HEADER_SIZE;

    const sections = mapValues(sizes, size => {
        const offset = alignSection(end, size);
        end = offset + size;

        return { offset, size };
    });

    return { sections, end };
}

/** Places every section and checks, in file order, that each one ends within the file. */
export function computeLayout(header: FileHeader): SectionLayout {
    const layout = placeSections(sectionSizes(header));

    for (const [section, { offset, size }] of entries(layout.sections)) {
        checkSectionEnd(section, offset + size, header.fileLength);
    }

    checkDebugInfoOffset(header, layout.end);

    return layout;
}

export function checkSectionEnd(section: string, end: number, fileLength: number) {
    if (end > MAX_FILE_SIZE) {
        throw new BytecodeFormatError(
            "SectionOverflow",
            section,
            MAX_FILE_SIZE,
            end,
            `section would end at ${end}, past the largest addressable offset`,
        );
    }

    if (end > fileLength) {
        throw new BytecodeFormatError(
            "TruncatedBuffer",
            section,
            end,
            fileLength,
            `section ends at ${end} but the file is ${fileLength} bytes`,
        );
    }
}

/** Debug info sits at an absolute offset so it can be stripped without moving anything else. */
export function checkDebugInfoOffset(header: FileHeader, sectionsEnd: number) {
    const offset = header.debugInfoOffset;
    if (offset === 0) return;

    if (offset < sectionsEnd) {
        throw new BytecodeFormatError(
            "DebugInfoBoundsError",
            "debugInfo",
            sectionsEnd,
            offset,
            `debug info at ${offset} overlaps sections ending at ${sectionsEnd}`,
        );
    }

    const end = offset + debugInfoHeader.byteSize;
    if (end > header.fileLength) {
        throw new BytecodeFormatError(
            "DebugInfoBoundsError",
            "debugInfo",
            header.fileLength,
            end,
            `debug info header ends at ${end} but the file is ${header.fileLength} bytes`,
        );
    }
}
