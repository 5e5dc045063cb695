import { bisect } from "../../utils/index.ts";
import {
    type DebugFileRegion,
    debugFileRegion,
    type DebugInfoHeader,
    debugInfoHeader,
    type OffsetLengthPair,
    offsetLengthPair,
} from "./bitfields.ts";
import { BytecodeFormatError } from "./errors.ts";
import type { FileHeader } from "./header.ts";
import { alignSection, MAX_FILE_SIZE } from "./layout.ts";
import { type ArrayView, uint8 } from "./views.ts";

export interface DebugInfo {
    header: DebugInfoHeader;
    filenameTable: ArrayView<OffsetLengthPair>;
    /** UTF-8 */
    filenameStorage: ArrayView<number>;
    /** Sorted by `fromAddress` */
    fileRegions: ArrayView<DebugFileRegion>;
    sourceLocations: ArrayView<number>;
    lexicalData: ArrayView<number>;
}

/**
 * Reads the debug info trailer, if the file has one. Kept apart from population since it can
 * be large and is rarely needed while executing.
 */
export function readDebugInfo(
    file: ArrayView<number>,
    header: Pick<FileHeader, "debugInfoOffset" | "fileLength">,
): DebugInfo | undefined {
    if (header.debugInfoOffset === 0) return undefined;

    let end = header.debugInfoOffset;

    const place = (section: string, size: number, aligned = true) => {
        const offset = aligned ? alignSection(end, size) : end;
        end = offset + size;

        if (end > MAX_FILE_SIZE || end > header.fileLength) {
            throw new BytecodeFormatError(
                "DebugInfoBoundsError",
                `debugInfo.${section}`,
                header.fileLength,
                end,
                `${section} ends at ${end} but the file is ${header.fileLength} bytes`,
            );
        }

        return offset;
    };

    const info = file.readAt(debugInfoHeader, place("header", debugInfoHeader.byteSize, false));

    const filenameTable = place("filenameTable", info.filenameCount * offsetLengthPair.byteSize);
    const filenameStorage = place("filenameStorage", info.filenameStorageSize);
    const fileRegions = place("fileRegions", info.fileRegionCount * debugFileRegion.byteSize);
    const debugData = place("debugData", info.debugDataSize);

    if (info.lexicalDataOffset > info.debugDataSize) {
        throw new BytecodeFormatError(
            "DebugInfoBoundsError",
            "debugInfo.lexicalData",
            info.debugDataSize,
            info.lexicalDataOffset,
            `lexical data offset ${info.lexicalDataOffset} is past the end of ${info.debugDataSize} bytes of debug data`,
        );
    }

    return {
        header: info,
        filenameTable: file.viewAs(offsetLengthPair, filenameTable, info.filenameCount),
        filenameStorage: file.viewAs(uint8, filenameStorage, info.filenameStorageSize),
        fileRegions: file.viewAs(debugFileRegion, fileRegions, info.fileRegionCount),
        sourceLocations: file.viewAs(uint8, debugData, info.lexicalDataOffset),
        lexicalData: file.viewAs(
            uint8,
            debugData + info.lexicalDataOffset,
            info.debugDataSize - info.lexicalDataOffset,
        ),
    };
}

const Utf8D = new TextDecoder("utf-8");

export function getFilename(info: DebugInfo, id: number) {
    if (id >= info.filenameTable.length) {
        throw new BytecodeFormatError("DebugInfoBoundsError", "debugInfo.filenameTable", info.filenameTable.length, id);
    }

    const { offset, length } = info.filenameTable.get(id);
    if (offset + length > info.filenameStorage.length) {
        throw new BytecodeFormatError(
            "DebugInfoBoundsError",
            "debugInfo.filenameStorage",
            info.filenameStorage.length,
            offset + length,
        );
    }

    return Utf8D.decode(info.filenameStorage.subview(offset, offset + length).toUint8Array());
}

/** The region covering `address`: the last one starting at or before it. */
export function findFileRegion(info: DebugInfo, address: number): DebugFileRegion | undefined {
    const regions = info.fileRegions;
    const index = bisect(regions.length, address, i => regions.get(i).fromAddress);

    return index > 0 ? regions.get(index - 1) : undefined;
}
