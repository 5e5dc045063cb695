import { mapValues } from "../../utils/index.ts";
import { Bitfield, type ParsedBitfield } from "./Bitfield.ts";

// Single source for both function header layouts: name, width in the compact header, width in
// the full header. Order matters, it is both the bit layout and the order overflow is checked in.
export const functionHeaderFields = {
    // first word
    offset: { compact: 25, full: 32 },
    paramCount: { compact: 7, full: 32 },
    // second word
    bytecodeSizeInBytes: { compact: 15, full: 32 },
    functionName: { compact: 17, full: 32 },
    // third word
    infoOffset: { compact: 25, full: 32 },
    frameSize: { compact: 7, full: 32 },
    // fourth word, flags below
    environmentSize: { compact: 8, full: 32 },
    highestReadCacheIndex: { compact: 8, full: 8 },
    highestWriteCacheIndex: { compact: 8, full: 8 },
} as const;

export type FunctionHeaderField = keyof typeof functionHeaderFields;

export const smallFunctionHeader = new Bitfield({
    ...mapValues(functionHeaderFields, field => field.compact),
    flags: 8,
});

export const largeFunctionHeader = new Bitfield({
    ...mapValues(functionHeaderFields, field => field.full),
    flags: 8,
});

export type SmallFunctionHeader = ParsedBitfield<typeof smallFunctionHeader>;
export type FunctionHeader = ParsedBitfield<typeof largeFunctionHeader>;

export const smallStringTableEntry = new Bitfield({
    isUTF16: 1,
    isIdentifier: 1,
    offset: 22,
    length: 8,
});

export type SmallStringTableEntry = ParsedBitfield<typeof smallStringTableEntry>;

/** Overflow string entries, regexp table entries and debug filename entries all share this shape */
export const offsetLengthPair = new Bitfield({
    offset: 32,
    length: 32,
});

export type OffsetLengthPair = ParsedBitfield<typeof offsetLengthPair>;

export const cjsModuleEntry = new Bitfield({
    moduleId: 32,
    functionIndex: 32,
});

export type CjsModuleEntry = ParsedBitfield<typeof cjsModuleEntry>;

export const exceptionHandlerEntry = new Bitfield({
    start: 32,
    end: 32,
    target: 32,
});

export type ExceptionHandlerEntry = ParsedBitfield<typeof exceptionHandlerEntry>;

export const debugOffsets = new Bitfield({
    sourceLocations: 32,
    lexicalData: 32,
});

export type DebugOffsets = ParsedBitfield<typeof debugOffsets>;

export const debugInfoHeader = new Bitfield({
    filenameCount: 32,
    filenameStorageSize: 32,
    fileRegionCount: 32,
    /** Byte offset of the lexical data within the debug data */
    lexicalDataOffset: 32,
    debugDataSize: 32,
});

export type DebugInfoHeader = ParsedBitfield<typeof debugInfoHeader>;

export const debugFileRegion = new Bitfield({
    fromAddress: 32,
    filenameId: 32,
    sourceMappingUrlId: 32,
});

export type DebugFileRegion = ParsedBitfield<typeof debugFileRegion>;
