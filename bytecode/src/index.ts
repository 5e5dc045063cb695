export { Bitfield } from "./Bitfield.ts";
export type { BitfieldSegment, BitfieldValue, ParsedBitfield } from "./Bitfield.ts";
export * from "./bitfields.ts";
export { getFilename, findFileRegion, readDebugInfo } from "./debugInfo.ts";
export type { DebugInfo } from "./debugInfo.ts";
export { BytecodeFormatError } from "./errors.ts";
export type { BytecodeErrorKind, ErrorValue } from "./errors.ts";
export {
    BytecodeFileFields,
    MutableBytecodeFileFields,
    populateFromBuffer,
    populateMutableFromBuffer,
} from "./fields.ts";
export type { HeaderPatch } from "./fields.ts";
export {
    FunctionHeaderFlag,
    getLargeHeaderOffset,
    hasFlag,
    isOverflowed,
    packFunctionHeader,
    resolveFunctionHeader,
    setFlag,
    setLargeHeaderOffset,
    unpackFunctionHeader,
} from "./functionHeader.ts";
export { getDebugOffsets, getExceptionHandlers, getFunctionBytecode, getFunctionHeader } from "./functionInfo.ts";
export {
    BYTECODE_VERSION,
    BytecodeForm,
    BytecodeOption,
    decodeHeader,
    DELTA_MAGIC,
    encodeHeader,
    HEADER_SIZE,
    hasOption,
    MAGIC,
    magicFor,
    readHeader,
    setOption,
    SHA1_NUM_BYTES,
} from "./header.ts";
export type { FileHeader, HeaderField } from "./header.ts";
export { alignSection, computeLayout, MAX_FILE_SIZE, placeSections, sectionSizes } from "./layout.ts";
export type { SectionLayout, SectionName, SectionRange, SectionSizes } from "./layout.ts";
export { parseLiterals } from "./literals.ts";
export type { Literal } from "./literals.ts";
export { getCjsModules, getRegExpBytecode } from "./sections.ts";
export type { CjsModules } from "./sections.ts";
export {
    decodeString,
    encodeString,
    getIdentifierHash,
    getString,
    getStringEntry,
    INVALID_LENGTH,
    INVALID_OFFSET,
    isStringOverflowed,
    packStringEntry,
    unpackStringEntry,
} from "./stringTable.ts";
export type { EncodedString, OverflowTable, StringTableEntry } from "./stringTable.ts";
export { setStaticBuiltins, stripDebugInfo } from "./tools.ts";
export { ArrayView, asBytes, float64, MutableArrayView, uint16, uint32, uint8 } from "./views.ts";
export type { Codec } from "./views.ts";
export { writeBytecodeFile } from "./writer.ts";
export type { BytecodeFileInput, DebugInfoInput, FunctionInput, StringInput, WriteOptions } from "./writer.ts";
