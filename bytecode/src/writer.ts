import { concatBytes, padSize } from "../../utils/index.ts";
import {
    type CjsModuleEntry,
    cjsModuleEntry,
    type DebugFileRegion,
    debugFileRegion,
    debugInfoHeader,
    type DebugOffsets,
    debugOffsets,
    type ExceptionHandlerEntry,
    exceptionHandlerEntry,
    type FunctionHeader,
    largeFunctionHeader,
    type OffsetLengthPair,
    offsetLengthPair,
    smallFunctionHeader,
    smallStringTableEntry,
} from "./bitfields.ts";
import { BytecodeFormatError } from "./errors.ts";
import { FunctionHeaderFlag, isOverflowed, packFunctionHeader, setFlag } from "./functionHeader.ts";
import { BYTECODE_VERSION, BytecodeForm, encodeHeader, type FileHeader, HEADER_SIZE, magicFor, SHA1_NUM_BYTES } from "./header.ts";
import { alignSection, checkSectionEnd, placeSections, type SectionName, sectionSizes } from "./layout.ts";
import { encodeString, packStringEntry } from "./stringTable.ts";
import { type Codec, MutableArrayView, uint32, uint8 } from "./views.ts";

export interface FunctionInput {
    paramCount: number;
    frameSize: number;
    environmentSize: number;
    /** String table index of the name */
    functionName: number;
    highestReadCacheIndex?: number;
    highestWriteCacheIndex?: number;
    strictMode?: boolean;
    /** Functions sharing one array also share their bytecode in the file */
    bytecode: Uint8Array;
    exceptionHandlers?: ExceptionHandlerEntry[];
    debugOffsets?: DebugOffsets;
}

export interface StringInput {
    value: string;
    /** Marks the string as an identifier */
    identifierHash?: number;
}

export interface DebugInfoInput {
    filenames: string[];
    fileRegions: DebugFileRegion[];
    sourceLocations?: Uint8Array;
    lexicalData?: Uint8Array;
}

export interface BytecodeFileInput {
    sourceHash?: Uint8Array;
    globalCodeIndex?: number;
    options?: number;
    functions: FunctionInput[];
    strings?: (string | StringInput)[];
    arrayBuffer?: Uint8Array;
    objKeyBuffer?: Uint8Array;
    objValueBuffer?: Uint8Array;
    /** Compiled regexp programs */
    regExps?: Uint8Array[];
    /** Unresolved modules; mutually exclusive with `resolvedCjsModules` */
    cjsModules?: CjsModuleEntry[];
    /** Function index per module slot */
    resolvedCjsModules?: number[];
    debugInfo?: DebugInfoInput;
}

export interface WriteOptions {
    form?: BytecodeForm;
}

const Utf8E = new TextEncoder();

/**
 * Serializes a compiled program. Section offsets, function header packing (with overflow into
 * the info area) and the file length are all worked out before a single buffer is allocated.
 */
export function writeBytecodeFile(input: BytecodeFileInput, { form = BytecodeForm.Execution }: WriteOptions = {}) {
    if (input.cjsModules?.length && input.resolvedCjsModules?.length) {
        throw Error("A file has either unresolved or resolved CJS modules, not both");
    }

    const strings = buildStringTable(input.strings ?? []);
    const regExps = buildStorage(input.regExps ?? []);
    const cjsModules = input.cjsModules ?? [];
    const resolvedCjsModules = input.resolvedCjsModules ?? [];
    const arrayBuffer = input.arrayBuffer ?? new Uint8Array(0);
    const objKeyBuffer = input.objKeyBuffer ?? new Uint8Array(0);
    const objValueBuffer = input.objValueBuffer ?? new Uint8Array(0);

    const header: FileHeader = {
        magic: magicFor(form),
        version: BYTECODE_VERSION,
        sourceHash: input.sourceHash ?? new Uint8Array(SHA1_NUM_BYTES),
        options: input.options ?? 0,
        fileLength: 0, // to be filled
        globalCodeIndex: input.globalCodeIndex ?? 0,
        functionCount: input.functions.length,
        stringCount: strings.entries.length,
        identifierCount: strings.identifierHashes.length,
        stringTableBytes: strings.entries.length * smallStringTableEntry.byteSize
            + strings.overflowEntries.length * offsetLengthPair.byteSize,
        stringStorageSize: strings.storage.byteLength,
        regExpCount: regExps.entries.length,
        regExpStorageSize: regExps.storage.byteLength,
        arrayBufferSize: arrayBuffer.byteLength,
        objKeyBufferSize: objKeyBuffer.byteLength,
        objValueBufferSize: objValueBuffer.byteLength,
        cjsModuleCount: resolvedCjsModules.length ? -resolvedCjsModules.length : cjsModules.length,
        debugInfoOffset: 0, // to be filled
    };

    const { sections, end } = placeSections(sectionSizes(header));

    // bytecode follows the sections, deduplicated by array
    let offset = padSize(end);
    const bytecodeOffsets = new Map<Uint8Array, number>();

    for (const func of input.functions) {
        if (bytecodeOffsets.has(func.bytecode)) continue;

        bytecodeOffsets.set(func.bytecode, offset);
        offset += func.bytecode.byteLength;
    }

    // then every function's info: full header if overflowed, exception handlers, debug offsets
    offset = padSize(offset);

    const largeHeaders: FunctionHeader[] = [];
    const smallHeaders = input.functions.map(func => {
        const handlers = func.exceptionHandlers ?? [];

        let flags = setFlag(0, FunctionHeaderFlag.StrictMode, !!func.strictMode);
        flags = setFlag(flags, FunctionHeaderFlag.HasExceptionHandler, handlers.length > 0);
        flags = setFlag(flags, FunctionHeaderFlag.HasDebugInfo, !!func.debugOffsets);

        const large: FunctionHeader = {
            offset: bytecodeOffsets.get(func.bytecode) ?? 0,
            paramCount: func.paramCount,
            bytecodeSizeInBytes: func.bytecode.byteLength,
            functionName: func.functionName,
            infoOffset: offset,
            frameSize: func.frameSize,
            environmentSize: func.environmentSize,
            highestReadCacheIndex: func.highestReadCacheIndex ?? 0,
            highestWriteCacheIndex: func.highestWriteCacheIndex ?? 0,
            flags,
        };
        largeHeaders.push(large);

        const small = packFunctionHeader(large);

        if (isOverflowed(small)) offset += largeFunctionHeader.byteSize;
        if (handlers.length) offset += uint32.byteSize + handlers.length * exceptionHandlerEntry.byteSize;
        if (func.debugOffsets) offset += debugOffsets.byteSize;

        return small;
    });

    const debugInfo = input.debugInfo && buildDebugInfo(input.debugInfo);

    if (debugInfo) {
        header.debugInfoOffset = offset = padSize(offset);
        offset += debugInfo.size;
    }

    checkSectionEnd("file", offset, offset);
    header.fileLength = offset;

    // everything up until now only works out where things go, now write them

    const out = new MutableArrayView(new ArrayBuffer(header.fileLength), 0, header.fileLength, uint8);
    const bytes = out.bytes();

    encodeHeader(new DataView(bytes.buffer, 0, HEADER_SIZE), header);

    const writeTable = <T>(section: SectionName, codec: Codec<T>, items: readonly T[]) => {
        const table = out.viewAs(codec, sections[section].offset, items.length);
        items.forEach((item, i) => table.set(i, item));
    };

    writeTable("functionHeaders", smallFunctionHeader, smallHeaders);
    writeTable("stringTableEntries", smallStringTableEntry, strings.entries);
    writeTable("identifierHashes", uint32, strings.identifierHashes);
    writeTable("stringTableOverflowEntries", offsetLengthPair, strings.overflowEntries);
    writeTable("regExpTable", offsetLengthPair, regExps.entries);
    writeTable("cjsModuleTable", cjsModuleEntry, cjsModules);
    writeTable("cjsModuleTableStatic", uint32, resolvedCjsModules);

    bytes.set(strings.storage, sections.stringStorage.offset);
    bytes.set(arrayBuffer, sections.arrayBuffer.offset);
    bytes.set(objKeyBuffer, sections.objKeyBuffer.offset);
    bytes.set(objValueBuffer, sections.objValueBuffer.offset);
    bytes.set(regExps.storage, sections.regExpStorage.offset);

    for (const [bytecode, bytecodeOffset] of bytecodeOffsets) {
        bytes.set(bytecode, bytecodeOffset);
    }

    input.functions.forEach((func, i) => {
        const large = largeHeaders[i];
        let infoOffset = large.infoOffset;

        if (isOverflowed(smallHeaders[i])) {
            out.writeAt(largeFunctionHeader, infoOffset, large);
            infoOffset += largeFunctionHeader.byteSize;
        }

        const handlers = func.exceptionHandlers ?? [];
        if (handlers.length) {
            out.writeAt(uint32, infoOffset, handlers.length);
            infoOffset += uint32.byteSize;

            for (const handler of handlers) {
                out.writeAt(exceptionHandlerEntry, infoOffset, handler);
                infoOffset += exceptionHandlerEntry.byteSize;
            }
        }

        if (func.debugOffsets) {
            out.writeAt(debugOffsets, infoOffset, func.debugOffsets);
        }
    });

    if (debugInfo) debugInfo.write(out, header.debugInfoOffset);

    return bytes;
}

function buildStringTable(strings: (string | StringInput)[]) {
    const overflowEntries: OffsetLengthPair[] = [];
    const identifierHashes: number[] = [];
    const parts: Uint8Array[] = [];
    const storageOffsets = new Map<string, number>();
    let size = 0;

    const entries = strings.map(input => {
        const { value, identifierHash } = typeof input === "string" ? { value: input, identifierHash: undefined } : input;
        const encoded = encodeString(value);

        // identical contents share storage
        const key = `${+encoded.isUTF16}:${value}`;
        let offset = storageOffsets.get(key);

        if (offset === undefined) {
            offset = size;
            storageOffsets.set(key, offset);
            parts.push(encoded.bytes);
            size += encoded.bytes.byteLength;
        }

        if (identifierHash !== undefined) identifierHashes.push(identifierHash);

        return packStringEntry({
            offset,
            length: encoded.length,
            isUTF16: encoded.isUTF16,
            isIdentifier: identifierHash !== undefined,
        }, overflowEntries);
    });

    return { entries, overflowEntries, identifierHashes, storage: concatBytes(parts) };
}

function buildStorage(items: Uint8Array[]) {
    let offset = 0;
    const entries = items.map(item => {
        const entry = { offset, length: item.byteLength };
        offset += item.byteLength;
        return entry;
    });

    return { entries, storage: concatBytes(items) };
}

function buildDebugInfo(input: DebugInfoInput) {
    const filenames = buildStorage(input.filenames.map(name => Utf8E.encode(name)));
    const sourceLocations = input.sourceLocations ?? new Uint8Array(0);
    const lexicalData = input.lexicalData ?? new Uint8Array(0);

    const header = {
        filenameCount: filenames.entries.length,
        filenameStorageSize: filenames.storage.byteLength,
        fileRegionCount: input.fileRegions.length,
        lexicalDataOffset: sourceLocations.byteLength,
        debugDataSize: sourceLocations.byteLength + lexicalData.byteLength,
    };

    // relative to the start of the debug info, laid out the way readDebugInfo expects
    let end = debugInfoHeader.byteSize;
    const place = (size: number) => {
        const offset = alignSection(end, size);
        end = offset + size;
        return offset;
    };

    const filenameTable = place(filenames.entries.length * offsetLengthPair.byteSize);
    const filenameStorage = place(filenames.storage.byteLength);
    const fileRegions = place(input.fileRegions.length * debugFileRegion.byteSize);
    const debugData = place(header.debugDataSize);

    return {
        size: end,
        write(out: MutableArrayView<number>, base: number) {
            if (base % 4 !== 0) {
                throw new BytecodeFormatError("DebugInfoBoundsError", "debugInfo", "4-byte aligned offset", base);
            }

            const bytes = out.bytes();

            out.writeAt(debugInfoHeader, base, header);
            filenames.entries.forEach((entry, i) => {
                out.writeAt(offsetLengthPair, base + filenameTable + i * offsetLengthPair.byteSize, entry);
            });
            bytes.set(filenames.storage, base + filenameStorage);
            input.fileRegions.forEach((region, i) => {
                out.writeAt(debugFileRegion, base + fileRegions + i * debugFileRegion.byteSize, region);
            });
            bytes.set(sourceLocations, base + debugData);
            bytes.set(lexicalData, base + debugData + sourceLocations.byteLength);
        },
    };
}
