import { BytecodeFormatError } from "./errors.ts";

// "Hermes" in ancient Greek, UTF-16BE, truncated to 8 bytes.
export const MAGIC = 0x1F1903C103BC1FC6n;

// Files prepared for binary diffing rather than execution carry the complement.
export const DELTA_MAGIC = ~MAGIC & 0xFFFFFFFFFFFFFFFFn;

export const BYTECODE_VERSION = 41;

export const SHA1_NUM_BYTES = 20;

// Padded so the function headers that follow don't straddle cache lines.
export const HEADER_SIZE = 96;

export enum BytecodeForm {
    /** Prepared for execution (the default) */
    Execution,
    /** Prepared to minimize binary diff size */
    Delta,
}

export enum BytecodeOption {
    StaticBuiltins = 1 << 0,
}

export function hasOption(options: number, option: BytecodeOption) {
    return (options & option) !== 0;
}

export function setOption(options: number, option: BytecodeOption, enabled: boolean) {
    return (enabled ? options | option : options & ~option) & 0xff;
}

export function magicFor(form: BytecodeForm) {
    return form === BytecodeForm.Delta ? DELTA_MAGIC : MAGIC;
}

const headerFields = [
    "fileLength",
    "globalCodeIndex",
    "functionCount",
    "stringCount",
    "identifierCount",
    "stringTableBytes", // small and overflow entries together
    "stringStorageSize",
    "regExpCount",
    "regExpStorageSize",
    "arrayBufferSize",
    "objKeyBufferSize",
    "objValueBufferSize",
    "cjsModuleCount", // signed, negative once modules are resolved
    "debugInfoOffset",
] as const;

export type HeaderField = typeof headerFields[number];

export type FileHeader = {
    magic: bigint;
    version: number;
    sourceHash: Uint8Array;
    options: number;
} & Record<HeaderField, number>;

const FIELDS_OFFSET = 12 + SHA1_NUM_BYTES;
const OPTIONS_OFFSET = FIELDS_OFFSET + headerFields.length * 4;

export function decodeHeader(view: DataView): FileHeader {
    const header: FileHeader = {
        magic: view.getBigUint64(0, true),
        version: view.getUint32(8, true),
        sourceHash: new Uint8Array(view.buffer, view.byteOffset + 12, SHA1_NUM_BYTES).slice(),
        options: view.getUint8(OPTIONS_OFFSET),
        fileLength: 0,
        globalCodeIndex: 0,
        functionCount: 0,
        stringCount: 0,
        identifierCount: 0,
        stringTableBytes: 0,
        stringStorageSize: 0,
        regExpCount: 0,
        regExpStorageSize: 0,
        arrayBufferSize: 0,
        objKeyBufferSize: 0,
        objValueBufferSize: 0,
        cjsModuleCount: 0,
        debugInfoOffset: 0,
    };

    headerFields.forEach((field, i) => {
        const offset = FIELDS_OFFSET + i * 4;
        header[field] = field === "cjsModuleCount" ? view.getInt32(offset, true) : view.getUint32(offset, true);
    });

    return header;
}

export function encodeHeader(view: DataView, header: FileHeader) {
    if (header.sourceHash.byteLength !== SHA1_NUM_BYTES) {
        throw RangeError(`Source hash must be ${SHA1_NUM_BYTES} bytes, got ${header.sourceHash.byteLength}`);
    }

    view.setBigUint64(0, header.magic, true);
    view.setUint32(8, header.version, true);
    new Uint8Array(view.buffer, view.byteOffset + 12, SHA1_NUM_BYTES).set(header.sourceHash);

    headerFields.forEach((field, i) => {
        const offset = FIELDS_OFFSET + i * 4;

        if (field === "cjsModuleCount") {
            view.setInt32(offset, header[field], true);
        } else {
            view.setUint32(offset, header[field], true);
        }
    });

    view.setUint8(OPTIONS_OFFSET, header.options);
    for (let i = OPTIONS_OFFSET + 1; i < HEADER_SIZE; i++) view.setUint8(i, 0);
}

/**
 * Reads the fixed header and checks, in order, that it fits, that its magic matches `form`,
 * that its version is exactly ours and that it describes a file of the buffer's length.
 */
export function readHeader(bytes: Uint8Array, form = BytecodeForm.Execution): FileHeader {
    if (bytes.byteLength < HEADER_SIZE) {
        throw new BytecodeFormatError("TruncatedBuffer", "header", HEADER_SIZE, bytes.byteLength);
    }

    const header = decodeHeader(new DataView(bytes.buffer, bytes.byteOffset, HEADER_SIZE));

    const magic = magicFor(form);
    if (header.magic !== magic) {
        throw new BytecodeFormatError(
            "MagicMismatch",
            "header",
            magic,
            header.magic,
            `expected ${BytecodeForm[form]} form magic 0x${magic.toString(16)}, got 0x${header.magic.toString(16)}`,
        );
    }

    if (header.version !== BYTECODE_VERSION) {
        throw new BytecodeFormatError("VersionMismatch", "header", BYTECODE_VERSION, header.version);
    }

    if (header.fileLength !== bytes.byteLength) {
        throw new BytecodeFormatError(
            "TruncatedBuffer",
            "file",
            header.fileLength,
            bytes.byteLength,
            `header declares ${header.fileLength} bytes, buffer has ${bytes.byteLength}`,
        );
    }

    return header;
}
