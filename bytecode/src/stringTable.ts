import { type OffsetLengthPair, type SmallStringTableEntry, smallStringTableEntry } from "./bitfields.ts";
import { BytecodeFormatError } from "./errors.ts";
import type { BytecodeFileFields } from "./fields.ts";
import { ArrayView } from "./views.ts";

export const INVALID_OFFSET = 1 << 22;
export const INVALID_LENGTH = (1 << 8) - 1;

export interface StringTableEntry {
    /** Byte offset into string storage */
    offset: number;
    /** Length in code units: bytes for Latin-1, pairs of bytes for UTF-16 */
    length: number;
    isUTF16: boolean;
    isIdentifier: boolean;
}

export type OverflowTable = ArrayView<OffsetLengthPair> | readonly OffsetLengthPair[];

export function isStringOverflowed(small: SmallStringTableEntry) {
    return small.length === INVALID_LENGTH;
}

/**
 * Makes a small entry for `entry`. If its offset or length doesn't fit, the full pair is
 * appended to `overflowEntries` and the small entry keeps only its index.
 */
export function packStringEntry(entry: StringTableEntry, overflowEntries: OffsetLengthPair[]): SmallStringTableEntry {
    const small = smallStringTableEntry.empty();
    small.isUTF16 = +entry.isUTF16;
    small.isIdentifier = +entry.isIdentifier;

    if (entry.offset < INVALID_OFFSET && entry.length < INVALID_LENGTH) {
        small.offset = entry.offset;
        small.length = entry.length;
        return small;
    }

    const index = overflowEntries.length;
    if (index >= INVALID_OFFSET) {
        throw new BytecodeFormatError("SectionOverflow", "stringTableOverflowEntries", INVALID_OFFSET, index + 1);
    }

    overflowEntries.push({ offset: entry.offset, length: entry.length });
    small.offset = index;
    small.length = INVALID_LENGTH;

    return small;
}

export function unpackStringEntry(small: SmallStringTableEntry, overflowEntries: OverflowTable): StringTableEntry {
    const flags = { isUTF16: small.isUTF16 === 1, isIdentifier: small.isIdentifier === 1 };

    if (!isStringOverflowed(small)) {
        return { offset: small.offset, length: small.length, ...flags };
    }

    if (small.offset >= overflowEntries.length) {
        throw new BytecodeFormatError(
            "InvalidOverflowReference",
            "stringTableOverflowEntries",
            overflowEntries.length,
            small.offset,
            `overflow index ${small.offset} is outside a table of ${overflowEntries.length} entries`,
        );
    }

    const { offset, length } = overflowEntries instanceof ArrayView
        ? overflowEntries.get(small.offset)
        : overflowEntries[small.offset];

    return { offset, length, ...flags };
}

const Utf16D = new TextDecoder("utf-16le");

export function decodeString(storage: ArrayView<number>, entry: StringTableEntry) {
    const byteLength = entry.isUTF16 ? entry.length * 2 : entry.length;
    const end = entry.offset + byteLength;

    if (end > storage.length) {
        throw new BytecodeFormatError("TruncatedBuffer", "stringStorage", end, storage.length);
    }

    const bytes = storage.subview(entry.offset, end).toUint8Array();
    if (entry.isUTF16) return Utf16D.decode(bytes);

    let result = "";
    for (const byte of bytes) result += String.fromCharCode(byte);

    return result;
}

export interface EncodedString {
    bytes: Uint8Array;
    length: number;
    isUTF16: boolean;
}

/** Latin-1 when every code unit fits in a byte, UTF-16LE otherwise. */
export function encodeString(value: string): EncodedString {
    let isUTF16 = false;
    for (let i = 0; i < value.length; i++) {
        if (value.charCodeAt(i) > 0xff) {
            isUTF16 = true;
            break;
        }
    }

    const bytes = new Uint8Array(value.length * (isUTF16 ? 2 : 1));
    const view = new DataView(bytes.buffer);

    for (let i = 0; i < value.length; i++) {
        if (isUTF16) {
            view.setUint16(i * 2, value.charCodeAt(i), true);
        } else {
            bytes[i] = value.charCodeAt(i);
        }
    }

    return { bytes, length: value.length, isUTF16 };
}

export function getStringEntry(fields: BytecodeFileFields, id: number): StringTableEntry {
    return unpackStringEntry(fields.stringTableEntries.get(id), fields.stringTableOverflowEntries);
}

export function getString(fields: BytecodeFileFields, id: number) {
    return decodeString(fields.stringStorage, getStringEntry(fields, id));
}

/** Hash of an identifier string; identifiers are numbered in string table order. */
export function getIdentifierHash(fields: BytecodeFileFields, id: number) {
    if (!fields.stringTableEntries.get(id).isIdentifier) {
        throw Error(`String #${id} is not an identifier`);
    }

    let identifier = 0;
    for (let i = 0; i < id; i++) {
        identifier += fields.stringTableEntries.get(i).isIdentifier;
    }

    if (identifier >= fields.identifierHashes.length) {
        throw new BytecodeFormatError(
            "InvalidOverflowReference",
            "identifierHashes",
            fields.identifierHashes.length,
            identifier,
            `identifier #${identifier} has no hash, the table has ${fields.identifierHashes.length}`,
        );
    }

    return fields.identifierHashes.get(identifier);
}
