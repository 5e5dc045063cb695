import {
    type DebugOffsets,
    debugOffsets,
    type ExceptionHandlerEntry,
    exceptionHandlerEntry,
    type FunctionHeader,
    largeFunctionHeader,
} from "./bitfields.ts";
import { BytecodeFormatError } from "./errors.ts";
import type { BytecodeFileFields } from "./fields.ts";
import { FunctionHeaderFlag, hasFlag, isOverflowed, resolveFunctionHeader } from "./functionHeader.ts";
import { type ArrayView, uint32 } from "./views.ts";

// The info area of a function starts at its infoOffset. An overflowed function keeps its full
// header there, with the rest following it:
//
//   [FunctionHeader]                          if overflowed
//   [count: u32] [start, end, target] * count if hasExceptionHandler
//   [sourceLocations, lexicalData]            if hasDebugInfo

export function getFunctionHeader(fields: BytecodeFileFields, index: number): FunctionHeader {
    return resolveFunctionHeader(fields.functionHeaders.get(index), fields.file, fields.layout.end);
}

/** Exception handler table of a function, viewed in place. */
export function getExceptionHandlers(fields: BytecodeFileFields, index: number): ArrayView<ExceptionHandlerEntry> {
    const { header, offset } = infoStart(fields, index);
    if (!hasFlag(header.flags, FunctionHeaderFlag.HasExceptionHandler)) {
        return fields.file.viewAs(exceptionHandlerEntry, 0, 0);
    }

    const count = readInfo(fields, offset, uint32.byteSize, () => fields.file.readAt(uint32, offset));
    const tableOffset = offset + uint32.byteSize;

    return readInfo(fields, tableOffset, count * exceptionHandlerEntry.byteSize, () => (
        fields.file.viewAs(exceptionHandlerEntry, tableOffset, count)
    ));
}

export function getDebugOffsets(fields: BytecodeFileFields, index: number): DebugOffsets | undefined {
    const { header, offset } = infoStart(fields, index);
    if (!hasFlag(header.flags, FunctionHeaderFlag.HasDebugInfo)) return undefined;

    const debugOffset = hasFlag(header.flags, FunctionHeaderFlag.HasExceptionHandler)
        ? offset + uint32.byteSize + getExceptionHandlers(fields, index).byteLength
        : offset;

    return readInfo(fields, debugOffset, debugOffsets.byteSize, () => fields.file.readAt(debugOffsets, debugOffset));
}

/** The function's instructions, viewed in place. */
export function getFunctionBytecode(fields: BytecodeFileFields, index: number): ArrayView<number> {
    const header = getFunctionHeader(fields, index);
    const end = header.offset + header.bytecodeSizeInBytes;

    if (end > fields.file.length) {
        throw new BytecodeFormatError(
            "TruncatedBuffer",
            "bytecode",
            end,
            fields.file.length,
            `bytecode of function #${index} ends at ${end} but the file is ${fields.file.length} bytes`,
        );
    }

    return fields.file.subview(header.offset, end);
}

function infoStart(fields: BytecodeFileFields, index: number) {
    const small = fields.functionHeaders.get(index);
    const header = resolveFunctionHeader(small, fields.file, fields.layout.end);
    const offset = header.infoOffset + (isOverflowed(small) ? largeFunctionHeader.byteSize : 0);

    return { header, offset };
}

function readInfo<T>(fields: BytecodeFileFields, offset: number, size: number, read: () => T): T {
    if (offset + size > fields.file.length) {
        throw new BytecodeFormatError(
            "TruncatedBuffer",
            "functionInfo",
            offset + size,
            fields.file.length,
            `function info at ${offset} needs ${size} bytes but the file is ${fields.file.length} bytes`,
        );
    }

    return read();
}
