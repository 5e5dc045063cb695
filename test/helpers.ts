import { BytecodeFormatError, type FunctionInput } from "bytecode";

export function catchError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }

    throw Error("Expected function to throw");
}

export function catchFormatError(fn: () => unknown): BytecodeFormatError {
    const error = catchError(fn);
    if (!(error instanceof BytecodeFormatError)) throw Error(`Expected a BytecodeFormatError, got ${String(error)}`);

    return error;
}

export function makeFunction(overrides: Partial<FunctionInput> = {}): FunctionInput {
    return {
        paramCount: 1,
        frameSize: 4,
        environmentSize: 0,
        functionName: 0,
        bytecode: new Uint8Array([1, 2, 3, 4]),
        ...overrides,
    };
}

export function patchUint32(bytes: Uint8Array, offset: number, value: number) {
    new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).setUint32(offset, value, true);
}

// byte offsets of the u32 header fields used by tests
export const FIELD_OFFSETS = {
    fileLength: 32,
    functionCount: 40,
    stringCount: 44,
    stringTableBytes: 52,
    stringStorageSize: 56,
    debugInfoOffset: 84,
} as const;
