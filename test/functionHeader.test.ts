import {
    ArrayView,
    type FunctionHeader,
    FunctionHeaderFlag,
    getFunctionBytecode,
    getFunctionHeader,
    getLargeHeaderOffset,
    getString,
    isOverflowed,
    MutableBytecodeFileFields,
    packFunctionHeader,
    populateFromBuffer,
    resolveFunctionHeader,
    setLargeHeaderOffset,
    smallFunctionHeader,
    uint8,
    unpackFunctionHeader,
    writeBytecodeFile,
} from "bytecode";
import { describe, expect, it } from "vitest";
import { catchFormatError, makeFunction } from "./helpers.ts";

function makeHeader(overrides: Partial<FunctionHeader> = {}): FunctionHeader {
    return {
        offset: 1000,
        paramCount: 3,
        bytecodeSizeInBytes: 40,
        functionName: 2,
        infoOffset: 2000,
        frameSize: 10,
        environmentSize: 1,
        highestReadCacheIndex: 0,
        highestWriteCacheIndex: 0,
        flags: FunctionHeaderFlag.StrictMode,
        ...overrides,
    };
}

describe("packFunctionHeader", () => {
    it("round trips a header that fits", () => {
        const large = makeHeader();
        const small = packFunctionHeader(large);

        expect(isOverflowed(small)).toBe(false);
        expect(unpackFunctionHeader(small)).toEqual(large);
    });

    it("fits values right at the compact limits", () => {
        const large = makeHeader({ offset: 2 ** 25 - 1, paramCount: 127, bytecodeSizeInBytes: 2 ** 15 - 1 });

        expect(isOverflowed(packFunctionHeader(large))).toBe(false);
    });

    it("overflows one past a compact limit", () => {
        expect(isOverflowed(packFunctionHeader(makeHeader({ offset: 2 ** 25 })))).toBe(true);
        expect(isOverflowed(packFunctionHeader(makeHeader({ bytecodeSizeInBytes: 2 ** 15 })))).toBe(true);
        expect(isOverflowed(packFunctionHeader(makeHeader({ environmentSize: 256 })))).toBe(true);
    });

    it("stores the large header offset split across offset and infoOffset", () => {
        const small = packFunctionHeader(makeHeader({ paramCount: 200, infoOffset: 0x12345 }));

        expect(small.offset).toBe(0x2345);
        expect(small.infoOffset).toBe(0x1);
        expect(small.flags).toBe(FunctionHeaderFlag.StrictMode | FunctionHeaderFlag.Overflowed);
        expect(getLargeHeaderOffset(small)).toBe(0x12345);
    });

    it("ignores an overflow flag on the input", () => {
        const small = packFunctionHeader(makeHeader({
            flags: FunctionHeaderFlag.Overflowed | FunctionHeaderFlag.HasDebugInfo,
        }));

        expect(small.flags).toBe(FunctionHeaderFlag.HasDebugInfo);
    });
});

describe("unpackFunctionHeader", () => {
    it("refuses an overflowed header", () => {
        const small = packFunctionHeader(makeHeader({ paramCount: 200, infoOffset: 0x40 }));

        expect(() => unpackFunctionHeader(small)).toThrow("Function header is overflowed, its fields live at 0x40");
    });

    it("has no large offset unless overflowed", () => {
        expect(() => getLargeHeaderOffset(packFunctionHeader(makeHeader()))).toThrow("Function header is not overflowed");
    });
});

describe("resolveFunctionHeader", () => {
    it("rejects a large header past the end of the file", () => {
        const small = smallFunctionHeader.empty();
        setLargeHeaderOffset(small, 0x10000);

        const file = new ArrayView(new ArrayBuffer(128), 0, 128, uint8);
        const error = catchFormatError(() => resolveFunctionHeader(small, file, 96));

        expect(error.kind).toBe("InvalidOverflowReference");
        expect(error.section).toBe("functionHeaders");
        expect(error.actual).toBe(0x10000 + 32);
    });

    it("rejects a large header inside the structured sections", () => {
        const bytes = writeBytecodeFile({ functions: [makeFunction({ paramCount: 200 })] });
        const fields = MutableBytecodeFileFields.fromBuffer(bytes);

        const small = fields.functionHeaders.get(0);
        setLargeHeaderOffset(small, 0);
        fields.functionHeaders.set(0, small);

        const error = catchFormatError(() => getFunctionHeader(fields, 0));
        expect(error.kind).toBe("InvalidOverflowReference");
        expect(error.section).toBe("functionHeaders");
        expect(error.expected).toBe(112);
        expect(error.actual).toBe(0);
    });

    it("resolves an overflowed header in a file with one function and one string", () => {
        const bytes = writeBytecodeFile({
            functions: [makeFunction({ paramCount: 200, bytecode: new Uint8Array([9, 8, 7, 6, 5]) })],
            strings: ["main"],
        });
        const fields = populateFromBuffer(bytes);

        expect(fields.header.functionCount).toBe(1);
        expect(fields.header.stringCount).toBe(1);

        // sections end at 120, bytecode to 125, info area at 128
        const small = fields.functionHeaders.get(0);
        expect(isOverflowed(small)).toBe(true);
        expect(getLargeHeaderOffset(small)).toBe(128);

        const header = getFunctionHeader(fields, 0);
        expect(header.paramCount).toBe(200);
        expect(header.infoOffset).toBe(128);
        expect(header.offset).toBe(120);
        expect(getString(fields, header.functionName)).toBe("main");
    });

    it("follows overflow references in a written file", () => {
        const bytecode = new Uint8Array([9, 8, 7, 6, 5]);
        const bytes = writeBytecodeFile({
            functions: [makeFunction({ paramCount: 200, bytecode, strictMode: true })],
        });
        const fields = populateFromBuffer(bytes);

        // header 96, one function header to 112, bytecode to 117, info area at 120
        const small = fields.functionHeaders.get(0);
        expect(isOverflowed(small)).toBe(true);
        expect(getLargeHeaderOffset(small)).toBe(120);
        expect(fields.header.fileLength).toBe(152);

        expect(getFunctionHeader(fields, 0)).toEqual({
            offset: 112,
            paramCount: 200,
            bytecodeSizeInBytes: 5,
            functionName: 0,
            infoOffset: 120,
            frameSize: 4,
            environmentSize: 0,
            highestReadCacheIndex: 0,
            highestWriteCacheIndex: 0,
            flags: FunctionHeaderFlag.StrictMode,
        });
        expect(Array.from(getFunctionBytecode(fields, 0))).toEqual([9, 8, 7, 6, 5]);
    });
});
