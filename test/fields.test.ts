import {
    BytecodeFileFields,
    BytecodeForm,
    getCjsModules,
    MutableBytecodeFileFields,
    populateFromBuffer,
    populateMutableFromBuffer,
    writeBytecodeFile,
} from "bytecode";
import { afterEach, describe, expect, it, vi } from "vitest";
import { catchFormatError, FIELD_OFFSETS, makeFunction, patchUint32 } from "./helpers.ts";

describe("populateFromBuffer", () => {
    it("gives empty views for an empty file", () => {
        const fields = populateFromBuffer(writeBytecodeFile({ functions: [] }));

        expect(fields.layout.end).toBe(96);
        expect(fields.functionHeaders.length).toBe(0);
        expect(fields.stringTableEntries.length).toBe(0);
        expect(fields.stringStorage.length).toBe(0);
        expect(fields.regExpTable.length).toBe(0);
        expect(fields.cjsModuleTable.length).toBe(0);
        expect(fields.cjsModuleTableStatic.length).toBe(0);
        expect(fields.loadDebugInfo()).toBeUndefined();
    });

    it("accepts an ArrayBuffer as well as a Uint8Array", () => {
        const bytes = writeBytecodeFile({ functions: [makeFunction()] });

        expect(BytecodeFileFields.fromBuffer(bytes.buffer).functionHeaders.length).toBe(1);
    });

    it("is idempotent", () => {
        const bytes = writeBytecodeFile({ functions: [makeFunction(), makeFunction({ paramCount: 2 })], strings: ["a"] });
        const first = populateFromBuffer(bytes);
        const second = populateFromBuffer(bytes);

        expect(second.layout).toEqual(first.layout);
        expect(second.functionHeaders.toArray()).toEqual(first.functionHeaders.toArray());
        expect(second.stringTableEntries.toArray()).toEqual(first.stringTableEntries.toArray());
    });

    it("aligns every non-empty section", () => {
        const fields = populateFromBuffer(writeBytecodeFile({
            functions: [makeFunction()],
            strings: ["abc"],
            arrayBuffer: new Uint8Array([1, 2, 3]),
            objKeyBuffer: new Uint8Array([4]),
            regExps: [new Uint8Array([5, 6])],
        }));

        const { sections } = fields.layout;
        expect(sections.functionHeaders).toEqual({ offset: 96, size: 16 });
        expect(sections.stringTableEntries).toEqual({ offset: 112, size: 4 });
        expect(sections.stringStorage).toEqual({ offset: 116, size: 3 });
        expect(sections.arrayBuffer).toEqual({ offset: 120, size: 3 });
        expect(sections.objKeyBuffer).toEqual({ offset: 124, size: 1 });
        expect(sections.objValueBuffer).toEqual({ offset: 125, size: 0 });
        expect(sections.regExpTable).toEqual({ offset: 128, size: 8 });
        expect(sections.regExpStorage).toEqual({ offset: 136, size: 2 });
        expect(fields.layout.end).toBe(138);
    });

    it("fails on a flipped magic bit before looking at anything else", () => {
        const bytes = writeBytecodeFile({ functions: [makeFunction()], strings: ["main"] });
        bytes[0] ^= 1;

        const error = catchFormatError(() => populateFromBuffer(bytes, BytecodeForm.Execution));
        expect(error.kind).toBe("MagicMismatch");
        expect(error.section).toBe("header");
    });

    it("names the section that runs past the end", () => {
        const bytes = writeBytecodeFile({ functions: [], arrayBuffer: new Uint8Array([1, 2, 3, 4]) });
        const truncated = bytes.slice(0, 99);
        patchUint32(truncated, FIELD_OFFSETS.fileLength, 99);

        const error = catchFormatError(() => populateFromBuffer(truncated));
        expect(error.kind).toBe("TruncatedBuffer");
        expect(error.section).toBe("arrayBuffer");
        expect(error.expected).toBe(100);
        expect(error.actual).toBe(99);
    });

    it("checks a section whose declared size grew", () => {
        const bytes = writeBytecodeFile({ functions: [], strings: ["hello"] });
        patchUint32(bytes, FIELD_OFFSETS.stringStorageSize, 9);

        const error = catchFormatError(() => populateFromBuffer(bytes));
        expect(error.kind).toBe("TruncatedBuffer");
        expect(error.section).toBe("stringStorage");
        expect(error.expected).toBe(109);
        expect(error.actual).toBe(108);
    });

    it("reports sizes past the addressable range as overflow", () => {
        const bytes = writeBytecodeFile({ functions: [] });
        patchUint32(bytes, FIELD_OFFSETS.functionCount, 0x10000000);

        const error = catchFormatError(() => populateFromBuffer(bytes));
        expect(error.kind).toBe("SectionOverflow");
        expect(error.section).toBe("functionHeaders");
    });

    it("rejects string table bytes that don't add up", () => {
        const bytes = writeBytecodeFile({ functions: [] });
        patchUint32(bytes, FIELD_OFFSETS.stringCount, 1);
        patchUint32(bytes, FIELD_OFFSETS.stringTableBytes, 6);

        const error = catchFormatError(() => populateFromBuffer(bytes));
        expect(error.kind).toBe("SectionOverflow");
        expect(error.section).toBe("stringTableOverflowEntries");
    });

    it("rejects debug info overlapping the sections or past the end", () => {
        const overlapping = writeBytecodeFile({ functions: [] });
        patchUint32(overlapping, FIELD_OFFSETS.debugInfoOffset, 90);
        expect(catchFormatError(() => populateFromBuffer(overlapping)).kind).toBe("DebugInfoBoundsError");

        const outside = writeBytecodeFile({ functions: [] });
        patchUint32(outside, FIELD_OFFSETS.debugInfoOffset, 96);
        const error = catchFormatError(() => populateFromBuffer(outside));
        expect(error.kind).toBe("DebugInfoBoundsError");
        expect(error.actual).toBe(116);
    });
});

describe("CommonJS module tables", () => {
    it("reads resolved modules from a negative count", () => {
        const fields = populateFromBuffer(writeBytecodeFile({ functions: [], resolvedCjsModules: [4, 5, 6] }));

        expect(fields.header.cjsModuleCount).toBe(-3);
        expect(fields.cjsModuleTable.length).toBe(0);
        expect(fields.cjsModuleTableStatic.toArray()).toEqual([4, 5, 6]);

        const modules = getCjsModules(fields);
        expect(modules.resolved && modules.functionIndices.toArray()).toEqual([4, 5, 6]);
    });

    it("reads unresolved module pairs", () => {
        const fields = populateFromBuffer(writeBytecodeFile({
            functions: [],
            cjsModules: [{ moduleId: 7, functionIndex: 1 }],
        }));

        const modules = getCjsModules(fields);
        expect(modules.resolved).toBe(false);
        expect(modules.resolved || modules.entries.toArray()).toEqual([{ moduleId: 7, functionIndex: 1 }]);
    });

    it("refuses both kinds at once", () => {
        expect(() => writeBytecodeFile({
            functions: [],
            cjsModules: [{ moduleId: 0, functionIndex: 0 }],
            resolvedCjsModules: [0],
        })).toThrow("A file has either unresolved or resolved CJS modules, not both");
    });
});

describe("access modes", () => {
    it("writes through mutable views without copying", () => {
        const bytes = writeBytecodeFile({ functions: [], arrayBuffer: new Uint8Array([1, 2, 3, 4]) });
        const fields = MutableBytecodeFileFields.fromBuffer(bytes);

        fields.arrayBuffer.set(0, 42);
        expect(bytes[96]).toBe(42);
        expect(fields.arrayBuffer.bytes()[0]).toBe(42);
    });

    it("copies out of immutable views", () => {
        const bytes = writeBytecodeFile({ functions: [], arrayBuffer: new Uint8Array([1, 2, 3, 4]) });
        const copy = populateFromBuffer(bytes).arrayBuffer.toUint8Array();

        copy[0] = 42;
        expect(bytes[96]).toBe(1);
    });

    it("never views one buffer both ways", () => {
        const bytes = writeBytecodeFile({ functions: [] });
        populateFromBuffer(bytes);

        expect(() => populateMutableFromBuffer(bytes))
            .toThrow("Buffer is already populated as immutable, can't also populate it as mutable");
        expect(populateFromBuffer(bytes).layout.end).toBe(96);
    });

    it("claims only the bytes of one file within a shared ArrayBuffer", () => {
        const first = Buffer.from(writeBytecodeFile({ functions: [] }));
        const second = Buffer.from(writeBytecodeFile({ functions: [makeFunction()] }));

        populateFromBuffer(first);
        expect(populateMutableFromBuffer(second).functionHeaders.length).toBe(1);
        expect(populateFromBuffer(first).layout.end).toBe(96);

        const overlapping = new Uint8Array(second.buffer, second.byteOffset, second.byteLength);
        expect(() => populateFromBuffer(overlapping))
            .toThrow("Buffer is already populated as mutable, can't also populate it as immutable");
    });
});

describe("loadDebugInfo", () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it("warns about debug info no function uses", () => {
        const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
        const fields = populateFromBuffer(writeBytecodeFile({
            functions: [],
            debugInfo: { filenames: ["a.js"], fileRegions: [] },
        }));

        expect(fields.header.debugInfoOffset).toBe(96);
        expect(fields.loadDebugInfo()).toBeUndefined();
        expect(warn).toHaveBeenCalledOnce();
        expect(warn).toHaveBeenCalledWith("Debug info at 0x60 is not used by any function, ignoring it");
    });
});
