import {
    type CjsModuleEntry,
    cjsModuleEntry,
    type OffsetLengthPair,
    offsetLengthPair,
    type SmallFunctionHeader,
    smallFunctionHeader,
    type SmallStringTableEntry,
    smallStringTableEntry,
} from "./bitfields.ts";
import { type DebugInfo, readDebugInfo } from "./debugInfo.ts";
import { FunctionHeaderFlag, hasFlag } from "./functionHeader.ts";
import { BytecodeForm, encodeHeader, type FileHeader, HEADER_SIZE, readHeader } from "./header.ts";
import { checkDebugInfoOffset, computeLayout, type SectionLayout, type SectionName } from "./layout.ts";
import { ArrayView, asBytes, type Codec, MutableArrayView, uint32, uint8 } from "./views.ts";

type AccessMode = "immutable" | "mutable";

interface BufferClaim {
    start: number;
    end: number;
    mode: AccessMode;
}

// a range of bytes is only ever viewed one way; unrelated files may share one ArrayBuffer
const populatedBuffers = new WeakMap<ArrayBufferLike, BufferClaim[]>();

function claimBuffer(bytes: Uint8Array, mode: AccessMode) {
    const start = bytes.byteOffset;
    const end = start + bytes.byteLength;
    const claims = populatedBuffers.get(bytes.buffer) ?? [];

    const conflict = claims.find(claim => claim.mode !== mode && claim.start < end && start < claim.end);
    if (conflict) {
        throw Error(`Buffer is already populated as ${conflict.mode}, can't also populate it as ${mode}`);
    }

    if (!claims.some(claim => claim.mode === mode && claim.start === start && claim.end === end)) {
        claims.push({ start, end, mode });
    }

    populatedBuffers.set(bytes.buffer, claims);
}

/**
 * Typed views over every structured section of a bytecode file, pointing directly into the
 * caller's buffer. Bounds are checked once, here; the views must not outlive the buffer.
 *
 * Function bodies and their info (exception handlers, debug offsets) are less structured and
 * are reached through the function headers instead, see `functionInfo.ts`.
 */
export class BytecodeFileFields {
    /** The whole file */
    readonly file: ArrayView<number>;
    readonly form: BytecodeForm;
    readonly layout: SectionLayout;

    /** Some of these may be overflow references to full headers */
    readonly functionHeaders: ArrayView<SmallFunctionHeader>;
    readonly stringTableEntries: ArrayView<SmallStringTableEntry>;
    /** One per identifier string, in string table order */
    readonly identifierHashes: ArrayView<number>;
    readonly stringTableOverflowEntries: ArrayView<OffsetLengthPair>;
    readonly stringStorage: ArrayView<number>;

    readonly arrayBuffer: ArrayView<number>;
    readonly objKeyBuffer: ArrayView<number>;
    readonly objValueBuffer: ArrayView<number>;

    readonly regExpTable: ArrayView<OffsetLengthPair>;
    /** Compiled regexp programs */
    readonly regExpStorage: ArrayView<number>;

    /** `(moduleId, functionIndex)` pairs, while modules are unresolved */
    readonly cjsModuleTable: ArrayView<CjsModuleEntry>;
    /** Function index per module slot, once resolved */
    readonly cjsModuleTableStatic: ArrayView<number>;

    protected fileHeader: FileHeader;

    protected constructor(bytes: Uint8Array, file: ArrayView<number>, form: BytecodeForm, mode: AccessMode) {
        // nothing is exposed unless every check passes
        const header = readHeader(bytes, form);
        const layout = computeLayout(header);

        claimBuffer(bytes, mode);

        this.file = file;
        this.form = form;
        this.layout = layout;
        this.fileHeader = header;

        const section = <T>(name: SectionName, codec: Codec<T>) => {
            const { offset, size } = layout.sections[name];
            return file.viewAs(codec, offset, size / codec.byteSize);
        };

        this.functionHeaders = section("functionHeaders", smallFunctionHeader);
        this.stringTableEntries = section("stringTableEntries", smallStringTableEntry);
        this.identifierHashes = section("identifierHashes", uint32);
        this.stringTableOverflowEntries = section("stringTableOverflowEntries", offsetLengthPair);
        this.stringStorage = section("stringStorage", uint8);
        this.arrayBuffer = section("arrayBuffer", uint8);
        this.objKeyBuffer = section("objKeyBuffer", uint8);
        this.objValueBuffer = section("objValueBuffer", uint8);
        this.regExpTable = section("regExpTable", offsetLengthPair);
        this.regExpStorage = section("regExpStorage", uint8);
        this.cjsModuleTable = section("cjsModuleTable", cjsModuleEntry);
        this.cjsModuleTableStatic = section("cjsModuleTableStatic", uint32);
    }

    /** Populates read-only views. `form` selects which magic number is accepted. */
    static fromBuffer(buffer: ArrayBufferLike | Uint8Array, form = BytecodeForm.Execution): BytecodeFileFields {
        const bytes = asBytes(buffer);
        const file = new ArrayView(bytes.buffer, bytes.byteOffset, bytes.byteLength, uint8);

        return new BytecodeFileFields(bytes, file, form, "immutable");
    }

    get header(): Readonly<FileHeader> {
        return this.fileHeader;
    }

    /** Whether any function header says it has debug info. */
    hasDebugInfo() {
        for (const header of this.functionHeaders) {
            if (hasFlag(header.flags, FunctionHeaderFlag.HasDebugInfo)) return true;
        }

        return false;
    }

    /**
     * Reads the debug info trailer. It only counts as present when `debugInfoOffset` is set and
     * some function uses it.
     */
    loadDebugInfo(): DebugInfo | undefined {
        const offset = this.header.debugInfoOffset;
        if (offset === 0) return undefined;

        if (!this.hasDebugInfo()) {
            console.warn(`Debug info at 0x${offset.toString(16)} is not used by any function, ignoring it`);
            return undefined;
        }

        return readDebugInfo(this.file, this.header);
    }
}

export type HeaderPatch = Partial<Pick<FileHeader, "globalCodeIndex" | "debugInfoOffset" | "options" | "sourceHash">>;

/**
 * The same views, writable, for tools that patch a file in place. Writes to one record are not
 * atomic, so an instance must not be shared between concurrent mutators.
 */
export class MutableBytecodeFileFields extends BytecodeFileFields {
    declare readonly file: MutableArrayView<number>;
    declare readonly functionHeaders: MutableArrayView<SmallFunctionHeader>;
    declare readonly stringTableEntries: MutableArrayView<SmallStringTableEntry>;
    declare readonly identifierHashes: MutableArrayView<number>;
    declare readonly stringTableOverflowEntries: MutableArrayView<OffsetLengthPair>;
    declare readonly stringStorage: MutableArrayView<number>;
    declare readonly arrayBuffer: MutableArrayView<number>;
    declare readonly objKeyBuffer: MutableArrayView<number>;
    declare readonly objValueBuffer: MutableArrayView<number>;
    declare readonly regExpTable: MutableArrayView<OffsetLengthPair>;
    declare readonly regExpStorage: MutableArrayView<number>;
    declare readonly cjsModuleTable: MutableArrayView<CjsModuleEntry>;
    declare readonly cjsModuleTableStatic: MutableArrayView<number>;

    static override fromBuffer(buffer: ArrayBufferLike | Uint8Array, form = BytecodeForm.Execution): MutableBytecodeFileFields {
        const bytes = asBytes(buffer);
        const file = new MutableArrayView(bytes.buffer, bytes.byteOffset, bytes.byteLength, uint8);

        return new MutableBytecodeFileFields(bytes, file, form, "mutable");
    }

    /** Rewrites header fields that don't move any section. */
    updateHeader(patch: HeaderPatch) {
        const header = { ...this.fileHeader, ...patch };
        checkDebugInfoOffset(header, this.layout.end);

        const bytes = this.file.bytes();
        encodeHeader(new DataView(bytes.buffer, bytes.byteOffset, HEADER_SIZE), header);

        this.fileHeader = header;
    }
}

export function populateFromBuffer(buffer: ArrayBufferLike | Uint8Array, form = BytecodeForm.Execution) {
    return BytecodeFileFields.fromBuffer(buffer, form);
}

export function populateMutableFromBuffer(buffer: ArrayBufferLike | Uint8Array, form = BytecodeForm.Execution) {
    return MutableBytecodeFileFields.fromBuffer(buffer, form);
}
