import type { CjsModuleEntry } from "./bitfields.ts";
import { BytecodeFormatError } from "./errors.ts";
import type { BytecodeFileFields } from "./fields.ts";
import type { ArrayView } from "./views.ts";

/** Compiled program of a regexp literal, viewed in place. */
export function getRegExpBytecode(fields: BytecodeFileFields, index: number): ArrayView<number> {
    const { offset, length } = fields.regExpTable.get(index);
    const end = offset + length;

    if (end > fields.regExpStorage.length) {
        throw new BytecodeFormatError(
            "TruncatedBuffer",
            "regExpStorage",
            end,
            fields.regExpStorage.length,
            `regexp #${index} ends at ${end} but storage is ${fields.regExpStorage.length} bytes`,
        );
    }

    return fields.regExpStorage.subview(offset, end);
}

export type CjsModules =
    | { resolved: false; entries: ArrayView<CjsModuleEntry> }
    | { resolved: true; functionIndices: ArrayView<number> };

/** A negative module count in the header means modules were already resolved to function indices. */
export function getCjsModules(fields: BytecodeFileFields): CjsModules {
    return fields.header.cjsModuleCount < 0
        ? { resolved: true, functionIndices: fields.cjsModuleTableStatic }
        : { resolved: false, entries: fields.cjsModuleTable };
}
