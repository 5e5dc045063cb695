import { largeFunctionHeader } from "./bitfields.ts";
import type { MutableBytecodeFileFields } from "./fields.ts";
import { FunctionHeaderFlag, getLargeHeaderOffset, isOverflowed, resolveFunctionHeader, setFlag } from "./functionHeader.ts";
import { BytecodeOption, setOption } from "./header.ts";

/**
 * Detaches debug info from every function and from the header. The trailer's bytes stay where
 * they are; nothing points at them anymore.
 *
 * Every overflow reference is resolved before anything is written, so a bad one leaves the file
 * untouched.
 */
export function stripDebugInfo(fields: MutableBytecodeFileFields) {
    const headers = fields.functionHeaders;

    const resolved = headers.toArray().map(small => ({
        small,
        large: isOverflowed(small) ? resolveFunctionHeader(small, fields.file, fields.layout.end) : undefined,
    }));

    resolved.forEach(({ small, large }, i) => {
        if (large) {
            large.flags = setFlag(large.flags, FunctionHeaderFlag.HasDebugInfo, false);
            fields.file.writeAt(largeFunctionHeader, getLargeHeaderOffset(small), large);
        }

        small.flags = setFlag(small.flags, FunctionHeaderFlag.HasDebugInfo, false);
        headers.set(i, small);
    });

    fields.updateHeader({ debugInfoOffset: 0 });
}

export function setStaticBuiltins(fields: MutableBytecodeFileFields, enabled: boolean) {
    fields.updateHeader({ options: setOption(fields.header.options, BytecodeOption.StaticBuiltins, enabled) });
}
