import { BytecodeFormatError } from "./errors.ts";
import { type ArrayView, float64, uint16, uint32, uint8 } from "./views.ts";

export type Literal = number | string | boolean | null;

enum TagType {
    Null = 0,
    True = 1,
    False = 2,
    Number = 3,
    LongString = 4,
    ShortString = 5,
    ByteString = 6,
    Integer = 7,
}

const valueSizes: Record<TagType, number> = {
    [TagType.Null]: 0,
    [TagType.True]: 0,
    [TagType.False]: 0,
    [TagType.Number]: 8,
    [TagType.LongString]: 4,
    [TagType.ShortString]: 2,
    [TagType.ByteString]: 1,
    [TagType.Integer]: 4,
};

/**
 * Reads `count` literals from one of the literal buffers, starting at a byte offset.
 * Literals come in runs of the same tag, each run prefixed by its tag and length.
 */
export function parseLiterals(
    buffer: ArrayView<number>,
    offset: number,
    count: number,
    getString: (id: number) => string,
): Literal[] {
    const literals: Literal[] = [];

    const read = <T>(size: number, value: () => T) => {
        if (offset + size > buffer.length) {
            throw new BytecodeFormatError("TruncatedBuffer", "literals", offset + size, buffer.length);
        }

        const result = value();
        offset += size;
        return result;
    };

    while (literals.length < count) {
        const byte = read(1, () => buffer.get(offset));

        // 0tagllll or 1tagllll llllllll
        // 76543210    76543210 76543210
        const tag: TagType = (byte >> 4) & 0b111;
        let length = byte & 0b1111;

        if (byte & 0x80) length = length << 8 | read(1, () => buffer.get(offset));

        for (let i = 0; i < length; i++) {
            const size = valueSizes[tag];

            literals.push(read(size, (): Literal => {
                switch (tag) {
                    case TagType.Null:
                        return null;
                    case TagType.True:
                        return true;
                    case TagType.False:
                        return false;
                    case TagType.Number:
                        return buffer.readAt(float64, offset);
                    case TagType.LongString:
                        return getString(buffer.readAt(uint32, offset));
                    case TagType.ShortString:
                        return getString(buffer.readAt(uint16, offset));
                    case TagType.ByteString:
                        return getString(buffer.readAt(uint8, offset));
                    case TagType.Integer:
                        return buffer.readAt(uint32, offset) | 0;
                }
            }));
        }
    }

    return literals;
}
