import { entries, fromEntries, padSize } from "../../utils/index.ts";
import type { Codec } from "./views.ts";

export type BitfieldValue<K extends string> = { [P in K]: number };

export type ParsedBitfield<T> = T extends Bitfield<infer K> ? BitfieldValue<K> : never;

export interface BitfieldSegment {
    /** Byte offset of the 32-bit word holding the field */
    byte: number;
    shift: number;
    mask: number;
    /** Largest value the field can hold */
    max: number;
}

/**
 * Fixed-size record of unsigned fields packed LSB-first into little-endian 32-bit words.
 * Fields are laid out in declaration order and may not straddle a word.
 */
export class Bitfield<K extends string> implements Codec<BitfieldValue<K>> {
    bitSize: number;
    byteSize: number;
    segments: [K, BitfieldSegment][];

    constructor(public fields: Record<K, number>) {
        this.bitSize = entries(fields).reduce((a, [, b]) => a + b, 0);
        this.byteSize = padSize(Math.ceil(this.bitSize / 8));

        let bit = 0;
        this.segments = entries(fields).map(([name, bitSize]) => {
            if (bitSize > 32) throw Error(`Field "${name}" is larger than 32 bits`);
            if (bit % 32 + bitSize > 32) throw Error(`Field "${name}" is misaligned`);

            const byte = (bit / 32 | 0) * 4;
            const shift = bit % 32;
            const mask = -1 >>> (32 - bitSize) | 0; // right shift instead of left so 32-bit mask doesn't overflow
            bit += bitSize;

            return [name, { byte, shift, mask, max: 2 ** bitSize - 1 }];
        });
    }

    fits(field: K, value: number) {
        return value <= this.segment(field).max;
    }

    segment(field: K) {
        const found = this.segments.find(([name]) => name === field);
        if (!found) throw Error(`Unknown field "${field}"`);

        return found[1];
    }

    read(view: DataView, offset: number): BitfieldValue<K> {
        return fromEntries(this.segments.map(([field, segment]) => [
            field,
            ((view.getUint32(offset + segment.byte, true) >>> segment.shift) & segment.mask) >>> 0,
        ]));
    }

    /** Writes every word of the record from scratch, so bits not covered by a field end up zero. */
    write(view: DataView, offset: number, value: BitfieldValue<K>) {
        const words = new Array<number>(this.byteSize / 4).fill(0);

        for (const [field, segment] of this.segments) {
            const fieldValue = value[field];

            if (!Number.isInteger(fieldValue) || fieldValue < 0 || fieldValue > segment.max) {
                throw RangeError(`Value ${fieldValue} of "${field}" not in range [0, ${segment.max}]`);
            }

            words[segment.byte / 4] |= (fieldValue & segment.mask) << segment.shift;
        }

        words.forEach((word, i) => view.setUint32(offset + i * 4, word >>> 0, true));
    }

    /** A record with every field set to zero */
    empty(): BitfieldValue<K> {
        return fromEntries(this.segments.map(([field]) => [field, 0]));
    }
}
