export interface Codec<T> {
    readonly byteSize: number;
    read(view: DataView, offset: number): T;
    write(view: DataView, offset: number, value: T): void;
}

export const uint8: Codec<number> = {
    byteSize: 1,
    read: (view, offset) => view.getUint8(offset),
    write: (view, offset, value) => view.setUint8(offset, value),
};

export const uint16: Codec<number> = {
    byteSize: 2,
    read: (view, offset) => view.getUint16(offset, true),
    write: (view, offset, value) => view.setUint16(offset, value, true),
};

export const uint32: Codec<number> = {
    byteSize: 4,
    read: (view, offset) => view.getUint32(offset, true),
    write: (view, offset, value) => view.setUint32(offset, value, true),
};

export const float64: Codec<number> = {
    byteSize: 8,
    read: (view, offset) => view.getFloat64(offset, true),
    write: (view, offset, value) => view.setFloat64(offset, value, true),
};

export function asBytes(buffer: ArrayBufferLike | Uint8Array) {
    return buffer instanceof Uint8Array ? buffer : new Uint8Array(buffer);
}

/**
 * Read-only window of `length` fixed-size elements into a buffer owned by someone else.
 * Nothing is copied; the view must not outlive the buffer it was made from.
 */
export class ArrayView<T> implements Iterable<T> {
    protected readonly data: DataView;

    constructor(
        buffer: ArrayBufferLike,
        readonly byteOffset: number,
        readonly length: number,
        readonly codec: Codec<T>,
    ) {
        this.data = new DataView(buffer, byteOffset, length * codec.byteSize);
    }

    get byteLength() {
        return this.data.byteLength;
    }

    get(index: number): T {
        checkIndex(index, this.length);

        return this.codec.read(this.data, index * this.codec.byteSize);
    }

    /** Reads a record of any layout at a byte offset within this view. */
    readAt<U>(codec: Codec<U>, byteOffset: number): U {
        checkRange(byteOffset, byteOffset + codec.byteSize, this.byteLength);

        return codec.read(this.data, byteOffset);
    }

    subview(start = 0, end = this.length): ArrayView<T> {
        checkRange(start, end, this.length);

        return new ArrayView(this.data.buffer, this.byteOffset + start * this.codec.byteSize, end - start, this.codec);
    }

    /** Reinterprets `count` elements of another layout starting at a byte offset within this view. */
    viewAs<U>(codec: Codec<U>, byteOffset: number, count: number): ArrayView<U> {
        checkRange(byteOffset, byteOffset + count * codec.byteSize, this.byteLength);

        return new ArrayView(this.data.buffer, this.byteOffset + byteOffset, count, codec);
    }

    toArray(): T[] {
        return Array.from(this);
    }

    /** Copies the underlying bytes out of the buffer. */
    toUint8Array() {
        return new Uint8Array(this.data.buffer, this.byteOffset, this.byteLength).slice();
    }

    *[Symbol.iterator]() {
        for (let i = 0; i < this.length; i++) {
            yield this.get(i);
        }
    }
}

export class MutableArrayView<T> extends ArrayView<T> {
    set(index: number, value: T) {
        checkIndex(index, this.length);

        this.codec.write(this.data, index * this.codec.byteSize, value);
    }

    writeAt<U>(codec: Codec<U>, byteOffset: number, value: U) {
        checkRange(byteOffset, byteOffset + codec.byteSize, this.byteLength);

        codec.write(this.data, byteOffset, value);
    }

    /** The viewed bytes, writable and without a copy. */
    bytes() {
        return new Uint8Array(this.data.buffer, this.byteOffset, this.byteLength);
    }

    override subview(start = 0, end = this.length): MutableArrayView<T> {
        checkRange(start, end, this.length);

        return new MutableArrayView(this.data.buffer, this.byteOffset + start * this.codec.byteSize, end - start, this.codec);
    }

    override viewAs<U>(codec: Codec<U>, byteOffset: number, count: number): MutableArrayView<U> {
        checkRange(byteOffset, byteOffset + count * codec.byteSize, this.byteLength);

        return new MutableArrayView(this.data.buffer, this.byteOffset + byteOffset, count, codec);
    }
}

function checkIndex(index: number, length: number) {
    if (!Number.isInteger(index) || index < 0 || index >= length) {
        throw RangeError(`Index ${index} not in range [0, ${length})`);
    }
}

function checkRange(start: number, end: number, length: number) {
    if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || end < start || end > length) {
        throw RangeError(`Range [${start}, ${end}) not within [0, ${length})`);
    }
}
