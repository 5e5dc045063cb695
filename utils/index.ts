export function fromEntries<K extends PropertyKey, V>(entries: Iterable<readonly [K, V]>) {
    return Object.fromEntries(entries) as Record<K, V>;
}

export function entries<K extends PropertyKey, V>(obj: { [key in K]?: V }) {
    return Object.entries(obj) as [K, V][];
}

export function mapValues<K extends PropertyKey, V, W>(obj: { [key in K]: V }, func: (v: V, k: K) => W) {
    return fromEntries(entries<K, V>(obj).map(([k, v]) => [k, func(v, k)]));
}

export function padSize(size: number) {
    return Math.ceil(size / 4) * 4;
}

/** Binary search over sorted keys, returning the index after the rightmost key not above `value`. */
export function bisect(length: number, value: number, keyAt: (index: number) => number) {
    let lo = 0, hi = length;

    while (lo < hi) {
        const mid = (lo + hi) / 2 | 0;

        if (keyAt(mid) <= value) {
            lo = mid + 1;
        } else {
            hi = mid;
        }
    }

    return lo;
}

export function concatBytes(parts: Uint8Array[]) {
    const result = new Uint8Array(parts.reduce((acc, part) => acc + part.byteLength, 0));

    let offset = 0;
    for (const part of parts) {
        result.set(part, offset);
        offset += part.byteLength;
    }

    return result;
}
