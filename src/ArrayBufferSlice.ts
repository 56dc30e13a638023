
// A read-only window over an ArrayBuffer.
//
// ArrayBuffer.prototype.slice copies, and Node's Buffer shares a pooled ArrayBuffer with
// unrelated allocations, so a Buffer's .buffer cannot be handed around on its own. An
// ArrayBufferSlice keeps the (buffer, offset, length) triple together and makes sub-views
// without copying. Nothing stops a caller from writing through a view it creates; don't.

import { assert } from "./util.js";

interface _TypedArrayConstructor<T extends ArrayBufferView> {
    readonly BYTES_PER_ELEMENT: number;
    new(buffer: ArrayBuffer, byteOffset: number, length?: number): T;
    new(buffer: ArrayBuffer): T;
}

function isAligned(n: number, m: number) {
    return (n & (m - 1)) === 0;
}

export default class ArrayBufferSlice {
    constructor(
        // Named arrayBuffer so that an ArrayBufferSlice is never mistaken for an ArrayBufferView
        // when passed to an API that takes one.
        public readonly arrayBuffer: ArrayBuffer,
        public readonly byteOffset: number = 0,
        public readonly byteLength: number = arrayBuffer.byteLength - byteOffset
    ) {
        assert(byteOffset >= 0 && byteLength >= 0 && (byteOffset + byteLength) <= this.arrayBuffer.byteLength);
    }

    /**
     * Wrap the bytes of a Node Buffer (or any Uint8Array) without copying them.
     */
    public static fromUint8Array(data: Uint8Array): ArrayBufferSlice {
        if (data.buffer instanceof ArrayBuffer)
            return new ArrayBufferSlice(data.buffer, data.byteOffset, data.byteLength);

        // SharedArrayBuffer-backed views get their own copy.
        const copy = new ArrayBuffer(data.byteLength);
        new Uint8Array(copy).set(data);
        return new ArrayBufferSlice(copy);
    }

    /**
     * Return a sub-section of the buffer starting at byte offset {@param begin} and spanning
     * {@param byteLength} bytes, or the rest of the slice when no length is given.
     */
    public subarray(begin: number, byteLength?: number): ArrayBufferSlice {
        const absBegin = this.byteOffset + begin;
        if (byteLength === undefined)
            byteLength = this.byteLength - begin;
        assert(begin >= 0 && byteLength >= 0 && begin + byteLength <= this.byteLength);
        return new ArrayBufferSlice(this.arrayBuffer, absBegin, byteLength);
    }

    /**
     * Copy bytes out into a fresh ArrayBuffer. Use sparingly.
     */
    public copyToBuffer(begin: number = 0, byteLength?: number): ArrayBuffer {
        const start = this.byteOffset + begin;
        const end = byteLength !== undefined ? start + byteLength : this.byteOffset + this.byteLength;
        return this.arrayBuffer.slice(start, end);
    }

    public createDataView(offs: number = 0, length?: number): DataView {
        if (offs === 0 && length === undefined) {
            return new DataView(this.arrayBuffer, this.byteOffset, this.byteLength);
        } else {
            return this.subarray(offs, length).createDataView();
        }
    }

    // Host byte order is assumed little-endian, which covers every platform Node runs on.
    public createTypedArray<T extends ArrayBufferView>(clazz: _TypedArrayConstructor<T>, offs: number = 0, count?: number): T {
        const begin = this.byteOffset + offs;

        let byteLength;
        if (count !== undefined) {
            byteLength = clazz.BYTES_PER_ELEMENT * count;
        } else {
            byteLength = this.byteLength - offs;
            count = byteLength / clazz.BYTES_PER_ELEMENT;
            assert((count | 0) === count);
        }

        // Typed arrays require alignment.
        if (isAligned(begin, clazz.BYTES_PER_ELEMENT))
            return new clazz(this.arrayBuffer, begin, count);
        else
            return new clazz(this.copyToBuffer(offs, byteLength));
    }
}
