
import { vec2, vec3, vec4 } from "gl-matrix";
import ArrayBufferSlice from "../ArrayBufferSlice.js";
import { decodeString, readMagic } from "../util.js";
import { CorruptSectionError, type SectionName, TruncatedInputError } from "./Errors.js";

export type IndexWidth = 1 | 2 | 4;

export const enum TextEncoding {
    UTF16LE = 0,
    UTF8    = 1,
}

// Forward-only little-endian reader. Every read checks the remaining length before touching
// the DataView, so short input always surfaces as TruncatedInputError.
export class Stream {
    private offset: number = 0;
    private view: DataView;

    public encoding: TextEncoding = TextEncoding.UTF16LE;
    // Section currently being decoded, for error reporting.
    public section: SectionName = "header";

    constructor(private buffer: ArrayBufferSlice) {
        this.view = buffer.createDataView();
    }

    public tell(): number {
        return this.offset;
    }

    public remaining(): number {
        return this.buffer.byteLength - this.offset;
    }

    // Reserve n bytes and return the offset they start at.
    private take(n: number): number {
        const available = this.remaining();
        if (n > available)
            throw new TruncatedInputError(this.offset, n, available);
        const offs = this.offset;
        this.offset += n;
        return offs;
    }

    public skip(n: number): void {
        this.take(n);
    }

    public peekMagic(n: number): string {
        const available = this.remaining();
        if (n > available)
            throw new TruncatedInputError(this.offset, n, available);
        return readMagic(this.buffer, this.offset, n);
    }

    public readUint8(): number {
        return this.view.getUint8(this.take(1));
    }

    public readInt8(): number {
        return this.view.getInt8(this.take(1));
    }

    public readUint16(): number {
        return this.view.getUint16(this.take(2), true);
    }

    public readInt16(): number {
        return this.view.getInt16(this.take(2), true);
    }

    public readUint32(): number {
        return this.view.getUint32(this.take(4), true);
    }

    public readInt32(): number {
        return this.view.getInt32(this.take(4), true);
    }

    public readFloat32(): number {
        return this.view.getFloat32(this.take(4), true);
    }

    public readVec2(): vec2 {
        const offs = this.take(8);
        return vec2.fromValues(this.view.getFloat32(offs + 0x00, true), this.view.getFloat32(offs + 0x04, true));
    }

    public readVec3(): vec3 {
        const offs = this.take(12);
        return vec3.fromValues(
            this.view.getFloat32(offs + 0x00, true),
            this.view.getFloat32(offs + 0x04, true),
            this.view.getFloat32(offs + 0x08, true),
        );
    }

    public readVec4(): vec4 {
        const offs = this.take(16);
        return vec4.fromValues(
            this.view.getFloat32(offs + 0x00, true),
            this.view.getFloat32(offs + 0x04, true),
            this.view.getFloat32(offs + 0x08, true),
            this.view.getFloat32(offs + 0x0C, true),
        );
    }

    /**
     * Read a signed index of the given width. -1 is the format's "no reference".
     */
    public readIndex(width: IndexWidth): number {
        if (width === 1)
            return this.readInt8();
        else if (width === 2)
            return this.readInt16();
        else
            return this.readInt32();
    }

    /**
     * Vertex indices are unsigned at widths 1 and 2, and signed at width 4.
     */
    public readVertexIndex(width: IndexWidth): number {
        if (width === 1)
            return this.readUint8();
        else if (width === 2)
            return this.readUint16();
        else
            return this.readInt32();
    }

    public readText(): string {
        const byteLength = this.readInt32();
        if (byteLength < 0)
            throw new CorruptSectionError(this.section, `negative text length ${byteLength} at offset ${this.offset - 4}`);
        const offs = this.take(byteLength);
        return decodeString(this.buffer, offs, byteLength, this.encoding === TextEncoding.UTF16LE ? 'utf-16le' : 'utf-8');
    }

    /**
     * Copy the next n bytes out of the stream.
     */
    public readBytes(n: number): Uint8Array {
        const offs = this.take(n);
        return new Uint8Array(this.buffer.copyToBuffer(offs, n));
    }
}
