
import { describe, expect, it } from "vitest";
import { CorruptSectionError, TruncatedInputError } from "./Errors.js";
import { Stream, TextEncoding } from "./Stream.js";
import { ByteWriter, catchError } from "../../test/PMXFixture.js";

function streamOf(build: (w: ByteWriter) => void): Stream {
    const w = new ByteWriter();
    build(w);
    return new Stream(w.finish());
}

describe("Stream", () => {
    it("reads little-endian primitives in order", () => {
        const stream = streamOf((w) => w.u8(0xFE).i8(-2).u16(0xBEEF).i16(-300).u32(0xDEADBEEF).i32(-5).f32(1.5));
        expect(stream.readUint8()).toBe(0xFE);
        expect(stream.readInt8()).toBe(-2);
        expect(stream.readUint16()).toBe(0xBEEF);
        expect(stream.readInt16()).toBe(-300);
        expect(stream.readUint32()).toBe(0xDEADBEEF);
        expect(stream.readInt32()).toBe(-5);
        expect(stream.readFloat32()).toBe(1.5);
        expect(stream.tell()).toBe(18);
        expect(stream.remaining()).toBe(0);
    });

    it("reads vectors as float32 components", () => {
        const stream = streamOf((w) => w.vec([1, 2]).vec([3, 4, 5]).vec([6, 7, 8, 9]));
        expect(Array.from(stream.readVec2())).toEqual([1, 2]);
        expect(Array.from(stream.readVec3())).toEqual([3, 4, 5]);
        expect(Array.from(stream.readVec4())).toEqual([6, 7, 8, 9]);
    });

    it("throws TruncatedInputError without advancing on a short read", () => {
        const stream = streamOf((w) => w.u16(1));
        const error = catchError(() => stream.readUint32());
        expect(error).toBeInstanceOf(TruncatedInputError);
        expect(error).toMatchObject({ kind: "TruncatedInput", offset: 0, needed: 4, available: 2 });
        expect(error).toHaveProperty("message", "Unexpected end of input at 0x00000000: needed 4 bytes, 2 left");
        expect(stream.tell()).toBe(0);
        expect(stream.readUint16()).toBe(1);
    });

    it("reads signed indices at every width", () => {
        const stream = streamOf((w) => w.i8(-1).i16(-1).i32(-1).i8(127).i16(300));
        expect(stream.readIndex(1)).toBe(-1);
        expect(stream.readIndex(2)).toBe(-1);
        expect(stream.readIndex(4)).toBe(-1);
        expect(stream.readIndex(1)).toBe(127);
        expect(stream.readIndex(2)).toBe(300);
    });

    it("reads vertex indices unsigned at widths 1 and 2", () => {
        const stream = streamOf((w) => w.u8(0xFF).u16(0xFFFF).i32(70000));
        expect(stream.readVertexIndex(1)).toBe(255);
        expect(stream.readVertexIndex(2)).toBe(65535);
        expect(stream.readVertexIndex(4)).toBe(70000);
    });

    it("decodes UTF-16LE text by default", () => {
        const stream = streamOf((w) => w.text("初音ミク", 0).text("", 0));
        expect(stream.readText()).toBe("初音ミク");
        expect(stream.readText()).toBe("");
        expect(stream.remaining()).toBe(0);
    });

    it("decodes UTF-8 text when the encoding is switched", () => {
        const stream = streamOf((w) => w.text("héllo wörld", 1));
        stream.encoding = TextEncoding.UTF8;
        expect(stream.readText()).toBe("héllo wörld");
    });

    it("reports a negative text length against the current section", () => {
        const stream = streamOf((w) => w.i32(-4));
        stream.section = "materials";
        expect(() => stream.readText()).toThrow(CorruptSectionError);
        const again = streamOf((w) => w.i32(-4));
        again.section = "materials";
        expect(() => again.readText()).toThrow("Corrupt materials section: negative text length -4 at offset 0");
    });

    it("reports text running past the end as truncation", () => {
        const stream = streamOf((w) => w.i32(10).u16(0x41));
        const error = catchError(() => stream.readText());
        expect(error).toBeInstanceOf(TruncatedInputError);
        expect(error).toMatchObject({ offset: 4, needed: 10, available: 2 });
    });

    it("copies bytes out of the buffer", () => {
        const w = new ByteWriter().u8(1).u8(2).u8(3);
        const buffer = w.finish();
        const stream = new Stream(buffer);
        const bytes = stream.readBytes(3);
        bytes[0] = 99;
        expect(Array.from(bytes)).toEqual([99, 2, 3]);
        expect(new Stream(buffer).readUint8()).toBe(1);
    });

    it("peeks at the magic without consuming it", () => {
        const stream = streamOf((w) => w.raw([0x50, 0x4D, 0x58, 0x20]));
        expect(stream.peekMagic(4)).toBe("PMX ");
        expect(stream.tell()).toBe(0);
        expect(() => stream.peekMagic(5)).toThrow(TruncatedInputError);
    });

    it("skips forward and refuses to skip past the end", () => {
        const stream = streamOf((w) => w.u32(0).u8(7));
        stream.skip(4);
        expect(stream.readUint8()).toBe(7);
        expect(() => stream.skip(1)).toThrow(TruncatedInputError);
    });
});
