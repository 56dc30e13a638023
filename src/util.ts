
import ArrayBufferSlice from "./ArrayBufferSlice.js";

export function assert(b: boolean, message: string = ""): asserts b {
    if (!b)
        throw new Error(`Assert fail: ${message}`);
}

export function unreachable(v: never): never {
    throw new Error(`Unreachable: ${JSON.stringify(v)}`);
}

export function decodeString(buffer: ArrayBufferSlice, offs: number, byteLength: number, encoding: string = 'utf-8'): string {
    if (byteLength === 0)
        return "";
    return new TextDecoder(encoding).decode(buffer.createTypedArray(Uint8Array, offs, byteLength));
}

export function readMagic(buffer: ArrayBufferSlice, offs: number, length: number): string {
    const buf = buffer.createTypedArray(Uint8Array, offs, length);
    let S = '';
    for (let i = 0; i < length; i++)
        S += String.fromCharCode(buf[i]);
    return S;
}

export function nArray<T>(n: number, c: (i: number) => T): T[] {
    const d: T[] = new Array(n);
    for (let i = 0; i < n; i++)
        d[i] = c(i);
    return d;
}

export function leftPad(S: string, spaces: number, ch: string = '0'): string {
    return S.padStart(spaces, ch);
}

export function hexzero(n: number, spaces: number): string {
    const S = (n >>> 0).toString(16);
    return leftPad(S, spaces);
}

export function hexzero0x(n: number, spaces: number = 8): string {
    if (n < 0)
        return `-0x${hexzero(-n, spaces)}`;
    else
        return `0x${hexzero(n, spaces)}`;
}

export function fallbackUndefined<T>(v: T | null | undefined, fallback: T): T {
    return (v !== null && v !== undefined) ? v : fallback;
}
