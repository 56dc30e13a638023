
// Polygon Model eXtended (PMX), the model format of MikuMikuDance and PMX Editor.
// https://gist.github.com/felixjones/f8a06bd48f9da9a4539f

import type { ReadonlyVec2, ReadonlyVec3, ReadonlyVec4 } from "gl-matrix";
import ArrayBufferSlice from "../ArrayBufferSlice.js";
import { fallbackUndefined, nArray, readMagic } from "../util.js";
import { CorruptSectionError, DanglingIndexError, type DecodeError, InvalidHeaderError, InvalidWeightTypeError, isDecodeError, type SectionName, UnsupportedVersionError } from "./Errors.js";
import { type IndexWidth, Stream, TextEncoding } from "./Stream.js";

const MAGIC = "PMX ";
const SUPPORTED_VERSIONS = [Math.fround(2.0), Math.fround(2.1)];

// Ceiling on any element count.
export const DEFAULT_MAX_SECTION_COUNT = 0x1000000;

//#region Document
export interface PMXHeader {
    readonly version: number;
    readonly encoding: TextEncoding;
    readonly additionalVec4Count: number;
    readonly vertexIndexSize: IndexWidth;
    readonly textureIndexSize: IndexWidth;
    readonly materialIndexSize: IndexWidth;
    readonly boneIndexSize: IndexWidth;
    readonly morphIndexSize: IndexWidth;
    readonly rigidBodyIndexSize: IndexWidth;
    readonly vertexCount: number;
}

export interface PMXModelInfo {
    readonly name: string;
    readonly nameEnglish: string;
    readonly comment: string;
    readonly commentEnglish: string;
}

// Bone indices inside a binding are kept raw; -1 shows up in unused slots of real files.
export type SkinBinding =
    | { readonly kind: "single"; readonly bone: number; }
    | { readonly kind: "dual"; readonly boneA: number; readonly boneB: number; readonly weightA: number; }
    | { readonly kind: "quad"; readonly bones: Quad; readonly weights: Quad; }
    | { readonly kind: "sphericalDual"; readonly boneA: number; readonly boneB: number; readonly weightA: number; readonly center: ReadonlyVec3; readonly r0: ReadonlyVec3; readonly r1: ReadonlyVec3; }
    | { readonly kind: "dualQuaternion"; readonly bones: Quad; readonly weights: Quad; };

export type Quad = readonly [number, number, number, number];

export const enum WeightType {
    BDEF1 = 0,
    BDEF2 = 1,
    BDEF4 = 2,
    SDEF  = 3,
    QDEF  = 4,
}

export interface PMXVertex {
    readonly position: ReadonlyVec3;
    readonly normal: ReadonlyVec3;
    readonly uv: ReadonlyVec2;
    readonly additionalVec4: ReadonlyArray<ReadonlyVec4>;
    readonly skin: SkinBinding;
    readonly edgeScale: number;
}

export type Face = readonly [number, number, number];

export const enum MaterialFlags {
    DoubleSided   = 0x01,
    GroundShadow  = 0x02,
    SelfShadowMap = 0x04,
    SelfShadow    = 0x08,
    Edge          = 0x10,
    VertexColor   = 0x20,
    PointDraw     = 0x40,
    LineDraw      = 0x80,
}

export const enum SphereMode {
    None       = 0,
    Multiply   = 1,
    Add        = 2,
    SubTexture = 3,
}

// Toon ramps are either one of the ten built-in toon01..toon10 images, or a texture of the model.
export type ToonRef =
    | { readonly kind: "shared"; readonly index: number; }
    | { readonly kind: "texture"; readonly textureIndex: number | null; };

export interface PMXMaterial {
    readonly name: string;
    readonly nameEnglish: string;
    readonly diffuse: ReadonlyVec4;
    readonly specular: ReadonlyVec3;
    readonly shininess: number;
    readonly ambient: ReadonlyVec3;
    readonly flags: number;
    readonly edgeColor: ReadonlyVec4;
    readonly edgeSize: number;
    readonly textureIndex: number | null;
    readonly sphereTextureIndex: number | null;
    readonly sphereMode: SphereMode;
    readonly toon: ToonRef;
    readonly comment: string;
    readonly faceVertexCount: number;
}

export const enum BoneFlags {
    TailIsBone         = 0x0001,
    Rotatable          = 0x0002,
    Movable            = 0x0004,
    Visible            = 0x0008,
    Enabled            = 0x0010,
    IK                 = 0x0020,
    InheritLocal       = 0x0080,
    InheritRotation    = 0x0100,
    InheritTranslation = 0x0200,
    FixedAxis          = 0x0400,
    LocalAxis          = 0x0800,
    PhysicsAfterDeform = 0x1000,
    ExternalParent     = 0x2000,
}

export type TailRef =
    | { readonly kind: "offset"; readonly offset: ReadonlyVec3; }
    | { readonly kind: "bone"; readonly bone: number | null; };

export interface IKLink {
    readonly bone: number;
    readonly angleLimit: { readonly min: ReadonlyVec3; readonly max: ReadonlyVec3; } | null;
}

export interface IKSolver {
    readonly target: number | null;
    readonly loopCount: number;
    // Maximum rotation per iteration, in radians.
    readonly limitAngle: number;
    readonly links: ReadonlyArray<IKLink>;
}

// PMX Editor calls this "append": the bone copies a ratio of another bone's rotation and/or translation.
export interface InheritTransform {
    readonly parent: number | null;
    readonly ratio: number;
    readonly rotation: boolean;
    readonly translation: boolean;
    readonly local: boolean;
}

export interface PMXBone {
    readonly name: string;
    readonly nameEnglish: string;
    readonly position: ReadonlyVec3;
    readonly parent: number | null;
    readonly layer: number;
    readonly flags: number;
    readonly tail: TailRef;
    readonly inherit: InheritTransform | null;
    readonly fixedAxis: ReadonlyVec3 | null;
    readonly localAxis: { readonly x: ReadonlyVec3; readonly z: ReadonlyVec3; } | null;
    readonly externalParentKey: number | null;
    readonly ik: IKSolver | null;
}

export const enum MorphPanel {
    System  = 0,
    Eyebrow = 1,
    Eye     = 2,
    Mouth   = 3,
    Other   = 4,
}

export const enum MorphKind {
    Group    = 0,
    Vertex   = 1,
    Bone     = 2,
    UV       = 3,
    UV1      = 4,
    UV2      = 5,
    UV3      = 6,
    UV4      = 7,
    Material = 8,
    Flip     = 9,
    Impulse  = 10,
}

export interface VertexMorphOffset {
    readonly vertex: number;
    readonly offset: ReadonlyVec3;
}

export const enum MaterialMorphOperation {
    Multiply = 0,
    Add      = 1,
}

export interface MaterialMorphOffset {
    // null targets every material.
    readonly material: number | null;
    readonly operation: MaterialMorphOperation;
    readonly diffuse: ReadonlyVec4;
    readonly specular: ReadonlyVec3;
    readonly shininess: number;
    readonly ambient: ReadonlyVec3;
    readonly edgeColor: ReadonlyVec4;
    readonly edgeSize: number;
    readonly textureTint: ReadonlyVec4;
    readonly sphereTint: ReadonlyVec4;
    readonly toonTint: ReadonlyVec4;
}

interface MorphBase {
    readonly name: string;
    readonly nameEnglish: string;
    readonly panel: MorphPanel;
}

export interface VertexMorph extends MorphBase {
    readonly kind: "vertex";
    readonly offsets: ReadonlyArray<VertexMorphOffset>;
}

export interface MaterialMorph extends MorphBase {
    readonly kind: "material";
    readonly offsets: ReadonlyArray<MaterialMorphOffset>;
}

// Group, bone, UV, flip and impulse morphs keep their raw offset records.
export interface UnhandledMorph extends MorphBase {
    readonly kind: "unhandled";
    readonly kindId: MorphKind;
    readonly offsetCount: number;
    readonly data: Uint8Array;
}

export type PMXMorph = VertexMorph | MaterialMorph | UnhandledMorph;

export type DisplayFrameElement =
    | { readonly target: "bone"; readonly index: number; }
    | { readonly target: "morph"; readonly index: number; };

export interface PMXDisplayFrame {
    readonly name: string;
    readonly nameEnglish: string;
    readonly special: boolean;
    readonly elements: ReadonlyArray<DisplayFrameElement>;
}

export const enum RigidBodyShape {
    Sphere  = 0,
    Box     = 1,
    Capsule = 2,
}

export const enum RigidBodyMode {
    FollowBone     = 0,
    Physics        = 1,
    PhysicsAndBone = 2,
}

export interface PMXRigidBody {
    readonly name: string;
    readonly nameEnglish: string;
    readonly bone: number | null;
    readonly group: number;
    readonly nonCollisionMask: number;
    // Kept as read; values outside RigidBodyShape are possible in damaged files.
    readonly shape: number;
    readonly size: ReadonlyVec3;
    readonly position: ReadonlyVec3;
    // Euler angles, radians.
    readonly rotation: ReadonlyVec3;
    readonly mass: number;
    readonly linearDamping: number;
    readonly angularDamping: number;
    readonly restitution: number;
    readonly friction: number;
    readonly mode: RigidBodyMode;
}

export interface PMXJoint {
    readonly name: string;
    readonly nameEnglish: string;
    // 0 is the 6DOF spring used by every 2.0 file.
    readonly type: number;
    readonly rigidBodyA: number | null;
    readonly rigidBodyB: number | null;
    readonly position: ReadonlyVec3;
    readonly rotation: ReadonlyVec3;
    readonly linearLowerLimit: ReadonlyVec3;
    readonly linearUpperLimit: ReadonlyVec3;
    readonly angularLowerLimit: ReadonlyVec3;
    readonly angularUpperLimit: ReadonlyVec3;
    readonly springLinear: ReadonlyVec3;
    readonly springAngular: ReadonlyVec3;
}

export interface PMXDocument {
    readonly header: PMXHeader;
    readonly info: PMXModelInfo;
    readonly vertices: ReadonlyArray<PMXVertex>;
    readonly faces: ReadonlyArray<Face>;
    readonly textures: ReadonlyArray<string>;
    readonly materials: ReadonlyArray<PMXMaterial>;
    readonly bones: ReadonlyArray<PMXBone>;
    readonly morphs: ReadonlyArray<PMXMorph>;
    readonly displayFrames: ReadonlyArray<PMXDisplayFrame>;
    readonly rigidBodies: ReadonlyArray<PMXRigidBody>;
    readonly joints: ReadonlyArray<PMXJoint>;
}
//#endregion

//#region Decoder
export interface DecodeOptions {
    maxSectionCount?: number;
}

interface IndexSizes {
    vertex: IndexWidth;
    texture: IndexWidth;
    material: IndexWidth;
    bone: IndexWidth;
    morph: IndexWidth;
    rigidBody: IndexWidth;
}

interface DecodeContext {
    stream: Stream;
    sizes: IndexSizes;
    additionalVec4Count: number;
    maxSectionCount: number;
}

function optionalIndex(index: number): number | null {
    return index === -1 ? null : index;
}

function readIndexWidth(stream: Stream, what: string): IndexWidth {
    const width = stream.readUint8();
    if (width !== 1 && width !== 2 && width !== 4)
        throw new InvalidHeaderError(`${what} index size ${width} is not 1, 2 or 4`);
    return width;
}

function readCount(ctx: DecodeContext, section: SectionName): number {
    const stream = ctx.stream;
    stream.section = section;
    const count = stream.readInt32();
    if (count < 0)
        throw new CorruptSectionError(section, `negative count ${count}`);
    if (count > ctx.maxSectionCount)
        throw new CorruptSectionError(section, `count ${count} exceeds limit ${ctx.maxSectionCount}`);
    return count;
}

function readQuad(read: () => number): Quad {
    const a = read(), b = read(), c = read(), d = read();
    return [a, b, c, d];
}

function parseSkinBinding(ctx: DecodeContext, vertexIndex: number): SkinBinding {
    const stream = ctx.stream, boneSize = ctx.sizes.bone;
    const tag = stream.readUint8();
    switch (tag) {
    case WeightType.BDEF1: {
        return { kind: "single", bone: stream.readIndex(boneSize) };
    }
    case WeightType.BDEF2: {
        const boneA = stream.readIndex(boneSize), boneB = stream.readIndex(boneSize);
        const weightA = stream.readFloat32();
        return { kind: "dual", boneA, boneB, weightA };
    }
    case WeightType.BDEF4:
    case WeightType.QDEF: {
        const bones = readQuad(() => stream.readIndex(boneSize));
        const weights = readQuad(() => stream.readFloat32());
        return tag === WeightType.BDEF4 ? { kind: "quad", bones, weights } : { kind: "dualQuaternion", bones, weights };
    }
    case WeightType.SDEF: {
        const boneA = stream.readIndex(boneSize), boneB = stream.readIndex(boneSize);
        const weightA = stream.readFloat32();
        const center = stream.readVec3(), r0 = stream.readVec3(), r1 = stream.readVec3();
        return { kind: "sphericalDual", boneA, boneB, weightA, center, r0, r1 };
    }
    default:
        throw new InvalidWeightTypeError(tag, vertexIndex);
    }
}

function parseVertex(ctx: DecodeContext, index: number): PMXVertex {
    const stream = ctx.stream;
    const position = stream.readVec3();
    const normal = stream.readVec3();
    const uv = stream.readVec2();
    const additionalVec4 = nArray(ctx.additionalVec4Count, () => stream.readVec4());
    const skin = parseSkinBinding(ctx, index);
    const edgeScale = stream.readFloat32();
    return { position, normal, uv, additionalVec4, skin, edgeScale };
}

function parseFaces(ctx: DecodeContext, vertexCount: number): Face[] {
    const stream = ctx.stream;
    const indexCount = readCount(ctx, "faces");
    if (indexCount % 3 !== 0)
        throw new CorruptSectionError("faces", `index count ${indexCount} is not a multiple of 3`);

    const readVertex = (face: number): number => {
        const index = stream.readVertexIndex(ctx.sizes.vertex);
        if (index < 0 || index >= vertexCount)
            throw new DanglingIndexError("faces", "vertex", index, face);
        return index;
    };

    const faces: Face[] = [];
    for (let i = 0; i < indexCount / 3; i++) {
        const a = readVertex(i), b = readVertex(i), c = readVertex(i);
        faces.push([a, b, c]);
    }
    return faces;
}

function parseMaterial(ctx: DecodeContext): PMXMaterial {
    const stream = ctx.stream, textureSize = ctx.sizes.texture;
    const name = stream.readText();
    const nameEnglish = stream.readText();
    const diffuse = stream.readVec4();
    const specular = stream.readVec3();
    const shininess = stream.readFloat32();
    const ambient = stream.readVec3();
    const flags = stream.readUint8();
    const edgeColor = stream.readVec4();
    const edgeSize = stream.readFloat32();
    const textureIndex = optionalIndex(stream.readIndex(textureSize));
    const sphereTextureIndex = optionalIndex(stream.readIndex(textureSize));
    const sphereMode: SphereMode = stream.readUint8();
    const sharedToon = stream.readUint8() !== 0;
    const toon: ToonRef = sharedToon
        ? { kind: "shared", index: stream.readUint8() }
        : { kind: "texture", textureIndex: optionalIndex(stream.readIndex(textureSize)) };
    const comment = stream.readText();
    const faceVertexCount = stream.readInt32();
    return {
        name, nameEnglish, diffuse, specular, shininess, ambient, flags, edgeColor, edgeSize,
        textureIndex, sphereTextureIndex, sphereMode, toon, comment, faceVertexCount,
    };
}

function parseIKSolver(ctx: DecodeContext): IKSolver {
    const stream = ctx.stream, boneSize = ctx.sizes.bone;
    const target = optionalIndex(stream.readIndex(boneSize));
    const loopCount = stream.readInt32();
    const limitAngle = stream.readFloat32();
    const linkCount = readCount(ctx, "bones");
    const links = nArray(linkCount, (): IKLink => {
        const bone = stream.readIndex(boneSize);
        const hasLimit = stream.readUint8() !== 0;
        if (hasLimit) {
            const min = stream.readVec3(), max = stream.readVec3();
            return { bone, angleLimit: { min, max } };
        } else {
            return { bone, angleLimit: null };
        }
    });
    return { target, loopCount, limitAngle, links };
}

function parseBone(ctx: DecodeContext): PMXBone {
    const stream = ctx.stream, boneSize = ctx.sizes.bone;
    const name = stream.readText();
    const nameEnglish = stream.readText();
    const position = stream.readVec3();
    const parent = optionalIndex(stream.readIndex(boneSize));
    const layer = stream.readInt32();
    const flags = stream.readUint16();

    const tail: TailRef = (flags & BoneFlags.TailIsBone)
        ? { kind: "bone", bone: optionalIndex(stream.readIndex(boneSize)) }
        : { kind: "offset", offset: stream.readVec3() };

    let inherit: InheritTransform | null = null;
    if (flags & (BoneFlags.InheritRotation | BoneFlags.InheritTranslation)) {
        const inheritParent = optionalIndex(stream.readIndex(boneSize));
        const ratio = stream.readFloat32();
        inherit = {
            parent: inheritParent, ratio,
            rotation: !!(flags & BoneFlags.InheritRotation),
            translation: !!(flags & BoneFlags.InheritTranslation),
            local: !!(flags & BoneFlags.InheritLocal),
        };
    }

    const fixedAxis = (flags & BoneFlags.FixedAxis) ? stream.readVec3() : null;

    let localAxis: PMXBone["localAxis"] = null;
    if (flags & BoneFlags.LocalAxis) {
        const x = stream.readVec3(), z = stream.readVec3();
        localAxis = { x, z };
    }

    const externalParentKey = (flags & BoneFlags.ExternalParent) ? stream.readInt32() : null;
    const ik = (flags & BoneFlags.IK) ? parseIKSolver(ctx) : null;

    return { name, nameEnglish, position, parent, layer, flags, tail, inherit, fixedAxis, localAxis, externalParentKey, ik };
}

// Byte size of one offset record for the morph kinds kept raw.
function unhandledMorphOffsetSize(sizes: IndexSizes, kindId: number): number | null {
    switch (kindId) {
    case MorphKind.Group:
    case MorphKind.Flip:
        return sizes.morph + 0x04;
    case MorphKind.Bone:
        return sizes.bone + 0x0C + 0x10;
    case MorphKind.UV:
    case MorphKind.UV1:
    case MorphKind.UV2:
    case MorphKind.UV3:
    case MorphKind.UV4:
        return sizes.vertex + 0x10;
    case MorphKind.Impulse:
        return sizes.rigidBody + 0x01 + 0x0C + 0x0C;
    default:
        return null;
    }
}

function parseMaterialMorphOffset(ctx: DecodeContext): MaterialMorphOffset {
    const stream = ctx.stream;
    const material = optionalIndex(stream.readIndex(ctx.sizes.material));
    const operation: MaterialMorphOperation = stream.readUint8();
    const diffuse = stream.readVec4();
    const specular = stream.readVec3();
    const shininess = stream.readFloat32();
    const ambient = stream.readVec3();
    const edgeColor = stream.readVec4();
    const edgeSize = stream.readFloat32();
    const textureTint = stream.readVec4();
    const sphereTint = stream.readVec4();
    const toonTint = stream.readVec4();
    return { material, operation, diffuse, specular, shininess, ambient, edgeColor, edgeSize, textureTint, sphereTint, toonTint };
}

function parseMorph(ctx: DecodeContext): PMXMorph {
    const stream = ctx.stream;
    const name = stream.readText();
    const nameEnglish = stream.readText();
    const panel: MorphPanel = stream.readUint8();
    const kindId: MorphKind = stream.readUint8();
    const offsetCount = readCount(ctx, "morphs");

    if (kindId === MorphKind.Vertex) {
        const offsets = nArray(offsetCount, (): VertexMorphOffset => {
            const vertex = stream.readVertexIndex(ctx.sizes.vertex);
            const offset = stream.readVec3();
            return { vertex, offset };
        });
        return { kind: "vertex", name, nameEnglish, panel, offsets };
    } else if (kindId === MorphKind.Material) {
        const offsets = nArray(offsetCount, () => parseMaterialMorphOffset(ctx));
        return { kind: "material", name, nameEnglish, panel, offsets };
    }

    const recordSize = unhandledMorphOffsetSize(ctx.sizes, kindId);
    if (recordSize === null)
        throw new CorruptSectionError("morphs", `unknown morph kind ${kindId} on morph "${name}"`);
    const data = stream.readBytes(offsetCount * recordSize);
    return { kind: "unhandled", name, nameEnglish, panel, kindId, offsetCount, data };
}

function parseDisplayFrame(ctx: DecodeContext): PMXDisplayFrame {
    const stream = ctx.stream;
    const name = stream.readText();
    const nameEnglish = stream.readText();
    const special = stream.readUint8() !== 0;
    const elementCount = readCount(ctx, "displayFrames");
    const elements = nArray(elementCount, (): DisplayFrameElement => {
        const type = stream.readUint8();
        if (type === 0)
            return { target: "bone", index: stream.readIndex(ctx.sizes.bone) };
        else if (type === 1)
            return { target: "morph", index: stream.readIndex(ctx.sizes.morph) };
        else
            throw new CorruptSectionError("displayFrames", `unknown element type ${type} in frame "${name}"`);
    });
    return { name, nameEnglish, special, elements };
}

function parseRigidBody(ctx: DecodeContext): PMXRigidBody {
    const stream = ctx.stream;
    const name = stream.readText();
    const nameEnglish = stream.readText();
    const bone = optionalIndex(stream.readIndex(ctx.sizes.bone));
    const group = stream.readUint8();
    const nonCollisionMask = stream.readUint16();
    const shape = stream.readUint8();
    const size = stream.readVec3();
    const position = stream.readVec3();
    const rotation = stream.readVec3();
    const mass = stream.readFloat32();
    const linearDamping = stream.readFloat32();
    const angularDamping = stream.readFloat32();
    const restitution = stream.readFloat32();
    const friction = stream.readFloat32();
    const mode: RigidBodyMode = stream.readUint8();
    return {
        name, nameEnglish, bone, group, nonCollisionMask, shape, size, position, rotation,
        mass, linearDamping, angularDamping, restitution, friction, mode,
    };
}

function parseJoint(ctx: DecodeContext): PMXJoint {
    const stream = ctx.stream, rigidBodySize = ctx.sizes.rigidBody;
    const name = stream.readText();
    const nameEnglish = stream.readText();
    const type = stream.readUint8();
    const rigidBodyA = optionalIndex(stream.readIndex(rigidBodySize));
    const rigidBodyB = optionalIndex(stream.readIndex(rigidBodySize));
    const position = stream.readVec3();
    const rotation = stream.readVec3();
    const linearLowerLimit = stream.readVec3();
    const linearUpperLimit = stream.readVec3();
    const angularLowerLimit = stream.readVec3();
    const angularUpperLimit = stream.readVec3();
    const springLinear = stream.readVec3();
    const springAngular = stream.readVec3();
    return {
        name, nameEnglish, type, rigidBodyA, rigidBodyB, position, rotation,
        linearLowerLimit, linearUpperLimit, angularLowerLimit, angularUpperLimit, springLinear, springAngular,
    };
}

function readSection<T>(ctx: DecodeContext, section: SectionName, parse: (i: number) => T): T[] {
    const count = readCount(ctx, section);
    const items: T[] = [];
    for (let i = 0; i < count; i++)
        items.push(parse(i));
    return items;
}

export function detectFormat(buffer: ArrayBufferSlice): "pmx" | null {
    if (buffer.byteLength >= MAGIC.length && readMagic(buffer, 0, MAGIC.length) === MAGIC)
        return "pmx";
    return null;
}

/**
 * Decode a PMX file. Pure: the only output is the returned document or the thrown error.
 *
 * @throws {DecodeError}
 */
export function decode(buffer: ArrayBufferSlice, options: DecodeOptions = {}): PMXDocument {
    const stream = new Stream(buffer);

    const magic = stream.peekMagic(MAGIC.length);
    if (magic !== MAGIC)
        throw new InvalidHeaderError(`bad magic ${JSON.stringify(magic)}`);
    stream.skip(MAGIC.length);

    const version = stream.readFloat32();
    if (!SUPPORTED_VERSIONS.includes(version))
        throw new UnsupportedVersionError(version);

    const headerSize = stream.readUint8();
    if (headerSize < 8)
        throw new InvalidHeaderError(`header size ${headerSize} is smaller than 8`);

    // Any flag other than 0 means UTF-8.
    const encoding = stream.readUint8() === 0 ? TextEncoding.UTF16LE : TextEncoding.UTF8;
    stream.encoding = encoding;

    const additionalVec4Count = stream.readUint8();
    if (additionalVec4Count > 4)
        throw new InvalidHeaderError(`additional vec4 count ${additionalVec4Count} is larger than 4`);

    const sizes: IndexSizes = {
        vertex: readIndexWidth(stream, "vertex"),
        texture: readIndexWidth(stream, "texture"),
        material: readIndexWidth(stream, "material"),
        bone: readIndexWidth(stream, "bone"),
        morph: readIndexWidth(stream, "morph"),
        rigidBody: readIndexWidth(stream, "rigid body"),
    };

    // Later revisions may append globals; skip what we don't know.
    stream.skip(headerSize - 8);

    const ctx: DecodeContext = {
        stream, sizes, additionalVec4Count,
        maxSectionCount: fallbackUndefined(options.maxSectionCount, DEFAULT_MAX_SECTION_COUNT),
    };

    stream.section = "info";
    const info: PMXModelInfo = {
        name: stream.readText(),
        nameEnglish: stream.readText(),
        comment: stream.readText(),
        commentEnglish: stream.readText(),
    };

    const vertices = readSection(ctx, "vertices", (i) => parseVertex(ctx, i));
    const faces = parseFaces(ctx, vertices.length);
    const textures = readSection(ctx, "textures", () => stream.readText());
    const materials = readSection(ctx, "materials", () => parseMaterial(ctx));
    const bones = readSection(ctx, "bones", () => parseBone(ctx));
    const morphs = readSection(ctx, "morphs", () => parseMorph(ctx));
    const displayFrames = readSection(ctx, "displayFrames", () => parseDisplayFrame(ctx));
    const rigidBodies = readSection(ctx, "rigidBodies", () => parseRigidBody(ctx));
    const joints = readSection(ctx, "joints", () => parseJoint(ctx));

    // PMX 2.1 soft bodies may follow; they are not read.

    const header: PMXHeader = {
        version,
        encoding,
        additionalVec4Count,
        vertexIndexSize: sizes.vertex,
        textureIndexSize: sizes.texture,
        materialIndexSize: sizes.material,
        boneIndexSize: sizes.bone,
        morphIndexSize: sizes.morph,
        rigidBodyIndexSize: sizes.rigidBody,
        vertexCount: vertices.length,
    };

    return { header, info, vertices, faces, textures, materials, bones, morphs, displayFrames, rigidBodies, joints };
}

export type DecodeResult =
    | { readonly ok: true; readonly document: PMXDocument; }
    | { readonly ok: false; readonly error: DecodeError; };

export function tryDecode(buffer: ArrayBufferSlice, options: DecodeOptions = {}): DecodeResult {
    try {
        return { ok: true, document: decode(buffer, options) };
    } catch (e) {
        if (isDecodeError(e))
            return { ok: false, error: e };
        throw e;
    }
}
//#endregion
