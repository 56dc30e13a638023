
import { hexzero0x } from "../util.js";

// Everything that can make an import fail. Each error carries a literal `kind`, so
// ImportError can be narrowed with a switch.

export type SectionName =
    | "header"
    | "info"
    | "vertices"
    | "faces"
    | "textures"
    | "materials"
    | "bones"
    | "morphs"
    | "displayFrames"
    | "rigidBodies"
    | "joints"
    | "finalize";

export abstract class PMXError extends Error {
    public abstract readonly kind: string;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class TruncatedInputError extends PMXError {
    public readonly kind = "TruncatedInput";

    constructor(public readonly offset: number, public readonly needed: number, public readonly available: number) {
        super(`Unexpected end of input at ${hexzero0x(offset)}: needed ${needed} bytes, ${available} left`);
    }
}

export class InvalidHeaderError extends PMXError {
    public readonly kind = "InvalidHeader";

    constructor(public readonly reason: string) {
        super(`Invalid header: ${reason}`);
    }
}

export class UnsupportedVersionError extends PMXError {
    public readonly kind = "UnsupportedVersion";

    constructor(public readonly version: number) {
        super(`Unsupported PMX version ${version}`);
    }
}

export class CorruptSectionError extends PMXError {
    public readonly kind = "CorruptSection";

    constructor(public readonly section: SectionName, public readonly reason: string) {
        super(`Corrupt ${section} section: ${reason}`);
    }
}

export class InvalidWeightTypeError extends PMXError {
    public readonly kind = "InvalidWeightType";

    constructor(public readonly tag: number, public readonly vertex: number) {
        super(`Invalid weight type ${tag} on vertex ${vertex}`);
    }
}

export class MaterialFaceCountMismatchError extends PMXError {
    public readonly kind = "MaterialFaceCountMismatch";

    constructor(public readonly expected: number, public readonly actual: number, detail: string = "") {
        super(`Materials cover ${actual} triangles but the mesh has ${expected}${detail !== "" ? ` (${detail})` : ""}`);
    }
}

export type IndexTarget = "vertex" | "bone" | "material" | "rigidBody";

export class DanglingIndexError extends PMXError {
    public readonly kind = "DanglingIndex";

    constructor(
        public readonly section: SectionName,
        public readonly target: IndexTarget,
        public readonly index: number,
        // Position of the record holding the reference.
        public readonly owner: number,
    ) {
        super(`${section}[${owner}] references ${target} ${index}, which does not exist`);
    }
}

export class CyclicBoneHierarchyError extends PMXError {
    public readonly kind = "CyclicBoneHierarchy";

    constructor(public readonly bone: number, public readonly boneName: string) {
        super(`Bone ${bone} (${boneName}) is its own ancestor`);
    }
}

export class HostRejectedError extends PMXError {
    public readonly kind = "HostRejected";

    constructor(public readonly op: string, public readonly section: SectionName, cause: unknown) {
        super(`Host rejected ${op} while building ${section}: ${describeCause(cause)}`, { cause });
    }
}

export class FileUnreadableError extends PMXError {
    public readonly kind = "FileUnreadable";

    constructor(public readonly path: string, cause: unknown) {
        super(`Could not read ${path}: ${describeCause(cause)}`, { cause });
    }
}

export type DecodeError =
    | TruncatedInputError
    | InvalidHeaderError
    | UnsupportedVersionError
    | CorruptSectionError
    | InvalidWeightTypeError
    | DanglingIndexError;

export type BuildError =
    | MaterialFaceCountMismatchError
    | DanglingIndexError
    | CyclicBoneHierarchyError
    | HostRejectedError;

export type ImportError = DecodeError | BuildError | FileUnreadableError;

export function isDecodeError(e: unknown): e is DecodeError {
    return e instanceof TruncatedInputError
        || e instanceof InvalidHeaderError
        || e instanceof UnsupportedVersionError
        || e instanceof CorruptSectionError
        || e instanceof InvalidWeightTypeError
        || e instanceof DanglingIndexError;
}

export function isImportError(e: unknown): e is ImportError {
    return e instanceof PMXError;
}

export function describeCause(cause: unknown): string {
    if (cause instanceof Error)
        return cause.message;
    return String(cause);
}
