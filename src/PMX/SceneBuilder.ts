
import { vec3, type ReadonlyVec3 } from "gl-matrix";
import { swapYZAndScale, Vec3UnitY, Vec3Zero } from "../MathHelpers.js";
import { unreachable } from "../util.js";
import { computeBoneCreationOrder, enforceMinimumBoneLength, validateBoneHierarchy } from "./Bones.js";
import { DanglingIndexError, describeCause, HostRejectedError, MaterialFaceCountMismatchError, PMXError, type SectionName } from "./Errors.js";
import { MaterialFlags, type MaterialMorph, type MorphKind, type PMXDocument, type PMXMaterial, RigidBodyShape, type VertexMorph } from "./PMX.js";
import { type MaterialDescriptor, type ResolvedToon, type SceneCollaborator, type SceneHandleTypes, WeightMode } from "./Scene.js";

const BASIS_SHAPE_KEY_NAME = "Basis";
// Length of the tail given to a bone that has neither an offset nor a linked bone.
const DEFAULT_TAIL_LENGTH = 0.1;

export interface SceneBuildOptions {
    scale: number;
    importPhysics: boolean;
    importMorphs: boolean;
    swapYZ: boolean;
    minimumBoneLength: number;
}

export type BuildStage = "vertices" | "materials" | "faces" | "bones" | "morphs" | "physics" | "finalize";

export interface ImportWarning {
    readonly section: SectionName;
    readonly message: string;
}

export interface SkippedMorph {
    readonly index: number;
    readonly name: string;
    readonly kindId: MorphKind;
}

export interface ImportSummary {
    readonly modelName: string;
    readonly meshCount: number;
    readonly vertexCount: number;
    readonly faceCount: number;
    readonly boneCount: number;
    readonly materialCount: number;
    readonly vertexGroupCount: number;
    readonly ikConstraintCount: number;
    // Not counting the basis.
    readonly shapeKeyCount: number;
    readonly rigidBodyCount: number;
    readonly jointCount: number;
    readonly skippedMorphs: ReadonlyArray<SkippedMorph>;
    readonly warnings: ReadonlyArray<ImportWarning>;
}

/**
 * Rebuilds a decoded model in a host scene, one pass at a time. Geometry, materials and
 * bones must succeed; a failure there throws. Constraints, morphs, physics and the final
 * mesh binding are applied per element, and a failing element becomes a warning.
 *
 * A builder is good for one build.
 */
export class SceneBuilder<H extends SceneHandleTypes> {
    private vertexGroups = new Map<number, H["vertexGroup"]>();
    private bones = new Map<number, H["bone"]>();
    private materials: H["material"][] = [];
    private rigidBodies = new Map<number, H["rigidBody"]>();

    private warnings: ImportWarning[] = [];
    private skippedMorphs: SkippedMorph[] = [];
    private ikConstraintCount = 0;
    private shapeKeyCount = 0;
    private jointCount = 0;

    constructor(private doc: PMXDocument, private target: SceneCollaborator<H>, private options: SceneBuildOptions) {
    }

    public build(progress: (stage: BuildStage) => void = () => {}): ImportSummary {
        validateBoneHierarchy(this.doc.bones);

        const mesh = this.buildGeometry();
        this.buildWeights(mesh);
        progress("vertices");

        this.validateMaterialPartition();
        this.buildMaterials();
        progress("materials");
        this.assignFaces(mesh);
        progress("faces");

        const armature = this.buildBones();
        this.buildConstraints();
        progress("bones");

        if (this.options.importMorphs)
            this.buildMorphs(mesh);
        progress("morphs");

        if (this.options.importPhysics) {
            this.buildRigidBodies(armature);
            this.buildJoints();
        }
        progress("physics");

        this.attempt("finalize", "binding mesh to armature", () => this.target.bindMeshToArmature(mesh, armature));
        progress("finalize");

        return {
            modelName: this.doc.info.name,
            meshCount: 1,
            vertexCount: this.doc.vertices.length,
            faceCount: this.doc.faces.length,
            boneCount: this.bones.size,
            materialCount: this.materials.length,
            vertexGroupCount: this.vertexGroups.size,
            ikConstraintCount: this.ikConstraintCount,
            shapeKeyCount: this.shapeKeyCount,
            rigidBodyCount: this.rigidBodies.size,
            jointCount: this.jointCount,
            skippedMorphs: this.skippedMorphs,
            warnings: this.warnings,
        };
    }

    //#region Error policy
    private mandatory<T>(op: string, section: SectionName, fn: () => T): T {
        try {
            return fn();
        } catch (e) {
            if (e instanceof PMXError)
                throw e;
            throw new HostRejectedError(op, section, e);
        }
    }

    private warn(section: SectionName, message: string): void {
        this.warnings.push({ section, message });
    }

    private attemptCreate<T>(section: SectionName, what: string, fn: () => T): T | null {
        try {
            return fn();
        } catch (e) {
            this.warn(section, `${what} failed: ${describeCause(e)}`);
            return null;
        }
    }

    private attempt(section: SectionName, what: string, fn: () => void): boolean {
        return this.attemptCreate(section, what, () => { fn(); return true; }) !== null;
    }
    //#endregion

    private convertPosition(v: ReadonlyVec3): vec3 {
        return swapYZAndScale(vec3.create(), v, this.options.swapYZ, this.options.scale);
    }

    // Directions and Euler angles are swizzled, never scaled.
    private convertDirection(v: ReadonlyVec3): vec3 {
        return swapYZAndScale(vec3.create(), v, this.options.swapYZ, 1.0);
    }

    //#region Geometry
    private buildGeometry(): H["mesh"] {
        const vertices = this.doc.vertices;
        const positions = vertices.map((v) => this.convertPosition(v.position));
        const normals = vertices.map((v) => this.convertDirection(v.normal));
        const uvs = vertices.map((v) => v.uv);
        const name = this.doc.info.name;
        return this.mandatory("createMesh", "vertices", () => this.target.createMesh({ name, positions, normals, uvs, faces: this.doc.faces }));
    }

    private vertexGroupFor(mesh: H["mesh"], bone: number, vertex: number): H["vertexGroup"] {
        const existing = this.vertexGroups.get(bone);
        if (existing !== undefined)
            return existing;

        const bones = this.doc.bones;
        if (bone < 0 || bone >= bones.length)
            throw new DanglingIndexError("vertices", "bone", bone, vertex);

        const group = this.mandatory("createVertexGroup", "vertices", () => this.target.createVertexGroup(mesh, bones[bone].name));
        this.vertexGroups.set(bone, group);
        return group;
    }

    private assignWeight(mesh: H["mesh"], vertex: number, bone: number, weight: number, mode: WeightMode): void {
        // An unused slot.
        if (bone === -1 && weight === 0)
            return;
        const group = this.vertexGroupFor(mesh, bone, vertex);
        this.mandatory("assignWeight", "vertices", () => this.target.assignWeight(group, vertex, weight, mode));
    }

    private buildWeights(mesh: H["mesh"]): void {
        const vertices = this.doc.vertices;
        for (let i = 0; i < vertices.length; i++) {
            const skin = vertices[i].skin;
            switch (skin.kind) {
            case "single":
                this.assignWeight(mesh, i, skin.bone, 1.0, WeightMode.Replace);
                break;
            case "dual":
            case "sphericalDual":
                this.assignWeight(mesh, i, skin.boneA, skin.weightA, WeightMode.Replace);
                // Both halves on one bone must sum rather than overwrite.
                this.assignWeight(mesh, i, skin.boneB, 1.0 - skin.weightA, skin.boneB === skin.boneA ? WeightMode.Add : WeightMode.Replace);
                break;
            case "quad":
            case "dualQuaternion":
                for (let j = 0; j < 4; j++)
                    if (skin.weights[j] > 0)
                        this.assignWeight(mesh, i, skin.bones[j], skin.weights[j], WeightMode.Add);
                break;
            default:
                unreachable(skin);
            }
        }
    }
    //#endregion

    //#region Materials
    private validateMaterialPartition(): void {
        const faceCount = this.doc.faces.length;
        let vertexCount = 0;
        for (let i = 0; i < this.doc.materials.length; i++) {
            const material = this.doc.materials[i];
            if (material.faceVertexCount < 0 || material.faceVertexCount % 3 !== 0)
                throw new MaterialFaceCountMismatchError(faceCount, Math.floor(vertexCount / 3),
                    `material ${i} (${material.name}) has face vertex count ${material.faceVertexCount}`);
            vertexCount += material.faceVertexCount;
        }

        if (vertexCount / 3 !== faceCount)
            throw new MaterialFaceCountMismatchError(faceCount, vertexCount / 3);
    }

    private resolveTexture(materialIndex: number, textureIndex: number | null, slot: string): string | null {
        if (textureIndex === null)
            return null;
        if (textureIndex < 0 || textureIndex >= this.doc.textures.length) {
            this.warn("materials", `material ${materialIndex} references ${slot} texture ${textureIndex}, which does not exist`);
            return null;
        }
        return this.doc.textures[textureIndex];
    }

    private describeMaterial(index: number, material: PMXMaterial): MaterialDescriptor {
        const toon: ResolvedToon = material.toon.kind === "shared"
            ? { kind: "shared", index: material.toon.index }
            : { kind: "texture", path: this.resolveTexture(index, material.toon.textureIndex, "toon") };

        return {
            index,
            name: material.name,
            nameEnglish: material.nameEnglish,
            diffuse: material.diffuse,
            specular: material.specular,
            shininess: material.shininess,
            ambient: material.ambient,
            doubleSided: !!(material.flags & MaterialFlags.DoubleSided),
            edgeColor: material.edgeColor,
            edgeSize: material.edgeSize,
            texturePath: this.resolveTexture(index, material.textureIndex, "diffuse"),
            sphereTexturePath: this.resolveTexture(index, material.sphereTextureIndex, "sphere"),
            sphereMode: material.sphereMode,
            toon,
        };
    }

    private buildMaterials(): void {
        const materials = this.doc.materials;
        for (let i = 0; i < materials.length; i++) {
            const desc = this.describeMaterial(i, materials[i]);
            this.materials.push(this.mandatory("createMaterial", "materials", () => this.target.createMaterial(desc)));
        }
    }

    private assignFaces(mesh: H["mesh"]): void {
        let start = 0;
        for (let i = 0; i < this.materials.length; i++) {
            const count = this.doc.materials[i].faceVertexCount / 3;
            const material = this.materials[i];
            if (count > 0)
                this.mandatory("assignFacesToMaterial", "faces", () => this.target.assignFacesToMaterial(mesh, { start, count }, material));
            start += count;
        }
    }
    //#endregion

    //#region Bones
    private computeTail(dst: vec3, index: number, head: ReadonlyVec3): void {
        const bones = this.doc.bones;
        const tail = bones[index].tail;

        if (tail.kind === "offset" && !vec3.equals(tail.offset, Vec3Zero)) {
            vec3.add(dst, head, this.convertPosition(tail.offset));
            return;
        }

        if (tail.kind === "bone" && tail.bone !== null && tail.bone >= 0 && tail.bone < bones.length && tail.bone !== index) {
            swapYZAndScale(dst, bones[tail.bone].position, this.options.swapYZ, this.options.scale);
            return;
        }

        vec3.scaleAndAdd(dst, head, Vec3UnitY, DEFAULT_TAIL_LENGTH * this.options.scale);
    }

    private buildBones(): H["armature"] {
        const bones = this.doc.bones;
        const armature = this.mandatory("createArmature", "bones", () => this.target.createArmature(this.doc.info.name));

        for (const i of computeBoneCreationOrder(bones)) {
            const bone = bones[i];
            const head = this.convertPosition(bone.position);
            const tail = vec3.create();
            this.computeTail(tail, i, head);
            enforceMinimumBoneLength(head, tail, this.options.minimumBoneLength);

            let parent: H["bone"] | null = null;
            if (bone.parent !== null) {
                const parentHandle = this.bones.get(bone.parent);
                if (parentHandle === undefined)
                    throw new DanglingIndexError("bones", "bone", bone.parent, i);
                parent = parentHandle;
            }

            const desc = { index: i, name: bone.name, nameEnglish: bone.nameEnglish, head, tail };
            this.bones.set(i, this.mandatory("createBone", "bones", () => this.target.createBone(armature, desc, parent)));
        }

        return armature;
    }

    private lookupBone(index: number | null): H["bone"] | null {
        if (index === null)
            return null;
        const handle = this.bones.get(index);
        return handle !== undefined ? handle : null;
    }

    private buildConstraints(): void {
        const bones = this.doc.bones;
        for (let i = 0; i < bones.length; i++) {
            const bone = bones[i];
            const handle = this.lookupBone(i);
            if (handle === null)
                continue;

            if (bone.ik !== null) {
                const ik = bone.ik;
                const target = this.lookupBone(ik.target);
                if (target === null) {
                    this.warn("bones", ik.target === null
                        ? `IK bone ${i} (${bone.name}) has no target`
                        : `IK bone ${i} (${bone.name}) targets bone ${ik.target}, which does not exist`);
                } else if (this.attempt("bones", `IK constraint on bone ${i} (${bone.name})`, () => this.target.createIKConstraint(handle, target, ik.links.length, ik.loopCount))) {
                    this.ikConstraintCount++;
                }

                for (const link of ik.links) {
                    const angleLimit = link.angleLimit;
                    if (angleLimit === null)
                        continue;
                    const linkHandle = this.lookupBone(link.bone);
                    if (linkHandle === null) {
                        this.warn("bones", `IK bone ${i} (${bone.name}) links bone ${link.bone}, which does not exist`);
                        continue;
                    }
                    const min = this.convertDirection(angleLimit.min), max = this.convertDirection(angleLimit.max);
                    this.attempt("bones", `angle limits on bone ${link.bone}`, () => this.target.setBoneAngleLimits(linkHandle, min, max));
                }
            }

            if (bone.inherit !== null) {
                const inherit = bone.inherit;
                const source = this.lookupBone(inherit.parent);
                if (source === null) {
                    this.warn("bones", inherit.parent === null
                        ? `bone ${i} (${bone.name}) inherits from no bone`
                        : `bone ${i} (${bone.name}) inherits from bone ${inherit.parent}, which does not exist`);
                } else {
                    const desc = { ratio: inherit.ratio, rotation: inherit.rotation, translation: inherit.translation, local: inherit.local };
                    this.attempt("bones", `inherit constraint on bone ${i} (${bone.name})`, () => this.target.createInheritConstraint(handle, source, desc));
                }
            }
        }
    }
    //#endregion

    //#region Morphs
    private buildVertexMorph(mesh: H["mesh"], index: number, morph: VertexMorph, basis: { created: boolean }): void {
        if (!basis.created) {
            if (this.attemptCreate("morphs", "basis shape key", () => this.target.createShapeKey(mesh, BASIS_SHAPE_KEY_NAME)) === null)
                return;
            basis.created = true;
        }

        const key = this.attemptCreate("morphs", `shape key for morph ${index} (${morph.name})`, () => this.target.createShapeKey(mesh, morph.name));
        if (key === null)
            return;
        this.shapeKeyCount++;

        const vertexCount = this.doc.vertices.length;
        for (const { vertex, offset } of morph.offsets) {
            if (vertex < 0 || vertex >= vertexCount) {
                this.warn("morphs", `morph ${index} (${morph.name}) moves vertex ${vertex}, which does not exist`);
                continue;
            }
            const converted = this.convertPosition(offset);
            this.attempt("morphs", `offset of vertex ${vertex} in morph ${index} (${morph.name})`, () => this.target.setShapeKeyOffset(key, vertex, converted));
        }
    }

    private buildMaterialMorph(index: number, morph: MaterialMorph): void {
        for (const offset of morph.offsets) {
            let targets: H["material"][];
            if (offset.material === null) {
                targets = this.materials;
            } else if (offset.material >= 0 && offset.material < this.materials.length) {
                targets = [this.materials[offset.material]];
            } else {
                this.warn("morphs", `morph ${index} (${morph.name}) targets material ${offset.material}, which does not exist`);
                continue;
            }

            for (const material of targets)
                this.attempt("morphs", `material morph ${index} (${morph.name})`, () => this.target.applyMaterialMorph(material, morph.name, offset));
        }
    }

    private buildMorphs(mesh: H["mesh"]): void {
        const morphs = this.doc.morphs;
        const basis = { created: false };
        for (let i = 0; i < morphs.length; i++) {
            const morph = morphs[i];
            switch (morph.kind) {
            case "vertex":
                this.buildVertexMorph(mesh, i, morph, basis);
                break;
            case "material":
                this.buildMaterialMorph(i, morph);
                break;
            case "unhandled":
                this.skippedMorphs.push({ index: i, name: morph.name, kindId: morph.kindId });
                break;
            default:
                unreachable(morph);
            }
        }
    }
    //#endregion

    //#region Physics
    private buildRigidBodies(armature: H["armature"]): void {
        const rigidBodies = this.doc.rigidBodies;
        for (let i = 0; i < rigidBodies.length; i++) {
            const body = rigidBodies[i];

            let shape: RigidBodyShape;
            if (body.shape === RigidBodyShape.Sphere || body.shape === RigidBodyShape.Box || body.shape === RigidBodyShape.Capsule) {
                shape = body.shape;
            } else {
                this.warn("rigidBodies", `rigid body ${i} (${body.name}) has unknown shape ${body.shape}, using a sphere`);
                shape = RigidBodyShape.Sphere;
            }

            // Sphere and capsule sizes are radius and height, not axes.
            const size = shape === RigidBodyShape.Box
                ? this.convertPosition(body.size)
                : vec3.scale(vec3.create(), body.size, this.options.scale);

            const desc = {
                index: i,
                name: `rigid_${body.name}`,
                shape, size,
                position: this.convertPosition(body.position),
                rotation: this.convertDirection(body.rotation),
                mass: body.mass,
                friction: body.friction,
                restitution: body.restitution,
                linearDamping: body.linearDamping,
                angularDamping: body.angularDamping,
                mode: body.mode,
                group: body.group,
                nonCollisionMask: body.nonCollisionMask,
            };
            const handle = this.attemptCreate("rigidBodies", `rigid body ${i} (${body.name})`, () => this.target.createRigidBody(desc));
            if (handle === null)
                continue;
            this.rigidBodies.set(i, handle);

            if (body.bone === null)
                continue;
            const bone = this.lookupBone(body.bone);
            if (bone === null) {
                this.warn("rigidBodies", `rigid body ${i} (${body.name}) is attached to bone ${body.bone}, which does not exist`);
                continue;
            }
            this.attempt("rigidBodies", `attaching rigid body ${i} (${body.name})`, () => this.target.attachRigidBodyToBone(handle, armature, bone));
        }
    }

    private lookupRigidBody(joint: number, name: string, index: number | null): H["rigidBody"] | null {
        if (index === null)
            return null;
        const handle = this.rigidBodies.get(index);
        if (handle === undefined) {
            this.warn("joints", `joint ${joint} (${name}) references rigid body ${index}, which does not exist`);
            return null;
        }
        return handle;
    }

    private buildJoints(): void {
        const joints = this.doc.joints;
        for (let i = 0; i < joints.length; i++) {
            const joint = joints[i];
            const bodyA = this.lookupRigidBody(i, joint.name, joint.rigidBodyA);
            const bodyB = this.lookupRigidBody(i, joint.name, joint.rigidBodyB);

            const desc = {
                index: i,
                name: `joint_${joint.name}`,
                position: this.convertPosition(joint.position),
                rotation: this.convertDirection(joint.rotation),
                linearLowerLimit: this.convertPosition(joint.linearLowerLimit),
                linearUpperLimit: this.convertPosition(joint.linearUpperLimit),
                angularLowerLimit: this.convertDirection(joint.angularLowerLimit),
                angularUpperLimit: this.convertDirection(joint.angularUpperLimit),
                springLinear: this.convertDirection(joint.springLinear),
                springAngular: this.convertDirection(joint.springAngular),
            };
            if (this.attemptCreate("joints", `joint ${i} (${joint.name})`, () => this.target.createJoint(desc, bodyA, bodyB)) !== null)
                this.jointCount++;
        }
    }
    //#endregion
}
