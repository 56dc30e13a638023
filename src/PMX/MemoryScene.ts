
import { vec3, type ReadonlyVec3 } from "gl-matrix";
import { assert } from "../util.js";
import { enforceMinimumBoneLength } from "./Bones.js";
import type { MaterialMorphOffset } from "./PMX.js";
import { type BoneDescriptor, type FaceRange, type InheritDescriptor, type JointDescriptor, type MaterialDescriptor, type MeshDescriptor, type RigidBodyDescriptor, type SceneCollaborator, WeightMode } from "./Scene.js";

// A scene that only keeps records. Handy as a dry-run target and as the scene the tests build into.

export interface MemoryMesh {
    readonly descriptor: MeshDescriptor;
    readonly vertexGroups: MemoryVertexGroup[];
    readonly shapeKeys: MemoryShapeKey[];
    armature: MemoryArmature | null;
}

export interface MemoryVertexGroup {
    readonly name: string;
    readonly weights: Map<number, number>;
}

export interface MemoryArmature {
    readonly name: string;
    readonly bones: MemoryBone[];
}

export interface MemoryIKConstraint {
    readonly target: MemoryBone;
    readonly chainLength: number;
    readonly iterations: number;
}

export interface MemoryInheritConstraint {
    readonly source: MemoryBone;
    readonly inherit: InheritDescriptor;
}

export interface MemoryBone {
    readonly index: number;
    readonly name: string;
    readonly armature: MemoryArmature;
    readonly head: vec3;
    readonly tail: vec3;
    readonly parent: MemoryBone | null;
    ikConstraint: MemoryIKConstraint | null;
    angleLimits: { readonly min: vec3; readonly max: vec3; } | null;
    inheritConstraint: MemoryInheritConstraint | null;
}

export interface MemoryMaterial {
    readonly descriptor: MaterialDescriptor;
    readonly faceRanges: FaceRange[];
    readonly morphs: { readonly name: string; readonly offset: MaterialMorphOffset; }[];
}

export interface MemoryShapeKey {
    readonly name: string;
    readonly offsets: Map<number, vec3>;
}

export interface MemoryRigidBody {
    readonly descriptor: RigidBodyDescriptor;
    attachedBone: MemoryBone | null;
}

export interface MemoryJoint {
    readonly descriptor: JointDescriptor;
    readonly bodyA: MemoryRigidBody | null;
    readonly bodyB: MemoryRigidBody | null;
}

export interface MemoryHandleTypes {
    mesh: MemoryMesh;
    vertexGroup: MemoryVertexGroup;
    armature: MemoryArmature;
    bone: MemoryBone;
    material: MemoryMaterial;
    shapeKey: MemoryShapeKey;
    rigidBody: MemoryRigidBody;
    joint: MemoryJoint;
}

export class MemoryScene implements SceneCollaborator<MemoryHandleTypes> {
    public meshes: MemoryMesh[] = [];
    public armatures: MemoryArmature[] = [];
    public materials: MemoryMaterial[] = [];
    public rigidBodies: MemoryRigidBody[] = [];
    public joints: MemoryJoint[] = [];

    constructor(public minimumBoneLength: number = 0.001) {
    }

    public createMesh(descriptor: MeshDescriptor): MemoryMesh {
        const mesh: MemoryMesh = { descriptor, vertexGroups: [], shapeKeys: [], armature: null };
        this.meshes.push(mesh);
        return mesh;
    }

    public createVertexGroup(mesh: MemoryMesh, name: string): MemoryVertexGroup {
        const group: MemoryVertexGroup = { name, weights: new Map() };
        mesh.vertexGroups.push(group);
        return group;
    }

    public assignWeight(group: MemoryVertexGroup, vertex: number, weight: number, mode: WeightMode): void {
        const existing = group.weights.get(vertex);
        if (mode === WeightMode.Add && existing !== undefined)
            group.weights.set(vertex, existing + weight);
        else
            group.weights.set(vertex, weight);
    }

    public createArmature(name: string): MemoryArmature {
        const armature: MemoryArmature = { name, bones: [] };
        this.armatures.push(armature);
        return armature;
    }

    public createBone(armature: MemoryArmature, bone: BoneDescriptor, parent: MemoryBone | null): MemoryBone {
        if (parent !== null)
            assert(parent.armature === armature, `parent of bone ${bone.name} belongs to another armature`);
        const head = vec3.clone(bone.head), tail = vec3.clone(bone.tail);
        enforceMinimumBoneLength(head, tail, this.minimumBoneLength);
        const record: MemoryBone = {
            index: bone.index, name: bone.name, armature, head, tail, parent,
            ikConstraint: null, angleLimits: null, inheritConstraint: null,
        };
        armature.bones.push(record);
        return record;
    }

    public setBoneHead(bone: MemoryBone, head: ReadonlyVec3): void {
        vec3.copy(bone.head, head);
        enforceMinimumBoneLength(bone.head, bone.tail, this.minimumBoneLength);
    }

    public setBoneTail(bone: MemoryBone, tail: ReadonlyVec3): void {
        vec3.copy(bone.tail, tail);
        enforceMinimumBoneLength(bone.head, bone.tail, this.minimumBoneLength);
    }

    public createIKConstraint(bone: MemoryBone, target: MemoryBone, chainLength: number, iterations: number): void {
        bone.ikConstraint = { target, chainLength, iterations };
    }

    public setBoneAngleLimits(bone: MemoryBone, min: ReadonlyVec3, max: ReadonlyVec3): void {
        bone.angleLimits = { min: vec3.clone(min), max: vec3.clone(max) };
    }

    public createInheritConstraint(bone: MemoryBone, source: MemoryBone, inherit: InheritDescriptor): void {
        bone.inheritConstraint = { source, inherit };
    }

    public createMaterial(descriptor: MaterialDescriptor): MemoryMaterial {
        const material: MemoryMaterial = { descriptor, faceRanges: [], morphs: [] };
        this.materials.push(material);
        return material;
    }

    public assignFacesToMaterial(mesh: MemoryMesh, range: FaceRange, material: MemoryMaterial): void {
        assert(range.start >= 0 && range.start + range.count <= mesh.descriptor.faces.length, `face range ${range.start}+${range.count} is outside the mesh`);
        material.faceRanges.push({ start: range.start, count: range.count });
    }

    public createShapeKey(mesh: MemoryMesh, name: string): MemoryShapeKey {
        const key: MemoryShapeKey = { name, offsets: new Map() };
        mesh.shapeKeys.push(key);
        return key;
    }

    // Offsets on the same vertex accumulate.
    public setShapeKeyOffset(key: MemoryShapeKey, vertex: number, offset: ReadonlyVec3): void {
        const existing = key.offsets.get(vertex);
        if (existing !== undefined)
            vec3.add(existing, existing, offset);
        else
            key.offsets.set(vertex, vec3.clone(offset));
    }

    public applyMaterialMorph(material: MemoryMaterial, morphName: string, offset: MaterialMorphOffset): void {
        material.morphs.push({ name: morphName, offset });
    }

    public createRigidBody(descriptor: RigidBodyDescriptor): MemoryRigidBody {
        const body: MemoryRigidBody = { descriptor, attachedBone: null };
        this.rigidBodies.push(body);
        return body;
    }

    public attachRigidBodyToBone(body: MemoryRigidBody, armature: MemoryArmature, bone: MemoryBone): void {
        assert(bone.armature === armature, `bone ${bone.name} belongs to another armature`);
        body.attachedBone = bone;
    }

    public createJoint(descriptor: JointDescriptor, bodyA: MemoryRigidBody | null, bodyB: MemoryRigidBody | null): MemoryJoint {
        const joint: MemoryJoint = { descriptor, bodyA, bodyB };
        this.joints.push(joint);
        return joint;
    }

    public bindMeshToArmature(mesh: MemoryMesh, armature: MemoryArmature): void {
        mesh.armature = armature;
    }

    public findBone(name: string): MemoryBone | null {
        for (const armature of this.armatures)
            for (const bone of armature.bones)
                if (bone.name === name)
                    return bone;
        return null;
    }
}
