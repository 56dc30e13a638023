
import type { ReadonlyVec2, ReadonlyVec3, ReadonlyVec4 } from "gl-matrix";
import type { Face, MaterialMorphOffset, RigidBodyMode, RigidBodyShape, SphereMode } from "./PMX.js";

// The host application's side of an import. The reconstructor never looks inside a
// handle; it only hands them back to the host. A host refuses an operation by throwing.

export interface SceneHandleTypes {
    mesh: object;
    vertexGroup: object;
    armature: object;
    bone: object;
    material: object;
    shapeKey: object;
    rigidBody: object;
    joint: object;
}

export const enum WeightMode {
    Replace = "replace",
    Add     = "add",
}

export interface MeshDescriptor {
    name: string;
    positions: ReadonlyArray<ReadonlyVec3>;
    normals: ReadonlyArray<ReadonlyVec3>;
    uvs: ReadonlyArray<ReadonlyVec2>;
    faces: ReadonlyArray<Face>;
}

export interface BoneDescriptor {
    // Position of the bone in the source document.
    index: number;
    name: string;
    nameEnglish: string;
    head: ReadonlyVec3;
    tail: ReadonlyVec3;
}

export interface InheritDescriptor {
    ratio: number;
    rotation: boolean;
    translation: boolean;
    local: boolean;
}

export type ResolvedToon =
    | { kind: "shared"; index: number; }
    | { kind: "texture"; path: string | null; };

export interface MaterialDescriptor {
    index: number;
    name: string;
    nameEnglish: string;
    diffuse: ReadonlyVec4;
    specular: ReadonlyVec3;
    shininess: number;
    ambient: ReadonlyVec3;
    doubleSided: boolean;
    edgeColor: ReadonlyVec4;
    edgeSize: number;
    texturePath: string | null;
    sphereTexturePath: string | null;
    sphereMode: SphereMode;
    toon: ResolvedToon;
}

// A run of triangles, in triangles.
export interface FaceRange {
    start: number;
    count: number;
}

export interface RigidBodyDescriptor {
    index: number;
    name: string;
    shape: RigidBodyShape;
    size: ReadonlyVec3;
    position: ReadonlyVec3;
    rotation: ReadonlyVec3;
    mass: number;
    friction: number;
    restitution: number;
    linearDamping: number;
    angularDamping: number;
    mode: RigidBodyMode;
    group: number;
    nonCollisionMask: number;
}

export interface JointDescriptor {
    index: number;
    name: string;
    position: ReadonlyVec3;
    rotation: ReadonlyVec3;
    linearLowerLimit: ReadonlyVec3;
    linearUpperLimit: ReadonlyVec3;
    angularLowerLimit: ReadonlyVec3;
    angularUpperLimit: ReadonlyVec3;
    springLinear: ReadonlyVec3;
    springAngular: ReadonlyVec3;
}

export interface SceneCollaborator<H extends SceneHandleTypes = SceneHandleTypes> {
    createMesh(mesh: MeshDescriptor): H["mesh"];
    createVertexGroup(mesh: H["mesh"], name: string): H["vertexGroup"];
    assignWeight(group: H["vertexGroup"], vertex: number, weight: number, mode: WeightMode): void;

    createArmature(name: string): H["armature"];
    createBone(armature: H["armature"], bone: BoneDescriptor, parent: H["bone"] | null): H["bone"];
    createIKConstraint(bone: H["bone"], target: H["bone"], chainLength: number, iterations: number): void;
    setBoneAngleLimits(bone: H["bone"], min: ReadonlyVec3, max: ReadonlyVec3): void;
    createInheritConstraint(bone: H["bone"], source: H["bone"], inherit: InheritDescriptor): void;

    createMaterial(material: MaterialDescriptor): H["material"];
    assignFacesToMaterial(mesh: H["mesh"], range: FaceRange, material: H["material"]): void;

    createShapeKey(mesh: H["mesh"], name: string): H["shapeKey"];
    setShapeKeyOffset(key: H["shapeKey"], vertex: number, offset: ReadonlyVec3): void;
    applyMaterialMorph(material: H["material"], morphName: string, offset: MaterialMorphOffset): void;

    createRigidBody(body: RigidBodyDescriptor): H["rigidBody"];
    attachRigidBodyToBone(body: H["rigidBody"], armature: H["armature"], bone: H["bone"]): void;
    createJoint(joint: JointDescriptor, bodyA: H["rigidBody"] | null, bodyB: H["rigidBody"] | null): H["joint"];

    bindMeshToArmature(mesh: H["mesh"], armature: H["armature"]): void;
}
