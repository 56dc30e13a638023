
import { describe, expect, it, vi } from "vitest";
import { CyclicBoneHierarchyError, DanglingIndexError, HostRejectedError, MaterialFaceCountMismatchError } from "./Errors.js";
import { type MemoryArmature, type MemoryHandleTypes, MemoryScene } from "./MemoryScene.js";
import { decode } from "./PMX.js";
import { type BuildStage, SceneBuilder, type SceneBuildOptions } from "./SceneBuilder.js";
import { catchError, type FixtureModel, type FixtureVertex, singleTriangleModel, writePMX } from "../../test/PMXFixture.js";

const defaultOptions: SceneBuildOptions = { scale: 1.0, importPhysics: true, importMorphs: true, swapYZ: true, minimumBoneLength: 0.001 };

function builderFor(model: FixtureModel, scene: MemoryScene, options: Partial<SceneBuildOptions> = {}): SceneBuilder<MemoryHandleTypes> {
    return new SceneBuilder<MemoryHandleTypes>(decode(writePMX(model)), scene, { ...defaultOptions, ...options });
}

function buildModel(model: FixtureModel, options: Partial<SceneBuildOptions> = {}) {
    const scene = new MemoryScene();
    const summary = builderFor(model, scene, options).build();
    return { scene, summary };
}

function fourBoneModel(): FixtureModel {
    return {
        ...singleTriangleModel(),
        bones: [
            { name: "B0", position: [0, 0, 0] },
            { name: "B1", position: [0, 1, 0], parent: 0 },
            { name: "B2", position: [0, 2, 0], parent: 1 },
            { name: "B3", position: [0, 3, 0], parent: 2 },
        ],
    };
}

describe("SceneBuilder", () => {
    describe("geometry and weights", () => {
        it("builds a single skinned triangle", () => {
            const { scene, summary } = buildModel(singleTriangleModel());

            expect(summary).toEqual({
                modelName: "Triangle",
                meshCount: 1,
                vertexCount: 3,
                faceCount: 1,
                boneCount: 1,
                materialCount: 1,
                vertexGroupCount: 1,
                ikConstraintCount: 0,
                shapeKeyCount: 0,
                rigidBodyCount: 0,
                jointCount: 0,
                skippedMorphs: [],
                warnings: [],
            });

            const mesh = scene.meshes[0];
            expect(mesh.descriptor.name).toBe("Triangle");
            expect(mesh.vertexGroups).toHaveLength(1);
            expect(mesh.vertexGroups[0].name).toBe("Root");
            expect([...mesh.vertexGroups[0].weights]).toEqual([[0, 1.0], [1, 1.0], [2, 1.0]]);
            expect(scene.materials[0].faceRanges).toEqual([{ start: 0, count: 1 }]);
            expect(mesh.armature).toBe(scene.armatures[0]);
        });

        it("swaps Y and Z and applies the scale to positions only", () => {
            const model = singleTriangleModel();
            model.vertices[2] = { position: [0, 1, 2], normal: [0, 1, 0], uv: [0.5, 0.75], skin: { kind: "single", bone: 0 } };
            const { scene } = buildModel(model, { scale: 2 });
            const mesh = scene.meshes[0].descriptor;
            expect(Array.from(mesh.positions[2])).toEqual([0, 4, 2]);
            expect(Array.from(mesh.normals[2])).toEqual([0, 0, 1]);
            expect(Array.from(mesh.uvs[2])).toEqual([0.5, 0.75]);
            expect(mesh.faces).toEqual([[0, 1, 2]]);
        });

        it("keeps the file's axes when swapping is off", () => {
            const model = singleTriangleModel();
            model.vertices[2] = { position: [0, 1, 2], skin: { kind: "single", bone: 0 } };
            const { scene } = buildModel(model, { swapYZ: false });
            expect(Array.from(scene.meshes[0].descriptor.positions[2])).toEqual([0, 1, 2]);
        });

        it("skips zero weights of a quad binding", () => {
            const model = fourBoneModel();
            model.vertices[0] = { position: [0, 0, 0], skin: { kind: "quad", bones: [0, 1, 2, 3], weights: [0.5, 0.5, 0.0, 0.0] } };
            const { scene, summary } = buildModel(model);

            const groups = scene.meshes[0].vertexGroups;
            expect(groups.map((g) => g.name)).toEqual(["B0", "B1"]);
            expect([...groups[0].weights]).toEqual([[0, 0.5], [1, 1.0], [2, 1.0]]);
            expect([...groups[1].weights]).toEqual([[0, 0.5]]);
            expect(summary.vertexGroupCount).toBe(2);
        });

        it("splits a dual binding between both bones", () => {
            const model = fourBoneModel();
            model.vertices[0] = { position: [0, 0, 0], skin: { kind: "dual", boneA: 1, boneB: 0, weightA: 0.75 } };
            const { scene } = buildModel(model);

            const [b1, b0] = scene.meshes[0].vertexGroups;
            expect(b1.name).toBe("B1");
            expect(b1.weights.get(0)).toBe(0.75);
            expect(b0.name).toBe("B0");
            expect(b0.weights.get(0)).toBe(0.25);
        });

        it("sums both halves of a dual binding on one bone", () => {
            const model = fourBoneModel();
            model.vertices[0] = { position: [0, 0, 0], skin: { kind: "sphericalDual", boneA: 2, boneB: 2, weightA: 0.75, center: [0, 0, 0], r0: [0, 0, 0], r1: [0, 0, 0] } };
            const { scene } = buildModel(model);

            const group = scene.meshes[0].vertexGroups[0];
            expect(group.name).toBe("B2");
            expect(group.weights.get(0)).toBe(1.0);
        });

        it("rejects a skin binding to a missing bone", () => {
            const model = singleTriangleModel();
            model.vertices[1] = { position: [1, 0, 0], skin: { kind: "single", bone: 5 } };
            const error = catchError(() => builderFor(model, new MemoryScene()).build());
            expect(error).toBeInstanceOf(DanglingIndexError);
            expect(error).toMatchObject({ section: "vertices", target: "bone", index: 5, owner: 1 });
        });
    });

    describe("materials", () => {
        it("assigns contiguous face ranges in declaration order", () => {
            const model: FixtureModel = {
                ...singleTriangleModel(),
                vertices: [...singleTriangleModel().vertices, { position: [1, 1, 0], skin: { kind: "single", bone: 0 } }],
                indices: [0, 1, 2, 1, 3, 2, 0, 3, 1],
                materials: [
                    { name: "Skin", faceVertexCount: 6 },
                    { name: "Empty", faceVertexCount: 0 },
                    { name: "Cloth", faceVertexCount: 3 },
                ],
            };
            const { scene, summary } = buildModel(model);
            expect(scene.materials.map((m) => m.faceRanges)).toEqual([[{ start: 0, count: 2 }], [], [{ start: 2, count: 1 }]]);
            expect(summary.materialCount).toBe(3);
        });

        it("rejects materials that cover more faces than the mesh has", () => {
            const scene = new MemoryScene();
            const model: FixtureModel = { ...singleTriangleModel(), materials: [{ name: "Body", faceVertexCount: 6 }] };
            const error = catchError(() => builderFor(model, scene).build());
            expect(error).toBeInstanceOf(MaterialFaceCountMismatchError);
            expect(error).toMatchObject({ expected: 1, actual: 2 });
            expect(error).toHaveProperty("message", "Materials cover 2 triangles but the mesh has 1");
            // The mesh built before the failure stays.
            expect(scene.meshes).toHaveLength(1);
            expect(scene.materials).toHaveLength(0);
        });

        it("rejects a face vertex count that is not a multiple of 3", () => {
            const model: FixtureModel = { ...singleTriangleModel(), materials: [{ name: "Body", faceVertexCount: 4 }] };
            expect(() => builderFor(model, new MemoryScene()).build()).toThrow(MaterialFaceCountMismatchError);
        });

        it("resolves texture paths and warns about missing textures", () => {
            const model: FixtureModel = {
                ...singleTriangleModel(),
                textures: ["tex/body.png", "toon/skin.bmp"],
                materials: [{ name: "Body", textureIndex: 0, sphereTextureIndex: 4, toon: { shared: false, textureIndex: 1 }, faceVertexCount: 3 }],
            };
            const { scene, summary } = buildModel(model);
            const desc = scene.materials[0].descriptor;
            expect(desc.texturePath).toBe("tex/body.png");
            expect(desc.sphereTexturePath).toBeNull();
            expect(desc.toon).toEqual({ kind: "texture", path: "toon/skin.bmp" });
            expect(summary.warnings).toEqual([{ section: "materials", message: "material 0 references sphere texture 4, which does not exist" }]);
        });

        it("reads double-sidedness from the material flags", () => {
            const model: FixtureModel = { ...singleTriangleModel(), materials: [{ name: "Body", flags: 0x01, faceVertexCount: 3 }] };
            const { scene } = buildModel(model);
            expect(scene.materials[0].descriptor.doubleSided).toBe(true);
            expect(scene.materials[0].descriptor.toon).toEqual({ kind: "shared", index: 0 });
        });
    });

    describe("bones", () => {
        it("places heads and tails", () => {
            const model: FixtureModel = {
                ...singleTriangleModel(),
                bones: [
                    { name: "Root", position: [0, 0, 0] },
                    { name: "Arm", position: [0, 1, 0], parent: 0, tailOffset: [0, 0, 1] },
                    { name: "Hand", position: [1, 1, 0], parent: 1, tailBone: 0 },
                ],
            };
            const { scene } = buildModel(model, { scale: 2 });

            const root = scene.findBone("Root");
            const arm = scene.findBone("Arm");
            const hand = scene.findBone("Hand");
            if (root === null || arm === null || hand === null)
                throw new Error("missing bone");

            expect(Array.from(root.head)).toEqual([0, 0, 0]);
            expect(root.tail[0]).toBe(0);
            expect(root.tail[1]).toBeCloseTo(0.2, 6);
            expect(root.tail[2]).toBe(0);

            expect(Array.from(arm.head)).toEqual([0, 0, 2]);
            expect(Array.from(arm.tail)).toEqual([0, 2, 2]);
            expect(arm.parent).toBe(root);

            expect(Array.from(hand.head)).toEqual([2, 0, 2]);
            expect(Array.from(hand.tail)).toEqual([0, 0, 0]);
            expect(hand.parent).toBe(arm);
        });

        it("extends bones shorter than the minimum length", () => {
            const model: FixtureModel = { ...singleTriangleModel(), bones: [{ name: "Tiny", position: [0, 0, 0], tailOffset: [0, 0.0001, 0] }] };
            const { scene } = buildModel(model, { minimumBoneLength: 0.01 });
            const tiny = scene.findBone("Tiny");
            expect(tiny).not.toBeNull();
            if (tiny !== null) {
                expect(tiny.tail[0]).toBe(0);
                expect(tiny.tail[1]).toBe(0);
                expect(tiny.tail[2]).toBeCloseTo(0.01, 6);
            }
        });

        it("creates parents before children declared ahead of them", () => {
            const model: FixtureModel = {
                ...singleTriangleModel(),
                bones: [
                    { name: "Hand", position: [0, 2, 0], parent: 1 },
                    { name: "Arm", position: [0, 1, 0], parent: 2 },
                    { name: "Root", position: [0, 0, 0] },
                ],
            };
            model.vertices = model.vertices.map((v): FixtureVertex => ({ ...v, skin: { kind: "single", bone: 2 } }));
            const { scene } = buildModel(model);
            expect(scene.armatures[0].bones.map((b) => b.name)).toEqual(["Root", "Arm", "Hand"]);
            expect(scene.armatures[0].bones.map((b) => b.index)).toEqual([2, 1, 0]);
        });

        it("rejects a self-parented bone before touching the scene", () => {
            const scene = new MemoryScene();
            const model: FixtureModel = { ...singleTriangleModel(), bones: [{ name: "Root", position: [0, 0, 0], parent: 0 }] };
            expect(() => builderFor(model, scene).build()).toThrow(CyclicBoneHierarchyError);
            expect(scene.meshes).toHaveLength(0);
        });

        it("reports a refused bone operation as HostRejected", () => {
            class LockedScene extends MemoryScene {
                public createArmature(): MemoryArmature {
                    throw new Error("armatures are locked");
                }
            }

            const error = catchError(() => builderFor(singleTriangleModel(), new LockedScene()).build());
            expect(error).toBeInstanceOf(HostRejectedError);
            expect(error).toMatchObject({ kind: "HostRejected", op: "createArmature", section: "bones" });
            expect(error).toHaveProperty("message", "Host rejected createArmature while building bones: armatures are locked");
        });
    });

    describe("constraints", () => {
        function ikModel(): FixtureModel {
            return {
                ...singleTriangleModel(),
                bones: [
                    { name: "Leg", position: [0, 1, 0] },
                    { name: "LegIK", position: [0, 0, 1], parent: 0, ik: { target: 2, loopCount: 40, limitAngle: 2, links: [{ bone: 0, limit: { min: [-1, 0, 0], max: [0, 0, 0.5] } }] } },
                    { name: "Foot", position: [0, 0, 0], parent: 0 },
                ],
            };
        }

        it("resolves an IK target declared after the IK bone", () => {
            const { scene, summary } = buildModel(ikModel());
            const legIK = scene.findBone("LegIK");
            const foot = scene.findBone("Foot");
            const leg = scene.findBone("Leg");
            if (legIK === null || foot === null || leg === null)
                throw new Error("missing bone");

            expect(summary.ikConstraintCount).toBe(1);
            expect(summary.warnings).toEqual([]);
            expect(legIK.ikConstraint).toEqual({ target: foot, chainLength: 1, iterations: 40 });
            expect(legIK.angleLimits).toBeNull();

            // Limits go on the link bone, swizzled and unscaled.
            expect(leg.angleLimits).not.toBeNull();
            if (leg.angleLimits !== null) {
                expect(Array.from(leg.angleLimits.min)).toEqual([-1, 0, 0]);
                expect(Array.from(leg.angleLimits.max)).toEqual([0, 0.5, 0]);
            }
        });

        it("skips an IK constraint whose target is missing", () => {
            const model = ikModel();
            const bones = model.bones !== undefined ? model.bones : [];
            bones[1] = { name: "LegIK", position: [0, 0, 1], parent: 0, ik: { target: -1, loopCount: 40, limitAngle: 2, links: [] } };
            const { scene, summary } = buildModel(model);
            expect(summary.ikConstraintCount).toBe(0);
            expect(summary.warnings).toEqual([{ section: "bones", message: "IK bone 1 (LegIK) has no target" }]);
            expect(scene.findBone("LegIK")).toMatchObject({ ikConstraint: null });
        });

        it("creates inherit constraints", () => {
            const model: FixtureModel = {
                ...singleTriangleModel(),
                bones: [
                    { name: "Root", position: [0, 0, 0] },
                    { name: "Follower", position: [0, 1, 0], parent: 0, inherit: { parent: 0, ratio: 0.5, translation: true } },
                ],
            };
            const { scene } = buildModel(model);
            const follower = scene.findBone("Follower");
            expect(follower !== null ? follower.inheritConstraint : null).toEqual({
                source: scene.findBone("Root"),
                inherit: { ratio: 0.5, rotation: true, translation: true, local: false },
            });
        });

        it("keeps going when the host refuses a constraint", () => {
            const scene = new MemoryScene();
            vi.spyOn(scene, "createIKConstraint").mockImplementation(() => {
                throw new Error("no IK here");
            });
            const summary = builderFor(ikModel(), scene).build();
            expect(summary.ikConstraintCount).toBe(0);
            expect(summary.warnings).toEqual([{ section: "bones", message: "IK constraint on bone 1 (LegIK) failed: no IK here" }]);
            expect(summary.boneCount).toBe(3);
        });
    });

    describe("morphs", () => {
        function morphModel(): FixtureModel {
            return {
                ...singleTriangleModel(),
                morphs: [
                    { kind: "vertex", name: "Smile", offsets: [{ vertex: 0, offset: [0, 0.25, 0] }, { vertex: 9, offset: [1, 0, 0] }] },
                    { kind: "material", name: "Fade", offsets: [{ material: -1, diffuse: [0, 0, 0, 0] }, { material: 4 }] },
                    { kind: "raw", name: "Group", kindId: 0, offsetCount: 0, data: [] },
                ],
            };
        }

        it("creates a basis and one shape key per vertex morph", () => {
            const { scene, summary } = buildModel(morphModel());
            const keys = scene.meshes[0].shapeKeys;
            expect(keys.map((k) => k.name)).toEqual(["Basis", "Smile"]);
            expect(keys[0].offsets.size).toBe(0);
            expect([...keys[1].offsets.keys()]).toEqual([0]);
            expect(Array.from(keys[1].offsets.get(0) ?? [])).toEqual([0, 0, 0.25]);
            expect(summary.shapeKeyCount).toBe(1);
        });

        it("applies material morphs, records skipped kinds and warns about bad references", () => {
            const { scene, summary } = buildModel(morphModel());
            expect(scene.materials[0].morphs.map((m) => m.name)).toEqual(["Fade"]);
            expect(summary.skippedMorphs).toEqual([{ index: 2, name: "Group", kindId: 0 }]);
            expect(summary.warnings).toEqual([
                { section: "morphs", message: "morph 0 (Smile) moves vertex 9, which does not exist" },
                { section: "morphs", message: "morph 1 (Fade) targets material 4, which does not exist" },
            ]);
        });

        it("creates no basis for a model without vertex morphs", () => {
            const model: FixtureModel = { ...singleTriangleModel(), morphs: [{ kind: "material", name: "Fade", offsets: [{ material: 0 }] }] };
            const { scene } = buildModel(model);
            expect(scene.meshes[0].shapeKeys).toEqual([]);
        });

        it("skips the pass when morphs are turned off", () => {
            const { scene, summary } = buildModel(morphModel(), { importMorphs: false });
            expect(scene.meshes[0].shapeKeys).toEqual([]);
            expect(scene.materials[0].morphs).toEqual([]);
            expect(summary.skippedMorphs).toEqual([]);
            expect(summary.warnings).toEqual([]);
        });
    });

    describe("physics", () => {
        it("creates rigid bodies and attaches them to bones", () => {
            const model: FixtureModel = {
                ...singleTriangleModel(),
                rigidBodies: [
                    { name: "Chest", bone: 0, shape: 1, size: [1, 2, 3], position: [0, 1, 2], rotation: [0.5, 0.25, 0] },
                    { name: "Bad", bone: 7 },
                    { name: "Odd", shape: 9, size: [1, 2, 3] },
                ],
            };
            const { scene, summary } = buildModel(model, { scale: 2 });

            expect(summary.rigidBodyCount).toBe(3);
            const [chest, bad, odd] = scene.rigidBodies;
            expect(chest.descriptor.name).toBe("rigid_Chest");
            expect(Array.from(chest.descriptor.size)).toEqual([2, 6, 4]);
            expect(Array.from(chest.descriptor.position)).toEqual([0, 4, 2]);
            expect(Array.from(chest.descriptor.rotation)).toEqual([0.5, 0, 0.25]);
            expect(chest.attachedBone).toBe(scene.findBone("Root"));

            expect(bad.attachedBone).toBeNull();
            expect(odd.descriptor.shape).toBe(0);
            expect(Array.from(odd.descriptor.size)).toEqual([2, 4, 6]);

            expect(summary.warnings).toEqual([
                { section: "rigidBodies", message: "rigid body 1 (Bad) is attached to bone 7, which does not exist" },
                { section: "rigidBodies", message: "rigid body 2 (Odd) has unknown shape 9, using a sphere" },
            ]);
        });

        it("leaves a joint unconstrained when it references a missing rigid body", () => {
            const model: FixtureModel = {
                ...singleTriangleModel(),
                rigidBodies: [{ name: "Body" }],
                joints: [{ name: "J", rigidBodyA: 0, rigidBodyB: 3, linearLowerLimit: [-1, 0, 2], angularUpperLimit: [0.5, 0.25, 0] }],
            };
            const { scene, summary } = buildModel(model, { scale: 2 });

            expect(summary.jointCount).toBe(1);
            expect(summary.warnings).toEqual([{ section: "joints", message: "joint 0 (J) references rigid body 3, which does not exist" }]);
            const joint = scene.joints[0];
            expect(joint.descriptor.name).toBe("joint_J");
            expect(joint.bodyA).toBe(scene.rigidBodies[0]);
            expect(joint.bodyB).toBeNull();
            expect(Array.from(joint.descriptor.linearLowerLimit)).toEqual([-2, 4, 0]);
            expect(Array.from(joint.descriptor.angularUpperLimit)).toEqual([0.5, 0, 0.25]);
        });

        it("records a refused joint as a warning", () => {
            const scene = new MemoryScene();
            vi.spyOn(scene, "createJoint").mockImplementation(() => {
                throw new Error("nope");
            });
            const model: FixtureModel = { ...singleTriangleModel(), rigidBodies: [{ name: "Body" }], joints: [{ name: "J", rigidBodyA: 0, rigidBodyB: 0 }] };
            const summary = builderFor(model, scene).build();
            expect(summary.jointCount).toBe(0);
            expect(summary.warnings).toEqual([{ section: "joints", message: "joint 0 (J) failed: nope" }]);
        });

        it("skips the pass when physics is turned off", () => {
            const model: FixtureModel = { ...singleTriangleModel(), rigidBodies: [{ name: "Body" }], joints: [{ name: "J", rigidBodyA: 0, rigidBodyB: 0 }] };
            const { scene, summary } = buildModel(model, { importPhysics: false });
            expect(scene.rigidBodies).toEqual([]);
            expect(scene.joints).toEqual([]);
            expect(summary.rigidBodyCount).toBe(0);
        });
    });

    it("reports every checkpoint in order, including skipped passes", () => {
        const stages: BuildStage[] = [];
        builderFor(singleTriangleModel(), new MemoryScene(), { importMorphs: false, importPhysics: false }).build((stage) => stages.push(stage));
        expect(stages).toEqual(["vertices", "materials", "faces", "bones", "morphs", "physics", "finalize"]);
    });

    it("records a refused armature binding as a warning", () => {
        const scene = new MemoryScene();
        vi.spyOn(scene, "bindMeshToArmature").mockImplementation(() => {
            throw new Error("already bound");
        });
        const summary = builderFor(singleTriangleModel(), scene).build();
        expect(summary.warnings).toEqual([{ section: "finalize", message: "binding mesh to armature failed: already bound" }]);
        expect(scene.meshes[0].armature).toBeNull();
    });
});
