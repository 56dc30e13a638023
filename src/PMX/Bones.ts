
import { vec3, type ReadonlyVec3 } from "gl-matrix";
import { normToLength, Vec3UnitY } from "../MathHelpers.js";
import { CyclicBoneHierarchyError, DanglingIndexError } from "./Errors.js";
import type { PMXBone } from "./PMX.js";

const enum VisitState {
    Unvisited,
    InProgress,
    Done,
}

/**
 * Check that every parent reference points at an existing bone and that following
 * parents from any bone ends at a root.
 *
 * @throws {DanglingIndexError} on a parent index outside the bone table
 * @throws {CyclicBoneHierarchyError} on a bone that is its own ancestor
 */
export function validateBoneHierarchy(bones: ReadonlyArray<PMXBone>): void {
    for (let i = 0; i < bones.length; i++) {
        const parent = bones[i].parent;
        if (parent !== null && (parent < 0 || parent >= bones.length))
            throw new DanglingIndexError("bones", "bone", parent, i);
    }

    const state: VisitState[] = bones.map(() => VisitState.Unvisited);
    for (let i = 0; i < bones.length; i++) {
        if (state[i] !== VisitState.Unvisited)
            continue;

        const chain: number[] = [];
        let cur: number | null = i;
        while (cur !== null && state[cur] === VisitState.Unvisited) {
            state[cur] = VisitState.InProgress;
            chain.push(cur);
            cur = bones[cur].parent;
        }

        if (cur !== null && state[cur] === VisitState.InProgress)
            throw new CyclicBoneHierarchyError(cur, bones[cur].name);

        for (const j of chain)
            state[j] = VisitState.Done;
    }
}

function computeBoneDepths(bones: ReadonlyArray<PMXBone>): number[] {
    const depths: number[] = bones.map(() => -1);
    const chain: number[] = [];
    for (let i = 0; i < bones.length; i++) {
        // Climb until a bone of known depth or past the root, then unwind.
        let cur: number | null = i;
        while (cur !== null && depths[cur] < 0) {
            chain.push(cur);
            cur = bones[cur].parent;
        }

        let depth = cur === null ? -1 : depths[cur];
        for (let j = chain.length - 1; j >= 0; j--)
            depths[chain[j]] = ++depth;
        chain.length = 0;
    }
    return depths;
}

/**
 * Order in which bones can be created so that every parent exists before its children.
 * Bones at the same depth keep document order. Assumes a validated hierarchy.
 */
export function computeBoneCreationOrder(bones: ReadonlyArray<PMXBone>): number[] {
    const depths = computeBoneDepths(bones);
    const order = bones.map((_, i) => i);
    // Array.prototype.sort is stable.
    order.sort((a, b) => depths[a] - depths[b]);
    return order;
}

/**
 * Push the tail out along the bone's direction until the bone is at least minLength long.
 * A bone with no direction at all is pointed along fallbackAxis. Returns whether the tail moved.
 */
export function enforceMinimumBoneLength(head: ReadonlyVec3, tail: vec3, minLength: number, fallbackAxis: ReadonlyVec3 = Vec3UnitY): boolean {
    const dir = vec3.sub(vec3.create(), tail, head);
    const length = vec3.length(dir);
    if (length >= minLength)
        return false;

    if (length === 0)
        vec3.copy(dir, fallbackAxis);
    normToLength(dir, minLength);
    vec3.add(tail, head, dir);
    return true;
}
