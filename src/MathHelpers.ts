
import { vec3, type ReadonlyVec3 } from "gl-matrix";

// Misc bits of 3D math.

export const Vec3Zero: ReadonlyVec3  = vec3.fromValues(0, 0, 0);
export const Vec3UnitY: ReadonlyVec3 = vec3.fromValues(0, 1, 0);

export function normToLength(dst: vec3, len: number): void {
    const vlen = vec3.length(dst);
    if (vlen > 0) {
        const inv = len / vlen;
        dst[0] = dst[0] * inv;
        dst[1] = dst[1] * inv;
        dst[2] = dst[2] * inv;
    }
}

/**
 * Move a Y-up vector into a Z-up space by exchanging its Y and Z components, then scale it.
 * {@param dst} may alias {@param v}.
 */
export function swapYZAndScale(dst: vec3, v: ReadonlyVec3, swapYZ: boolean, scale: number): vec3 {
    const x = v[0], y = v[1], z = v[2];
    if (swapYZ)
        return vec3.set(dst, x * scale, z * scale, y * scale);
    else
        return vec3.set(dst, x * scale, y * scale, z * scale);
}
