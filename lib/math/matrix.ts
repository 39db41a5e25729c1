import { mat4, vec4, type ReadonlyMat4 } from "gl-matrix"
import { toRad } from "../utils/toRad"
import type { MutableVec4, Vec3, Vec4 } from "./vector"

export type Mat4 = mat4
export type { ReadonlyMat4 }

// gl-matrix allocates Float32Array by default; all matrices here are float64.
function allocMat4(): Mat4 {
  return new Float64Array(16)
}

export function identity(): Mat4 {
  return mat4.identity(allocMat4())
}

/**
 * Composes two transforms. Applying the result to a column vector is the same
 * as applying `b` first and then `a`.
 */
export function multiply(a: ReadonlyMat4, b: ReadonlyMat4): Mat4 {
  return mat4.multiply(allocMat4(), a, b)
}

export function transformVec4(m: ReadonlyMat4, v: Vec4): MutableVec4 {
  const out: MutableVec4 = [0, 0, 0, 0]
  vec4.transformMat4(out, v, m)
  return out
}

export function transformPoint(m: ReadonlyMat4, p: Vec3): MutableVec4 {
  return transformVec4(m, [p[0], p[1], p[2], 1])
}

export function translation(v: Vec3): Mat4 {
  return mat4.fromTranslation(allocMat4(), v)
}

export function rotationY(rad: number): Mat4 {
  return mat4.fromYRotation(allocMat4(), rad)
}

export function perspective(
  fovDeg: number,
  aspect: number,
  near: number,
  far: number,
): Mat4 {
  return mat4.perspective(allocMat4(), toRad(fovDeg), aspect, near, far)
}

/**
 * World-to-camera transform. The camera basis is forward = eye - target,
 * right = up x forward, up' = forward x right, and the eye translation is
 * folded into the last column.
 */
export function lookAt(eye: Vec3, target: Vec3, up: Vec3): Mat4 {
  return mat4.lookAt(allocMat4(), eye, target, up)
}
