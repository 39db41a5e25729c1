import { vec3 } from "gl-matrix"

export type Vec3 = readonly [number, number, number]
export type MutableVec3 = [number, number, number]
export type Vec4 = readonly [number, number, number, number]
export type MutableVec4 = [number, number, number, number]

export const ZERO_VEC3: Vec3 = [0, 0, 0]

export function add(a: Vec3, b: Vec3): MutableVec3 {
  const out: MutableVec3 = [0, 0, 0]
  vec3.add(out, a, b)
  return out
}

export function subtract(a: Vec3, b: Vec3): MutableVec3 {
  const out: MutableVec3 = [0, 0, 0]
  vec3.subtract(out, a, b)
  return out
}

export function scale(a: Vec3, s: number): MutableVec3 {
  const out: MutableVec3 = [0, 0, 0]
  vec3.scale(out, a, s)
  return out
}

export function dot(a: Vec3, b: Vec3): number {
  return vec3.dot(a, b)
}

export function cross(a: Vec3, b: Vec3): MutableVec3 {
  const out: MutableVec3 = [0, 0, 0]
  vec3.cross(out, a, b)
  return out
}

export function length(a: Vec3): number {
  return vec3.length(a)
}

/**
 * Unit vector in the direction of `a`. A zero-length input yields the zero
 * vector instead of NaNs.
 */
export function normalize(a: Vec3): MutableVec3 {
  const out: MutableVec3 = [0, 0, 0]
  vec3.normalize(out, a)
  return out
}

export function negate(a: Vec3): MutableVec3 {
  const out: MutableVec3 = [0, 0, 0]
  vec3.negate(out, a)
  return out
}
