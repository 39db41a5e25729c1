import type { MutableVec3 } from "../math/vector"

export type Point2 = readonly [number, number]

/** Below this the triangle is treated as having no area. */
export const DEGENERATE_EPSILON = 1e-5

/**
 * Per-triangle terms of the dot-product barycentric formulation. `denom` is
 * the squared length of (b - a) x (c - a).
 */
export interface BarycentricBasis {
  ax: number
  ay: number
  v0x: number
  v0y: number
  v1x: number
  v1y: number
  d00: number
  d01: number
  d11: number
  denom: number
}

/** Returns null when the triangle is (near) zero area or not finite. */
export function createBarycentricBasis(
  a: Point2,
  b: Point2,
  c: Point2,
): BarycentricBasis | null {
  const v0x = b[0] - a[0]
  const v0y = b[1] - a[1]
  const v1x = c[0] - a[0]
  const v1y = c[1] - a[1]
  const d00 = v0x * v0x + v0y * v0y
  const d01 = v0x * v1x + v0y * v1y
  const d11 = v1x * v1x + v1y * v1y
  const denom = d00 * d11 - d01 * d01
  if (!(Math.abs(denom) >= DEGENERATE_EPSILON) || !isFinite(denom)) return null
  return { ax: a[0], ay: a[1], v0x, v0y, v1x, v1y, d00, d01, d11, denom }
}

/**
 * Writes the weights (u, v, w) of point (px, py) into `out`. The corners
 * evaluate to exactly (1,0,0), (0,1,0) and (0,0,1).
 */
export function barycentricAt(
  basis: BarycentricBasis,
  px: number,
  py: number,
  out: MutableVec3,
): MutableVec3 {
  const { v0x, v0y, v1x, v1y, d00, d01, d11, denom } = basis
  const v2x = px - basis.ax
  const v2y = py - basis.ay
  const d20 = v2x * v0x + v2y * v0y
  const d21 = v2x * v1x + v2y * v1y
  const v = (d11 * d20 - d01 * d21) / denom
  const w = (d00 * d21 - d01 * d20) / denom
  out[0] = 1 - v - w
  out[1] = v
  out[2] = w
  return out
}

/** Weights of `p` against `a`, `b`, `c`, or null for a degenerate triangle. */
export function computeBarycentric(
  a: Point2,
  b: Point2,
  c: Point2,
  p: Point2,
): MutableVec3 | null {
  const basis = createBarycentricBasis(a, b, c)
  if (!basis) return null
  return barycentricAt(basis, p[0], p[1], [0, 0, 0])
}
